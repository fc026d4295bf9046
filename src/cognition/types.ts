export const COGNITION_MODEL_VERSION = "2.0";

export const SECTION_NAMES = [
  "CoreThinkingPatterns",
  "DecisionApproach",
  "LearningStyle",
  "ExecutionTendencies",
  "CognitiveStrengths",
  "ExperienceThemes",
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export const SECTION_TITLES: Readonly<Record<SectionName, string>> = {
  CoreThinkingPatterns: "Core Thinking Patterns",
  DecisionApproach: "Decision Approach",
  LearningStyle: "Learning Style",
  ExecutionTendencies: "Execution Tendencies",
  CognitiveStrengths: "Cognitive Strengths",
  ExperienceThemes: "Generalized Experience Themes",
};

export interface CognitionSection {
  readonly name: SectionName;
  readonly bullets: readonly string[];
}

/**
 * Sections always appear in `SECTION_NAMES` order, one entry each.
 * Never holds source text: only bullets that survived redaction,
 * classification and generalization.
 */
export interface CognitionProfile {
  readonly sections: readonly CognitionSection[];
  readonly modelVersion: string;
}

export function isSectionName(value: string): value is SectionName {
  return SECTION_NAMES.some((name) => name === value);
}

export function createProfile(
  bullets: Partial<Record<SectionName, readonly string[]>>,
  modelVersion: string = COGNITION_MODEL_VERSION,
): CognitionProfile {
  return Object.freeze({
    sections: Object.freeze(
      SECTION_NAMES.map((name) =>
        Object.freeze({ name, bullets: Object.freeze([...(bullets[name] ?? [])]) }),
      ),
    ),
    modelVersion,
  });
}

export function bulletCount(profile: CognitionProfile): number {
  return profile.sections.reduce((n, s) => n + s.bullets.length, 0);
}
