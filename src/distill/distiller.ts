import {
  COGNITION_MODEL_VERSION,
  createProfile,
  type CognitionProfile,
  type SectionName,
} from "../cognition/types.js";
import type { Logger } from "../logging/logger.js";
import { Redactor } from "../redaction/redactor.js";
import { PLACEHOLDER_PATTERN } from "../redaction/rules.js";
import { SectionClassifier } from "./classifier.js";
import { defaultLexicon, type Lexicon } from "./tables.js";
import type { DistillReport, DropReason, MemoryKind, MemorySource } from "./types.js";

export interface DistillerOptions {
  readonly redactor?: Redactor;
  readonly classifier?: SectionClassifier;
  readonly lexicon?: Lexicon;
  readonly maxBulletsPerSection?: number;
  readonly logger?: Logger;
}

const DEFAULT_MAX_BULLETS = 12;

const KIND_ORDER: Readonly<Record<MemoryKind, number>> = { fact: 0, event: 1 };

const LIST_MARKER = /^\s*(?:[-*+]|\d+[.)])\s+/;
const CHECKBOX = /^\[[ xX]\]\s+/;
const INLINE_MARKUP = /\*\*|__|`/g;

export function orderSources(sources: readonly MemorySource[]): MemorySource[] {
  // Array.prototype.sort is stable, so same-kind sources keep caller order.
  return [...sources].sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind]);
}

export function toCandidate(line: string): string {
  return line
    .replace(LIST_MARKER, "")
    .replace(CHECKBOX, "")
    .replace(INLINE_MARKUP, "")
    .trim();
}

export class Distiller {
  private readonly redactor: Redactor;
  private readonly classifier: SectionClassifier;
  private readonly lexicon: Lexicon;
  private readonly maxBullets: number;
  private readonly logger: Logger | undefined;

  constructor(opts: DistillerOptions = {}) {
    this.redactor = opts.redactor ?? new Redactor({ logger: opts.logger });
    this.classifier = opts.classifier ?? new SectionClassifier();
    this.lexicon = opts.lexicon ?? defaultLexicon();
    this.maxBullets = opts.maxBulletsPerSection ?? DEFAULT_MAX_BULLETS;
    this.logger = opts.logger?.child({ component: "distiller" });
  }

  distill(sources: readonly MemorySource[]): CognitionProfile {
    return this.distillDetailed(sources).profile;
  }

  distillDetailed(sources: readonly MemorySource[]): DistillReport {
    const combined = orderSources(sources)
      .map((s) => s.text)
      .join("\n\n");

    // One pass over the whole concatenation so a value broken across
    // lines is still seen. Throws before any line is classified.
    const redaction = this.redactor.redact(combined);

    const bullets: Record<SectionName, string[]> = {
      CoreThinkingPatterns: [],
      DecisionApproach: [],
      LearningStyle: [],
      ExecutionTendencies: [],
      CognitiveStrengths: [],
      ExperienceThemes: [],
    };
    const seen = new Set<string>();
    const dropped: Partial<Record<DropReason, number>> = {};
    const drop = (reason: DropReason): void => {
      dropped[reason] = (dropped[reason] ?? 0) + 1;
    };

    let candidates = 0;
    let kept = 0;

    for (const raw of redaction.text.split(/\r?\n/)) {
      const candidate = toCandidate(raw);
      if (candidate.length === 0) continue;
      candidates++;

      const verdict = this.classifier.inspect(candidate);
      if (verdict.section === null) {
        drop(verdict.reason);
        continue;
      }

      const bullet = this.generalize(candidate);
      if (bullet === null) {
        drop("uncertain");
        continue;
      }

      const key = bullet.toLowerCase();
      if (seen.has(key)) {
        drop("duplicate");
        continue;
      }

      const target = bullets[verdict.section];
      if (target.length >= this.maxBullets) {
        drop("section_full");
        continue;
      }

      seen.add(key);
      target.push(bullet);
      kept++;
    }

    this.logger?.debug(
      { sources: sources.length, candidates, kept, dropped },
      "distillation complete",
    );

    return {
      profile: createProfile(bullets, COGNITION_MODEL_VERSION),
      redactions: redaction.counts,
      candidates,
      kept,
      dropped,
    };
  }

  /**
   * Rewrites placeholders and cue-noun fragments into abstract wording.
   * Returns null when anything that could identify someone is left and the
   * line cannot be made safe with confidence.
   */
  generalize(line: string): string | null {
    let text = line;
    for (const rule of this.lexicon.generalizations) {
      text = text.replace(rule.pattern, rule.replacement);
    }

    text = text
      .replace(/\(\s*\)/g, "")
      .replace(/\s+/g, " ")
      .replace(/\s+([,.;:!?])/g, "$1")
      .replace(/([,;:])(?=[,.;:!?]|$)/g, "")
      .trim();

    if (text.length === 0) return null;
    if (new RegExp(PLACEHOLDER_PATTERN.source).test(text)) return null;
    if (this.hasUnexplainedProperNoun(text)) return null;
    return text;
  }

  private hasUnexplainedProperNoun(text: string): boolean {
    const words = text.split(" ");
    let sentenceStart = true;
    for (const word of words) {
      const bare = word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
      if (bare.length > 0 && /^\p{Lu}/u.test(bare) && !this.lexicon.allowedCapitalized.has(bare)) {
        // A capital at a sentence start only passes for a known opening word,
        // and never as an acronym or mixed-case identifier.
        if (
          !sentenceStart ||
          /\p{Lu}.*\p{Lu}/u.test(bare) ||
          !this.lexicon.sentenceStarters.has(bare.toLowerCase())
        ) {
          return true;
        }
      }
      if (bare.length > 0) sentenceStart = /[.!?:]$/.test(word);
    }
    return false;
  }
}
