import { readFileSync } from "node:fs";
import { z } from "zod";
import { SECTION_NAMES, type SectionName } from "../cognition/types.js";

const classifierFileSchema = z.object({
  sections: z
    .array(
      z.object({
        section: z.enum(SECTION_NAMES),
        keywords: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
  boilerplate: z.array(z.string().min(1)).default([]),
});

const lexiconFileSchema = z.object({
  allowedCapitalized: z.array(z.string().min(1)).default([]),
  sentenceStarters: z.array(z.string().min(1)).default([]),
  generalizations: z
    .array(z.object({ pattern: z.string().min(1), replacement: z.string() }))
    .default([]),
});

export interface SectionPredicate {
  readonly section: SectionName;
  readonly keywords: readonly string[];
  readonly matcher: RegExp;
}

export interface ClassifierTable {
  readonly predicates: readonly SectionPredicate[];
  readonly boilerplate: readonly string[];
}

export interface GeneralizationRule {
  readonly pattern: RegExp;
  readonly replacement: string;
}

export interface Lexicon {
  readonly allowedCapitalized: ReadonlySet<string>;
  /** Lower-cased words that may open a sentence capitalised. */
  readonly sentenceStarters: ReadonlySet<string>;
  readonly generalizations: readonly GeneralizationRule[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function readDataFile(name: string): unknown {
  const url = new URL(`../../data/${name}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf-8"));
}

export function buildClassifierTable(raw: unknown): ClassifierTable {
  const parsed = classifierFileSchema.parse(raw);
  return Object.freeze({
    predicates: Object.freeze(
      parsed.sections.map((entry) => ({
        section: entry.section,
        keywords: Object.freeze([...entry.keywords]),
        // Keywords are word prefixes: "iterat" covers iterate and iteration.
        matcher: new RegExp(
          `\\b(?:${entry.keywords.map((k) => escapeRegExp(k.toLowerCase())).join("|")})`,
        ),
      })),
    ),
    boilerplate: Object.freeze(parsed.boilerplate.map((b) => b.toLowerCase())),
  });
}

export function buildLexicon(raw: unknown): Lexicon {
  const parsed = lexiconFileSchema.parse(raw);
  return Object.freeze({
    allowedCapitalized: new Set(parsed.allowedCapitalized),
    sentenceStarters: new Set(parsed.sentenceStarters.map((w) => w.toLowerCase())),
    generalizations: Object.freeze(
      parsed.generalizations.map((g) => ({
        pattern: new RegExp(g.pattern, "g"),
        replacement: g.replacement,
      })),
    ),
  });
}

let classifierTable: ClassifierTable | undefined;
let lexicon: Lexicon | undefined;

/** Loaded once per process; the tables are immutable afterwards. */
export function defaultClassifierTable(): ClassifierTable {
  classifierTable ??= buildClassifierTable(readDataFile("classifier.json"));
  return classifierTable;
}

export function defaultLexicon(): Lexicon {
  lexicon ??= buildLexicon(readDataFile("lexicon.json"));
  return lexicon;
}
