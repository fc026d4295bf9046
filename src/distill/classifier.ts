import type { SectionName } from "../cognition/types.js";
import { PLACEHOLDER_PATTERN } from "../redaction/rules.js";
import { defaultClassifierTable, type ClassifierTable } from "./tables.js";

export type DiscardReason =
  | "empty"
  | "structural"
  | "boilerplate"
  | "too_short"
  | "unmatched";

export type ClassifierVerdict =
  | { readonly section: SectionName }
  | { readonly section: null; readonly reason: DiscardReason };

export interface SectionClassifierOptions {
  readonly table?: ClassifierTable;
  readonly minTokens?: number;
}

const DEFAULT_MIN_TOKENS = 4;

// Headings, table rows, fences, rules and quotes carry layout, not content.
const STRUCTURAL_LINE = /^(?:#|\||```|~~~|>|-{3,}$|\*{3,}$|_{3,}$)/;

/**
 * Maps one redacted line to a cognition section. First predicate in table
 * order wins; anything that matches nothing is discarded rather than
 * defaulted into a catch-all bucket.
 */
export class SectionClassifier {
  private readonly table: ClassifierTable;
  private readonly minTokens: number;

  constructor(opts: SectionClassifierOptions = {}) {
    this.table = opts.table ?? defaultClassifierTable();
    this.minTokens = opts.minTokens ?? DEFAULT_MIN_TOKENS;
  }

  classify(redactedLine: string): SectionName | null {
    return this.inspect(redactedLine).section;
  }

  inspect(redactedLine: string): ClassifierVerdict {
    const line = redactedLine.trim();
    if (line.length === 0) return { section: null, reason: "empty" };
    if (STRUCTURAL_LINE.test(line)) return { section: null, reason: "structural" };

    // Placeholders neither count as content nor steer the section choice.
    const content = line.replace(PLACEHOLDER_PATTERN, " ").replace(/\s+/g, " ").trim();
    const lower = content.toLowerCase();

    if (this.isBoilerplate(lower)) return { section: null, reason: "boilerplate" };

    const tokens = content.split(" ").filter((t) => /[a-z0-9]/i.test(t));
    if (tokens.length < this.minTokens) return { section: null, reason: "too_short" };

    for (const predicate of this.table.predicates) {
      if (predicate.matcher.test(lower)) return { section: predicate.section };
    }
    return { section: null, reason: "unmatched" };
  }

  private isBoilerplate(lower: string): boolean {
    const bare = lower.replace(/[\s.:;!]+$/, "");
    return this.table.boilerplate.some((entry) => {
      if (bare === entry) return true;
      if (entry.includes(" ") || entry.startsWith("(")) return lower.includes(entry);
      // Single words only count as a leading marker, e.g. "TODO: ..."
      return new RegExp(`^${entry.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\b\\W`).test(bare);
    });
  }
}
