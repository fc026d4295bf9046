import { RedactionError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { REDACTION_RULES } from "./rules.js";
import {
  REDACTION_CATEGORIES,
  type RedactionCategory,
  type RedactionCounts,
  type RedactionResult,
  type RedactionRule,
} from "./types.js";

export interface RedactorOptions {
  readonly rules?: readonly RedactionRule[];
  /** Upper bound on full passes before the output must be stable. */
  readonly maxPasses?: number;
  readonly logger?: Logger;
}

const DEFAULT_MAX_PASSES = 4;

function emptyCounts(): Record<RedactionCategory, number> {
  return {
    Name: 0,
    Email: 0,
    Phone: 0,
    URL: 0,
    IPAddress: 0,
    ApiKey: 0,
    CustomerId: 0,
    Address: 0,
    Date: 0,
    Other: 0,
  };
}

export function formatCounts(counts: RedactionCounts): string {
  return REDACTION_CATEGORIES.filter((c) => counts[c] > 0)
    .map((c) => `${c}=${counts[c]}`)
    .join(", ");
}

export class Redactor {
  private readonly rules: readonly RedactionRule[];
  private readonly maxPasses: number;
  private readonly logger: Logger | undefined;

  constructor(opts: RedactorOptions = {}) {
    this.rules = opts.rules ?? REDACTION_RULES;
    this.maxPasses = opts.maxPasses ?? DEFAULT_MAX_PASSES;
    this.logger = opts.logger?.child({ component: "redactor" });
  }

  redact(text: string): RedactionResult {
    const counts = emptyCounts();
    let current = text;

    for (let pass = 0; pass < this.maxPasses; pass++) {
      const next = this.applyRules(current, counts);
      if (next === current) {
        this.assertClosed(next);
        this.logger?.debug({ passes: pass + 1, counts }, "redaction complete");
        return { text: next, counts };
      }
      current = next;
    }

    // Still changing after the last pass: refuse rather than hand back
    // something that might contain a match.
    throw new RedactionError(`output did not stabilise after ${this.maxPasses} passes`);
  }

  /** Per-category match counts over the raw text, without rewriting it. */
  countMatches(text: string): RedactionCounts {
    return this.redact(text).counts;
  }

  private applyRules(text: string, counts: Record<RedactionCategory, number>): string {
    let out = text;
    for (const rule of this.rules) {
      for (const pattern of rule.patterns) {
        out = this.replaceAll(out, rule, pattern, counts);
      }
    }
    return out;
  }

  private replaceAll(
    text: string,
    rule: RedactionRule,
    pattern: RegExp,
    counts: Record<RedactionCategory, number>,
  ): string {
    try {
      return text.replace(pattern, (match: string) => {
        counts[rule.category]++;
        return match
          .split("\n")
          .map(() => rule.placeholder)
          .join("\n");
      });
    } catch (err) {
      throw new RedactionError(`${rule.category} matcher failed`, err);
    }
  }

  private assertClosed(text: string): void {
    for (const rule of this.rules) {
      for (const pattern of rule.patterns) {
        pattern.lastIndex = 0;
        let matched: boolean;
        try {
          matched = pattern.test(text);
        } catch (err) {
          throw new RedactionError(`${rule.category} matcher failed`, err);
        } finally {
          pattern.lastIndex = 0;
        }
        if (matched) {
          throw new RedactionError(`${rule.category} match survived redaction`);
        }
      }
    }
  }
}

const defaultRedactor = new Redactor();

export function redact(text: string): RedactionResult {
  return defaultRedactor.redact(text);
}
