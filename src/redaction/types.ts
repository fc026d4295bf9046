export const REDACTION_CATEGORIES = [
  "Name",
  "Email",
  "Phone",
  "URL",
  "IPAddress",
  "ApiKey",
  "CustomerId",
  "Address",
  "Date",
  "Other",
] as const;

export type RedactionCategory = (typeof REDACTION_CATEGORIES)[number];

export interface RedactionRule {
  readonly category: RedactionCategory;
  readonly placeholder: string;
  readonly description: string;
  /** Global regexes; the first pattern of a rule is tried first. */
  readonly patterns: readonly RegExp[];
}

export type RedactionCounts = Readonly<Record<RedactionCategory, number>>;

export interface RedactionResult {
  readonly text: string;
  readonly counts: RedactionCounts;
}
