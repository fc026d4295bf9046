import type { RedactionCategory, RedactionRule } from "./types.js";

const MONTH =
  "(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)";

// Whitespace that may cross one line break but not a blank line.
const GAP = "(?:[^\\S\\n]+|[^\\S\\n]*\\n[^\\S\\n]*)";

const OCTET = "(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";

/**
 * Redaction rules in precedence order. A rule earlier in the table consumes
 * its span before any later rule runs, so the more specific (and longer)
 * shapes come first: a URL swallows the IP or e-mail inside it, a customer
 * reference swallows the digits a phone rule would otherwise take.
 *
 * No placeholder may match any pattern in this table. A match that spans a
 * line break becomes one placeholder per line, so lines never merge.
 */
export const REDACTION_RULES: readonly RedactionRule[] = Object.freeze([
  {
    category: "URL",
    placeholder: "[URL]",
    description: "Absolute URLs, connection strings and bare www hosts",
    patterns: [/\b[a-z][a-z0-9+.-]*:\/\/[^\s<>"'()[\]]+|(?<!@)\bwww\.[^\s<>"'()[\]]+/gi],
  },
  {
    category: "Email",
    placeholder: "[EMAIL]",
    description: "E-mail addresses",
    patterns: [/[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g],
  },
  {
    category: "ApiKey",
    placeholder: "[API_KEY]",
    description: "Credential assignments and well-known key formats",
    patterns: [
      /\b(?:api[_-]?key|secret|token|password|passwd|pwd)\s*[:=]\s*["']?[^\s"']+["']?/gi,
      /\b(?:sk|pk|rk)[-_][A-Za-z0-9_-]{16,}|\bgh[pousr]_[A-Za-z0-9]{20,}|\bAKIA[0-9A-Z]{16}\b|\bxox[abprs]-[A-Za-z0-9-]{10,}|\beyJ[A-Za-z0-9_-]*\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*/g,
    ],
  },
  {
    category: "IPAddress",
    placeholder: "[IP_ADDRESS]",
    description: "IPv4 and full-form IPv6 addresses",
    patterns: [
      new RegExp(`\\b(?:${OCTET}\\.){3}${OCTET}\\b`, "g"),
      /\b(?:[0-9a-f]{1,4}:){7}[0-9a-f]{1,4}\b/gi,
    ],
  },
  {
    category: "CustomerId",
    placeholder: "[CUSTOMER_ID]",
    description: "Prefixed account references and labelled customer numbers",
    patterns: [
      /\b[A-Z]{2,}(?:-[A-Z0-9]+)*-\d{2,}(?:-[A-Z0-9]+)*\b/g,
      /\b(?:customer|account|client|order|invoice)\s*(?:id|no\.?|number|#)\s*[:#]?\s*[A-Za-z0-9-]+/gi,
    ],
  },
  {
    category: "Other",
    placeholder: "[REDACTED]",
    description: "IBANs, card numbers and national identifiers",
    patterns: [
      /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{4}){3,7}(?: ?[A-Z0-9]{1,3})?\b/g,
      /\b\d(?:[ -]?\d){12,18}\b/g,
      /\b\d{3}-\d{2}-\d{4}\b/g,
    ],
  },
  {
    category: "Date",
    placeholder: "[DATE]",
    description: "Calendar dates in numeric and written forms",
    patterns: [
      /\b\d{4}-\d{1,2}-\d{1,2}\b/g,
      /\b\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}\b/g,
      new RegExp(`\\b${MONTH}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s+\\d{4})?\\b`, "g"),
      new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+${MONTH}\\b(?:,?\\s+\\d{4})?`, "g"),
    ],
  },
  {
    category: "Phone",
    placeholder: "[PHONE]",
    description: "Phone numbers with optional country code",
    patterns: [/(?<![\w+])(?:\+\d{1,3}[\s.-]?)?(?:\(\d{3}\)|\d{3})[\s.-]?\d{3}[\s.-]?\d{4}\b/g],
  },
  {
    category: "Address",
    placeholder: "[ADDRESS]",
    description: "Street addresses",
    patterns: [
      /\b\d{1,5}\s+(?:[A-Z][a-z]+\s+){1,3}(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr|Court|Ct|Way|Place|Pl)\b\.?/g,
    ],
  },
  {
    category: "Name",
    placeholder: "[NAME]",
    description: "Honorific names and runs of capitalised words",
    patterns: [
      new RegExp(`\\b(?:Mr|Mrs|Ms|Mx|Dr|Prof)\\.?${GAP}[A-Z][a-z]+(?:${GAP}[A-Z][a-z]+)?`, "g"),
      new RegExp(`\\b[A-Z][a-z]+(?:${GAP}[A-Z][a-z]+)+\\b`, "g"),
    ],
  },
] satisfies RedactionRule[]);

export function placeholderFor(category: RedactionCategory): string {
  const rule = REDACTION_RULES.find((r) => r.category === category);
  if (!rule) {
    throw new Error(`No redaction rule for category ${category}`);
  }
  return rule.placeholder;
}

export const PLACEHOLDER_PATTERN = /\[(?:NAME|EMAIL|PHONE|URL|IP_ADDRESS|API_KEY|CUSTOMER_ID|ADDRESS|DATE|REDACTED)\]/g;
