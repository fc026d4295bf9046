import { createHash, randomBytes } from "node:crypto";

export interface IssuedToken {
  /** What the seller hands out: `<namespace>@<opaque>`. */
  readonly token: string;
  /** What is stored and looked up. */
  readonly opaque: string;
}

export function generateToken(namespace: string, bytes: number): IssuedToken {
  const opaque = randomBytes(bytes).toString("base64url");
  return { token: formatToken(namespace, opaque), opaque };
}

export function formatToken(namespace: string, opaque: string): string {
  return `${namespace}@${opaque}`;
}

/**
 * Opaque part of a token. Anything before the last "@" is presentation and
 * carries no authority; a bare opaque string is accepted as-is.
 */
export function parseToken(token: string): string {
  const trimmed = token.trim();
  const at = trimmed.lastIndexOf("@");
  return at === -1 ? trimmed : trimmed.slice(at + 1);
}

/** Directory name for a pulled persona; never reveals the seller. */
export function personaDirName(token: string, namespace: string): string {
  const digest = createHash("sha256").update(parseToken(token)).digest("hex").slice(0, 16);
  return `${namespace}-${digest}`;
}
