/**
 * Error taxonomy shared by the distillation pipeline, the persona store and
 * the rental service. Every error carries a stable machine-readable code and
 * whether the caller may retry it.
 */

export type MindprintErrorCode =
  | "SOURCE_NOT_FOUND"
  | "REDACTION_FAILED"
  | "WRITE_FAILED"
  | "INVALID_DOCUMENT"
  | "SELLER_NOT_FOUND"
  | "TOKEN_NOT_FOUND"
  | "TOKEN_EXPIRED"
  | "TOKEN_REVOKED"
  | "STORE_UNAVAILABLE"
  | "LOCK_BUSY";

export abstract class MindprintError extends Error {
  abstract readonly code: MindprintErrorCode;
  readonly retryable: boolean;

  constructor(message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.retryable = options?.retryable ?? false;
  }
}

export class SourceNotFoundError extends MindprintError {
  readonly code = "SOURCE_NOT_FOUND";
  override readonly name = "SourceNotFoundError";

  constructor(readonly root: string) {
    super("No memory files found.");
  }
}

export class RedactionError extends MindprintError {
  readonly code = "REDACTION_FAILED";
  override readonly name = "RedactionError";

  // Never carries the input text: the message may end up in logs.
  constructor(reason: string, cause?: unknown) {
    super(`Redaction aborted: ${reason}`, { cause });
  }
}

export class WriteError extends MindprintError {
  readonly code = "WRITE_FAILED";
  override readonly name = "WriteError";

  constructor(readonly path: string, cause?: unknown) {
    super(`Failed to write ${path}`, { retryable: true, cause });
  }
}

export class InvalidDocumentError extends MindprintError {
  readonly code = "INVALID_DOCUMENT";
  override readonly name = "InvalidDocumentError";

  constructor(reason: string, readonly line?: number) {
    super(
      line === undefined
        ? `Invalid cognition document: ${reason}`
        : `Invalid cognition document (line ${line}): ${reason}`,
    );
  }
}

export class SellerNotFoundError extends MindprintError {
  readonly code = "SELLER_NOT_FOUND";
  override readonly name = "SellerNotFoundError";

  constructor() {
    super("Seller has no distilled cognition asset.");
  }
}

export class TokenNotFoundError extends MindprintError {
  readonly code = "TOKEN_NOT_FOUND";
  override readonly name = "TokenNotFoundError";

  constructor() {
    super("Rental token not found.");
  }
}

export class TokenExpiredError extends MindprintError {
  readonly code = "TOKEN_EXPIRED";
  override readonly name = "TokenExpiredError";

  constructor(readonly expiredAt: number) {
    super("Rental token has expired.");
  }
}

export class TokenRevokedError extends MindprintError {
  readonly code = "TOKEN_REVOKED";
  override readonly name = "TokenRevokedError";

  constructor() {
    super("Rental token has been revoked.");
  }
}

export class StoreUnavailableError extends MindprintError {
  readonly code = "STORE_UNAVAILABLE";
  override readonly name = "StoreUnavailableError";

  constructor(operation: string, cause?: unknown) {
    super(`Persona store unavailable during ${operation}`, {
      retryable: true,
      cause,
    });
  }
}

export class LockBusyError extends MindprintError {
  readonly code = "LOCK_BUSY";
  override readonly name = "LockBusyError";

  constructor(waitedMs: number, cause?: unknown) {
    super(`Another process is still working on this workspace (waited ${waitedMs}ms)`, {
      retryable: true,
      cause,
    });
  }
}

export type TokenError = TokenNotFoundError | TokenExpiredError | TokenRevokedError;

export function isRetryable(err: unknown): boolean {
  return err instanceof MindprintError && err.retryable;
}
