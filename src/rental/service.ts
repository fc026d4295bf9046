import { parseCognitionDocument } from "../cognition/parser.js";
import type { CognitionProfile } from "../cognition/types.js";
import {
  SellerNotFoundError,
  TokenExpiredError,
  TokenNotFoundError,
  TokenRevokedError,
  type TokenError,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { PersonaStore } from "../persona/store.js";
import type { RentalRecord } from "../persona/types.js";
import { Outcome } from "../utils/types.js";
import { formatToken, generateToken, parseToken } from "./token.js";

export type RentalState = "active" | "expired" | "revoked";

export interface IssuedRental {
  readonly token: string;
  readonly sellerUserId: string;
  readonly createdAt: number;
  readonly expiresAt: number | null;
}

export interface RentalSummary extends RentalRecord {
  readonly state: RentalState;
}

export interface RentalServiceOptions {
  readonly namespace: string;
  readonly tokenBytes: number;
  readonly defaultTtlMs: number;
  readonly clock?: () => number;
  readonly logger?: Logger;
}

const MAX_ISSUE_ATTEMPTS = 3;
const PUBLIC_TOKEN_MESSAGE = "This rental token is not valid.";

/** Revocation wins over expiry. */
export function rentalState(rental: RentalRecord, now: number): RentalState {
  if (rental.revokedAt !== null) return "revoked";
  if (rental.expiresAt !== null && now > rental.expiresAt) return "expired";
  return "active";
}

/**
 * What a buyer is told. Identical for every token failure so a caller cannot
 * probe which tokens exist.
 */
export function publicMessage(_error: TokenError): string {
  return PUBLIC_TOKEN_MESSAGE;
}

export class RentalService {
  private readonly store: PersonaStore;
  private readonly opts: RentalServiceOptions;
  private readonly clock: () => number;
  private readonly logger: Logger | undefined;

  constructor(store: PersonaStore, opts: RentalServiceOptions) {
    this.store = store;
    this.opts = opts;
    this.clock = opts.clock ?? Date.now;
    this.logger = opts.logger?.child({ component: "rental" });
  }

  /**
   * `ttlMs` undefined takes the configured default; null issues a token that
   * never expires.
   */
  issue(
    sellerUserId: string,
    ttlMs?: number | null,
  ): Outcome<IssuedRental, SellerNotFoundError> {
    if (typeof ttlMs === "number" && (!Number.isFinite(ttlMs) || ttlMs < 0)) {
      throw new RangeError(`ttlMs must be a non-negative number, got ${ttlMs}`);
    }
    if (!this.store.hasAsset(sellerUserId)) {
      return Outcome.fail(new SellerNotFoundError());
    }

    const ttl = ttlMs === undefined ? this.opts.defaultTtlMs : ttlMs;
    if (ttl === null) {
      this.logger?.warn({ sellerUserId }, "issuing a rental token without expiry");
    }

    for (let attempt = 0; attempt < MAX_ISSUE_ATTEMPTS; attempt++) {
      const { token, opaque } = generateToken(this.opts.namespace, this.opts.tokenBytes);
      const createdAt = this.clock();
      const expiresAt = ttl === null ? null : createdAt + ttl;
      if (this.store.insertRental({ token: opaque, sellerUserId, createdAt, expiresAt })) {
        this.logger?.info({ sellerUserId, expiresAt }, "rental issued");
        return Outcome.ok({ token, sellerUserId, createdAt, expiresAt });
      }
      this.logger?.warn({ attempt }, "rental token collision, regenerating");
    }
    throw new Error(`Could not allocate a unique rental token after ${MAX_ISSUE_ATTEMPTS} attempts`);
  }

  validate(token: string): Outcome<CognitionProfile, TokenError> {
    const opaque = parseToken(token);
    const resolved = opaque.length > 0 ? this.store.resolveRental(opaque) : null;
    if (!resolved?.asset) {
      return Outcome.fail(new TokenNotFoundError());
    }

    const { rental, asset } = resolved;
    switch (rentalState(rental, this.clock())) {
      case "revoked":
        return Outcome.fail(new TokenRevokedError());
      case "expired":
        return Outcome.fail(new TokenExpiredError(rental.expiresAt ?? 0));
      case "active":
        return Outcome.ok(parseCognitionDocument(asset.content));
    }
  }

  /** Idempotent; unknown tokens are ignored. Returns whether the token exists. */
  revoke(token: string): boolean {
    const opaque = parseToken(token);
    if (opaque.length === 0) return false;
    const known = this.store.revokeRental(opaque, this.clock());
    this.logger?.info({ known }, "rental revoke requested");
    return known;
  }

  list(sellerUserId: string): RentalSummary[] {
    const now = this.clock();
    return this.store.listRentals(sellerUserId).map((rental) => ({
      ...rental,
      token: formatToken(this.opts.namespace, rental.token),
      state: rentalState(rental, now),
    }));
  }
}
