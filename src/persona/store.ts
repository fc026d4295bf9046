import { createHash } from "node:crypto";
import { z } from "zod";
import { parseCognitionDocument } from "../cognition/parser.js";
import type { CognitionProfile } from "../cognition/types.js";
import { COGNITION_FILE_NAME, renderCognitionDocument } from "../cognition/writer.js";
import { StoreUnavailableError } from "../errors.js";
import type { PersonaDB } from "./db.js";
import type {
  Party,
  PartyRole,
  RentalRecord,
  StoreStats,
  StoredAsset,
} from "./types.js";

export interface UpsertPartyParams {
  userId: string;
  hostFingerprint: string;
  metadata?: Record<string, unknown>;
  now?: number;
}

export interface SaveAssetParams {
  userId: string;
  profile: CognitionProfile;
  filePath?: string;
  now?: number;
}

export interface InsertRentalParams {
  token: string;
  sellerUserId: string;
  createdAt: number;
  expiresAt: number | null;
}

export interface ResolvedRental {
  readonly rental: RentalRecord;
  readonly asset: StoredAsset | null;
}

interface PartyRow {
  user_id: string;
  host_fingerprint: string;
  first_seen: number;
  last_seen: number;
  metadata: string | null;
}

interface AssetRow {
  user_id: string;
  file_path: string;
  content: string;
  content_hash: string;
  scanned_at: number;
}

interface RentalRow {
  token: string;
  seller_user_id: string;
  created_at: number;
  expires_at: number | null;
  revoked_at: number | null;
}

const PARTY_TABLES: Readonly<Record<PartyRole, string>> = {
  seller: "sellers",
  buyer: "buyers",
};

const metadataSchema = z.record(z.unknown());

export function contentHash(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

function isBusy(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    (err.code.startsWith("SQLITE_BUSY") || err.code.startsWith("SQLITE_LOCKED"))
  );
}

export class PersonaStore {
  private readonly db;

  constructor(personaDb: PersonaDB) {
    this.db = personaDb.raw();
  }

  // ── Sellers / Buyers ──

  upsertSeller(params: UpsertPartyParams): Party {
    return this.upsertParty("seller", params);
  }

  upsertBuyer(params: UpsertPartyParams): Party {
    return this.upsertParty("buyer", params);
  }

  getSeller(userId: string): Party | null {
    return this.getParty("seller", userId);
  }

  getBuyer(userId: string): Party | null {
    return this.getParty("buyer", userId);
  }

  private upsertParty(role: PartyRole, params: UpsertPartyParams): Party {
    const table = PARTY_TABLES[role];
    const now = params.now ?? Date.now();
    return this.guard(`upsert ${role}`, () => {
      this.db
        .prepare(
          `INSERT INTO ${table} (user_id, host_fingerprint, first_seen, last_seen, metadata)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(user_id) DO UPDATE SET
             host_fingerprint = excluded.host_fingerprint,
             metadata = excluded.metadata,
             last_seen = MAX(${table}.last_seen, excluded.last_seen)`,
        )
        .run(
          params.userId,
          params.hostFingerprint,
          now,
          now,
          JSON.stringify(params.metadata ?? {}),
        );
      const row = this.db
        .prepare(`SELECT * FROM ${table} WHERE user_id = ?`)
        .get(params.userId) as PartyRow;
      return this.toParty(row);
    });
  }

  private getParty(role: PartyRole, userId: string): Party | null {
    const table = PARTY_TABLES[role];
    return this.guard(`read ${role}`, () => {
      const row = this.db
        .prepare(`SELECT * FROM ${table} WHERE user_id = ?`)
        .get(userId) as PartyRow | undefined;
      return row ? this.toParty(row) : null;
    });
  }

  // ── Assets ──

  /** Replaces whatever asset the seller had, in one write transaction. */
  saveAsset(params: SaveAssetParams): StoredAsset {
    const content = renderCognitionDocument(params.profile);
    const asset: StoredAsset = {
      userId: params.userId,
      filePath: params.filePath ?? COGNITION_FILE_NAME,
      content,
      contentHash: contentHash(content),
      scannedAt: params.now ?? Date.now(),
    };

    const replace = this.db.transaction((a: StoredAsset) => {
      this.db.prepare("DELETE FROM memory_data WHERE user_id = ?").run(a.userId);
      this.db
        .prepare(
          `INSERT INTO memory_data (user_id, file_path, content, content_hash, scanned_at)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(a.userId, a.filePath, a.content, a.contentHash, a.scannedAt);
    });

    this.guard("save asset", () => replace.immediate(asset));
    return asset;
  }

  getStoredAsset(userId: string): StoredAsset | null {
    return this.guard("read asset", () => this.latestAsset(userId));
  }

  getAsset(userId: string): CognitionProfile | null {
    const asset = this.getStoredAsset(userId);
    return asset ? parseCognitionDocument(asset.content) : null;
  }

  hasAsset(userId: string): boolean {
    return this.guard("read asset", () => {
      const row = this.db
        .prepare("SELECT 1 AS present FROM memory_data WHERE user_id = ? LIMIT 1")
        .get(userId);
      return row !== undefined;
    });
  }

  private latestAsset(userId: string): StoredAsset | null {
    const row = this.db
      .prepare(
        "SELECT * FROM memory_data WHERE user_id = ? ORDER BY scanned_at DESC, id DESC LIMIT 1",
      )
      .get(userId) as AssetRow | undefined;
    return row ? this.toAsset(row) : null;
  }

  // ── Rentals ──

  /** Returns false when the token already exists. */
  insertRental(params: InsertRentalParams): boolean {
    return this.guard("insert rental", () => {
      const result = this.db
        .prepare(
          `INSERT INTO rentals (token, seller_user_id, created_at, expires_at, revoked_at)
           VALUES (?, ?, ?, ?, NULL)
           ON CONFLICT(token) DO NOTHING`,
        )
        .run(params.token, params.sellerUserId, params.createdAt, params.expiresAt);
      return result.changes > 0;
    });
  }

  findRental(token: string): RentalRecord | null {
    return this.guard("read rental", () => this.rentalRow(token));
  }

  getSellerId(token: string): string | null {
    return this.findRental(token)?.sellerUserId ?? null;
  }

  /**
   * Sets revoked_at once; later calls keep the first timestamp. Returns
   * whether the token exists.
   */
  revokeRental(token: string, now: number = Date.now()): boolean {
    return this.guard("revoke rental", () => {
      const result = this.db
        .prepare("UPDATE rentals SET revoked_at = COALESCE(revoked_at, ?) WHERE token = ?")
        .run(now, token);
      return result.changes > 0;
    });
  }

  listRentals(sellerUserId: string): RentalRecord[] {
    return this.guard("list rentals", () => {
      const rows = this.db
        .prepare("SELECT * FROM rentals WHERE seller_user_id = ? ORDER BY created_at DESC, id DESC")
        .all(sellerUserId) as RentalRow[];
      return rows.map((r) => this.toRental(r));
    });
  }

  /** Rental and the seller's current asset, read in one transaction. */
  resolveRental(token: string): ResolvedRental | null {
    const read = this.db.transaction((t: string): ResolvedRental | null => {
      const rental = this.rentalRow(t);
      if (!rental) return null;
      return { rental, asset: this.latestAsset(rental.sellerUserId) };
    });
    return this.guard("resolve rental", () => read(token));
  }

  // ── Stats ──

  stats(now: number = Date.now()): StoreStats {
    return this.guard("read stats", () => {
      const count = (sql: string, ...args: number[]): number => {
        const row = this.db.prepare(sql).get(...args) as { n: number };
        return row.n;
      };
      return {
        sellers: count("SELECT COUNT(*) AS n FROM sellers"),
        buyers: count("SELECT COUNT(*) AS n FROM buyers"),
        assets: count("SELECT COUNT(*) AS n FROM memory_data"),
        rentals: count("SELECT COUNT(*) AS n FROM rentals"),
        activeRentals: count(
          "SELECT COUNT(*) AS n FROM rentals WHERE revoked_at IS NULL AND (expires_at IS NULL OR expires_at >= ?)",
          now,
        ),
      };
    });
  }

  // ── Helpers ──

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isBusy(err)) throw new StoreUnavailableError(operation, err);
      throw err;
    }
  }

  private rentalRow(token: string): RentalRecord | null {
    const row = this.db
      .prepare("SELECT * FROM rentals WHERE token = ?")
      .get(token) as RentalRow | undefined;
    return row ? this.toRental(row) : null;
  }

  private toParty(row: PartyRow): Party {
    return {
      userId: row.user_id,
      hostFingerprint: row.host_fingerprint,
      firstSeen: row.first_seen,
      lastSeen: row.last_seen,
      metadata: metadataSchema.parse(JSON.parse(row.metadata || "{}")),
    };
  }

  private toAsset(row: AssetRow): StoredAsset {
    return {
      userId: row.user_id,
      filePath: row.file_path,
      content: row.content,
      contentHash: row.content_hash,
      scannedAt: row.scanned_at,
    };
  }

  private toRental(row: RentalRow): RentalRecord {
    return {
      token: row.token,
      sellerUserId: row.seller_user_id,
      createdAt: row.created_at,
      expiresAt: row.expires_at,
      revokedAt: row.revoked_at,
    };
  }
}
