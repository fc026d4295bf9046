export type PartyRole = "seller" | "buyer";

export interface HostMetadata {
  readonly os: string;
  readonly release: string;
  readonly arch: string;
  readonly nodeVersion: string;
  readonly installPath: string;
}

export interface HostInfo {
  readonly fingerprint: string;
  readonly metadata: HostMetadata;
}

export interface Party {
  readonly userId: string;
  readonly hostFingerprint: string;
  readonly firstSeen: number;
  readonly lastSeen: number;
  readonly metadata: Record<string, unknown>;
}

export interface StoredAsset {
  readonly userId: string;
  readonly filePath: string;
  /** Rendered cognition document. Raw memory text is never stored. */
  readonly content: string;
  readonly contentHash: string;
  readonly scannedAt: number;
}

export interface RentalRecord {
  readonly token: string;
  readonly sellerUserId: string;
  readonly createdAt: number;
  readonly expiresAt: number | null;
  readonly revokedAt: number | null;
}

export interface StoreStats {
  readonly sellers: number;
  readonly buyers: number;
  readonly assets: number;
  readonly rentals: number;
  readonly activeRentals: number;
}
