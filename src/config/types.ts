export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface MindprintConfig {
  readonly store: StoreConfig;
  readonly rental: RentalConfig;
  readonly distill: DistillConfig;
  readonly redaction: RedactionConfig;
  readonly identity: IdentityConfig;
  readonly retry: RetryConfig;
  readonly lock: LockConfig;
  readonly logging: LoggingConfig;
}

export interface StoreConfig {
  /** Defaults to `<stateDir>/persona.db`. */
  readonly path?: string;
  readonly busyTimeoutMs: number;
}

export interface RentalConfig {
  readonly defaultTtlMs: number;
  readonly tokenBytes: number;
  readonly namespace: string;
}

export interface DistillConfig {
  readonly outputDirName: string;
  readonly minTokens: number;
  readonly maxBulletsPerSection: number;
}

export interface RedactionConfig {
  readonly maxPasses: number;
}

export interface IdentityConfig {
  readonly userId?: string;
}

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
}

/** How long `sync` waits for another sync of the same workspace. */
export interface LockConfig {
  readonly waitMs: number;
  readonly pollMs: number;
  readonly staleMs: number;
}

export interface LoggingConfig {
  readonly level?: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
