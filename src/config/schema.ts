import { z } from "zod";
import type { MindprintConfig } from "./types.js";

const THIRTY_DAYS_MS = 30 * 24 * 60 * 60 * 1000;

const storeSchema = z.object({
  path: z.string().min(1).optional(),
  busyTimeoutMs: z.number().int().positive().default(5_000),
});

const rentalSchema = z.object({
  defaultTtlMs: z.number().int().nonnegative().default(THIRTY_DAYS_MS),
  tokenBytes: z.number().int().min(16).max(64).default(24),
  namespace: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/i, "namespace must be alphanumeric and must not contain '@'")
    .default("mp"),
});

const distillSchema = z.object({
  outputDirName: z.string().min(1).default(".mindprint"),
  minTokens: z.number().int().min(1).default(4),
  maxBulletsPerSection: z.number().int().positive().default(12),
});

const redactionSchema = z.object({
  maxPasses: z.number().int().min(2).max(16).default(4),
});

const identitySchema = z.object({
  userId: z.string().min(1).max(100).optional(),
});

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().nonnegative().default(200),
});

const lockSchema = z.object({
  waitMs: z.number().int().nonnegative().default(60_000),
  pollMs: z.number().int().positive().default(100),
  staleMs: z.number().int().min(2_000).default(10_000),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const mindprintConfigSchema = z.object({
  store: storeSchema.default({}),
  rental: rentalSchema.default({}),
  distill: distillSchema.default({}),
  redaction: redactionSchema.default({}),
  identity: identitySchema.default({}),
  retry: retrySchema.default({}),
  lock: lockSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): MindprintConfig {
  return mindprintConfigSchema.parse(raw);
}
