import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { MindprintConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["MINDPRINT_STATE_DIR"] ?? join(homedir(), ".mindprint");
}

export function getConfigPath(): string {
  return process.env["MINDPRINT_CONFIG_PATH"] ?? "mindprint.config.json";
}

export function getStorePath(config: MindprintConfig): string {
  return config.store.path ?? join(getStateDir(), "persona.db");
}

export function getLockDir(): string {
  return join(getStateDir(), "locks");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
