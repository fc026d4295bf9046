import { createHash } from "node:crypto";
import { join, resolve } from "node:path";
import * as lockfile from "proper-lockfile";
import { ensureDir } from "../config/paths.js";
import { LockBusyError } from "../errors.js";

export interface FileLockOptions {
  /** Total time to wait for a lock held elsewhere before giving up. */
  readonly waitMs?: number;
  readonly pollMs?: number;
  /** Age after which a lock left by a dead process is taken over. */
  readonly staleMs?: number;
}

export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  opts: FileLockOptions = {},
): Promise<T> {
  const waitMs = opts.waitMs ?? 1_000;
  const pollMs = opts.pollMs ?? 100;

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(filePath, {
      retries: {
        retries: Math.ceil(waitMs / pollMs),
        factor: 1,
        minTimeout: pollMs,
        maxTimeout: pollMs,
      },
      stale: opts.staleMs ?? 10_000,
      realpath: false,
    });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ELOCKED") {
      throw new LockBusyError(waitMs, err);
    }
    throw err;
  }

  try {
    return await fn();
  } finally {
    await release();
  }
}

/**
 * Lock path for a directory that must not itself be written to. The lock
 * lives under `lockDir`, keyed by the directory's absolute path.
 */
export function lockPathFor(lockDir: string, target: string): string {
  const key = createHash("sha256").update(resolve(target)).digest("hex").slice(0, 32);
  return join(ensureDir(lockDir), key);
}
