import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { SourceNotFoundError } from "../errors.js";
import type { MemoryKind, MemorySource } from "./types.js";

export const MEMORY_FILES: ReadonlyArray<readonly [string, MemoryKind]> = [
  ["MEMORY.md", "fact"],
  ["HISTORY.md", "event"],
];

async function readIfPresent(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Reads the workspace's memory files, facts first. Throws
 * SourceNotFoundError when neither exists; touches nothing on disk.
 */
export async function readMemorySources(root: string): Promise<MemorySource[]> {
  const base = resolve(root);
  const sources: MemorySource[] = [];

  for (const [file, kind] of MEMORY_FILES) {
    const path = join(base, file);
    const text = await readIfPresent(path);
    if (text !== null) sources.push({ kind, path, text });
  }

  if (sources.length === 0) {
    throw new SourceNotFoundError(base);
  }
  return sources;
}
