import { readdir, readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { tryParseCognitionDocument } from "./parser.js";
import { bulletCount } from "./types.js";
import { COGNITION_FILE_NAME } from "./writer.js";

const MAX_DOCUMENTS = 200;
const MAX_DIRECTORIES = 5_000;

export interface CognitionDocumentInfo {
  readonly path: string;
  readonly size: number;
  readonly lines: number;
  readonly modifiedAt: number;
  /** null when the file is not a well-formed cognition document. */
  readonly modelVersion: string | null;
  readonly bullets: number;
}

export interface ListOptions {
  readonly outputDirName?: string;
}

export async function listCognitionDocuments(
  root: string,
  opts: ListOptions = {},
): Promise<CognitionDocumentInfo[]> {
  const outputDirName = opts.outputDirName ?? ".mindprint";
  const files = await discover(resolve(root), outputDirName, [], { dirs: 0 });

  const results: CognitionDocumentInfo[] = [];
  for (const file of files) {
    const [content, info] = await Promise.all([readFile(file, "utf-8"), stat(file)]);
    const profile = tryParseCognitionDocument(content);
    results.push({
      path: file,
      size: info.size,
      lines: countLines(content),
      modifiedAt: info.mtimeMs,
      modelVersion: profile?.modelVersion ?? null,
      bullets: profile ? bulletCount(profile) : 0,
    });
  }
  return results.sort((a, b) => a.path.localeCompare(b.path));
}

function countLines(content: string): number {
  if (content.length === 0) return 0;
  const parts = content.split("\n").length;
  return content.endsWith("\n") ? parts - 1 : parts;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

async function discover(
  dir: string,
  outputDirName: string,
  collected: string[],
  budget: { dirs: number },
): Promise<string[]> {
  if (collected.length >= MAX_DOCUMENTS || budget.dirs >= MAX_DIRECTORIES) return collected;
  budget.dirs++;

  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && (err.code === "EACCES" || err.code === "ENOENT")) {
      return collected;
    }
    throw err;
  }

  for (const entry of entries) {
    if (collected.length >= MAX_DOCUMENTS) break;
    if (!entry.isDirectory()) continue;

    const full = join(dir, entry.name);
    if (entry.name === outputDirName) {
      const candidate = join(full, COGNITION_FILE_NAME);
      if (await isFile(candidate)) collected.push(candidate);
      continue;
    }
    if (entry.name.startsWith(".") || entry.name === "node_modules") continue;
    await discover(full, outputDirName, collected, budget);
  }
  return collected;
}
