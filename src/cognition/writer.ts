import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { WriteError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { SECTION_TITLES, type CognitionProfile } from "./types.js";

export const COGNITION_FILE_NAME = "cognition.md";
export const DOCUMENT_TITLE = "# 🧠 Cognitive Profile";
export const VERSION_PREFIX = "Cognition Model Version: ";

export function renderCognitionDocument(profile: CognitionProfile): string {
  const lines: string[] = [DOCUMENT_TITLE, ""];

  for (const section of profile.sections) {
    lines.push(`## ${SECTION_TITLES[section.name]}`);
    for (const bullet of section.bullets) {
      lines.push(`- ${bullet}`);
    }
    lines.push("");
  }

  lines.push(`${VERSION_PREFIX}${profile.modelVersion}`);
  return lines.join("\n") + "\n";
}

export interface CognitionWriterOptions {
  readonly fileName?: string;
  readonly logger?: Logger;
}

export class CognitionWriter {
  private readonly fileName: string;
  private readonly logger: Logger | undefined;

  constructor(opts: CognitionWriterOptions = {}) {
    this.fileName = opts.fileName ?? COGNITION_FILE_NAME;
    this.logger = opts.logger?.child({ component: "cognition-writer" });
  }

  /**
   * Writes the document next to a temp file and renames it into place, so a
   * reader sees either the previous document or the new one in full.
   */
  async write(profile: CognitionProfile, destinationDir: string): Promise<string> {
    const dir = resolve(destinationDir);
    const target = join(dir, this.fileName);
    const tempPath = join(dir, `.${this.fileName}.${randomBytes(6).toString("hex")}.tmp`);
    const content = renderCognitionDocument(profile);

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tempPath, content, { encoding: "utf-8", mode: 0o644 });
      await rename(tempPath, target);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger?.warn({ err: cleanupErr, tempPath }, "failed to remove temp file");
      });
      throw new WriteError(target, err);
    }

    this.logger?.info({ path: target, bytes: Buffer.byteLength(content) }, "cognition document written");
    return target;
  }
}
