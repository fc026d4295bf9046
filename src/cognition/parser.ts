import { InvalidDocumentError } from "../errors.js";
import { DOCUMENT_TITLE, VERSION_PREFIX } from "./writer.js";
import {
  SECTION_NAMES,
  SECTION_TITLES,
  createProfile,
  type CognitionProfile,
  type SectionName,
} from "./types.js";

const VERSION_SHAPE = /^\d+(?:\.\d+){1,2}$/;

/**
 * Strict inverse of renderCognitionDocument. Anything that is not the
 * canonical layout is rejected, which is what keeps free-form text (raw
 * memory included) from being stored or served as a profile.
 */
export function parseCognitionDocument(text: string): CognitionProfile {
  const lines = text.split(/\r?\n/);
  let index = 0;

  const skipBlank = (): void => {
    while (index < lines.length && lines[index]?.trim() === "") index++;
  };

  skipBlank();
  if (lines[index]?.trim() !== DOCUMENT_TITLE) {
    throw new InvalidDocumentError("missing title", index + 1);
  }
  index++;

  const bullets: Partial<Record<SectionName, string[]>> = {};
  for (const name of SECTION_NAMES) {
    skipBlank();
    const heading = `## ${SECTION_TITLES[name]}`;
    if (lines[index]?.trim() !== heading) {
      throw new InvalidDocumentError(`expected "${heading}"`, index + 1);
    }
    index++;

    const items: string[] = [];
    for (; index < lines.length; index++) {
      const line = lines[index] ?? "";
      if (line.trim() === "") continue;
      if (!line.startsWith("- ")) break;
      const bullet = line.slice(2).trim();
      if (bullet.length === 0) {
        throw new InvalidDocumentError("empty bullet", index + 1);
      }
      items.push(bullet);
    }
    bullets[name] = items;
  }

  skipBlank();
  const versionLine = lines[index] ?? "";
  if (!versionLine.startsWith(VERSION_PREFIX)) {
    throw new InvalidDocumentError("missing model version line", index + 1);
  }
  const version = versionLine.slice(VERSION_PREFIX.length).trim();
  if (!VERSION_SHAPE.test(version)) {
    throw new InvalidDocumentError(`malformed model version "${version}"`, index + 1);
  }
  index++;

  skipBlank();
  if (index < lines.length) {
    throw new InvalidDocumentError("unexpected content after version line", index + 1);
  }

  return createProfile(bullets, version);
}

export function tryParseCognitionDocument(text: string): CognitionProfile | null {
  try {
    return parseCognitionDocument(text);
  } catch (err) {
    if (err instanceof InvalidDocumentError) return null;
    throw err;
  }
}
