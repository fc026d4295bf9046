import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { listCognitionDocuments } from "../../src/cognition/list.js";
import { parseCognitionDocument, tryParseCognitionDocument } from "../../src/cognition/parser.js";
import { createProfile } from "../../src/cognition/types.js";
import { CognitionWriter, renderCognitionDocument } from "../../src/cognition/writer.js";
import { InvalidDocumentError, WriteError } from "../../src/errors.js";

const profile = createProfile({ LearningStyle: ["Learns by doing"] });

const EXPECTED = [
  "# 🧠 Cognitive Profile",
  "",
  "## Core Thinking Patterns",
  "",
  "## Decision Approach",
  "",
  "## Learning Style",
  "- Learns by doing",
  "",
  "## Execution Tendencies",
  "",
  "## Cognitive Strengths",
  "",
  "## Generalized Experience Themes",
  "",
  "Cognition Model Version: 2.0",
  "",
].join("\n");

describe("renderCognitionDocument", () => {
  it("renders every section in order, empty ones included", () => {
    expect(renderCognitionDocument(profile)).toBe(EXPECTED);
  });

  it("writes the version line exactly once", () => {
    const lines = renderCognitionDocument(profile).split("\n");
    expect(lines.filter((l) => l.startsWith("Cognition Model Version")).length).toBe(1);
  });
});

describe("parseCognitionDocument", () => {
  it("reads back what the writer renders", () => {
    expect(parseCognitionDocument(EXPECTED)).toEqual(profile);
  });

  it("rejects free-form text", () => {
    expect(() => parseCognitionDocument("just some notes\n")).toThrow(
      "Invalid cognition document (line 1): missing title",
    );
    expect(tryParseCognitionDocument("just some notes\n")).toBeNull();
  });

  it("rejects a document without a version line", () => {
    const truncated = EXPECTED.replace("Cognition Model Version: 2.0\n", "");
    expect(() => parseCognitionDocument(truncated)).toThrow(InvalidDocumentError);
  });

  it("rejects content after the version line", () => {
    expect(() => parseCognitionDocument(EXPECTED + "Jane Doe was here\n")).toThrow(
      "unexpected content after version line",
    );
  });

  it("rejects sections out of order", () => {
    const swapped = EXPECTED.replace("## Decision Approach", "## Learning Style");
    expect(() => parseCognitionDocument(swapped)).toThrow(InvalidDocumentError);
  });
});

describe("CognitionWriter", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "mindprint-writer-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("creates the directory and leaves only the document behind", async () => {
    const outDir = join(tempDir, "out");
    const path = await new CognitionWriter().write(profile, outDir);

    expect(path).toBe(join(outDir, "cognition.md"));
    expect(readFileSync(path, "utf-8")).toBe(EXPECTED);
    expect(readdirSync(outDir)).toEqual(["cognition.md"]);
  });

  it("replaces an earlier document", async () => {
    const writer = new CognitionWriter();
    await writer.write(createProfile({ LearningStyle: ["Old bullet text here"] }), tempDir);
    const path = await writer.write(profile, tempDir);
    expect(readFileSync(path, "utf-8")).toBe(EXPECTED);
  });

  it("raises WriteError when the destination is unusable", async () => {
    const blocker = join(tempDir, "blocker");
    writeFileSync(blocker, "not a directory");
    await expect(new CognitionWriter().write(profile, blocker)).rejects.toBeInstanceOf(WriteError);
  });
});

describe("listCognitionDocuments", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "mindprint-list-"));
    const put = (rel: string, content: string): void => {
      const dir = join(root, rel, ".mindprint");
      mkdirSync(dir, { recursive: true });
      writeFileSync(join(dir, "cognition.md"), content);
    };
    put("a", EXPECTED);
    put("b", "hello\n");
    put("node_modules/pkg", EXPECTED);
    put(".cache/x", EXPECTED);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("finds documents and reports their metadata", async () => {
    const docs = await listCognitionDocuments(root);
    expect(docs.map((d) => d.path)).toEqual([
      join(root, "a", ".mindprint", "cognition.md"),
      join(root, "b", ".mindprint", "cognition.md"),
    ]);

    const [valid, invalid] = docs;
    expect(valid?.modelVersion).toBe("2.0");
    expect(valid?.bullets).toBe(1);
    expect(valid?.lines).toBe(16);
    expect(valid?.size).toBe(Buffer.byteLength(EXPECTED));

    expect(invalid?.modelVersion).toBeNull();
    expect(invalid?.bullets).toBe(0);
    expect(invalid?.lines).toBe(1);
  });

  it("returns nothing for a directory without documents", async () => {
    expect(await listCognitionDocuments(join(root, "a", ".mindprint"))).toEqual([]);
  });
});
