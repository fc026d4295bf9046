import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runDistillation } from "../../src/distill/pipeline.js";
import { readMemorySources } from "../../src/distill/sources.js";
import { SourceNotFoundError } from "../../src/errors.js";

describe("readMemorySources", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mindprint-sources-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads both files, facts first", async () => {
    writeFileSync(join(dir, "HISTORY.md"), "history");
    writeFileSync(join(dir, "MEMORY.md"), "memory");
    const sources = await readMemorySources(dir);
    expect(sources.map((s) => [s.kind, s.text])).toEqual([
      ["fact", "memory"],
      ["event", "history"],
    ]);
  });

  it("accepts a workspace with only a history file", async () => {
    writeFileSync(join(dir, "HISTORY.md"), "history");
    const sources = await readMemorySources(dir);
    expect(sources).toEqual([{ kind: "event", path: join(dir, "HISTORY.md"), text: "history" }]);
  });

  it("fails when neither file exists", async () => {
    await expect(readMemorySources(dir)).rejects.toThrow(SourceNotFoundError);
    await expect(readMemorySources(dir)).rejects.toThrow("No memory files found.");
  });
});

describe("runDistillation", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mindprint-pipeline-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes into the default output directory", async () => {
    writeFileSync(join(dir, "MEMORY.md"), "- Learns best by building small prototypes\n");
    const { path, report } = await runDistillation(dir, undefined);
    expect(path).toBe(join(dir, ".mindprint", "cognition.md"));
    expect(report.profile.sections.find((s) => s.name === "LearningStyle")?.bullets).toEqual([
      "Learns best by building small prototypes",
    ]);
  });

  it("touches nothing when there are no sources", async () => {
    await expect(runDistillation(dir, join(dir, "out"))).rejects.toBeInstanceOf(SourceNotFoundError);
    expect(readdirSync(dir)).toEqual([]);
  });
});
