import { join, resolve } from "node:path";
import { CognitionWriter } from "../cognition/writer.js";
import type { Logger } from "../logging/logger.js";
import { Distiller } from "./distiller.js";
import { readMemorySources } from "./sources.js";
import type { DistillReport } from "./types.js";

export interface DistillationDeps {
  readonly distiller?: Distiller;
  readonly writer?: CognitionWriter;
  readonly outputDirName?: string;
  readonly logger?: Logger;
}

export interface DistillationResult {
  readonly path: string;
  readonly report: DistillReport;
}

/**
 * Reads the workspace's memory, distills it and writes the cognition
 * document. Nothing is written unless sources exist and redaction succeeds.
 */
export async function runDistillation(
  root: string,
  outputDir: string | undefined,
  deps: DistillationDeps = {},
): Promise<DistillationResult> {
  const base = resolve(root);
  const destination = outputDir
    ? resolve(outputDir)
    : join(base, deps.outputDirName ?? ".mindprint");

  const sources = await readMemorySources(base);
  const distiller = deps.distiller ?? new Distiller({ logger: deps.logger });
  const report = distiller.distillDetailed(sources);

  const writer = deps.writer ?? new CognitionWriter({ logger: deps.logger });
  const path = await writer.write(report.profile, destination);

  deps.logger?.info(
    { path, sources: sources.length, kept: report.kept, candidates: report.candidates },
    "distillation written",
  );
  return { path, report };
}
