import { Command, Option } from "clipanion";
import { CognitionWriter } from "../../cognition/writer.js";
import { runDistillation } from "../../distill/pipeline.js";
import { MindprintError, SourceNotFoundError } from "../../errors.js";
import { formatCounts } from "../../redaction/redactor.js";
import { buildDistiller, errorMessage, loadRuntime } from "../context.js";

export class DistillCommand extends Command {
  static override paths = [["distill"]];

  static override usage = Command.Usage({
    description: "Distill MEMORY.md and HISTORY.md into a redacted cognition document",
    details: `
      Reads the workspace's memory files, strips personal and confidential
      details and writes \`cognition.md\` into the output directory
      (\`<path>/.mindprint\` unless given). Nothing is written when no memory
      file exists or redaction fails.
    `,
    examples: [
      ["Distill the current directory", "mindprint distill"],
      ["Distill a workspace into a custom directory", "mindprint distill ./agent ./out"],
    ],
  });

  targetDir = Option.String({ name: "path", required: false });
  outputDir = Option.String({ name: "outputDir", required: false });

  async execute(): Promise<void> {
    let runtime;
    try {
      runtime = loadRuntime();
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }
    const { config, logger } = runtime;

    try {
      const { path, report } = await runDistillation(this.targetDir ?? ".", this.outputDir, {
        distiller: buildDistiller(config, logger),
        writer: new CognitionWriter({ logger }),
        outputDirName: config.distill.outputDirName,
        logger,
      });
      const redactions = formatCounts(report.redactions);
      this.context.stdout.write(
        `Wrote ${path}\n` +
          `  Bullets:    ${report.kept} of ${report.candidates} candidate lines\n` +
          `  Redactions: ${redactions.length > 0 ? redactions : "none"}\n`,
      );
    } catch (err) {
      if (err instanceof SourceNotFoundError) {
        this.context.stdout.write(`${err.message}\n`);
        process.exitCode = 1;
        return;
      }
      if (err instanceof MindprintError) {
        logger.error({ err }, "distillation failed");
        this.context.stdout.write(`Distillation failed: ${err.message}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  }
}
