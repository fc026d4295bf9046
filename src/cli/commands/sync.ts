import { Command, Option } from "clipanion";
import { CognitionWriter } from "../../cognition/writer.js";
import { MindprintError } from "../../errors.js";
import { syncWorkspace } from "../../persona/sync.js";
import { formatCounts } from "../../redaction/redactor.js";
import { buildDistiller, errorMessage, loadRuntime, openStoreRuntime } from "../context.js";

export class SyncCommand extends Command {
  static override paths = [["sync"]];

  static override usage = Command.Usage({
    description: "Distill a workspace and publish its cognition profile as a seller",
    examples: [
      ["Sync the current directory", "mindprint sync"],
      ["Sync a workspace", "mindprint sync ./agent"],
    ],
  });

  targetDir = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    let runtime;
    try {
      runtime = openStoreRuntime(loadRuntime());
    } catch (err) {
      this.context.stdout.write(`Failed to open persona store: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }
    const { config, logger } = runtime;

    try {
      const result = await syncWorkspace(this.targetDir ?? ".", {
        store: runtime.store,
        config,
        lockDir: runtime.lockDir,
        distiller: buildDistiller(config, logger),
        writer: new CognitionWriter({ logger }),
        logger,
      });
      const redactions = result.redactions ? formatCounts(result.redactions) : "";
      this.context.stdout.write(
        `Synced seller ${result.sellerUserId}\n` +
          `  Document:   ${result.documentPath} (${result.origin})\n` +
          `  Hash:       ${result.contentHash}\n` +
          `  Redactions: ${redactions.length > 0 ? redactions : "none"}\n`,
      );
    } catch (err) {
      if (err instanceof MindprintError) {
        logger.error({ err }, "sync failed");
        this.context.stdout.write(`${err.message}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    } finally {
      runtime.close();
    }
  }
}
