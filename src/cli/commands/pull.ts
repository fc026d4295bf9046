import { Command, Option } from "clipanion";
import { CognitionWriter } from "../../cognition/writer.js";
import { MindprintError } from "../../errors.js";
import { pullPersona } from "../../persona/sync.js";
import { publicMessage } from "../../rental/service.js";
import { errorMessage, loadRuntime, openStoreRuntime } from "../context.js";

export class PullCommand extends Command {
  static override paths = [["pull"]];

  static override usage = Command.Usage({
    description: "Fetch a rented cognition profile into the workspace",
    examples: [
      ["Pull into the current directory", "mindprint pull mp@<token>"],
      ["Pull into another workspace", "mindprint pull mp@<token> --workspace ./agent"],
    ],
  });

  token = Option.String({ name: "token", required: true });
  workspace = Option.String("--workspace,-w", {
    description: "Workspace to write personas/ into (default: current directory)",
  });

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
      const outcome = await pullPersona(this.token, this.workspace ?? ".", {
        store: runtime.store,
        rentals: runtime.rentals,
        config,
        writer: new CognitionWriter({ logger }),
        logger,
      });

      if (!outcome.ok) {
        this.context.stdout.write(`${publicMessage(outcome.error)}\n`);
        process.exitCode = 1;
        return;
      }
      this.context.stdout.write(`Persona written to ${outcome.value.path}\n`);
    } catch (err) {
      if (err instanceof MindprintError) {
        logger.error({ err }, "pull failed");
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
