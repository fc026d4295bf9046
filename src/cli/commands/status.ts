import { Command } from "clipanion";
import { errorMessage, loadRuntime, openStoreRuntime } from "../context.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration and persona store status",
    examples: [["Show status", "mindprint status"]],
  });

  async execute(): Promise<void> {
    const configPath = getConfigPath();
    const stateDir = getStateDir();

    let runtime;
    try {
      runtime = openStoreRuntime(loadRuntime());
    } catch (err) {
      this.context.stdout.write(`Config path: ${configPath}\n`);
      this.context.stdout.write(`  Error: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      const stats = runtime.store.stats();
      this.context.stdout.write(`Mindprint Status\n`);
      this.context.stdout.write(`----------------\n`);
      this.context.stdout.write(`Config path: ${configPath}\n`);
      this.context.stdout.write(`State dir:   ${stateDir}\n`);
      this.context.stdout.write(`Store:       ${runtime.storePath}\n`);
      this.context.stdout.write(`Sellers:     ${stats.sellers}\n`);
      this.context.stdout.write(`Buyers:      ${stats.buyers}\n`);
      this.context.stdout.write(`Assets:      ${stats.assets}\n`);
      this.context.stdout.write(`Rentals:     ${stats.rentals} (${stats.activeRentals} active)\n`);
    } finally {
      runtime.close();
    }
  }
}
