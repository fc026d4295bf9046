import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { DistillCommand } from "./commands/distill.js";
import { ListCommand } from "./commands/list.js";
import { PullCommand } from "./commands/pull.js";
import {
  RentalIssueCommand,
  RentalListCommand,
  RentalRevokeCommand,
} from "./commands/rental.js";
import { StatusCommand } from "./commands/status.js";
import { SyncCommand } from "./commands/sync.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Mindprint",
    binaryName: "mindprint",
    binaryVersion: VERSION,
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  // Seller side
  cli.register(DistillCommand);
  cli.register(ListCommand);
  cli.register(SyncCommand);

  // Buyer side
  cli.register(PullCommand);

  // Rentals
  cli.register(RentalIssueCommand);
  cli.register(RentalRevokeCommand);
  cli.register(RentalListCommand);

  cli.register(StatusCommand);
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
