import { Command, Option } from "clipanion";
import { MindprintError } from "../../errors.js";
import { retry } from "../../utils/retry.js";
import { errorMessage, loadRuntime, openStoreRuntime, type StoreRuntime } from "../context.js";

/** Opens the store, runs `fn` with store retries, and always closes it. */
async function withStore(
  cmd: Command,
  fn: (runtime: StoreRuntime) => void,
): Promise<void> {
  let runtime: StoreRuntime;
  try {
    runtime = openStoreRuntime(loadRuntime());
  } catch (err) {
    cmd.context.stdout.write(`Failed to open persona store: ${errorMessage(err)}\n`);
    process.exitCode = 1;
    return;
  }

  try {
    await retry(() => fn(runtime), runtime.config.retry);
  } catch (err) {
    if (!(err instanceof MindprintError)) throw err;
    runtime.logger.error({ err }, "rental command failed");
    cmd.context.stdout.write(`${err.message}\n`);
    process.exitCode = 1;
  } finally {
    runtime.close();
  }
}

function formatTime(ms: number | null): string {
  return ms === null ? "never" : new Date(ms).toISOString();
}

export class RentalIssueCommand extends Command {
  static override paths = [["rental", "issue"]];

  static override usage = Command.Usage({
    description: "Issue a rental token for a seller's cognition profile",
    examples: [
      ["Issue with the default lifetime", "mindprint rental issue 3f9a1c2b7d4e"],
      ["Issue for one hour", "mindprint rental issue 3f9a1c2b7d4e --ttl 3600000"],
      ["Issue without expiry", "mindprint rental issue 3f9a1c2b7d4e --no-expiry"],
    ],
  });

  seller = Option.String({ name: "sellerUserId", required: true });

  ttl = Option.String("--ttl", {
    description: "Lifetime in milliseconds (default: rental.defaultTtlMs)",
  });

  expiry = Option.Boolean("--expiry", true, {
    description: "Pass --no-expiry for a token that never expires",
  });

  async execute(): Promise<void> {
    let ttlMs: number | null | undefined;
    if (!this.expiry) {
      ttlMs = null;
    } else if (this.ttl !== undefined) {
      ttlMs = Number(this.ttl);
      if (!Number.isInteger(ttlMs) || ttlMs < 0) {
        this.context.stdout.write(`Invalid --ttl: ${this.ttl}\n`);
        process.exitCode = 1;
        return;
      }
    }

    await withStore(this, (runtime) => {
      const outcome = runtime.rentals.issue(this.seller, ttlMs);
      if (!outcome.ok) {
        this.context.stdout.write(`${outcome.error.message}\n`);
        process.exitCode = 1;
        return;
      }
      this.context.stdout.write(
        `${outcome.value.token}\n` + `  Expires: ${formatTime(outcome.value.expiresAt)}\n`,
      );
    });
  }
}

export class RentalRevokeCommand extends Command {
  static override paths = [["rental", "revoke"]];

  static override usage = Command.Usage({
    description: "Revoke a rental token",
    examples: [["Revoke a token", "mindprint rental revoke mp@<token>"]],
  });

  token = Option.String({ name: "token", required: true });

  async execute(): Promise<void> {
    await withStore(this, (runtime) => {
      runtime.rentals.revoke(this.token);
      // Same answer for unknown tokens.
      this.context.stdout.write("Token revoked.\n");
    });
  }
}

export class RentalListCommand extends Command {
  static override paths = [["rental", "list"]];

  static override usage = Command.Usage({
    description: "List a seller's rental tokens",
    examples: [["List rentals", "mindprint rental list 3f9a1c2b7d4e"]],
  });

  seller = Option.String({ name: "sellerUserId", required: true });

  async execute(): Promise<void> {
    await withStore(this, (runtime) => {
      const rentals = runtime.rentals.list(this.seller);
      if (rentals.length === 0) {
        this.context.stdout.write("No rentals.\n");
        return;
      }
      for (const r of rentals) {
        this.context.stdout.write(
          `${r.token}  ${r.state}  created=${formatTime(r.createdAt)} expires=${formatTime(r.expiresAt)}\n`,
        );
      }
    });
  }
}
