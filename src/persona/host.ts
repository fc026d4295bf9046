import { createHash } from "node:crypto";
import * as os from "node:os";
import { resolve } from "node:path";
import type { MindprintConfig } from "../config/types.js";
import type { HostInfo } from "./types.js";

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch (err) {
    // userInfo throws when the uid has no passwd entry (some containers).
    if (
      err instanceof Error &&
      "code" in err &&
      (err.code === "ERR_SYSTEM_ERROR" || err.code === "ENOENT")
    ) {
      return process.env["USER"] ?? "unknown";
    }
    throw err;
  }
}

export function collectHostInfo(workspaceRoot: string): HostInfo {
  const fingerprint = createHash("sha256")
    .update([os.hostname(), os.platform(), os.arch(), currentUser()].join("\0"))
    .digest("hex");

  return {
    fingerprint,
    metadata: {
      os: os.type(),
      release: os.release(),
      arch: os.arch(),
      nodeVersion: process.version,
      installPath: resolve(workspaceRoot),
    },
  };
}

/** Configured identity, or a stable id derived from the host fingerprint. */
export function resolveUserId(config: MindprintConfig, host: HostInfo): string {
  return config.identity.userId ?? host.fingerprint.slice(0, 12);
}
