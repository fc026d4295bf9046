import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parseCognitionDocument } from "../cognition/parser.js";
import type { CognitionProfile } from "../cognition/types.js";
import { COGNITION_FILE_NAME, CognitionWriter } from "../cognition/writer.js";
import type { MindprintConfig } from "../config/types.js";
import { runDistillation } from "../distill/pipeline.js";
import type { Distiller } from "../distill/distiller.js";
import type { RedactionCounts } from "../redaction/types.js";
import { SourceNotFoundError, type TokenError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { RentalService } from "../rental/service.js";
import { personaDirName } from "../rental/token.js";
import { lockPathFor, withFileLock } from "../utils/file-lock.js";
import { retry } from "../utils/retry.js";
import { Outcome } from "../utils/types.js";
import { collectHostInfo, resolveUserId } from "./host.js";
import type { PersonaStore } from "./store.js";
import type { HostInfo } from "./types.js";

export const PERSONAS_DIR = "personas";

export interface SyncDeps {
  readonly store: PersonaStore;
  readonly config: MindprintConfig;
  readonly lockDir: string;
  readonly distiller?: Distiller;
  readonly writer?: CognitionWriter;
  readonly host?: HostInfo;
  readonly logger?: Logger;
}

export interface SyncResult {
  readonly sellerUserId: string;
  /** Whether the asset was distilled now or taken from an earlier run. */
  readonly origin: "distilled" | "existing";
  readonly documentPath: string;
  readonly contentHash: string;
  readonly redactions: RedactionCounts | null;
}

async function readExistingDocument(path: string): Promise<CognitionProfile | null> {
  try {
    return parseCognitionDocument(await readFile(path, "utf-8"));
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Distills the workspace (or reuses its last cognition document), then
 * registers the seller and replaces their stored asset.
 */
export async function syncWorkspace(root: string, deps: SyncDeps): Promise<SyncResult> {
  const base = resolve(root);
  const { config, store } = deps;
  const outputDir = join(base, config.distill.outputDirName);
  const documentPath = join(outputDir, COGNITION_FILE_NAME);

  return withFileLock(lockPathFor(deps.lockDir, base), async () => {
    let profile: CognitionProfile;
    let origin: SyncResult["origin"];
    let redactions: RedactionCounts | null = null;

    try {
      const result = await runDistillation(base, outputDir, deps);
      profile = result.report.profile;
      redactions = result.report.redactions;
      origin = "distilled";
    } catch (err) {
      if (!(err instanceof SourceNotFoundError)) throw err;
      const existing = await readExistingDocument(documentPath);
      if (!existing) throw err;
      profile = existing;
      origin = "existing";
    }

    const host = deps.host ?? collectHostInfo(base);
    const sellerUserId = resolveUserId(config, host);
    const asset = await retry(
      () => {
        store.upsertSeller({
          userId: sellerUserId,
          hostFingerprint: host.fingerprint,
          metadata: { ...host.metadata },
        });
        return store.saveAsset({ userId: sellerUserId, profile });
      },
      config.retry,
    );

    deps.logger?.info({ sellerUserId, origin }, "workspace synced");
    return { sellerUserId, origin, documentPath, contentHash: asset.contentHash, redactions };
  }, config.lock);
}

export interface PullDeps {
  readonly store: PersonaStore;
  readonly rentals: RentalService;
  readonly config: MindprintConfig;
  readonly writer?: CognitionWriter;
  readonly host?: HostInfo;
  readonly logger?: Logger;
}

export interface PulledPersona {
  readonly buyerUserId: string;
  readonly path: string;
  readonly profile: CognitionProfile;
}

/**
 * Validates a rental token and writes the rented profile under
 * `<workspace>/personas/`. Token failures come back as values.
 */
export async function pullPersona(
  token: string,
  workspace: string,
  deps: PullDeps,
): Promise<Outcome<PulledPersona, TokenError>> {
  const base = resolve(workspace);
  const host = deps.host ?? collectHostInfo(base);
  const buyerUserId = resolveUserId(deps.config, host);

  const validation = await retry(() => {
    deps.store.upsertBuyer({
      userId: buyerUserId,
      hostFingerprint: host.fingerprint,
      metadata: { ...host.metadata },
    });
    return deps.rentals.validate(token);
  }, deps.config.retry);

  if (!validation.ok) {
    deps.logger?.warn({ reason: validation.error.code }, "rental token rejected");
    return validation;
  }

  const dir = join(base, PERSONAS_DIR, personaDirName(token, deps.config.rental.namespace));
  const writer = deps.writer ?? new CognitionWriter({ logger: deps.logger });
  const path = await writer.write(validation.value, dir);

  deps.logger?.info({ buyerUserId, path }, "persona pulled");
  return Outcome.ok({ buyerUserId, path, profile: validation.value });
}
