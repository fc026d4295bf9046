import { loadConfig } from "../config/loader.js";
import { getConfigPath, getLockDir, getStateDir, getStorePath } from "../config/paths.js";
import type { MindprintConfig } from "../config/types.js";
import { SectionClassifier } from "../distill/classifier.js";
import { Distiller } from "../distill/distiller.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { PersonaDB } from "../persona/db.js";
import { PersonaStore } from "../persona/store.js";
import { Redactor } from "../redaction/redactor.js";
import { RentalService } from "../rental/service.js";

export interface CliRuntime {
  readonly config: MindprintConfig;
  readonly configPath: string;
  readonly logger: Logger;
}

export interface StoreRuntime extends CliRuntime {
  readonly stateDir: string;
  readonly storePath: string;
  readonly lockDir: string;
  readonly store: PersonaStore;
  readonly rentals: RentalService;
  close(): void;
}

export function loadRuntime(): CliRuntime {
  const configPath = getConfigPath();
  const config = loadConfig(configPath);
  return { config, configPath, logger: createLogger(config.logging) };
}

export function openStoreRuntime(runtime: CliRuntime = loadRuntime()): StoreRuntime {
  const { config, logger } = runtime;
  const storePath = getStorePath(config);
  const db = new PersonaDB(storePath, { busyTimeoutMs: config.store.busyTimeoutMs });
  const store = new PersonaStore(db);
  const rentals = new RentalService(store, {
    namespace: config.rental.namespace,
    tokenBytes: config.rental.tokenBytes,
    defaultTtlMs: config.rental.defaultTtlMs,
    logger,
  });

  return {
    ...runtime,
    stateDir: getStateDir(),
    storePath,
    lockDir: getLockDir(),
    store,
    rentals,
    close: () => db.close(),
  };
}

export function buildDistiller(config: MindprintConfig, logger: Logger): Distiller {
  return new Distiller({
    redactor: new Redactor({ maxPasses: config.redaction.maxPasses, logger }),
    classifier: new SectionClassifier({ minTokens: config.distill.minTokens }),
    maxBulletsPerSection: config.distill.maxBulletsPerSection,
    logger,
  });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
