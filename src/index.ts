export * from "./errors.js";
export type { MindprintConfig } from "./config/types.js";
export { loadConfig } from "./config/loader.js";
export { parseConfig } from "./config/schema.js";
export { createLogger, type Logger } from "./logging/logger.js";

export { Redactor, redact, formatCounts } from "./redaction/redactor.js";
export { REDACTION_RULES, PLACEHOLDER_PATTERN, placeholderFor } from "./redaction/rules.js";
export type { RedactionCategory, RedactionResult, RedactionRule } from "./redaction/types.js";

export { SectionClassifier } from "./distill/classifier.js";
export { Distiller } from "./distill/distiller.js";
export { readMemorySources } from "./distill/sources.js";
export { runDistillation } from "./distill/pipeline.js";
export type { DistillReport, MemorySource } from "./distill/types.js";

export { CognitionWriter, renderCognitionDocument } from "./cognition/writer.js";
export { parseCognitionDocument } from "./cognition/parser.js";
export { listCognitionDocuments } from "./cognition/list.js";
export {
  COGNITION_MODEL_VERSION,
  SECTION_NAMES,
  createProfile,
  type CognitionProfile,
  type SectionName,
} from "./cognition/types.js";

export { PersonaDB } from "./persona/db.js";
export { PersonaStore } from "./persona/store.js";
export { syncWorkspace, pullPersona } from "./persona/sync.js";
export { RentalService, publicMessage, rentalState } from "./rental/service.js";
export type { Outcome } from "./utils/types.js";
