import type { CognitionProfile } from "../cognition/types.js";
import type { RedactionCounts } from "../redaction/types.js";
import type { DiscardReason } from "./classifier.js";

export type MemoryKind = "fact" | "event";

/** Raw memory text. Lives for one distillation run and is never persisted. */
export interface MemorySource {
  readonly kind: MemoryKind;
  readonly path: string;
  readonly text: string;
}

export type DropReason = DiscardReason | "uncertain" | "duplicate" | "section_full";

export interface DistillReport {
  readonly profile: CognitionProfile;
  readonly redactions: RedactionCounts;
  readonly candidates: number;
  readonly kept: number;
  readonly dropped: Readonly<Partial<Record<DropReason, number>>>;
}
