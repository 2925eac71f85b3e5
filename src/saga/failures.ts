import type { RecordId, StorageKey } from "../core/ids.js";

export type SagaState =
  | "initiating"
  | "polling"
  | "fetching"
  | "persisting"
  | "recording"
  | "notifying"
  | "succeeded"
  | "failed";

/**
 * - `fatal_before_artifact`: create, polling exhaustion or fetch failed; nothing persisted.
 * - `fatal_after_artifact`: upload failed; the remote crawl result is abandoned.
 * - `fatal_orphan`: catalog write failed after a successful upload; the stored object has no record.
 */
export type FailureKind = "fatal_before_artifact" | "fatal_after_artifact" | "fatal_orphan";

export type FailedStep = "initiating" | "polling" | "fetching" | "persisting" | "recording";

export interface SagaSucceeded {
  status: "succeeded";
  recordId: RecordId;
  storageKey: StorageKey;
  pollAttempts: number;
  notified: boolean;
}

export interface SagaFailed {
  status: "failed";
  failureKind: FailureKind;
  step: FailedStep;
  message: string;
  pollAttempts: number;
  /** Set once an object has been written (orphan case only). */
  storageKey: StorageKey | null;
}

export type SagaOutcome = SagaSucceeded | SagaFailed;

export function failureKindForStep(step: FailedStep): FailureKind {
  switch (step) {
    case "initiating":
    case "polling":
    case "fetching":
      return "fatal_before_artifact";
    case "persisting":
      return "fatal_after_artifact";
    case "recording":
      return "fatal_orphan";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
