import type { NewArchivedRecord } from "../core/archive.js";
import type { RecordId } from "../core/ids.js";

export interface CatalogWriter {
  /** Atomic: the record and its subject links are written together or not at all. */
  writeRecord(record: NewArchivedRecord): Promise<RecordId>;
}

export class DuplicateRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DuplicateRecordError";
  }
}

export function isUniqueViolation(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  if ("code" in err && err.code === "23505") return true;
  return err instanceof Error && /duplicate key value violates unique constraint/i.test(err.message);
}

export class UnknownSubjectError extends Error {
  constructor(readonly subjectIds: readonly string[]) {
    super(`unknown subject ids: ${subjectIds.join(", ")}`);
    this.name = "UnknownSubjectError";
  }
}

export class SubjectInUseError extends Error {
  constructor(readonly subjectId: string, readonly recordCount: number) {
    super(`subject ${subjectId} is linked to ${recordCount} archived record(s)`);
    this.name = "SubjectInUseError";
  }
}
