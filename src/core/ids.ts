import { monotonicFactory } from "ulid";

export type SagaId = `saga_${string}`;
export type RecordId = `rec_${string}`;
export type SubjectId = `subj_${string}`;
export type StorageKey = `archives/${string}`;

// Monotonic within a millisecond, so ids minted in the same instant never collide.
const ulid = monotonicFactory();

const ULID_26 = "[0-9A-HJKMNP-TV-Z]{26}";
const STORAGE_KEY_RE = new RegExp(`^archives/${ULID_26}\\.[a-z0-9]+$`);

export function newSagaId(): SagaId {
  return `saga_${ulid()}`;
}

export function newRecordId(): RecordId {
  return `rec_${ulid()}`;
}

export function newSubjectId(): SubjectId {
  return `subj_${ulid()}`;
}

export function newStorageKey(extension = "wacz"): StorageKey {
  return `archives/${ulid()}.${extension}`;
}

export function isStorageKey(value: string): value is StorageKey {
  return STORAGE_KEY_RE.test(value);
}

export const ID_PATTERNS = {
  saga: new RegExp(`^saga_${ULID_26}$`),
  record: new RegExp(`^rec_${ULID_26}$`),
  subject: new RegExp(`^subj_${ULID_26}$`)
} as const;
