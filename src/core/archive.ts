import type { RecordId, StorageKey, SubjectId } from "./ids.js";

export type MetadataLanguage = "en" | "ar";

export type CrawlOutcome = "pending" | "complete" | "failed" | "unknown";

export interface ArchiveRequest {
  readonly url: string;
  readonly language: MetadataLanguage;
  readonly title: string;
  readonly description: string | null;
  readonly subjects: readonly SubjectId[];
  readonly isPrivate: boolean;
  readonly browserProfile: string | null;
  readonly contactEmail: string;
  /** ISO-8601 timestamp the archived page is catalogued under. */
  readonly recordTime: string;
}

export interface CrawlHandle {
  readonly crawlId: string;
  readonly jobRunId: string;
}

export interface UploadConfirmation {
  key: StorageKey;
  sizeBytes: bigint;
  checksumSha256: `sha256:${string}`;
  etag: string | null;
}

export interface NewArchivedRecord {
  request: ArchiveRequest;
  handle: CrawlHandle;
  storageKey: StorageKey;
  contentType: string;
  sizeBytes: bigint;
  checksumSha256: `sha256:${string}`;
}

export interface ArchivedRecord {
  recordId: RecordId;
  url: string;
  language: MetadataLanguage;
  title: string;
  description: string | null;
  subjects: SubjectId[];
  isPrivate: boolean;
  browserProfile: string | null;
  recordTime: string;
  crawlId: string;
  jobRunId: string;
  crawlStatus: "complete";
  storageKey: StorageKey;
  contentType: string;
  sizeBytes: bigint;
  checksumSha256: `sha256:${string}`;
  archivedAt: string;
}

export interface SubjectRecord {
  subjectId: SubjectId;
  language: MetadataLanguage;
  name: string;
  createdAt: string;
}

export function freezeArchiveRequest(input: ArchiveRequest): ArchiveRequest {
  return Object.freeze({ ...input, subjects: Object.freeze([...new Set(input.subjects)]) });
}
