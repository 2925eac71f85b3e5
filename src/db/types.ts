import type { ColumnType, Generated } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type Timestamp = ColumnType<Date | string, string, string>;

export interface SubjectsTable {
  subject_id: string;
  lang: string;
  name: string;
  created_at: Generated<Timestamp>;
}

export interface ArchivedRecordsTable {
  record_id: string;
  seed_url: string;
  lang: string;
  title: string;
  description: OptionalNullable<string>;
  is_private: boolean;
  browser_profile: OptionalNullable<string>;
  record_time: Timestamp;
  crawl_id: string;
  job_run_id: string;
  crawl_status: string;
  storage_key: string;
  content_type: string;
  size_bytes: string; // pg returns bigint as string by default
  checksum_sha256: string;
  archived_at: Generated<Timestamp>;
}

export interface ArchivedRecordSubjectsTable {
  record_id: string;
  subject_id: string;
}

export interface DB {
  subjects: SubjectsTable;
  archived_records: ArchivedRecordsTable;
  archived_record_subjects: ArchivedRecordSubjectsTable;
}
