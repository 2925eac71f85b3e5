import type { Kysely, Selectable } from "kysely";
import type { ArchivedRecord, MetadataLanguage, NewArchivedRecord, SubjectRecord } from "../core/archive.js";
import { isStorageKey, newRecordId, newSubjectId, type RecordId, type SubjectId } from "../core/ids.js";
import type { DB } from "../db/types.js";
import {
  DuplicateRecordError,
  isUniqueViolation,
  SubjectInUseError,
  UnknownSubjectError,
  type CatalogWriter
} from "./catalog.js";

export interface RecordFilter {
  language?: MetadataLanguage;
  includePrivate: boolean;
  limit: number;
  /** Case-insensitive substring of the title or description. */
  query?: string;
  urlPrefix?: string;
  recordedFrom?: string;
  recordedTo?: string;
  /** `any`: linked to at least one of the ids; `all`: linked to every one. */
  subjects?: { ids: readonly SubjectId[]; match: "any" | "all" };
}

export interface RecordUpdate {
  title: string;
  description: string | null;
  recordTime: string;
  subjects: readonly SubjectId[];
  isPrivate: boolean;
}

function likePattern(fragment: string, mode: "contains" | "prefix"): string {
  const escaped = fragment.replace(/[\\%_]/g, (c) => `\\${c}`);
  return mode === "contains" ? `%${escaped}%` : `${escaped}%`;
}

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  const parsed = new Date(String(value));
  return Number.isNaN(parsed.getTime()) ? String(value) : parsed.toISOString();
}

function toLanguage(value: string): MetadataLanguage {
  if (value === "en" || value === "ar") return value;
  throw new Error(`unexpected metadata language in catalog: ${value}`);
}

export class PostgresCatalog implements CatalogWriter {
  constructor(private readonly db: Kysely<DB>) {}

  async writeRecord(input: NewArchivedRecord): Promise<RecordId> {
    const recordId = newRecordId();
    const { request, handle } = input;

    try {
      await this.db.transaction().execute(async (trx) => {
        // Links are checked before the record row goes in; pg-mem does not undo earlier inserts on rollback.
        const subjectIds = [...new Set(request.subjects)];
        if (subjectIds.length > 0) {
          const found = await trx
            .selectFrom("subjects")
            .select(["subject_id"])
            .where("subject_id", "in", subjectIds)
            .execute();
          const known = new Set(found.map((r) => r.subject_id));
          const missing = subjectIds.filter((id) => !known.has(id));
          if (missing.length > 0) throw new UnknownSubjectError(missing);
        }

        await trx
          .insertInto("archived_records")
          .values({
            record_id: recordId,
            seed_url: request.url,
            lang: request.language,
            title: request.title.trim(),
            description: request.description?.trim() ?? null,
            is_private: request.isPrivate,
            browser_profile: request.browserProfile,
            record_time: request.recordTime,
            crawl_id: handle.crawlId,
            job_run_id: handle.jobRunId,
            crawl_status: "complete",
            storage_key: input.storageKey,
            content_type: input.contentType,
            size_bytes: input.sizeBytes.toString(),
            checksum_sha256: input.checksumSha256
          })
          .execute();

        if (subjectIds.length > 0) {
          await trx
            .insertInto("archived_record_subjects")
            .values(subjectIds.map((subjectId) => ({ record_id: recordId, subject_id: subjectId })))
            .execute();
        }
      });
    } catch (e) {
      if (isUniqueViolation(e)) {
        throw new DuplicateRecordError(
          `catalog already holds crawl ${handle.crawlId} or storage key ${input.storageKey}`
        );
      }
      throw e;
    }

    return recordId;
  }

  async getRecord(recordId: RecordId): Promise<ArchivedRecord | null> {
    const row = await this.db
      .selectFrom("archived_records")
      .selectAll()
      .where("record_id", "=", recordId)
      .executeTakeFirst();
    if (!row) return null;

    const subjects = await this.subjectsFor([row.record_id]);
    return this.mapRecord(row, subjects.get(row.record_id) ?? []);
  }

  async listRecords(filter: RecordFilter): Promise<ArchivedRecord[]> {
    let q = this.db.selectFrom("archived_records").selectAll();
    if (filter.language) q = q.where("lang", "=", filter.language);
    if (!filter.includePrivate) q = q.where("is_private", "=", false);

    const term = filter.query?.trim();
    if (term) {
      const pattern = likePattern(term, "contains");
      q = q.where((eb) => eb.or([eb("title", "ilike", pattern), eb("description", "ilike", pattern)]));
    }
    if (filter.urlPrefix) q = q.where("seed_url", "like", likePattern(filter.urlPrefix, "prefix"));
    if (filter.recordedFrom) q = q.where("record_time", ">=", filter.recordedFrom);
    if (filter.recordedTo) q = q.where("record_time", "<=", filter.recordedTo);

    if (filter.subjects && filter.subjects.ids.length > 0) {
      const matching = await this.recordsLinkedTo(filter.subjects.ids, filter.subjects.match);
      if (matching.length === 0) return [];
      q = q.where("record_id", "in", matching);
    }

    const rows = await q.orderBy("archived_at", "desc").orderBy("record_id", "desc").limit(filter.limit).execute();
    const subjects = await this.subjectsFor(rows.map((r) => r.record_id));
    return rows.map((row) => this.mapRecord(row, subjects.get(row.record_id) ?? []));
  }

  /**
   * Replaces the editable metadata of a record and its subject links. Subjects must exist in
   * the record's language; the crawl and storage columns never change. Null when the id is unknown.
   */
  async updateRecord(recordId: RecordId, update: RecordUpdate): Promise<ArchivedRecord | null> {
    const subjectIds = [...new Set(update.subjects)];

    const found = await this.db.transaction().execute(async (trx) => {
      const existing = await trx
        .selectFrom("archived_records")
        .select(["record_id", "lang"])
        .where("record_id", "=", recordId)
        .executeTakeFirst();
      if (!existing) return false;

      if (subjectIds.length > 0) {
        const known = await trx
          .selectFrom("subjects")
          .select(["subject_id"])
          .where("subject_id", "in", subjectIds)
          .where("lang", "=", existing.lang)
          .execute();
        const knownIds = new Set(known.map((r) => r.subject_id));
        const missing = subjectIds.filter((id) => !knownIds.has(id));
        if (missing.length > 0) throw new UnknownSubjectError(missing);
      }

      await trx
        .updateTable("archived_records")
        .set({
          title: update.title.trim(),
          description: update.description?.trim() || null,
          record_time: update.recordTime,
          is_private: update.isPrivate
        })
        .where("record_id", "=", recordId)
        .execute();
      await trx.deleteFrom("archived_record_subjects").where("record_id", "=", recordId).execute();
      if (subjectIds.length > 0) {
        await trx
          .insertInto("archived_record_subjects")
          .values(subjectIds.map((subjectId) => ({ record_id: recordId, subject_id: subjectId })))
          .execute();
      }
      return true;
    });

    return found ? this.getRecord(recordId) : null;
  }

  /** Removes the catalog entry and its links. The stored object is left in place. */
  async deleteRecord(recordId: RecordId): Promise<ArchivedRecord | null> {
    const record = await this.getRecord(recordId);
    if (!record) return null;

    await this.db.transaction().execute(async (trx) => {
      await trx.deleteFrom("archived_record_subjects").where("record_id", "=", recordId).execute();
      await trx.deleteFrom("archived_records").where("record_id", "=", recordId).execute();
    });
    return record;
  }

  async createSubject(language: MetadataLanguage, name: string): Promise<SubjectRecord> {
    const subjectId = newSubjectId();
    try {
      await this.db.insertInto("subjects").values({ subject_id: subjectId, lang: language, name: name.trim() }).execute();
    } catch (e) {
      if (isUniqueViolation(e)) throw new DuplicateRecordError(`subject already exists: ${name.trim()}`);
      throw e;
    }
    const row = await this.db
      .selectFrom("subjects")
      .selectAll()
      .where("subject_id", "=", subjectId)
      .executeTakeFirstOrThrow();
    return this.mapSubject(row);
  }

  async listSubjects(language: MetadataLanguage, limit: number): Promise<SubjectRecord[]> {
    const rows = await this.db
      .selectFrom("subjects")
      .selectAll()
      .where("lang", "=", language)
      .orderBy("name", "asc")
      .limit(limit)
      .execute();
    return rows.map((row) => this.mapSubject(row));
  }

  /**
   * Deletes a subject of `language`. Refuses while any record links to it; false when there is
   * no such subject.
   */
  async deleteSubject(subjectId: SubjectId, language: MetadataLanguage): Promise<boolean> {
    return this.db.transaction().execute(async (trx) => {
      const subject = await trx
        .selectFrom("subjects")
        .select(["subject_id"])
        .where("subject_id", "=", subjectId)
        .where("lang", "=", language)
        .executeTakeFirst();
      if (!subject) return false;

      const links = await trx
        .selectFrom("archived_record_subjects")
        .select(["record_id"])
        .where("subject_id", "=", subjectId)
        .execute();
      if (links.length > 0) throw new SubjectInUseError(subjectId, links.length);

      await trx.deleteFrom("subjects").where("subject_id", "=", subjectId).execute();
      return true;
    });
  }

  /** True when every id names an existing subject in `language`. */
  async subjectsExist(subjectIds: readonly SubjectId[], language: MetadataLanguage): Promise<boolean> {
    const unique = [...new Set(subjectIds)];
    if (unique.length === 0) return true;
    const rows = await this.db
      .selectFrom("subjects")
      .select(["subject_id"])
      .where("subject_id", "in", unique)
      .where("lang", "=", language)
      .execute();
    return rows.length === unique.length;
  }

  private async recordsLinkedTo(subjectIds: readonly SubjectId[], match: "any" | "all"): Promise<string[]> {
    const wanted = [...new Set(subjectIds)];
    const links = await this.db
      .selectFrom("archived_record_subjects")
      .select(["record_id", "subject_id"])
      .where("subject_id", "in", wanted)
      .execute();

    const hits = new Map<string, number>();
    for (const link of links) hits.set(link.record_id, (hits.get(link.record_id) ?? 0) + 1);
    const needed = match === "all" ? wanted.length : 1;
    return [...hits].filter(([, count]) => count >= needed).map(([recordId]) => recordId);
  }

  private async subjectsFor(recordIds: string[]): Promise<Map<string, SubjectId[]>> {
    const out = new Map<string, SubjectId[]>();
    if (recordIds.length === 0) return out;

    const links = await this.db
      .selectFrom("archived_record_subjects")
      .selectAll()
      .where("record_id", "in", recordIds)
      .orderBy("subject_id", "asc")
      .execute();
    for (const link of links) {
      const list = out.get(link.record_id) ?? [];
      list.push(link.subject_id as SubjectId);
      out.set(link.record_id, list);
    }
    return out;
  }

  private mapRecord(row: Selectable<DB["archived_records"]>, subjects: SubjectId[]): ArchivedRecord {
    if (!isStorageKey(row.storage_key)) {
      throw new Error(`record ${row.record_id} has a malformed storage key: ${row.storage_key}`);
    }
    return {
      recordId: row.record_id as RecordId,
      url: row.seed_url,
      language: toLanguage(row.lang),
      title: row.title,
      description: row.description,
      subjects,
      isPrivate: row.is_private,
      browserProfile: row.browser_profile,
      recordTime: toIso(row.record_time),
      crawlId: row.crawl_id,
      jobRunId: row.job_run_id,
      crawlStatus: "complete",
      storageKey: row.storage_key,
      contentType: row.content_type,
      sizeBytes: BigInt(row.size_bytes),
      checksumSha256: row.checksum_sha256 as `sha256:${string}`,
      archivedAt: toIso(row.archived_at)
    };
  }

  private mapSubject(row: Selectable<DB["subjects"]>): SubjectRecord {
    return {
      subjectId: row.subject_id as SubjectId,
      language: toLanguage(row.lang),
      name: row.name,
      createdAt: toIso(row.created_at)
    };
  }
}
