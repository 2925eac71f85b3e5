import * as z from "zod/v4";
import { ID_PATTERNS } from "../core/ids.js";

export const zSagaId = z.string().regex(ID_PATTERNS.saga, "invalid saga_id");
export const zRecordId = z.string().regex(ID_PATTERNS.record, "invalid record_id");
export const zSubjectId = z.string().regex(ID_PATTERNS.subject, "invalid subject_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);
export const zLanguage = z.enum(["en", "ar"]);

export const zSubjectSummary = z.object({
  subject_id: zSubjectId,
  lang: zLanguage,
  name: z.string(),
  created_at: z.string()
});

export const zRecordSummary = z.object({
  record_id: zRecordId,
  url: z.string(),
  lang: zLanguage,
  title: z.string(),
  description: z.string().nullable(),
  subjects: z.array(zSubjectId),
  is_private: z.boolean(),
  browser_profile: z.string().nullable(),
  record_time: z.string(),
  crawl_id: z.string(),
  job_run_id: z.string(),
  crawl_status: z.literal("complete"),
  storage_key: z.string(),
  content_type: z.string(),
  size_bytes: z.string(),
  checksum_sha256: zSha256,
  archived_at: z.string()
});

export const zSubjectCreateInput = z.object({
  lang: zLanguage,
  name: z.string().trim().min(1).max(256)
});

export const zSubjectCreateOutput = z.object({
  subject: zSubjectSummary
});

export const zSubjectDeleteInput = z.object({
  lang: zLanguage,
  subject_id: zSubjectId
});

export const zSubjectDeleteOutput = z.object({
  subject_id: zSubjectId,
  deleted: z.literal(true)
});

export const zSubjectListInput = z.object({
  lang: zLanguage,
  limit: z.number().int().min(1).max(500).default(100)
});

export const zSubjectListOutput = z.object({
  subjects: z.array(zSubjectSummary)
});

export const zArchiveSubmitInput = z.object({
  url: z.url({ protocol: /^https?$/ }),
  lang: zLanguage,
  title: z.string().trim().min(1).max(512),
  description: z.string().max(4096).optional(),
  subjects: z.array(zSubjectId).max(64).default([]),
  is_private: z.boolean().default(false),
  browser_profile: z.string().min(1).max(128).optional(),
  contact_email: z.email(),
  record_time: z.iso.datetime({ offset: true })
});

export const zArchiveSubmitOutput = z.object({
  saga_id: zSagaId,
  status: z.literal("accepted")
});

export const zArchiveStatusInput = z.object({
  saga_id: zSagaId
});

export const zSagaOutcome = z.object({
  status: z.enum(["succeeded", "failed", "crashed"]),
  record_id: zRecordId.optional(),
  storage_key: z.string().nullable().optional(),
  failure_kind: z.enum(["fatal_before_artifact", "fatal_after_artifact", "fatal_orphan"]).optional(),
  step: z.string().optional(),
  message: z.string().optional(),
  poll_attempts: z.number().int().optional(),
  notified: z.boolean().optional()
});

export const zArchiveStatusOutput = z.object({
  saga_id: zSagaId,
  url: z.string(),
  state: z.string(),
  started_at: z.string(),
  finished_at: z.string().nullable(),
  outcome: zSagaOutcome.nullable()
});

export const zArchiveGetInput = z.object({
  record_id: zRecordId
});

export const zArchiveGetOutput = z.object({
  record: zRecordSummary,
  download_url: z.string(),
  download_expires_in_seconds: z.number().int()
});

export const zArchiveListInput = z.object({
  lang: zLanguage.optional(),
  include_private: z.boolean().default(false),
  query: z.string().trim().min(1).max(256).optional(),
  url_prefix: z.string().min(1).max(2048).optional(),
  recorded_from: z.iso.datetime({ offset: true }).optional(),
  recorded_to: z.iso.datetime({ offset: true }).optional(),
  subjects: z.array(zSubjectId).max(64).optional(),
  subjects_match: z.enum(["any", "all"]).default("any"),
  limit: z.number().int().min(1).max(500).default(100)
});

export const zArchiveListOutput = z.object({
  count: z.number().int(),
  records: z.array(zRecordSummary)
});

export const zArchiveUpdateInput = z.object({
  record_id: zRecordId,
  title: z.string().trim().min(1).max(512),
  description: z.string().max(4096).optional(),
  subjects: z.array(zSubjectId).max(64).default([]),
  is_private: z.boolean(),
  record_time: z.iso.datetime({ offset: true })
});

export const zArchiveUpdateOutput = z.object({
  record: zRecordSummary
});

export const zArchiveDeleteInput = z.object({
  record_id: zRecordId
});

export const zArchiveDeleteOutput = z.object({
  record_id: zRecordId,
  storage_key: z.string()
});
