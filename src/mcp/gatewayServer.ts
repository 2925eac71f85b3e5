import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import type { ArchivedRecord, SubjectRecord } from "../core/archive.js";
import type { RecordId, SagaId, SubjectId } from "../core/ids.js";
import { ObjectNotFoundError, type ArtifactStore } from "../artifacts/artifactStore.js";
import type { ServiceConfig } from "../config/serviceConfig.js";
import { archiveLogger } from "../logging.js";
import type { SagaSupervisor, SupervisedOutcome } from "../saga/supervisor.js";
import { DuplicateRecordError, SubjectInUseError, UnknownSubjectError } from "../store/catalog.js";
import type { PostgresCatalog } from "../store/postgresCatalog.js";
import {
  zArchiveDeleteInput,
  zArchiveDeleteOutput,
  zArchiveGetInput,
  zArchiveGetOutput,
  zArchiveListInput,
  zArchiveListOutput,
  zArchiveStatusInput,
  zArchiveStatusOutput,
  zArchiveSubmitInput,
  zArchiveSubmitOutput,
  zArchiveUpdateInput,
  zArchiveUpdateOutput,
  type zSagaOutcome,
  zSubjectCreateInput,
  zSubjectCreateOutput,
  zSubjectDeleteInput,
  zSubjectDeleteOutput,
  zSubjectListInput,
  zSubjectListOutput,
  type zRecordSummary,
  type zSubjectSummary
} from "./toolSchemas.js";

export interface GatewayDeps {
  config: ServiceConfig;
  catalog: PostgresCatalog;
  artifacts: ArtifactStore;
  supervisor: SagaSupervisor;
}

const log = archiveLogger("gateway");

function toSubjectSummary(s: SubjectRecord): z.infer<typeof zSubjectSummary> {
  return { subject_id: s.subjectId, lang: s.language, name: s.name, created_at: s.createdAt };
}

function toRecordSummary(r: ArchivedRecord): z.infer<typeof zRecordSummary> {
  return {
    record_id: r.recordId,
    url: r.url,
    lang: r.language,
    title: r.title,
    description: r.description,
    subjects: r.subjects,
    is_private: r.isPrivate,
    browser_profile: r.browserProfile,
    record_time: r.recordTime,
    crawl_id: r.crawlId,
    job_run_id: r.jobRunId,
    crawl_status: r.crawlStatus,
    storage_key: r.storageKey,
    content_type: r.contentType,
    size_bytes: r.sizeBytes.toString(),
    checksum_sha256: r.checksumSha256,
    archived_at: r.archivedAt
  };
}

function toOutcomeSummary(o: SupervisedOutcome): z.infer<typeof zSagaOutcome> {
  switch (o.status) {
    case "succeeded":
      return {
        status: o.status,
        record_id: o.recordId,
        storage_key: o.storageKey,
        poll_attempts: o.pollAttempts,
        notified: o.notified
      };
    case "failed":
      return {
        status: o.status,
        failure_kind: o.failureKind,
        step: o.step,
        message: o.message,
        storage_key: o.storageKey,
        poll_attempts: o.pollAttempts
      };
    case "crashed":
      return { status: o.status, message: o.message };
  }
}

/**
 * Tool handler boundary: policy gate first, then the handler. McpErrors pass through
 * as they are; anything else is logged before it reaches the client.
 */
async function runTool(
  deps: GatewayDeps,
  toolName: string,
  handler: () => Promise<CallToolResult>
): Promise<CallToolResult> {
  try {
    deps.config.assertToolAllowed(toolName);
    return await handler();
  } catch (e) {
    if (e instanceof McpError) {
      log.debug("{toolName} rejected: {error}", { toolName, error: e.message, code: e.code });
      throw e;
    }
    log.error("{toolName} failed: {error}", { toolName, error: e instanceof Error ? e.message : String(e) });
    throw e;
  }
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "web-archive-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "subject_create",
    {
      description: "Create a catalog subject in one metadata language.",
      inputSchema: zSubjectCreateInput,
      outputSchema: zSubjectCreateOutput
    },
    async (args) =>
      runTool(deps, "subject_create", async () => {
        let subject: SubjectRecord;
        try {
          subject = await deps.catalog.createSubject(args.lang, args.name);
        } catch (e) {
          if (e instanceof DuplicateRecordError) throw new McpError(ErrorCode.InvalidParams, e.message);
          throw e;
        }
        const structured: z.infer<typeof zSubjectCreateOutput> = { subject: toSubjectSummary(subject) };
        return {
          content: [{ type: "text", text: `Created subject ${subject.subjectId}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "subject_list",
    {
      description: "List catalog subjects for a metadata language, by name.",
      inputSchema: zSubjectListInput,
      outputSchema: zSubjectListOutput
    },
    async (args) =>
      runTool(deps, "subject_list", async () => {
        const subjects = await deps.catalog.listSubjects(args.lang, args.limit);
        const structured: z.infer<typeof zSubjectListOutput> = { subjects: subjects.map(toSubjectSummary) };
        return {
          content: [{ type: "text", text: `Subjects: ${subjects.length}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "subject_delete",
    {
      description: "Delete a catalog subject that no archived record links to.",
      inputSchema: zSubjectDeleteInput,
      outputSchema: zSubjectDeleteOutput
    },
    async (args) =>
      runTool(deps, "subject_delete", async () => {
        let deleted: boolean;
        try {
          deleted = await deps.catalog.deleteSubject(args.subject_id as SubjectId, args.lang);
        } catch (e) {
          if (e instanceof SubjectInUseError) throw new McpError(ErrorCode.InvalidParams, e.message);
          throw e;
        }
        if (!deleted) {
          throw new McpError(ErrorCode.InvalidParams, `unknown subject_id for lang ${args.lang}: ${args.subject_id}`);
        }

        const structured: z.infer<typeof zSubjectDeleteOutput> = { subject_id: args.subject_id, deleted: true };
        return {
          content: [{ type: "text", text: `Deleted subject ${args.subject_id}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "archive_submit",
    {
      description:
        "Archive a web page: start a crawl, store the resulting WACZ, catalog it and email the requester. Returns once the job is accepted.",
      inputSchema: zArchiveSubmitInput,
      outputSchema: zArchiveSubmitOutput
    },
    async (args) =>
      runTool(deps, "archive_submit", async () => {
        const browserProfile = args.browser_profile ?? null;
        deps.config.assertBrowserProfileKnown(browserProfile);

        const subjects = args.subjects.map((s) => s as SubjectId);
        if (!(await deps.catalog.subjectsExist(subjects, args.lang))) {
          throw new McpError(ErrorCode.InvalidParams, `unknown subject for lang ${args.lang}`);
        }

        const description = args.description?.trim();
        const { sagaId } = deps.supervisor.launch({
          url: args.url,
          language: args.lang,
          title: args.title,
          description: description ? description : null,
          subjects,
          isPrivate: args.is_private,
          browserProfile,
          contactEmail: args.contact_email,
          recordTime: new Date(args.record_time).toISOString()
        });

        const structured: z.infer<typeof zArchiveSubmitOutput> = { saga_id: sagaId, status: "accepted" };
        return {
          content: [{ type: "text", text: `Accepted ${sagaId}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "archive_status",
    {
      description: "Report the progress of an archive job started by archive_submit.",
      inputSchema: zArchiveStatusInput,
      outputSchema: zArchiveStatusOutput
    },
    async (args) =>
      runTool(deps, "archive_status", async () => {
        const snapshot = deps.supervisor.status(args.saga_id as SagaId);
        if (!snapshot) throw new McpError(ErrorCode.InvalidParams, `unknown saga_id: ${args.saga_id}`);

        const structured: z.infer<typeof zArchiveStatusOutput> = {
          saga_id: snapshot.sagaId,
          url: snapshot.url,
          state: snapshot.state,
          started_at: snapshot.startedAt,
          finished_at: snapshot.finishedAt,
          outcome: snapshot.outcome ? toOutcomeSummary(snapshot.outcome) : null
        };
        return {
          content: [{ type: "text", text: `Saga ${snapshot.sagaId}: ${snapshot.state}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "archive_get",
    {
      description: "Fetch an archived record with a short-lived download URL for its WACZ file.",
      inputSchema: zArchiveGetInput,
      outputSchema: zArchiveGetOutput
    },
    async (args) =>
      runTool(deps, "archive_get", async () => {
        const record = await deps.catalog.getRecord(args.record_id as RecordId);
        if (!record) throw new McpError(ErrorCode.InvalidParams, `unknown record_id: ${args.record_id}`);

        const ttlSeconds = deps.config.presignTtlSeconds();
        let downloadUrl: string;
        try {
          downloadUrl = await deps.artifacts.presignedUrl(record.storageKey, ttlSeconds);
        } catch (e) {
          if (e instanceof ObjectNotFoundError) {
            log.error("Record {recordId} points at missing object {storageKey}", {
              recordId: record.recordId,
              storageKey: record.storageKey
            });
            throw new McpError(ErrorCode.InternalError, `archive file missing for ${record.recordId}`);
          }
          throw e;
        }

        const structured: z.infer<typeof zArchiveGetOutput> = {
          record: toRecordSummary(record),
          download_url: downloadUrl,
          download_expires_in_seconds: ttlSeconds
        };
        return {
          content: [{ type: "text", text: `Record ${record.recordId}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "archive_list",
    {
      description:
        "List archived records, newest first. Filters by language, text in the title or description, URL prefix, record time range and subjects.",
      inputSchema: zArchiveListInput,
      outputSchema: zArchiveListOutput
    },
    async (args) =>
      runTool(deps, "archive_list", async () => {
        const records = await deps.catalog.listRecords({
          ...(args.lang ? { language: args.lang } : {}),
          includePrivate: args.include_private,
          limit: args.limit,
          ...(args.query ? { query: args.query } : {}),
          ...(args.url_prefix ? { urlPrefix: args.url_prefix } : {}),
          ...(args.recorded_from ? { recordedFrom: new Date(args.recorded_from).toISOString() } : {}),
          ...(args.recorded_to ? { recordedTo: new Date(args.recorded_to).toISOString() } : {}),
          ...(args.subjects?.length
            ? { subjects: { ids: args.subjects.map((s) => s as SubjectId), match: args.subjects_match } }
            : {})
        });
        const structured: z.infer<typeof zArchiveListOutput> = {
          count: records.length,
          records: records.map(toRecordSummary)
        };
        return {
          content: [{ type: "text", text: `Records: ${records.length}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "archive_update",
    {
      description: "Replace the title, description, subjects, visibility and record time of an archived record.",
      inputSchema: zArchiveUpdateInput,
      outputSchema: zArchiveUpdateOutput
    },
    async (args) =>
      runTool(deps, "archive_update", async () => {
        let record: ArchivedRecord | null;
        try {
          record = await deps.catalog.updateRecord(args.record_id as RecordId, {
            title: args.title,
            description: args.description ?? null,
            recordTime: new Date(args.record_time).toISOString(),
            subjects: args.subjects.map((s) => s as SubjectId),
            isPrivate: args.is_private
          });
        } catch (e) {
          if (e instanceof UnknownSubjectError) throw new McpError(ErrorCode.InvalidParams, e.message);
          throw e;
        }
        if (!record) throw new McpError(ErrorCode.InvalidParams, `unknown record_id: ${args.record_id}`);

        const structured: z.infer<typeof zArchiveUpdateOutput> = { record: toRecordSummary(record) };
        return {
          content: [{ type: "text", text: `Updated record ${record.recordId}` }],
          structuredContent: structured
        };
      })
  );

  mcp.registerTool(
    "archive_delete",
    {
      description: "Remove an archived record from the catalog. The stored WACZ file is kept.",
      inputSchema: zArchiveDeleteInput,
      outputSchema: zArchiveDeleteOutput
    },
    async (args) =>
      runTool(deps, "archive_delete", async () => {
        const record = await deps.catalog.deleteRecord(args.record_id as RecordId);
        if (!record) throw new McpError(ErrorCode.InvalidParams, `unknown record_id: ${args.record_id}`);

        log.info("Record {recordId} removed from the catalog; object {storageKey} kept", {
          recordId: record.recordId,
          storageKey: record.storageKey
        });
        const structured: z.infer<typeof zArchiveDeleteOutput> = {
          record_id: record.recordId,
          storage_key: record.storageKey
        };
        return {
          content: [{ type: "text", text: `Deleted record ${record.recordId}` }],
          structuredContent: structured
        };
      })
  );

  return mcp;
}
