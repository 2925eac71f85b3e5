import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { LogRecord } from "@logtape/logtape";
import { isStorageKey, newSagaId, newStorageKey, type RecordId, type StorageKey } from "../src/core/ids.js";
import { setupLogging, teardownLogging } from "../src/logging.js";
import { CrawlOrchestrator } from "../src/saga/archiveSaga.js";
import type { SagaState } from "../src/saga/failures.js";
import {
  HANDLE,
  RecordingArtifactStore,
  RecordingCatalog,
  RecordingNotifier,
  ScriptedCrawlClient,
  captureSink,
  recordsAt,
  sampleRequest,
  type Trace
} from "./support/fakes.js";
import type { CrawlOutcome } from "../src/core/archive.js";

const K1: StorageKey = "archives/01HZX0000000000000000000K1.wacz";
const RECORD_ID: RecordId = "rec_01HZX00000000000000000REC1";
const URL = "https://example.org/page";

interface Harness {
  trace: Trace;
  sleeps: number[];
  crawler: ScriptedCrawlClient;
  artifacts: RecordingArtifactStore;
  catalog: RecordingCatalog;
  notifier: RecordingNotifier;
  orchestrator: CrawlOrchestrator;
}

function harness(opts: {
  statuses: Array<CrawlOutcome | Error>;
  createError?: Error;
  fetchError?: Error;
  uploadError?: Error;
  writeError?: Error;
  notifyError?: Error;
}): Harness {
  const trace: Trace = [];
  const sleeps: number[] = [];
  const crawler = new ScriptedCrawlClient(trace, {
    statuses: opts.statuses,
    ...(opts.createError ? { createError: opts.createError } : {}),
    ...(opts.fetchError ? { fetchError: opts.fetchError } : {})
  });
  const artifacts = new RecordingArtifactStore(trace, opts.uploadError ?? null);
  const catalog = new RecordingCatalog(trace, RECORD_ID, opts.writeError ?? null);
  const notifier = new RecordingNotifier(trace, opts.notifyError ?? null);
  const orchestrator = new CrawlOrchestrator({
    crawler,
    artifacts,
    catalog,
    notifier,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    newStorageKey: () => K1
  });
  return { trace, sleeps, crawler, artifacts, catalog, notifier, orchestrator };
}

describe("CrawlOrchestrator", () => {
  let records: LogRecord[];

  beforeEach(async () => {
    const capture = captureSink();
    records = capture.records;
    await setupLogging({ level: "debug", sink: capture.sink });
  });

  afterEach(async () => {
    await teardownLogging();
  });

  it("archives a crawl that is complete on the first poll without sleeping", async () => {
    const h = harness({ statuses: ["complete"] });
    const states: SagaState[] = [];

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest(), (s) => states.push(s));

    expect(outcome).toEqual({ status: "succeeded", recordId: RECORD_ID, storageKey: K1, pollAttempts: 1, notified: true });
    expect(h.sleeps).toEqual([]);
    expect(h.trace).toEqual([
      `create:${URL}:-`,
      "status",
      "fetch",
      `upload:${K1}`,
      `write:${K1}`,
      "notify:requester@example.org"
    ]);
    expect(states).toEqual(["initiating", "polling", "fetching", "persisting", "recording", "notifying", "succeeded"]);
    expect(h.artifacts.uploads).toEqual([{ key: K1, size: 1024, contentType: "application/wacz" }]);

    const written = h.catalog.writes[0];
    expect(written?.handle).toEqual(HANDLE);
    expect(written?.storageKey).toBe(K1);
    expect(written?.sizeBytes).toBe(1024n);
    expect(written?.contentType).toBe("application/wacz");

    expect(h.notifier.sent).toHaveLength(1);
    expect(h.notifier.sent[0]?.subject).toBe("Archive ready: Example page");
    expect(h.notifier.sent[0]?.body).toContain(`Record: ${RECORD_ID}`);
  });

  it("sleeps the poll interval between pending checks, five times before the sixth completes", async () => {
    const h = harness({ statuses: ["pending", "pending", "pending", "pending", "pending", "complete"] });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome.status).toBe("succeeded");
    expect(outcome.pollAttempts).toBe(6);
    expect(h.sleeps).toEqual([60_000, 60_000, 60_000, 60_000, 60_000]);
    expect(h.trace.slice(0, 8)).toEqual([
      `create:${URL}:-`,
      "status",
      "status",
      "status",
      "status",
      "status",
      "status",
      "fetch"
    ]);
  });

  it("gives up after thirty pending checks without touching storage, catalog or mail", async () => {
    const h = harness({ statuses: ["pending"] });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome).toEqual({
      status: "failed",
      failureKind: "fatal_before_artifact",
      step: "polling",
      message: "crawl cfg-1 did not complete within 30 status checks",
      pollAttempts: 30,
      storageKey: null
    });
    expect(h.crawler.statusCalls).toBe(30);
    expect(h.sleeps).toHaveLength(29);
    expect(h.trace.filter((t) => t !== "status")).toEqual([`create:${URL}:-`]);
    expect(h.artifacts.uploads).toEqual([]);
    expect(h.catalog.writes).toEqual([]);
    expect(h.notifier.sent).toEqual([]);

    const errors = recordsAt(records, "error", "saga");
    expect(errors).toHaveLength(1);
    expect(errors[0]?.properties.failureKind).toBe("fatal_before_artifact");
  });

  it("treats failed, unknown and status errors like pending", async () => {
    const h = harness({ statuses: [new Error("ECONNRESET"), "failed", "unknown", "complete"] });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome.status).toBe("succeeded");
    expect(outcome.pollAttempts).toBe(4);
    expect(h.sleeps).toEqual([60_000, 60_000, 60_000]);
    expect(recordsAt(records, "warning", "saga")).toHaveLength(3);
    expect(h.trace.filter((t) => t === "fetch")).toHaveLength(1);
  });

  it("fails before polling when the crawl cannot be created", async () => {
    const h = harness({ statuses: ["complete"], createError: new Error("HTTP 500") });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome).toMatchObject({ status: "failed", failureKind: "fatal_before_artifact", step: "initiating", pollAttempts: 0 });
    expect(h.crawler.statusCalls).toBe(0);
    expect(h.trace).toEqual([`create:${URL}:-`]);
  });

  it("fails without uploading when the artifact cannot be fetched", async () => {
    const h = harness({ statuses: ["complete"], fetchError: new Error("download failed (HTTP 502)") });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome).toMatchObject({
      status: "failed",
      failureKind: "fatal_before_artifact",
      step: "fetching",
      message: "download failed (HTTP 502)"
    });
    expect(h.artifacts.uploads).toEqual([]);
    expect(h.catalog.writes).toEqual([]);
  });

  it("classifies an upload failure as after-artifact and never writes the record", async () => {
    const h = harness({ statuses: ["complete"], uploadError: new Error("bucket unavailable") });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome).toEqual({
      status: "failed",
      failureKind: "fatal_after_artifact",
      step: "persisting",
      message: "bucket unavailable",
      pollAttempts: 1,
      storageKey: null
    });
    expect(h.trace).not.toContain(`write:${K1}`);
    expect(h.notifier.sent).toEqual([]);

    const errors = recordsAt(records, "error", "saga");
    expect(errors).toHaveLength(1);
    expect(errors[0]?.properties.failureKind).toBe("fatal_after_artifact");
    expect(recordsAt(records, "fatal", "saga")).toEqual([]);
  });

  it("logs a catalog failure after upload at fatal with the orphaned key, and sends no mail", async () => {
    const h = harness({ statuses: ["complete"], writeError: new Error("connection terminated") });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome).toEqual({
      status: "failed",
      failureKind: "fatal_orphan",
      step: "recording",
      message: "connection terminated",
      pollAttempts: 1,
      storageKey: K1
    });
    expect(h.notifier.sent).toEqual([]);
    expect(h.trace).toEqual([`create:${URL}:-`, "status", "fetch", `upload:${K1}`, `write:${K1}`]);

    const fatal = recordsAt(records, "fatal", "saga");
    expect(fatal).toHaveLength(1);
    expect(fatal[0]?.properties.failureKind).toBe("fatal_orphan");
    expect(fatal[0]?.properties.storageKey).toBe(K1);
    expect(fatal[0]?.properties.checksumSha256).toBe(`sha256:${"ab".repeat(32)}`);
    expect(recordsAt(records, "error", "saga")).toEqual([]);
  });

  it("still succeeds when the notification fails", async () => {
    const h = harness({ statuses: ["complete"], notifyError: new Error("smtp timeout") });

    const outcome = await h.orchestrator.run(newSagaId(), sampleRequest());

    expect(outcome).toEqual({ status: "succeeded", recordId: RECORD_ID, storageKey: K1, pollAttempts: 1, notified: false });
    expect(h.catalog.writes).toHaveLength(1);

    const warnings = recordsAt(records, "warning", "saga");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.properties.error).toBe("smtp timeout");
  });

  it("tags every saga log record with its saga id", async () => {
    const h = harness({ statuses: ["complete"] });
    const sagaId = newSagaId();

    await h.orchestrator.run(sagaId, sampleRequest());

    const sagaRecords = records.filter((r) => r.category[1] === "saga");
    expect(sagaRecords.length).toBeGreaterThan(0);
    expect(sagaRecords.every((r) => r.properties.sagaId === sagaId)).toBe(true);
  });

  it("rejects a zero attempt budget", () => {
    const h = harness({ statuses: ["complete"] });
    expect(
      () =>
        new CrawlOrchestrator(
          { crawler: h.crawler, artifacts: h.artifacts, catalog: h.catalog, notifier: h.notifier },
          { intervalMs: 1000, maxAttempts: 0 }
        )
    ).toThrow("maxAttempts must be an integer >= 1 (got 0)");
  });
});

describe("storage keys", () => {
  it("never collide when minted in the same instant", () => {
    const keys = Array.from({ length: 1000 }, () => newStorageKey());
    expect(new Set(keys).size).toBe(1000);
    expect(keys.every((k) => isStorageKey(k) && k.endsWith(".wacz"))).toBe(true);
  });

  it("are distinct across concurrently running sagas", async () => {
    const trace: Trace = [];
    const artifacts = new RecordingArtifactStore(trace);
    const runs = Array.from({ length: 20 }, () =>
      new CrawlOrchestrator({
        crawler: new ScriptedCrawlClient(trace, { statuses: ["complete"] }),
        artifacts,
        catalog: new RecordingCatalog(trace, RECORD_ID),
        notifier: new RecordingNotifier(trace),
        sleep: async () => undefined
      }).run(newSagaId(), sampleRequest())
    );

    const outcomes = await Promise.all(runs);
    const keys = new Set(artifacts.uploads.map((u) => u.key));
    expect(outcomes.every((o) => o.status === "succeeded")).toBe(true);
    expect(keys.size).toBe(20);
  });
});
