import { setTimeout as delay } from "timers/promises";
import type { Logger } from "@logtape/logtape";
import type { ArtifactStore } from "../artifacts/artifactStore.js";
import type { ArchiveRequest, CrawlHandle, CrawlOutcome, UploadConfirmation } from "../core/archive.js";
import { newStorageKey, type RecordId, type SagaId, type StorageKey } from "../core/ids.js";
import { extensionForArchiveFormat, mimeTypeForArchiveFormat } from "../core/mimeType.js";
import type { CrawlClient } from "../crawl/crawlClient.js";
import { archiveLogger } from "../logging.js";
import { renderArchiveReadyMessage } from "../notify/messages.js";
import type { Notifier } from "../notify/notifier.js";
import type { CatalogWriter } from "../store/catalog.js";
import {
  errorMessage,
  failureKindForStep,
  type FailedStep,
  type SagaFailed,
  type SagaOutcome,
  type SagaState
} from "./failures.js";

export interface OrchestratorDeps {
  crawler: CrawlClient;
  artifacts: ArtifactStore;
  catalog: CatalogWriter;
  notifier: Notifier;
  sleep?: (ms: number) => Promise<void>;
  newStorageKey?: () => StorageKey;
  /** Base of the record link put in notification emails. */
  publicBaseUrl?: string | null;
}

export interface PollingOptions {
  intervalMs: number;
  maxAttempts: number;
}

export const DEFAULT_POLLING: PollingOptions = { intervalMs: 60_000, maxAttempts: 30 };

export type TransitionListener = (state: SagaState) => void;

const ARCHIVE_FORMAT = "WACZ";

interface PollResult {
  complete: boolean;
  attempts: number;
}

/**
 * Drives one archive request through crawl, poll, fetch, upload, catalog write and
 * notification. Every failure is classified and logged here; `run` never rejects
 * for a failure of a collaborator.
 */
export class CrawlOrchestrator {
  private readonly log = archiveLogger("saga");
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly nextStorageKey: () => StorageKey;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly polling: PollingOptions = DEFAULT_POLLING
  ) {
    if (!Number.isInteger(polling.maxAttempts) || polling.maxAttempts < 1) {
      throw new Error(`maxAttempts must be an integer >= 1 (got ${polling.maxAttempts})`);
    }
    if (polling.intervalMs < 0) throw new Error(`intervalMs must be >= 0 (got ${polling.intervalMs})`);
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.nextStorageKey = deps.newStorageKey ?? (() => newStorageKey(extensionForArchiveFormat(ARCHIVE_FORMAT)));
  }

  async run(sagaId: SagaId, request: ArchiveRequest, onTransition?: TransitionListener): Promise<SagaOutcome> {
    const log = this.log.with({ sagaId, url: request.url });
    const enter = (state: SagaState): void => {
      log.debug("Saga entered {state}", { state });
      onTransition?.(state);
    };

    enter("initiating");
    let handle: CrawlHandle;
    try {
      handle = await this.deps.crawler.create(request.url, request.browserProfile);
    } catch (e) {
      return this.fail(log, enter, "initiating", e, 0);
    }
    log.info("Crawl {crawlId} accepted (job run {jobRunId})", { crawlId: handle.crawlId, jobRunId: handle.jobRunId });

    enter("polling");
    const poll = await this.pollUntilComplete(handle, log);
    if (!poll.complete) {
      const exhausted = new Error(`crawl ${handle.crawlId} did not complete within ${this.polling.maxAttempts} status checks`);
      return this.fail(log, enter, "polling", exhausted, poll.attempts);
    }

    enter("fetching");
    let bytes: Uint8Array;
    try {
      bytes = await this.deps.crawler.fetch(handle);
    } catch (e) {
      return this.fail(log, enter, "fetching", e, poll.attempts);
    }

    enter("persisting");
    const storageKey = this.nextStorageKey();
    const contentType = mimeTypeForArchiveFormat(ARCHIVE_FORMAT);
    let stored: UploadConfirmation;
    try {
      stored = await this.deps.artifacts.upload(storageKey, bytes, contentType);
    } catch (e) {
      return this.fail(log, enter, "persisting", e, poll.attempts);
    }
    log.info("Stored {sizeBytes} bytes under {storageKey}", {
      sizeBytes: stored.sizeBytes.toString(),
      storageKey: stored.key
    });

    enter("recording");
    let recordId: RecordId;
    try {
      recordId = await this.deps.catalog.writeRecord({
        request,
        handle,
        storageKey: stored.key,
        contentType,
        sizeBytes: stored.sizeBytes,
        checksumSha256: stored.checksumSha256
      });
    } catch (e) {
      log.fatal("Catalog write failed after upload; object {storageKey} ({checksumSha256}) is orphaned: {error}", {
        failureKind: "fatal_orphan",
        storageKey: stored.key,
        checksumSha256: stored.checksumSha256,
        crawlId: handle.crawlId,
        error: errorMessage(e)
      });
      enter("failed");
      return {
        status: "failed",
        failureKind: "fatal_orphan",
        step: "recording",
        message: errorMessage(e),
        pollAttempts: poll.attempts,
        storageKey: stored.key
      };
    }
    log.info("Archived {url} as {recordId}", { recordId, storageKey: stored.key });

    // The saga has succeeded at this point; notification can only be reported, not undo it.
    enter("notifying");
    const notified = await this.notify(log, request, recordId);

    enter("succeeded");
    return { status: "succeeded", recordId, storageKey: stored.key, pollAttempts: poll.attempts, notified };
  }

  private async pollUntilComplete(handle: CrawlHandle, log: Logger): Promise<PollResult> {
    const { intervalMs, maxAttempts } = this.polling;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let outcome: CrawlOutcome;
      try {
        outcome = await this.deps.crawler.status(handle);
      } catch (e) {
        log.warning("Status check {attempt}/{maxAttempts} for crawl {crawlId} failed: {error}", {
          attempt,
          maxAttempts,
          crawlId: handle.crawlId,
          error: errorMessage(e)
        });
        if (attempt < maxAttempts) await this.sleep(intervalMs);
        continue;
      }

      if (outcome === "complete") {
        log.info("Crawl {crawlId} complete after {attempt} status checks", { crawlId: handle.crawlId, attempt });
        return { complete: true, attempts: attempt };
      }
      if (outcome !== "pending") {
        log.warning("Crawl {crawlId} reported {outcome} on check {attempt}/{maxAttempts}; still waiting", {
          crawlId: handle.crawlId,
          outcome,
          attempt,
          maxAttempts
        });
      } else {
        log.debug("Crawl {crawlId} pending ({attempt}/{maxAttempts})", { crawlId: handle.crawlId, attempt, maxAttempts });
      }

      if (attempt < maxAttempts) await this.sleep(intervalMs);
    }
    return { complete: false, attempts: maxAttempts };
  }

  private async notify(log: Logger, request: ArchiveRequest, recordId: RecordId): Promise<boolean> {
    const message = renderArchiveReadyMessage(request, recordId, this.deps.publicBaseUrl ?? null);
    try {
      await this.deps.notifier.send(request.contactEmail, message.subject, message.body);
      return true;
    } catch (e) {
      log.warning("Notification for {recordId} to {address} failed: {error}", {
        recordId,
        address: request.contactEmail,
        error: errorMessage(e)
      });
      return false;
    }
  }

  private fail(
    log: Logger,
    enter: (state: SagaState) => void,
    step: FailedStep,
    err: unknown,
    pollAttempts: number
  ): SagaFailed {
    const failureKind = failureKindForStep(step);
    const message = errorMessage(err);
    log.error("Archive saga failed while {step}: {error}", { failureKind, step, error: message });
    enter("failed");
    return { status: "failed", failureKind, step, message, pollAttempts, storageKey: null };
  }
}
