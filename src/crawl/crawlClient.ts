import type { CrawlHandle, CrawlOutcome } from "../core/archive.js";

export interface CrawlClient {
  create(url: string, browserProfile: string | null): Promise<CrawlHandle>;
  status(handle: CrawlHandle): Promise<CrawlOutcome>;
  fetch(handle: CrawlHandle): Promise<Uint8Array>;
}

export class CrawlServiceError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = "CrawlServiceError";
  }
}

export class UnknownBrowserProfileError extends Error {
  constructor(readonly profile: string) {
    super(`unknown browser profile: ${profile}`);
    this.name = "UnknownBrowserProfileError";
  }
}

const RUNNING_STATES = new Set([
  "starting",
  "waiting_capacity",
  "waiting_org_limit",
  "running",
  "pending-wait",
  "generate-wacz",
  "uploading-wacz"
]);

const FAILED_STATES = new Set([
  "failed",
  "canceled",
  "skipped_storage_quota_reached",
  "skipped_time_quota_reached",
  "stopped_by_user",
  "stopped_pause_expired",
  "stopped_storage_quota_reached",
  "stopped_time_quota_reached"
]);

export function normalizeCrawlState(stateRaw: string | null | undefined): CrawlOutcome {
  // Only the exact state counts as done; anything merely resembling it keeps polling.
  if (stateRaw === "complete") return "complete";
  const s = String(stateRaw ?? "").trim().toLowerCase();
  if (!s) return "unknown";
  if (RUNNING_STATES.has(s)) return "pending";
  if (FAILED_STATES.has(s)) return "failed";
  return "unknown";
}
