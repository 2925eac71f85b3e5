import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import * as z from "zod/v4";
import type { CrawlHandle, CrawlOutcome } from "../core/archive.js";
import { archiveLogger } from "../logging.js";
import { buildCrawlConfig } from "./crawlConfig.js";
import { CrawlServiceError, UnknownBrowserProfileError, normalizeCrawlState, type CrawlClient } from "./crawlClient.js";
import { CredentialCache } from "./credentialCache.js";

const zLoginResponse = z.object({ access_token: z.string().min(1) });
const zCreateCrawlResponse = z.object({ id: z.string().min(1), run_now_job: z.string().min(1) });
const zCrawlConfigResponse = z.object({ lastCrawlState: z.string().nullish() });

export interface HttpCrawlClientOptions {
  baseUrl: string;
  orgId: string;
  username: string;
  password: string;
  timeoutMs?: number;
  /** Browser profile name → crawl-service profile id. */
  browserProfiles?: Record<string, string>;
  http?: AxiosInstance;
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown, what: string, status: number): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new CrawlServiceError(`unexpected ${what} response: ${z.prettifyError(parsed.error)}`, status);
  }
  return parsed.data;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

// Node's adapter returns a Buffer; wrap its memory in place.
function asBytes(data: ArrayBuffer | Uint8Array): Uint8Array {
  if (ArrayBuffer.isView(data)) return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  return new Uint8Array(data);
}

/** Client for a Browsertrix-compatible crawl service. Safe to share across sagas. */
export class HttpCrawlClient implements CrawlClient {
  readonly credentials: CredentialCache;
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly log = archiveLogger("crawl");

  constructor(private readonly opts: HttpCrawlClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.http = opts.http ?? axios.create({ timeout: opts.timeoutMs ?? 30_000 });
    this.credentials = new CredentialCache(() => this.authenticate());
  }

  async initialize(): Promise<void> {
    await this.credentials.current();
  }

  async create(url: string, browserProfile: string | null): Promise<CrawlHandle> {
    const profileId = this.resolveProfile(browserProfile);
    const res = await this.send<unknown>(
      { method: "POST", url: `${this.orgUrl()}/crawlconfigs/`, data: buildCrawlConfig(url, profileId) },
      "create crawl"
    );
    const body = parseBody(zCreateCrawlResponse, res.data, "create crawl", res.status);
    return Object.freeze({ crawlId: body.id, jobRunId: body.run_now_job });
  }

  async status(handle: CrawlHandle): Promise<CrawlOutcome> {
    const res = await this.send<unknown>(
      { method: "GET", url: `${this.orgUrl()}/crawlconfigs/${encodeURIComponent(handle.crawlId)}` },
      "crawl status"
    );
    const body = parseBody(zCrawlConfigResponse, res.data, "crawl status", res.status);
    this.log.debug("Crawl {crawlId} reports state {state}", { crawlId: handle.crawlId, state: body.lastCrawlState ?? null });
    return normalizeCrawlState(body.lastCrawlState);
  }

  async fetch(handle: CrawlHandle): Promise<Uint8Array> {
    const res = await this.send<ArrayBuffer | Uint8Array>(
      {
        method: "GET",
        url: `${this.orgUrl()}/crawls/${encodeURIComponent(handle.jobRunId)}/download`,
        params: { prefer_single_wacz: "true" },
        responseType: "arraybuffer"
      },
      "download crawl"
    );
    return asBytes(res.data);
  }

  private orgUrl(): string {
    return `${this.baseUrl}/orgs/${encodeURIComponent(this.opts.orgId)}`;
  }

  private resolveProfile(name: string | null): string | null {
    if (name === null) return null;
    const id = this.opts.browserProfiles?.[name];
    if (!id) throw new UnknownBrowserProfileError(name);
    return id;
  }

  private async authenticate(): Promise<string> {
    const form = new URLSearchParams({ username: this.opts.username, password: this.opts.password });
    const res = await this.http.request<unknown>({
      method: "POST",
      url: `${this.baseUrl}/auth/jwt/login`,
      data: form.toString(),
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      validateStatus: () => true
    });
    if (!isSuccess(res.status)) {
      throw new CrawlServiceError(`crawl service login failed (HTTP ${res.status})`, res.status);
    }
    this.log.info("Authenticated with crawl service at {baseUrl}", { baseUrl: this.baseUrl });
    return parseBody(zLoginResponse, res.data, "login", res.status).access_token;
  }

  // A 401 triggers exactly one re-authentication and one retry of the same request.
  private async send<T>(config: AxiosRequestConfig, what: string): Promise<AxiosResponse<T>> {
    const token = await this.credentials.current();
    let res = await this.http.request<T>(this.withBearer(config, token));

    if (res.status === 401) {
      this.log.info("Crawl service rejected the bearer token during {what}, re-authenticating", { what });
      const refreshed = await this.credentials.refresh(token);
      res = await this.http.request<T>(this.withBearer(config, refreshed));
    }

    if (!isSuccess(res.status)) {
      throw new CrawlServiceError(`${what} failed (HTTP ${res.status})`, res.status);
    }
    return res;
  }

  private withBearer(config: AxiosRequestConfig, token: string): AxiosRequestConfig {
    return {
      ...config,
      headers: { Authorization: `Bearer ${token}` },
      validateStatus: () => true
    };
  }
}
