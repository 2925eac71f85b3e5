import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { DEFAULT_PRESIGN_TTL_SECONDS } from "../artifacts/artifactStore.js";
import { DEFAULT_NOTIFY_TIMEOUT_MS } from "../notify/notifier.js";
import { DEFAULT_POLLING, type PollingOptions } from "../saga/archiveSaga.js";

export const DEFAULT_CONFIG_PATH = "config/default.config.yaml";

const zNonEmpty = z.string().trim().min(1);

const zSagaSection = z.object({
  poll_interval_seconds: z.number().min(0).default(DEFAULT_POLLING.intervalMs / 1000),
  max_poll_attempts: z.number().int().min(1).default(DEFAULT_POLLING.maxAttempts)
});

const zCrawlerSection = z.object({
  base_url: z.url(),
  org_id: zNonEmpty,
  username: zNonEmpty,
  password: zNonEmpty,
  request_timeout_seconds: z.number().positive().default(30),
  browser_profiles: z.record(z.string(), z.string().nullable()).default({})
});

const zLocalStorage = z.object({
  backend: z.literal("local"),
  presign_ttl_seconds: z.number().int().positive().default(DEFAULT_PRESIGN_TTL_SECONDS),
  local: z.object({
    root_dir: zNonEmpty,
    signing_secret: zNonEmpty,
    base_url: z.url().nullable().default(null)
  })
});

const zS3Storage = z.object({
  backend: z.literal("s3"),
  presign_ttl_seconds: z.number().int().positive().default(DEFAULT_PRESIGN_TTL_SECONDS),
  s3: z.object({
    bucket: zNonEmpty,
    endpoint: z.url(),
    region: zNonEmpty,
    access_key_id: zNonEmpty,
    secret_access_key: zNonEmpty,
    force_path_style: z.boolean().default(false)
  })
});

const zNotificationsSection = z.object({
  sender: zNonEmpty,
  timeout_seconds: z.number().positive().default(DEFAULT_NOTIFY_TIMEOUT_MS / 1000),
  public_base_url: z.url().nullable().default(null),
  smtp: z.object({
    host: zNonEmpty,
    port: z.number().int().min(1).max(65535).default(587),
    secure: z.boolean().default(false),
    user: z.string().nullable().default(null),
    pass: z.string().nullable().default(null)
  })
});

export const zServiceConfig = z.object({
  version: z.literal(1),
  tool_allowlist: z.array(z.string()),
  saga: zSagaSection.default({ poll_interval_seconds: 60, max_poll_attempts: 30 }),
  crawler: zCrawlerSection,
  storage: z.discriminatedUnion("backend", [zLocalStorage, zS3Storage]),
  notifications: zNotificationsSection
});

export type ServiceConfigData = z.infer<typeof zServiceConfig>;
export type StorageSection = ServiceConfigData["storage"];
export type NotificationsSection = ServiceConfigData["notifications"];

function expandEnvToken(value: string, env: NodeJS.ProcessEnv): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;

  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}

/** Replaces `${VAR}` / `$VAR` string values anywhere in the parsed document. */
export function expandEnv(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") return expandEnvToken(value, env);
  if (Array.isArray(value)) return value.map((v) => expandEnv(v, env));
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, expandEnv(v, env)]));
  }
  return value;
}

export class ServiceConfig {
  constructor(private readonly config: ServiceConfigData) {}

  static parse(raw: unknown, source: string, env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const parsed = zServiceConfig.safeParse(expandEnv(raw, env));
    if (!parsed.success) {
      throw new Error(`invalid config at ${source}:\n${z.prettifyError(parsed.error)}`);
    }
    return new ServiceConfig(parsed.data);
  }

  static async loadFromFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<ServiceConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    return ServiceConfig.parse(YAML.parse(raw), filePath, env);
  }

  assertToolAllowed(toolName: string): void {
    if (!this.config.tool_allowlist.includes(toolName)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied tool: ${toolName}`);
    }
  }

  polling(): PollingOptions {
    return {
      intervalMs: Math.round(this.config.saga.poll_interval_seconds * 1000),
      maxAttempts: this.config.saga.max_poll_attempts
    };
  }

  /** Profile name → crawl-service profile id, skipping entries whose id did not resolve. */
  browserProfiles(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [name, id] of Object.entries(this.config.crawler.browser_profiles)) {
      if (id) out[name] = id;
    }
    return out;
  }

  assertBrowserProfileKnown(name: string | null): void {
    if (name === null) return;
    if (!Object.hasOwn(this.browserProfiles(), name)) {
      throw new McpError(ErrorCode.InvalidParams, `unknown browser_profile: ${name}`);
    }
  }

  crawler(): {
    baseUrl: string;
    orgId: string;
    username: string;
    password: string;
    timeoutMs: number;
    browserProfiles: Record<string, string>;
  } {
    const c = this.config.crawler;
    return {
      baseUrl: c.base_url,
      orgId: c.org_id,
      username: c.username,
      password: c.password,
      timeoutMs: Math.round(c.request_timeout_seconds * 1000),
      browserProfiles: this.browserProfiles()
    };
  }

  storage(): StorageSection {
    return this.config.storage;
  }

  presignTtlSeconds(): number {
    return this.config.storage.presign_ttl_seconds;
  }

  notifications(): NotificationsSection {
    return this.config.notifications;
  }

  notifyTimeoutMs(): number {
    return Math.round(this.config.notifications.timeout_seconds * 1000);
  }
}
