import { Console } from "console";
import { configure, getConsoleSink, getLogger, reset, type LogLevel, type Logger, type Sink } from "@logtape/logtape";

export const LOG_ROOT = "archive";

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warning", "error", "fatal"];

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw) return isLogLevel(raw) ? raw : undefined;

  const debug = env.DEBUG?.trim().toLowerCase();
  if (debug === "true" || debug === "yes" || debug === "1") return "debug";
  return undefined;
}

// stdout carries the MCP stdio transport, so the console sink writes to stderr only.
export function stderrSink(): Sink {
  return getConsoleSink({ console: new Console({ stdout: process.stderr, stderr: process.stderr }) });
}

export async function setupLogging(opts: { level?: LogLevel; sink?: Sink } = {}): Promise<void> {
  await configure({
    reset: true,
    sinks: { main: opts.sink ?? stderrSink() },
    loggers: [
      { category: [LOG_ROOT], lowestLevel: opts.level ?? "info", sinks: ["main"] },
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["main"] }
    ]
  });
}

export async function teardownLogging(): Promise<void> {
  await reset();
}

export function archiveLogger(...subcategory: string[]): Logger {
  const category: readonly [string, ...string[]] = [LOG_ROOT, ...subcategory];
  return getLogger(category);
}
