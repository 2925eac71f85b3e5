import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { ArtifactStore } from "./artifacts/artifactStore.js";
import { LocalObjectStore } from "./artifacts/localObjectStore.js";
import { S3ObjectStore } from "./artifacts/s3ObjectStore.js";
import { DEFAULT_CONFIG_PATH, ServiceConfig, type StorageSection } from "./config/serviceConfig.js";
import { HttpCrawlClient } from "./crawl/httpCrawlClient.js";
import { applySchema, createDb, createPool, DEFAULT_SCHEMA_PATH } from "./db/connection.js";
import { archiveLogger, logLevelFromEnv, setupLogging } from "./logging.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { createSmtpTransport, EmailNotifier } from "./notify/emailNotifier.js";
import { CrawlOrchestrator } from "./saga/archiveSaga.js";
import { SagaSupervisor } from "./saga/supervisor.js";
import { PostgresCatalog } from "./store/postgresCatalog.js";

const log = archiveLogger("main");

async function createArtifactStore(storage: StorageSection): Promise<ArtifactStore> {
  if (storage.backend === "s3") {
    return S3ObjectStore.fromOptions({
      bucket: storage.s3.bucket,
      endpoint: storage.s3.endpoint,
      region: storage.s3.region,
      accessKeyId: storage.s3.access_key_id,
      secretAccessKey: storage.s3.secret_access_key,
      forcePathStyle: storage.s3.force_path_style
    });
  }
  const local = new LocalObjectStore({
    rootDir: storage.local.root_dir,
    signingSecret: storage.local.signing_secret,
    ...(storage.local.base_url ? { baseUrl: storage.local.base_url } : {})
  });
  await local.init();
  return local;
}

async function main(): Promise<void> {
  await setupLogging({ level: logLevelFromEnv() ?? "info" });

  const configPath = process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  const config = await ServiceConfig.loadFromFile(configPath);

  const pool = createPool(process.env.DATABASE_URL);
  if (!process.env.DATABASE_URL || autoSchema) {
    await applySchema(pool, DEFAULT_SCHEMA_PATH);
  }
  const catalog = new PostgresCatalog(createDb(pool));
  const artifacts = await createArtifactStore(config.storage());

  const crawler = new HttpCrawlClient(config.crawler());
  await crawler.initialize();

  const mail = config.notifications();
  const notifier = new EmailNotifier(createSmtpTransport(mail.smtp, config.notifyTimeoutMs()), {
    sender: mail.sender,
    timeoutMs: config.notifyTimeoutMs()
  });

  const orchestrator = new CrawlOrchestrator(
    { crawler, artifacts, catalog, notifier, publicBaseUrl: mail.public_base_url },
    config.polling()
  );
  const supervisor = new SagaSupervisor(orchestrator);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      const inFlight = supervisor.inFlight();
      if (inFlight > 0) {
        log.warning("Received {signal}; abandoning {inFlight} in-flight archive sagas", { signal, inFlight });
      } else {
        log.info("Received {signal}; shutting down", { signal });
      }
      process.exit(0);
    });
  }

  const server = createGatewayServer({ config, catalog, artifacts, supervisor });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("Web archive gateway ready (config {configPath}, database {database})", {
    configPath,
    database: process.env.DATABASE_URL ? "postgres" : "pg-mem"
  });
}

main().catch((err: unknown) => {
  log.fatal("Gateway failed to start: {error}", { error: err instanceof Error ? err.message : String(err) });
  console.error(err);
  process.exitCode = 1;
});
