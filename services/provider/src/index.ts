import { buildApp } from "./app.js";
import { loadEnv } from "./config/env.js";
import { createDb } from "./db/index.js";
import { DisabledEventPublisher, NatsEventPublisher } from "./events/publisher.js";
import { KubeVirtClient } from "./kubevirt/client.js";
import { createLogger } from "./logger.js";
import { VmService } from "./services/vmService.js";
import { SqlVmStore } from "./state/sqlVmStore.js";
import { VmMonitor } from "./sync/monitor.js";
import { DEFAULT_RETRY_POLICY } from "./sync/retryPolicy.js";
import { StatusSynchronizer } from "./sync/statusSync.js";
import { initOtel, shutdownOtel } from "./telemetry/otel.js";
import type { EventPublisher } from "./types/interfaces.js";

async function main() {
  const env = loadEnv();
  const logger = createLogger({ level: env.logLevel });
  await initOtel({
    otlpEndpoint: env.otlpEndpoint,
    serviceName: process.env.OTEL_SERVICE_NAME ?? "vm-provider"
  });

  const db = createDb({ dialect: env.dbDialect, sqlitePath: env.sqlitePath, databaseUrl: env.databaseUrl });
  await db.ensureSchema();
  const store = new SqlVmStore(db.vms);

  const cluster = KubeVirtClient.fromOptions({
    kubeconfigPath: env.kubeconfigPath,
    logger: logger.child({ component: "kubevirt" })
  });

  const publisher: EventPublisher = env.events.enabled
    ? await NatsEventPublisher.connect({
        url: env.events.natsUrl,
        maxReconnect: env.events.maxReconnect,
        flushTimeoutMs: env.events.flushTimeoutMs,
        source: env.events.source,
        type: env.events.type,
        logger: logger.child({ component: "publisher" })
      })
    : new DisabledEventPublisher();

  const retry = { ...DEFAULT_RETRY_POLICY, ...env.watchRetry };
  const sync = new StatusSynchronizer({
    store,
    source: cluster,
    publisher,
    logger: logger.child({ component: "status-sync" }),
    retry,
    watchKind: env.watchKind
  });

  const vmService = new VmService({
    store,
    cluster,
    tracker: sync,
    namespace: env.namespace,
    logger: logger.child({ component: "vm-service" })
  });

  const app = buildApp({
    apiKey: env.apiKey,
    logger,
    exposeInternalErrors: env.exposeInternalErrors,
    deps: {
      vmService,
      health: () => ({ status: "ok", events: publisher.stats(), sessions: sync.sessionCount() })
    }
  });

  const shutdown = new AbortController();
  const workers: Array<Promise<void>> = [];
  let closing = false;
  const close = async (reason: string) => {
    if (closing) return;
    closing = true;
    logger.info({ reason }, "shutting down");
    shutdown.abort();
    try {
      await app.close();
      await Promise.all(workers);
      await publisher.close();
      await db.close();
    } catch (err) {
      logger.error({ err }, "shutdown failed");
      process.exitCode = 1;
    }
    await shutdownOtel(logger);
  };
  const supervise = (name: string, work: Promise<void>) =>
    work.catch((err: unknown) => {
      logger.error({ err, worker: name }, "background worker failed");
      process.exitCode = 1;
      void close(`${name} failed`);
    });

  workers.push(supervise("status-sync", sync.startAll(shutdown.signal)));
  if (env.monitorEnabled) {
    const monitor = new VmMonitor({
      source: cluster,
      publisher,
      logger: logger.child({ component: "monitor" }),
      namespace: env.namespace,
      watchKind: env.watchKind,
      retry
    });
    workers.push(supervise("monitor", monitor.run(shutdown.signal)));
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      void close(signal);
    });
  }

  await app.listen({ port: env.port, host: env.host });
}

main().catch((err: unknown) => {
  // The logger may not exist yet when configuration is invalid.
  // eslint-disable-next-line no-console
  console.error("Fatal error", err);
  process.exit(1);
});
