import type { WatchKind } from "../kubevirt/resource.js";
import { DEFAULT_EVENT_SOURCE, DEFAULT_EVENT_TYPE } from "../events/envelope.js";

export interface EnvConfig {
  apiKey: string;
  port: number;
  host: string;
  logLevel: string;
  kubeconfigPath?: string;
  namespace: string;
  watchKind: WatchKind;
  dbDialect: "sqlite" | "postgres";
  sqlitePath: string;
  databaseUrl?: string;
  events: {
    enabled: boolean;
    natsUrl: string;
    maxReconnect: number;
    flushTimeoutMs: number;
    source: string;
    type: string;
  };
  monitorEnabled: boolean;
  watchRetry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  exposeInternalErrors: boolean;
  otlpEndpoint?: string;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function oneOf<T extends string>(raw: string, allowed: readonly T[], name: string): T {
  const match = allowed.find((v) => v === raw);
  if (!match) {
    throw new Error(`${name} must be one of: ${allowed.join(", ")}`);
  }
  return match;
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsePositiveInt = (raw: string | undefined, name: string, fallback: number) => {
    const n = Number(raw ?? String(fallback));
    if (!Number.isFinite(n) || n <= 0) {
      throw new Error(`${name} must be a positive number`);
    }
    return Math.floor(n);
  };
  const parseBool = (raw: string | undefined, fallback: boolean) =>
    raw === undefined || raw === "" ? fallback : raw.toLowerCase() === "true";

  const apiKey = env.API_KEY ?? "";
  if (!apiKey) {
    throw new Error("API_KEY is required");
  }

  const port = parsePositiveInt(env.PORT, "PORT", 8080);
  const host = env.HOST ?? "0.0.0.0";
  const logLevel = oneOf((env.LOG_LEVEL ?? "info").toLowerCase(), LOG_LEVELS, "LOG_LEVEL");

  const kubeconfigPath = env.KUBECONFIG?.trim() || undefined;
  const namespace = (env.VM_NAMESPACE ?? "default").trim();
  if (!/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/.test(namespace)) {
    throw new Error("VM_NAMESPACE must be a valid Kubernetes namespace name");
  }
  const watchKind = oneOf(env.WATCH_KIND ?? "VirtualMachineInstance", ["VirtualMachineInstance", "VirtualMachine"] as const, "WATCH_KIND");

  const dbDialect = oneOf((env.DB_DIALECT ?? "sqlite").toLowerCase(), ["sqlite", "postgres"] as const, "DB_DIALECT");
  // Dev default keeps the SQLite file under ./db/; deployments set SQLITE_PATH explicitly.
  const sqlitePath = env.SQLITE_PATH ?? "./db/provider.db";
  const databaseUrl = env.DATABASE_URL;
  if (dbDialect === "postgres" && !databaseUrl) {
    throw new Error("DATABASE_URL is required when DB_DIALECT=postgres");
  }

  const baseDelayMs = parsePositiveInt(env.WATCH_RETRY_BASE_MS, "WATCH_RETRY_BASE_MS", 1_000);
  const maxDelayMs = parsePositiveInt(env.WATCH_RETRY_MAX_MS, "WATCH_RETRY_MAX_MS", 30_000);
  if (maxDelayMs < baseDelayMs) {
    throw new Error("WATCH_RETRY_MAX_MS must not be smaller than WATCH_RETRY_BASE_MS");
  }

  return {
    apiKey,
    port,
    host,
    logLevel,
    kubeconfigPath,
    namespace,
    watchKind,
    dbDialect,
    sqlitePath,
    databaseUrl,
    events: {
      enabled: parseBool(env.EVENTS_ENABLED, true),
      natsUrl: env.NATS_URL ?? "nats://localhost:4222",
      maxReconnect: parsePositiveInt(env.NATS_MAX_RECONNECT, "NATS_MAX_RECONNECT", 10),
      flushTimeoutMs: parsePositiveInt(env.NATS_FLUSH_TIMEOUT_MS, "NATS_FLUSH_TIMEOUT_MS", 5_000),
      source: env.EVENT_SOURCE ?? DEFAULT_EVENT_SOURCE,
      type: env.EVENT_TYPE ?? DEFAULT_EVENT_TYPE
    },
    monitorEnabled: parseBool(env.MONITOR_ENABLED, false),
    watchRetry: { baseDelayMs, maxDelayMs },
    exposeInternalErrors: parseBool(env.EXPOSE_INTERNAL_ERRORS, false),
    otlpEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT?.trim() || undefined
  };
}
