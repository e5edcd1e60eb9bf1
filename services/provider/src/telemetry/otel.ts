import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { resourceFromAttributes } from "@opentelemetry/resources";
import type { Logger } from "pino";

const DIAG_LEVELS: Readonly<Record<string, DiagLogLevel>> = {
  NONE: DiagLogLevel.NONE,
  ERROR: DiagLogLevel.ERROR,
  WARN: DiagLogLevel.WARN,
  INFO: DiagLogLevel.INFO,
  DEBUG: DiagLogLevel.DEBUG,
  VERBOSE: DiagLogLevel.VERBOSE,
  ALL: DiagLogLevel.ALL
};

let sdk: NodeSDK | null = null;

export async function initOtel(env: { otlpEndpoint?: string; serviceName: string }) {
  const endpoint = env.otlpEndpoint?.trim();
  if (!endpoint) return;

  // Diagnostics stay quiet unless OTEL_DIAGNOSTIC_LOG_LEVEL is set.
  const diagLevel = DIAG_LEVELS[(process.env.OTEL_DIAGNOSTIC_LOG_LEVEL ?? "").toUpperCase()];
  if (diagLevel !== undefined) {
    diag.setLogger(new DiagConsoleLogger(), diagLevel);
  }

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      "service.name": env.serviceName
    }),
    traceExporter: new OTLPTraceExporter({
      url: endpoint
    }),
    instrumentations: [getNodeAutoInstrumentations()]
  });

  await sdk.start();
}

export async function shutdownOtel(logger: Logger) {
  const s = sdk;
  sdk = null;
  if (!s) return;
  try {
    await s.shutdown();
  } catch (err) {
    logger.warn({ err }, "telemetry shutdown failed");
  }
}
