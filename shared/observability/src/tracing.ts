/**
 * OpenTelemetry SDK bootstrap. Import before any other module of an entrypoint.
 *
 * Exports traces and logs via OTLP/gRPC. When the collector is unreachable the
 * exporters drop batches; the process keeps running.
 *
 * Set OTEL_SDK_DISABLED=true to skip initialization completely.
 */

import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";

const otelDisabled =
  process.env.OTEL_SDK_DISABLED === "true" ||
  process.env.OTEL_SDK_DISABLED === "1";

const serviceName = process.env.OTEL_SERVICE_NAME || "seller-insights-server";
const collectorUrl = process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4317";

// WARN by default so export failures don't flood stderr
const diagLevel =
  process.env.OTEL_LOG_LEVEL === "debug"
    ? DiagLogLevel.DEBUG
    : process.env.OTEL_LOG_LEVEL === "info"
      ? DiagLogLevel.INFO
      : DiagLogLevel.WARN;
diag.setLogger(new DiagConsoleLogger(), diagLevel);

let sdk: import("@opentelemetry/sdk-node").NodeSDK | null = null;

if (otelDisabled) {
  console.error(`[OTel] SDK disabled for ${serviceName} (OTEL_SDK_DISABLED=true)`);
} else {
  // gRPC modules are only loaded when tracing is on
  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-grpc");
  const { OTLPLogExporter } = await import("@opentelemetry/exporter-logs-otlp-grpc");
  const { BatchLogRecordProcessor } = await import("@opentelemetry/sdk-logs");

  sdk = new NodeSDK({
    serviceName,
    traceExporter: new OTLPTraceExporter({ url: collectorUrl }),
    logRecordProcessor: new BatchLogRecordProcessor(new OTLPLogExporter({ url: collectorUrl })),
  });

  sdk.start();
  console.error(`[OTel] ${serviceName} → ${collectorUrl}`);
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  try {
    await sdk.shutdown();
  } catch (err) {
    diag.warn(`OTel shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export { sdk, serviceName };
