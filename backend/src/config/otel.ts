// Observability: tracing helpers and optional SDK bootstrap
import { context, trace, type Attributes } from "@opentelemetry/api";

import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { Resource } from "@opentelemetry/resources";
import { SemanticResourceAttributes } from "@opentelemetry/semantic-conventions";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { logger } from "./logger";

let sdk: NodeSDK | null = null;

/**
 * Starts the OpenTelemetry NodeSDK with PG auto-instrumentation.
 * Controlled via env:
 *  - ENABLE_OTEL=true
 *  - OTEL_SERVICE_NAME=query-insight
 *  - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces (default)
 *
 * Call once from the host process before loading instrumented modules.
 */
export function startTelemetry(): boolean {
  if (process.env.ENABLE_OTEL !== "true" || sdk) return false;
  const serviceName = process.env.OTEL_SERVICE_NAME || "query-insight";

  const traceExporter = new OTLPTraceExporter({
    url: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318/v1/traces",
  });

  sdk = new NodeSDK({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: serviceName,
    }),
    traceExporter,
    instrumentations: [getNodeAutoInstrumentations()],
  });

  try {
    sdk.start();
    logger.info({ serviceName }, "[otel] NodeSDK started");
  } catch (err) {
    logger.error({ err }, "[otel] NodeSDK start failed");
    sdk = null;
    return false;
  }

  const shutdown = () => {
    sdk
      ?.shutdown()
      .then(() => logger.info("[otel] NodeSDK shut down"))
      .catch((err: unknown) => logger.error({ err }, "[otel] NodeSDK shutdown error"));
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
  return true;
}

export const tracer = trace.getTracer("query-insight");

export async function withSpan<T>(
  name: string,
  fn: () => Promise<T> | T,
  attrs?: Attributes
): Promise<T> {
  return await tracer.startActiveSpan(name, async (span) => {
    if (attrs) span.setAttributes(attrs);
    try {
      const res = await fn();
      return res;
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setAttribute("error", true);
      throw e;
    } finally {
      span.end();
    }
  });
}

export function addEvent(name: string, attrs?: Attributes) {
  const span = trace.getSpan(context.active());
  span?.addEvent(name, attrs);
}
