import { register, Counter, Histogram } from "prom-client";

// Detection Metrics
export const findingsCounter = new Counter({
  name: "insight_findings_total",
  help: "Total findings emitted by the detection orchestrator.",
  labelNames: ["kind", "severity"],
});

export const detectorFailuresCounter = new Counter({
  name: "insight_detector_failures_total",
  help: "Total detector evaluations that threw and were isolated.",
  labelNames: ["detector"],
});

export const batchRecordsCounter = new Counter({
  name: "insight_batch_records_total",
  help: "Records handled by batch detection, by outcome.",
  labelNames: ["outcome"],
});

export const batchDurationHistogram = new Histogram({
  name: "insight_batch_duration_seconds",
  help: "Batch detection latency",
  buckets: [0.05, 0.1, 0.5, 1, 5, 30],
});

// Baseline Metrics
export const baselineRefreshCounter = new Counter({
  name: "insight_baseline_refresh_total",
  help: "Baseline lookups by outcome (cached, refreshed, missing).",
  labelNames: ["outcome"],
});

// Measurement Metrics
export const measurementPhaseCounter = new Counter({
  name: "insight_measurement_phase_total",
  help: "Measurement phase calls by phase and result.",
  labelNames: ["phase", "result"],
});

export const measurementVerdictCounter = new Counter({
  name: "insight_measurement_verdict_total",
  help: "Validated measurements by verdict.",
  labelNames: ["verdict"],
});

export async function getMetrics() {
  return await register.metrics();
}

export function getContentType() {
  return register.contentType;
}
