/* Query insight core: public entry point */
import { BaselineCalculator, type BaselineConfig, type SampleProvider } from "./services/baseline";
import { createDefaultDetectors, type DetectionConfig } from "./services/detectors";
import {
  MeasurementEngine,
  type ExecutionLookup,
  type MeasurementConfig
} from "./services/measurement";
import {
  DetectionOrchestrator,
  type BatchOptions,
  type ProfileLookup
} from "./services/orchestration/coordinator";
import {
  createContextResolver,
  type AccelerationProvider,
  type DatasetStorageProvider
} from "./services/orchestration/context";
import { computeSignature } from "./services/signature";
import {
  MemoryBaselineStore,
  MemoryMeasurementStore,
  type BaselineStore,
  type MeasurementStore
} from "./services/stores";
import { SIGNATURE_LENGTH } from "./config/constants";
import type { ExecutionRecord } from "../../shared/types";

export interface InsightEngineOptions {
  executionLookup: ExecutionLookup;
  profileLookup?: ProfileLookup;
  sampleProvider?: SampleProvider;
  baselineStore?: BaselineStore;
  measurementStore?: MeasurementStore;
  datasets?: DatasetStorageProvider;
  accelerations?: AccelerationProvider;
  detection?: DetectionConfig;
  baseline?: Partial<BaselineConfig>;
  measurement?: Partial<MeasurementConfig>;
  concurrency?: number;
  timeoutMs?: number;
  signatureLength?: number;
  clock?: () => Date;
}

/**
 * Wires detection, baselines and measurement over the given collaborators.
 * Stores default to in-process maps.
 */
export function createInsightEngine(options: InsightEngineOptions) {
  const clock = options.clock ?? (() => new Date());
  const signatureLength = options.signatureLength ?? SIGNATURE_LENGTH;
  const baselineStore = options.baselineStore ?? new MemoryBaselineStore();
  const measurementStore = options.measurementStore ?? new MemoryMeasurementStore();

  const baselines = new BaselineCalculator(
    baselineStore,
    options.sampleProvider,
    options.baseline,
    clock
  );

  const detection: DetectionConfig = {
    ...options.detection,
    regression: { minSamples: baselines.minSamples, ...options.detection?.regression }
  };
  const orchestrator = new DetectionOrchestrator(createDefaultDetectors(detection), {
    profileLookup:
      options.profileLookup ??
      (async (record) => (await options.executionLookup(record.id))?.profile ?? null),
    contextResolver: createContextResolver({
      baselines: baselineStore,
      datasets: options.datasets,
      accelerations: options.accelerations,
      signatureLength
    }),
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs
  });

  const measurements = new MeasurementEngine(
    measurementStore,
    options.executionLookup,
    options.measurement,
    clock
  );

  return {
    orchestrator,
    baselines,
    measurements,
    detect: orchestrator.detect.bind(orchestrator),
    detectBatch: (records: readonly ExecutionRecord[], batch?: BatchOptions) =>
      orchestrator.detectBatch(records, batch),
    computeSignature: (sql: string) => computeSignature(sql, signatureLength),
    getOrRefreshBaseline: (signature: string) => baselines.getOrRefresh(signature),
    recordBefore: measurements.recordBefore.bind(measurements),
    recordAfter: measurements.recordAfter.bind(measurements),
    summarize: measurements.summarize.bind(measurements)
  };
}

export type InsightEngine = ReturnType<typeof createInsightEngine>;

export * from "./errors";
export * from "./services/detectors";
export {
  BaselineCalculator,
  computeBaseline,
  percentile,
  type BaselineConfig,
  type SampleProvider
} from "./services/baseline";
export {
  MeasurementEngine,
  captureSnapshot,
  computeImprovements,
  summarizeMeasurements,
  validateImprovement,
  type ExecutionLookup,
  type ExecutionSnapshot,
  type MeasurementConfig
} from "./services/measurement";
export {
  DetectionOrchestrator,
  sortFindings,
  type BatchDetectionResult,
  type BatchOptions,
  type ContextResolver,
  type ProfileLookup
} from "./services/orchestration/coordinator";
export {
  createContextResolver,
  type AccelerationProvider,
  type ContextSources,
  type DatasetStorageProvider
} from "./services/orchestration/context";
export { parseEngineProfile, classifyOperator } from "./services/profile";
export { computeSignature, normalizeSql } from "./services/signature";
export {
  MemoryBaselineStore,
  MemoryMeasurementStore,
  type BaselineStore,
  type MeasurementStore
} from "./services/stores";
export { PgBaselineStore } from "./db/baselines";
export { PgMeasurementStore } from "./db/measurements";
export { ensureSchema } from "./db/schema";
export { refreshBaselines, type RefreshReport } from "./jobs/baselineRefresher";
export { RetryExhaustedError } from "./utils/retry";
export { startTelemetry } from "./config/otel";
export { getMetrics, getContentType } from "./config/metrics";
export { logger } from "./config/logger";
export { SEVERITY_RANK } from "../../shared/types";
export type * from "../../shared/types";
