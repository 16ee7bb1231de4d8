// Before/after measurement of applied recommendations
import { v4 as uuidv4 } from "uuid";
import { MEASUREMENT_TOLERANCE_PCT } from "../config/constants";
import { componentLogger } from "../config/logger";
import { measurementPhaseCounter, measurementVerdictCounter } from "../config/metrics";
import { withSpan } from "../config/otel";
import { InputError, NotFoundError, SequencingError } from "../errors";
import type { MeasurementStore } from "./stores";
import type {
  ExecutionProfile,
  ExecutionRecord,
  MeasuredMetric,
  Measurement,
  MetricSnapshot,
  SummaryStats,
  ValidationOutcome
} from "../../../shared/types";

const log = componentLogger("measurement");

const DAY_MS = 24 * 60 * 60 * 1000;

export const MEASURED_METRICS: readonly MeasuredMetric[] = [
  "durationMs",
  "memoryBytes",
  "bytesScanned",
  "cpuTimeMs"
];

export interface ExecutionSnapshot {
  record: ExecutionRecord;
  profile: ExecutionProfile | null;
}

export type ExecutionLookup = (executionId: string) => Promise<ExecutionSnapshot | null>;

export interface MeasurementConfig {
  /** Percentage points the actual improvement may fall short of the estimate. */
  tolerancePct: number;
}

export function captureSnapshot(snapshot: ExecutionSnapshot, capturedAt: Date): MetricSnapshot {
  const { record, profile } = snapshot;
  return {
    executionId: record.id,
    durationMs: record.durationMs,
    memoryBytes: profile?.memoryAllocatedBytes ?? null,
    bytesScanned: profile?.bytesScanned ?? null,
    cpuTimeMs: profile?.cpuTimeMs ?? null,
    capturedAt
  };
}

/** Metrics with a null or zero before value, or no after value, are left out. */
export function computeImprovements(
  before: MetricSnapshot,
  after: MetricSnapshot
): Partial<Record<MeasuredMetric, number>> {
  const improvements: Partial<Record<MeasuredMetric, number>> = {};
  for (const metric of MEASURED_METRICS) {
    const b = before[metric];
    const a = after[metric];
    if (b === null || b === 0 || a === null) continue;
    improvements[metric] = ((b - a) * 100) / b;
  }
  return improvements;
}

export function validateImprovement(
  actualPct: number | null,
  estimatedPct: number,
  tolerancePct: number
): ValidationOutcome {
  if (actualPct === null) {
    return {
      estimatedImprovementPct: estimatedPct,
      actualImprovementPct: null,
      deltaPct: null,
      tolerancePct,
      meetsExpectation: false,
      verdict: "inconclusive"
    };
  }
  const deltaPct = actualPct - estimatedPct;
  const meetsExpectation = actualPct >= estimatedPct - tolerancePct;
  return {
    estimatedImprovementPct: estimatedPct,
    actualImprovementPct: actualPct,
    deltaPct,
    tolerancePct,
    meetsExpectation,
    verdict: deltaPct > 0 ? "exceeded" : meetsExpectation ? "met" : "underperformed"
  };
}

/** Aggregates measurements completed within `periodDays` before `now`. */
export function summarizeMeasurements(
  measurements: readonly Measurement[],
  periodDays: number,
  now: Date
): SummaryStats {
  const since = now.getTime() - periodDays * DAY_MS;
  const completed = measurements.filter(
    (m) => m.after && m.validation && m.completedAt && m.completedAt.getTime() >= since
  );

  const stats: SummaryStats = {
    periodDays,
    totalMeasurements: completed.length,
    averageImprovementPct: null,
    successRate: null,
    totalTimeSavedMs: 0,
    exceededCount: 0,
    metCount: 0,
    underperformedCount: 0,
    inconclusiveCount: 0
  };
  if (completed.length === 0) return stats;

  let improvementSum = 0;
  let improvementCount = 0;
  let successes = 0;
  for (const m of completed) {
    const v = m.validation;
    if (!v) continue;
    if (v.actualImprovementPct !== null) {
      improvementSum += v.actualImprovementPct;
      improvementCount++;
    }
    if (v.meetsExpectation) successes++;
    switch (v.verdict) {
      case "exceeded":
        stats.exceededCount++;
        break;
      case "met":
        stats.metCount++;
        break;
      case "underperformed":
        stats.underperformedCount++;
        break;
      case "inconclusive":
        stats.inconclusiveCount++;
        break;
    }
    const beforeMs = m.before.durationMs;
    const afterMs = m.after?.durationMs ?? null;
    if (beforeMs !== null && afterMs !== null) stats.totalTimeSavedMs += beforeMs - afterMs;
  }

  stats.averageImprovementPct = improvementCount > 0 ? improvementSum / improvementCount : null;
  stats.successRate = successes / completed.length;
  return stats;
}

export class MeasurementEngine {
  private readonly config: MeasurementConfig;

  constructor(
    private readonly store: MeasurementStore,
    private readonly lookup: ExecutionLookup,
    config: Partial<MeasurementConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = { tolerancePct: MEASUREMENT_TOLERANCE_PCT, ...config };
    if (!Number.isFinite(this.config.tolerancePct) || this.config.tolerancePct < 0) {
      throw new InputError(`Tolerance must be a non-negative number, got ${this.config.tolerancePct}`);
    }
  }

  async recordBefore(recommendationId: string, executionId: string): Promise<Measurement> {
    return await withSpan(
      "measurement.recordBefore",
      async () => {
        const execution = await this.lookupExecution("before", executionId);

        if (await this.store.get(recommendationId)) {
          measurementPhaseCounter.labels("before", "sequencing").inc();
          throw new SequencingError(
            recommendationId,
            `A measurement already exists for recommendation ${recommendationId}`
          );
        }

        const now = this.clock();
        const measurement: Measurement = {
          id: uuidv4(),
          recommendationId,
          before: captureSnapshot(execution, now),
          after: null,
          improvements: null,
          validation: null,
          createdAt: now,
          completedAt: null
        };
        if (!(await this.store.insertIfAbsent(measurement))) {
          measurementPhaseCounter.labels("before", "sequencing").inc();
          throw new SequencingError(
            recommendationId,
            `A measurement was created concurrently for recommendation ${recommendationId}`
          );
        }

        measurementPhaseCounter.labels("before", "ok").inc();
        log.info({ recommendationId, executionId }, "before snapshot captured");
        return measurement;
      },
      { recommendationId, executionId }
    );
  }

  /** Completes a measurement. Calling again replaces the after snapshot and recomputes. */
  async recordAfter(
    recommendationId: string,
    executionId: string,
    estimatedImprovementPct: number
  ): Promise<Measurement> {
    if (!Number.isFinite(estimatedImprovementPct)) {
      throw new InputError(`Estimated improvement must be a finite number, got ${estimatedImprovementPct}`);
    }
    return await withSpan(
      "measurement.recordAfter",
      async () => {
        const existing = await this.store.get(recommendationId);
        if (!existing) {
          measurementPhaseCounter.labels("after", "sequencing").inc();
          throw new SequencingError(
            recommendationId,
            `No before snapshot recorded for recommendation ${recommendationId}`
          );
        }

        const execution = await this.lookupExecution("after", executionId);
        if (existing.after) {
          log.warn(
            { recommendationId, previousExecutionId: existing.after.executionId, executionId },
            "overwriting after snapshot"
          );
        }

        const now = this.clock();
        const after = captureSnapshot(execution, now);
        const improvements = computeImprovements(existing.before, after);
        const validation = validateImprovement(
          improvements.durationMs ?? null,
          estimatedImprovementPct,
          this.config.tolerancePct
        );
        const completed: Measurement = {
          ...existing,
          after,
          improvements,
          validation,
          completedAt: now
        };
        await this.store.save(completed);

        measurementPhaseCounter.labels("after", existing.after ? "overwritten" : "ok").inc();
        measurementVerdictCounter.labels(validation.verdict).inc();
        log.info({ recommendationId, verdict: validation.verdict }, "measurement validated");
        return completed;
      },
      { recommendationId, executionId, estimatedImprovementPct }
    );
  }

  async summarize(periodDays: number): Promise<SummaryStats> {
    if (!Number.isFinite(periodDays) || periodDays <= 0) {
      throw new InputError(`Period must be a positive number of days, got ${periodDays}`);
    }
    const now = this.clock();
    const measurements = await this.store.listCompletedSince(
      new Date(now.getTime() - periodDays * DAY_MS)
    );
    return summarizeMeasurements(measurements, periodDays, now);
  }

  private async lookupExecution(
    phase: "before" | "after",
    executionId: string
  ): Promise<ExecutionSnapshot> {
    const execution = await this.lookup(executionId);
    if (!execution) {
      measurementPhaseCounter.labels(phase, "not_found").inc();
      throw new NotFoundError("execution", executionId);
    }
    return execution;
  }
}
