import { describe, it, expect } from "vitest";
import {
  MeasurementEngine,
  computeImprovements,
  summarizeMeasurements,
  validateImprovement,
  type ExecutionSnapshot
} from "../src/services/measurement";
import { MemoryMeasurementStore } from "../src/services/stores";
import { InputError, NotFoundError, SequencingError } from "../src/errors";
import type { Measurement, MetricSnapshot, ValidationOutcome } from "../../shared/types";
import { makeProfile, makeRecord } from "./fixtures";

const NOW = new Date("2026-03-01T12:00:00Z");

function execution(
  id: string,
  durationMs: number,
  memoryAllocatedBytes: number | null,
  bytesScanned: number | null,
  cpuTimeMs: number | null
): ExecutionSnapshot {
  return {
    record: makeRecord({ id, durationMs }),
    profile: makeProfile({ executionId: id, memoryAllocatedBytes, bytesScanned, cpuTimeMs })
  };
}

function engineWith(executions: ExecutionSnapshot[], store = new MemoryMeasurementStore()) {
  const byId = new Map(executions.map((e) => [e.record.id, e]));
  const engine = new MeasurementEngine(
    store,
    async (id) => byId.get(id) ?? null,
    { tolerancePct: 20 },
    () => NOW
  );
  return { engine, store };
}

function snapshot(executionId: string, durationMs: number | null): MetricSnapshot {
  return { executionId, durationMs, memoryBytes: null, bytesScanned: null, cpuTimeMs: null, capturedAt: NOW };
}

describe("computeImprovements", () => {
  it("should compute the relative reduction per metric", () => {
    const before = { ...snapshot("e1", 60_000), memoryBytes: 2048, bytesScanned: 1000, cpuTimeMs: 500 };
    const after = { ...snapshot("e2", 12_000), memoryBytes: 1024, bytesScanned: 250, cpuTimeMs: 100 };
    expect(computeImprovements(before, after)).toEqual({
      durationMs: 80,
      memoryBytes: 50,
      bytesScanned: 75,
      cpuTimeMs: 80
    });
  });

  it("should leave out metrics with a zero or missing before value", () => {
    const before = { ...snapshot("e1", 1000), memoryBytes: 0, bytesScanned: null, cpuTimeMs: 200 };
    const after = { ...snapshot("e2", 1500), memoryBytes: 10, bytesScanned: 10, cpuTimeMs: null };
    expect(computeImprovements(before, after)).toEqual({ durationMs: -50 });
  });
});

describe("validateImprovement", () => {
  it("should report exceeded when the actual improvement beats the estimate", () => {
    expect(validateImprovement(80, 70, 20)).toEqual({
      estimatedImprovementPct: 70,
      actualImprovementPct: 80,
      deltaPct: 10,
      tolerancePct: 20,
      meetsExpectation: true,
      verdict: "exceeded"
    });
  });

  it("should report met within the tolerance band", () => {
    const outcome = validateImprovement(50, 70, 20);
    expect(outcome.meetsExpectation).toBe(true);
    expect(outcome.verdict).toBe("met");
  });

  it("should report underperformed below the tolerance band", () => {
    const outcome = validateImprovement(30, 70, 20);
    expect(outcome.deltaPct).toBe(-40);
    expect(outcome.meetsExpectation).toBe(false);
    expect(outcome.verdict).toBe("underperformed");
  });

  it("should report inconclusive without an actual improvement", () => {
    expect(validateImprovement(null, 70, 20).verdict).toBe("inconclusive");
  });
});

describe("MeasurementEngine", () => {
  const before = execution("e1", 60_000, 2048, 1000, 500);
  const after = execution("e2", 12_000, 1024, 250, 100);

  it("should capture before and after and validate the estimate", async () => {
    const { engine } = engineWith([before, after]);

    const opened = await engine.recordBefore("rec-1", "e1");
    expect(opened.after).toBeNull();
    expect(opened.before.durationMs).toBe(60_000);

    const completed = await engine.recordAfter("rec-1", "e2", 70);
    expect(completed.id).toBe(opened.id);
    expect(completed.improvements).toEqual({
      durationMs: 80,
      memoryBytes: 50,
      bytesScanned: 75,
      cpuTimeMs: 80
    });
    expect(completed.validation?.verdict).toBe("exceeded");
    expect(completed.validation?.meetsExpectation).toBe(true);
    expect(completed.completedAt).toEqual(NOW);
  });

  it("should reject an after snapshot without a before snapshot", async () => {
    const { engine } = engineWith([before, after]);
    await expect(engine.recordAfter("rec-1", "e2", 70)).rejects.toBeInstanceOf(SequencingError);
  });

  it("should reject a second before snapshot and keep the first", async () => {
    const { engine, store } = engineWith([before, after]);
    const first = await engine.recordBefore("rec-1", "e1");

    await expect(engine.recordBefore("rec-1", "e2")).rejects.toBeInstanceOf(SequencingError);
    expect((await store.get("rec-1"))?.before.executionId).toBe("e1");
    expect((await store.get("rec-1"))?.id).toBe(first.id);
  });

  it("should let only one of two concurrent before calls succeed", async () => {
    const { engine } = engineWith([before, after]);
    const results = await Promise.allSettled([
      engine.recordBefore("rec-1", "e1"),
      engine.recordBefore("rec-1", "e2")
    ]);
    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((r) => r.status === "rejected");
    expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(SequencingError);
  });

  it("should raise NotFoundError for an unknown execution", async () => {
    const { engine, store } = engineWith([before]);
    await expect(engine.recordBefore("rec-1", "missing")).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.get("rec-1")).toBeNull();
  });

  it("should reject a non-finite estimate", async () => {
    const { engine } = engineWith([before, after]);
    await engine.recordBefore("rec-1", "e1");
    await expect(engine.recordAfter("rec-1", "e2", Number.NaN)).rejects.toBeInstanceOf(InputError);
  });

  it("should replace the after snapshot on a second call", async () => {
    const slower = execution("e3", 30_000, null, null, null);
    const { engine } = engineWith([before, after, slower]);
    await engine.recordBefore("rec-1", "e1");
    await engine.recordAfter("rec-1", "e2", 70);

    const replaced = await engine.recordAfter("rec-1", "e3", 70);

    expect(replaced.after?.executionId).toBe("e3");
    expect(replaced.improvements).toEqual({ durationMs: 50 });
    expect(replaced.validation?.verdict).toBe("met");
  });

  it("should reject a non-positive summary period", async () => {
    const { engine } = engineWith([]);
    await expect(engine.summarize(0)).rejects.toBeInstanceOf(InputError);
  });
});

describe("summarizeMeasurements", () => {
  function measurement(
    recommendationId: string,
    afterMs: number | null,
    completedAt: Date | null
  ): Measurement {
    const validation: ValidationOutcome | null =
      afterMs === null ? null : validateImprovement(((10_000 - afterMs) * 100) / 10_000, 70, 20);
    return {
      id: `m-${recommendationId}`,
      recommendationId,
      before: snapshot("before", 10_000),
      after: afterMs === null ? null : snapshot("after", afterMs),
      improvements: null,
      validation,
      createdAt: new Date("2026-02-20T00:00:00Z"),
      completedAt
    };
  }

  it("should aggregate completed measurements within the period", () => {
    const completedAt = new Date("2026-02-25T00:00:00Z");
    const stats = summarizeMeasurements(
      [
        measurement("rec-a", 2000, completedAt),
        measurement("rec-b", 7000, completedAt),
        measurement("rec-c", 4000, completedAt),
        measurement("rec-d", null, null),
        measurement("rec-old", 1000, new Date("2025-12-01T00:00:00Z"))
      ],
      30,
      NOW
    );

    expect(stats.totalMeasurements).toBe(3);
    expect(stats.averageImprovementPct).toBeCloseTo(56.67, 2);
    expect(stats.successRate).toBeCloseTo(2 / 3, 10);
    expect(stats.totalTimeSavedMs).toBe(17_000);
    expect(stats.exceededCount).toBe(1);
    expect(stats.metCount).toBe(1);
    expect(stats.underperformedCount).toBe(1);
    expect(stats.inconclusiveCount).toBe(0);
  });

  it("should return empty statistics when nothing completed", () => {
    expect(summarizeMeasurements([], 7, NOW)).toEqual({
      periodDays: 7,
      totalMeasurements: 0,
      averageImprovementPct: null,
      successRate: null,
      totalTimeSavedMs: 0,
      exceededCount: 0,
      metCount: 0,
      underperformedCount: 0,
      inconclusiveCount: 0
    });
  });
});
