import type {
  Baseline,
  ExecutionProfile,
  ExecutionRecord
} from "../../shared/types";

export function makeRecord(overrides: Partial<ExecutionRecord> = {}): ExecutionRecord {
  return {
    id: "job-1",
    sqlText: "SELECT id, total FROM sales.orders WHERE region = 'west'",
    user: "analyst",
    queueName: "default",
    startTime: new Date("2026-03-01T10:00:00Z"),
    endTime: new Date("2026-03-01T10:00:02Z"),
    durationMs: 2000,
    status: "completed",
    ...overrides
  };
}

export function makeProfile(overrides: Partial<ExecutionProfile> = {}): ExecutionProfile {
  return {
    executionId: "job-1",
    rowsScanned: 10_000,
    rowsReturned: 100,
    bytesScanned: 1_000_000,
    partitionsScanned: null,
    partitionsTotal: null,
    memoryAllocatedBytes: 2048,
    peakMemoryBytes: 4096,
    cpuTimeMs: 500,
    accelerationUsed: false,
    accelerationIds: [],
    operators: [],
    ...overrides
  };
}

export function makeBaseline(overrides: Partial<Baseline> = {}): Baseline {
  return {
    signature: "0123456789abcdef",
    sampleCount: 30,
    minMs: 500,
    maxMs: 1200,
    meanMs: 820,
    p50Ms: 800,
    p95Ms: 1000,
    p99Ms: 1100,
    lastUpdated: new Date("2026-03-01T00:00:00Z"),
    ...overrides
  };
}
