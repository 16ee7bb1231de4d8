// Shared types for execution telemetry, findings and measurements

export type ExecutionStatus = "completed" | "failed" | "cancelled" | "running";

export interface ExecutionRecord {
  id: string;
  sqlText: string;
  user: string | null;
  queueName?: string | null;
  startTime: Date;
  endTime: Date | null;
  durationMs: number;
  status: ExecutionStatus;
  datasets?: string[]; // dataset paths read by the query, when the collector knows them
}

export type OperatorType =
  | "scan"
  | "filter"
  | "project"
  | "join"
  | "aggregate"
  | "sort"
  | "exchange"
  | "other";

export interface OperatorNode {
  id: string;
  type: OperatorType;
  name?: string;
  inputRows: number;
  outputRows: number;
}

export interface ExecutionProfile {
  executionId: string;
  rowsScanned: number | null;
  rowsReturned: number | null;
  bytesScanned: number | null;
  partitionsScanned: number | null;
  partitionsTotal: number | null;
  memoryAllocatedBytes: number | null;
  peakMemoryBytes: number | null;
  cpuTimeMs: number | null;
  accelerationUsed: boolean;
  accelerationIds: string[];
  operators: OperatorNode[];
}

export interface DatasetStorage {
  datasetId: string;
  path: string;
  fileCount: number;
  totalSizeBytes: number;
  fileFormat?: string | null;
}

export interface AccelerationStructure {
  id: string;
  name: string;
  type: "raw" | "aggregation";
  datasetPath: string;
  hitCount: number;
  missCount: number;
  sizeBytes?: number | null;
  lastRefreshedAt?: Date | null;
}

export type Signature = string;

export interface Baseline {
  signature: Signature;
  sampleCount: number;
  minMs: number;
  maxMs: number;
  meanMs: number;
  p50Ms: number;
  p95Ms: number;
  p99Ms: number;
  lastUpdated: Date;
}

export type Severity = "low" | "medium" | "high" | "critical";

export const SEVERITY_RANK: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3
};

export type IssueKind =
  | "partition_pruning"
  | "missing_acceleration"
  | "underutilized_acceleration"
  | "join_fanout"
  | "select_star"
  | "small_files"
  | "performance_regression";

export type EvidenceValue = string | number | boolean | null;

export interface Finding {
  kind: IssueKind;
  severity: Severity;
  title: string;
  description: string;
  evidence: Record<string, EvidenceValue>;
  estimatedImprovementPct: number | null;
  detector: string;
  executionId: string;
}

export type MeasuredMetric = "durationMs" | "memoryBytes" | "bytesScanned" | "cpuTimeMs";

export interface MetricSnapshot {
  executionId: string;
  durationMs: number | null;
  memoryBytes: number | null;
  bytesScanned: number | null;
  cpuTimeMs: number | null;
  capturedAt: Date;
}

export type ValidationVerdict = "exceeded" | "met" | "underperformed" | "inconclusive";

export interface ValidationOutcome {
  estimatedImprovementPct: number;
  actualImprovementPct: number | null;
  deltaPct: number | null;
  tolerancePct: number;
  meetsExpectation: boolean;
  verdict: ValidationVerdict;
}

export interface Measurement {
  id: string;
  recommendationId: string;
  before: MetricSnapshot;
  after: MetricSnapshot | null;
  improvements: Partial<Record<MeasuredMetric, number>> | null;
  validation: ValidationOutcome | null;
  createdAt: Date;
  completedAt: Date | null;
}

export interface SummaryStats {
  periodDays: number;
  totalMeasurements: number;
  averageImprovementPct: number | null;
  successRate: number | null;
  totalTimeSavedMs: number;
  exceededCount: number;
  metCount: number;
  underperformedCount: number;
  inconclusiveCount: number;
}
