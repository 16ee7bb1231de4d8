import type {
  AccelerationStructure,
  Baseline,
  DatasetStorage,
  ExecutionProfile,
  ExecutionRecord,
  Finding
} from "../../../../shared/types";

export type DetectorName =
  | "partition_scan"
  | "acceleration"
  | "join_fanout"
  | "select_star"
  | "small_files"
  | "regression";

/** Auxiliary inputs resolved outside the detectors. */
export interface DetectionContext {
  baseline?: Baseline | null;
  datasets?: DatasetStorage[];
  accelerations?: AccelerationStructure[];
}

/**
 * Deterministic and side-effect free. Missing optional input yields an
 * empty list, never an exception.
 */
export interface Detector {
  readonly name: DetectorName;
  evaluate(
    record: ExecutionRecord,
    profile: ExecutionProfile | null,
    context: DetectionContext
  ): Finding[];
}

export function roundPct(value: number): number {
  return Math.round(value * 100) / 100;
}
