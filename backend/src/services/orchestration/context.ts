// Detection context resolution from stores and metadata providers
import { computeSignature } from "../signature";
import type { BaselineStore } from "../stores";
import type { DetectionContext } from "../detectors";
import type { ContextResolver } from "./coordinator";
import type {
  AccelerationStructure,
  DatasetStorage
} from "../../../../shared/types";

export type DatasetStorageProvider = (
  datasetPaths: string[],
  signal: AbortSignal
) => Promise<DatasetStorage[]>;

export type AccelerationProvider = (
  datasetPaths: string[],
  signal: AbortSignal
) => Promise<AccelerationStructure[]>;

export interface ContextSources {
  baselines?: BaselineStore;
  datasets?: DatasetStorageProvider;
  accelerations?: AccelerationProvider;
  signatureLength?: number;
}

/**
 * Baseline by the record's signature, storage and acceleration metadata by
 * the datasets the record read. Baselines are read, never refreshed, here.
 */
export function createContextResolver(sources: ContextSources): ContextResolver {
  return async (record, _profile, signal) => {
    const context: DetectionContext = {};
    const paths = record.datasets ?? [];

    if (sources.baselines) {
      context.baseline = await sources.baselines.get(
        computeSignature(record.sqlText, sources.signatureLength)
      );
    }
    if (sources.datasets && paths.length > 0) {
      context.datasets = await sources.datasets(paths, signal);
    }
    if (sources.accelerations && paths.length > 0) {
      context.accelerations = await sources.accelerations(paths, signal);
    }
    return context;
  };
}
