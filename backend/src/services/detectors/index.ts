import { createAccelerationDetector, type AccelerationConfig } from "./acceleration";
import { createJoinFanoutDetector, type JoinFanoutConfig } from "./joinFanout";
import { createPartitionScanDetector, type PartitionScanConfig } from "./partitionScan";
import { createRegressionDetector, type RegressionConfig } from "./regression";
import { createSelectStarDetector, type SelectStarConfig } from "./selectStar";
import { createSmallFilesDetector, type SmallFilesConfig } from "./smallFiles";
import type { Detector } from "./types";

export interface DetectionConfig {
  partitionScan?: Partial<PartitionScanConfig>;
  acceleration?: Partial<AccelerationConfig>;
  joinFanout?: Partial<JoinFanoutConfig>;
  selectStar?: Partial<SelectStarConfig>;
  smallFiles?: Partial<SmallFilesConfig>;
  regression?: Partial<RegressionConfig>;
}

/** The six built-in detectors, in a fixed order. */
export function createDefaultDetectors(config: DetectionConfig = {}): Detector[] {
  return [
    createPartitionScanDetector(config.partitionScan),
    createAccelerationDetector(config.acceleration),
    createJoinFanoutDetector(config.joinFanout),
    createSelectStarDetector(config.selectStar),
    createSmallFilesDetector(config.smallFiles),
    createRegressionDetector(config.regression)
  ];
}

export * from "./types";
export { hitRatio } from "./acceleration";
export { averageFileSize } from "./smallFiles";
export { hasWildcardProjection } from "./selectStar";
export {
  createAccelerationDetector,
  createJoinFanoutDetector,
  createPartitionScanDetector,
  createRegressionDetector,
  createSelectStarDetector,
  createSmallFilesDetector
};
