import { PARTITION_MIN_TOTAL, PARTITION_SCAN_CEILING } from "../../config/constants";
import { roundPct, type Detector } from "./types";

export interface PartitionScanConfig {
  minPartitions: number;
  scanRatioCeiling: number;
}

/** Flags scans that read more than the allowed share of a table's partitions. */
export function createPartitionScanDetector(
  config: Partial<PartitionScanConfig> = {}
): Detector {
  const { minPartitions = PARTITION_MIN_TOTAL, scanRatioCeiling = PARTITION_SCAN_CEILING } = config;

  return {
    name: "partition_scan",
    evaluate(record, profile) {
      if (!profile) return [];
      const { partitionsTotal: total, partitionsScanned: scanned } = profile;
      // Unpartitioned or unknown layout
      if (total === null || scanned === null || total <= minPartitions) return [];

      const ratio = scanned / total;
      if (ratio <= scanRatioCeiling) return [];

      return [
        {
          kind: "partition_pruning",
          severity: "high",
          title: "Partition pruning ineffective",
          description: `Query scanned ${scanned} of ${total} partitions; filters do not restrict the partition columns.`,
          evidence: {
            partitions_scanned: scanned,
            partitions_total: total,
            scan_ratio: ratio,
            ratio_ceiling: scanRatioCeiling
          },
          estimatedImprovementPct: roundPct(((ratio - scanRatioCeiling) / ratio) * 100),
          detector: "partition_scan",
          executionId: record.id
        }
      ];
    }
  };
}
