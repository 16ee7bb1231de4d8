import { SMALL_FILE_AVG_BYTES, SMALL_FILE_COUNT } from "../../config/constants";
import type { Detector } from "./types";
import type { DatasetStorage, Finding } from "../../../../shared/types";

export interface SmallFilesConfig {
  fileCountThreshold: number;
  avgFileSizeBytes: number;
  improvementPct: number;
}

export function averageFileSize(dataset: DatasetStorage): number | null {
  return dataset.fileCount > 0 ? dataset.totalSizeBytes / dataset.fileCount : null;
}

const MB = 1024 * 1024;

/** Storage-level check over the datasets in context, one finding per dataset. */
export function createSmallFilesDetector(config: Partial<SmallFilesConfig> = {}): Detector {
  const {
    fileCountThreshold = SMALL_FILE_COUNT,
    avgFileSizeBytes = SMALL_FILE_AVG_BYTES,
    improvementPct = 25
  } = config;

  return {
    name: "small_files",
    evaluate(record, _profile, context) {
      const findings: Finding[] = [];
      for (const dataset of context.datasets ?? []) {
        const avg = averageFileSize(dataset);
        if (avg === null || dataset.fileCount <= fileCountThreshold || avg >= avgFileSizeBytes) {
          continue;
        }
        findings.push({
          kind: "small_files",
          severity: "medium",
          title: "Dataset fragmented into small files",
          description: `${dataset.path} holds ${dataset.fileCount} files averaging ${(avg / MB).toFixed(1)} MB; compaction would cut per-file overhead.`,
          evidence: {
            dataset_id: dataset.datasetId,
            dataset_path: dataset.path,
            file_count: dataset.fileCount,
            avg_file_size_bytes: avg,
            file_count_threshold: fileCountThreshold,
            avg_file_size_threshold_bytes: avgFileSizeBytes
          },
          estimatedImprovementPct: improvementPct,
          detector: "small_files",
          executionId: record.id
        });
      }
      return findings;
    }
  };
}
