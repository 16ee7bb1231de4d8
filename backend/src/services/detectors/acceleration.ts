import { ACCELERATION_DURATION_MS, ACCELERATION_HIT_RATIO_FLOOR } from "../../config/constants";
import type { Detector } from "./types";
import type { AccelerationStructure } from "../../../../shared/types";

export interface AccelerationConfig {
  durationThresholdMs: number;
  hitRatioFloor: number;
  missingImprovementPct: number;
  underutilizedImprovementPct: number;
}

export function hitRatio(structure: AccelerationStructure): number {
  const total = structure.hitCount + structure.missCount;
  return total > 0 ? structure.hitCount / total : 0;
}

/**
 * Slow, unaccelerated queries. Candidate structures come from the context:
 * an empty list means acceleration is missing; candidates whose best hit
 * ratio is under the floor are underutilized. A healthy candidate the query
 * did not use produces no finding. Without acceleration metadata
 * (`context.accelerations` unset) the detector abstains.
 */
export function createAccelerationDetector(config: Partial<AccelerationConfig> = {}): Detector {
  const {
    durationThresholdMs = ACCELERATION_DURATION_MS,
    hitRatioFloor = ACCELERATION_HIT_RATIO_FLOOR,
    missingImprovementPct = 70,
    underutilizedImprovementPct = 40
  } = config;

  return {
    name: "acceleration",
    evaluate(record, profile, context) {
      if (!profile || profile.accelerationUsed) return [];
      if (record.durationMs <= durationThresholdMs) return [];

      const candidates = context.accelerations;
      if (!candidates) return [];
      if (candidates.length === 0) {
        return [
          {
            kind: "missing_acceleration",
            severity: "medium",
            title: "No acceleration structure available",
            description: `Query ran ${record.durationMs} ms without acceleration and no matching structure exists.`,
            evidence: {
              duration_ms: record.durationMs,
              duration_threshold_ms: durationThresholdMs,
              candidate_structures: 0
            },
            estimatedImprovementPct: missingImprovementPct,
            detector: "acceleration",
            executionId: record.id
          }
        ];
      }

      let best = candidates[0];
      for (const c of candidates) {
        if (hitRatio(c) > hitRatio(best)) best = c;
      }
      const bestRatio = hitRatio(best);
      if (bestRatio >= hitRatioFloor) return [];

      return [
        {
          kind: "underutilized_acceleration",
          severity: "medium",
          title: "Acceleration structure underutilized",
          description: `Structure ${best.name} exists for ${best.datasetPath} but answers only ${Math.round(bestRatio * 100)}% of matching queries.`,
          evidence: {
            duration_ms: record.durationMs,
            duration_threshold_ms: durationThresholdMs,
            candidate_structures: candidates.length,
            structure_id: best.id,
            structure_type: best.type,
            hit_ratio: bestRatio,
            hit_ratio_floor: hitRatioFloor
          },
          estimatedImprovementPct: underutilizedImprovementPct,
          detector: "acceleration",
          executionId: record.id
        }
      ];
    }
  };
}
