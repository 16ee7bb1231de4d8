import { BASELINE_MIN_SAMPLES, REGRESSION_MULTIPLIER } from "../../config/constants";
import { roundPct, type Detector } from "./types";

export interface RegressionConfig {
  multiplier: number;
  minSamples: number;
}

/**
 * Compares the run against its signature's baseline. No baseline, or one
 * with too few samples, is a normal abstention.
 */
export function createRegressionDetector(config: Partial<RegressionConfig> = {}): Detector {
  const { multiplier = REGRESSION_MULTIPLIER, minSamples = BASELINE_MIN_SAMPLES } = config;

  return {
    name: "regression",
    evaluate(record, _profile, context) {
      const baseline = context.baseline;
      if (!baseline || baseline.sampleCount < minSamples) return [];

      const thresholdMs = baseline.p95Ms * multiplier;
      if (record.durationMs <= thresholdMs) return [];

      const degradationPct =
        baseline.p95Ms > 0 ? roundPct(((record.durationMs - baseline.p95Ms) / baseline.p95Ms) * 100) : null;
      const recoveryPct = roundPct(((record.durationMs - baseline.p50Ms) / record.durationMs) * 100);

      return [
        {
          kind: "performance_regression",
          severity: "critical",
          title: "Performance regression against baseline",
          description: `Query took ${record.durationMs} ms against a p95 of ${baseline.p95Ms} ms over ${baseline.sampleCount} runs.`,
          evidence: {
            signature: baseline.signature,
            duration_ms: record.durationMs,
            baseline_p50_ms: baseline.p50Ms,
            baseline_p95_ms: baseline.p95Ms,
            sample_count: baseline.sampleCount,
            multiplier,
            threshold_ms: thresholdMs,
            degradation_pct: degradationPct
          },
          estimatedImprovementPct: recoveryPct,
          detector: "regression",
          executionId: record.id
        }
      ];
    }
  };
}
