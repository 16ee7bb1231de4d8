import { JOIN_FANOUT_MULTIPLIER } from "../../config/constants";
import type { Detector } from "./types";
import type { Finding } from "../../../../shared/types";

export interface JoinFanoutConfig {
  multiplier: number;
  improvementPct: number;
}

export function createJoinFanoutDetector(config: Partial<JoinFanoutConfig> = {}): Detector {
  const { multiplier = JOIN_FANOUT_MULTIPLIER, improvementPct = 30 } = config;

  return {
    name: "join_fanout",
    evaluate(record, profile) {
      if (!profile) return [];
      const findings: Finding[] = [];
      for (const node of profile.operators) {
        if (node.type !== "join" || node.inputRows <= 0) continue;
        const ratio = node.outputRows / node.inputRows;
        if (ratio <= multiplier) continue;
        findings.push({
          kind: "join_fanout",
          severity: "high",
          title: "Join multiplies row count",
          description: `Join ${node.name ?? node.id} produced ${node.outputRows} rows from ${node.inputRows} input rows (${ratio.toFixed(1)}x).`,
          evidence: {
            operator_id: node.id,
            rows_in: node.inputRows,
            rows_out: node.outputRows,
            fanout_ratio: ratio,
            multiplier
          },
          estimatedImprovementPct: improvementPct,
          detector: "join_fanout",
          executionId: record.id
        });
      }
      return findings;
    }
  };
}
