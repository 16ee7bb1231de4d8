import { SELECT_STAR_IMPROVEMENT_PCT } from "../../config/constants";
import { normalizeSql } from "../signature";
import type { Detector } from "./types";

const SCHEMA_DEFINITION = /^(?:CREATE|ALTER|DROP|TRUNCATE|COMMENT)\b/;
// SELECT *, SELECT DISTINCT *, SELECT t.* (COUNT(*) is not a projection)
const WILDCARD_PROJECTION = /\bSELECT\s+(?:DISTINCT\s+|ALL\s+)?(?:(?:\w+|"[^"]+")\.)?\*/;

export interface SelectStarConfig {
  improvementPct: number;
}

export function hasWildcardProjection(sql: string): boolean {
  // Literal stripping keeps quoted text like 'select *' from matching.
  const normalized = normalizeSql(sql);
  if (SCHEMA_DEFINITION.test(normalized)) return false;
  return WILDCARD_PROJECTION.test(normalized);
}

export function createSelectStarDetector(config: Partial<SelectStarConfig> = {}): Detector {
  const { improvementPct = SELECT_STAR_IMPROVEMENT_PCT } = config;

  return {
    name: "select_star",
    evaluate(record) {
      if (!record.sqlText || !hasWildcardProjection(record.sqlText)) return [];
      return [
        {
          kind: "select_star",
          severity: "low",
          title: "Unbounded column projection",
          description: "Query selects every column; list only the columns the caller reads.",
          evidence: { pattern: "SELECT *" },
          estimatedImprovementPct: improvementPct,
          detector: "select_star",
          executionId: record.id
        }
      ];
    }
  };
}
