import { query } from "./client";
import { withSpan } from "../config/otel";
import type { BaselineStore } from "../services/stores";
import type { Baseline, Signature } from "../../../shared/types";

interface BaselineRow {
  signature: string;
  sample_count: number;
  min_ms: number;
  max_ms: number;
  mean_ms: number;
  p50_ms: number;
  p95_ms: number;
  p99_ms: number;
  last_updated: Date;
}

function toBaseline(row: BaselineRow): Baseline {
  return {
    signature: row.signature,
    sampleCount: row.sample_count,
    minMs: row.min_ms,
    maxMs: row.max_ms,
    meanMs: row.mean_ms,
    p50Ms: row.p50_ms,
    p95Ms: row.p95_ms,
    p99Ms: row.p99_ms,
    lastUpdated: row.last_updated
  };
}

/** Whole-row upsert, so concurrent writers never leave a mixed baseline. */
export class PgBaselineStore implements BaselineStore {
  async get(signature: Signature): Promise<Baseline | null> {
    return await withSpan(
      "db.getBaseline",
      async () => {
        const { rows } = await query<BaselineRow>(
          "SELECT * FROM baselines WHERE signature = $1",
          [signature]
        );
        return rows.length > 0 ? toBaseline(rows[0]) : null;
      },
      { signature }
    );
  }

  async put(signature: Signature, baseline: Baseline): Promise<void> {
    await withSpan(
      "db.putBaseline",
      () =>
        query(
          `INSERT INTO baselines
             (signature, sample_count, min_ms, max_ms, mean_ms, p50_ms, p95_ms, p99_ms, last_updated)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
           ON CONFLICT (signature) DO UPDATE SET
             sample_count = EXCLUDED.sample_count,
             min_ms = EXCLUDED.min_ms,
             max_ms = EXCLUDED.max_ms,
             mean_ms = EXCLUDED.mean_ms,
             p50_ms = EXCLUDED.p50_ms,
             p95_ms = EXCLUDED.p95_ms,
             p99_ms = EXCLUDED.p99_ms,
             last_updated = EXCLUDED.last_updated`,
          [
            signature,
            baseline.sampleCount,
            baseline.minMs,
            baseline.maxMs,
            baseline.meanMs,
            baseline.p50Ms,
            baseline.p95Ms,
            baseline.p99Ms,
            baseline.lastUpdated
          ]
        ),
      { signature, sampleCount: baseline.sampleCount }
    );
  }
}
