import { query } from "./client";
import { withSpan } from "../config/otel";

export const createTablesSQL = `
CREATE TABLE IF NOT EXISTS baselines (
  signature TEXT PRIMARY KEY,
  sample_count INT NOT NULL CHECK (sample_count >= 1),
  min_ms DOUBLE PRECISION NOT NULL,
  max_ms DOUBLE PRECISION NOT NULL,
  mean_ms DOUBLE PRECISION NOT NULL,
  p50_ms DOUBLE PRECISION NOT NULL,
  p95_ms DOUBLE PRECISION NOT NULL,
  p99_ms DOUBLE PRECISION NOT NULL,
  last_updated TIMESTAMPTZ NOT NULL
);

CREATE TABLE IF NOT EXISTS measurements (
  id UUID PRIMARY KEY,
  recommendation_id TEXT NOT NULL UNIQUE,
  before_snapshot JSONB NOT NULL,
  after_snapshot JSONB,
  improvements JSONB,
  validation JSONB,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  completed_at TIMESTAMPTZ,
  CHECK (after_snapshot IS NULL OR completed_at IS NOT NULL)
);
`;

export const createIndexesSQL = `
CREATE INDEX IF NOT EXISTS idx_measurements_completed_at ON measurements (completed_at);
`;

export async function ensureSchema() {
  await withSpan("db.ensureSchema", async () => {
    await query(createTablesSQL);
    await query(createIndexesSQL);
  });
}
