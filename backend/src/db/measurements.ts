import { query } from "./client";
import { withSpan } from "../config/otel";
import type { MeasurementStore } from "../services/stores";
import type {
  MeasuredMetric,
  Measurement,
  MetricSnapshot,
  ValidationOutcome
} from "../../../shared/types";

// JSONB round-trips dates as ISO strings
type SnapshotJson = Omit<MetricSnapshot, "capturedAt"> & { capturedAt: string };

interface MeasurementRow {
  id: string;
  recommendation_id: string;
  before_snapshot: SnapshotJson;
  after_snapshot: SnapshotJson | null;
  improvements: Partial<Record<MeasuredMetric, number>> | null;
  validation: ValidationOutcome | null;
  created_at: Date;
  completed_at: Date | null;
}

function toSnapshot(json: SnapshotJson): MetricSnapshot {
  return { ...json, capturedAt: new Date(json.capturedAt) };
}

function toMeasurement(row: MeasurementRow): Measurement {
  return {
    id: row.id,
    recommendationId: row.recommendation_id,
    before: toSnapshot(row.before_snapshot),
    after: row.after_snapshot ? toSnapshot(row.after_snapshot) : null,
    improvements: row.improvements,
    validation: row.validation,
    createdAt: row.created_at,
    completedAt: row.completed_at
  };
}

export class PgMeasurementStore implements MeasurementStore {
  async get(recommendationId: string): Promise<Measurement | null> {
    return await withSpan(
      "db.getMeasurement",
      async () => {
        const { rows } = await query<MeasurementRow>(
          "SELECT * FROM measurements WHERE recommendation_id = $1",
          [recommendationId]
        );
        return rows.length > 0 ? toMeasurement(rows[0]) : null;
      },
      { recommendationId }
    );
  }

  async insertIfAbsent(measurement: Measurement): Promise<boolean> {
    return await withSpan(
      "db.insertMeasurement",
      async () => {
        const { rows } = await query<{ id: string }>(
          `INSERT INTO measurements (id, recommendation_id, before_snapshot, created_at)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (recommendation_id) DO NOTHING
           RETURNING id`,
          [
            measurement.id,
            measurement.recommendationId,
            JSON.stringify(measurement.before),
            measurement.createdAt
          ]
        );
        return rows.length === 1;
      },
      { recommendationId: measurement.recommendationId }
    );
  }

  async save(measurement: Measurement): Promise<void> {
    await withSpan(
      "db.saveMeasurement",
      async () => {
        const { rowCount } = await query(
          `UPDATE measurements
             SET after_snapshot = $2, improvements = $3, validation = $4, completed_at = $5
           WHERE recommendation_id = $1`,
          [
            measurement.recommendationId,
            measurement.after ? JSON.stringify(measurement.after) : null,
            measurement.improvements ? JSON.stringify(measurement.improvements) : null,
            measurement.validation ? JSON.stringify(measurement.validation) : null,
            measurement.completedAt
          ]
        );
        if (!rowCount) {
          throw new Error(`Measurement for ${measurement.recommendationId} does not exist`);
        }
      },
      { recommendationId: measurement.recommendationId }
    );
  }

  async listCompletedSince(since: Date): Promise<Measurement[]> {
    return await withSpan("db.listCompletedMeasurements", async () => {
      const { rows } = await query<MeasurementRow>(
        "SELECT * FROM measurements WHERE completed_at >= $1 ORDER BY completed_at",
        [since]
      );
      return rows.map(toMeasurement);
    });
  }
}
