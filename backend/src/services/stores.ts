// Store contracts and in-process implementations
import type { Baseline, Measurement, Signature } from "../../../shared/types";

/** Baselines are replaced wholesale, so reads need no locking. */
export interface BaselineStore {
  get(signature: Signature): Promise<Baseline | null>;
  put(signature: Signature, baseline: Baseline): Promise<void>;
}

export interface MeasurementStore {
  get(recommendationId: string): Promise<Measurement | null>;
  /** Conditional insert keyed by recommendation id; false when one already exists. */
  insertIfAbsent(measurement: Measurement): Promise<boolean>;
  /** Replaces an existing measurement. */
  save(measurement: Measurement): Promise<void>;
  listCompletedSince(since: Date): Promise<Measurement[]>;
}

export class MemoryBaselineStore implements BaselineStore {
  private store = new Map<Signature, Baseline>();

  async get(signature: Signature): Promise<Baseline | null> {
    const b = this.store.get(signature);
    return b ? structuredClone(b) : null;
  }

  async put(signature: Signature, baseline: Baseline): Promise<void> {
    this.store.set(signature, structuredClone(baseline));
  }

  get size() {
    return this.store.size;
  }
}

export class MemoryMeasurementStore implements MeasurementStore {
  private store = new Map<string, Measurement>();

  async get(recommendationId: string): Promise<Measurement | null> {
    const m = this.store.get(recommendationId);
    return m ? structuredClone(m) : null;
  }

  // Check and set happen in one synchronous step, so callers cannot interleave.
  async insertIfAbsent(measurement: Measurement): Promise<boolean> {
    if (this.store.has(measurement.recommendationId)) return false;
    this.store.set(measurement.recommendationId, structuredClone(measurement));
    return true;
  }

  async save(measurement: Measurement): Promise<void> {
    if (!this.store.has(measurement.recommendationId)) {
      throw new Error(`Measurement for ${measurement.recommendationId} does not exist`);
    }
    this.store.set(measurement.recommendationId, structuredClone(measurement));
  }

  async listCompletedSince(since: Date): Promise<Measurement[]> {
    const out: Measurement[] = [];
    for (const m of this.store.values()) {
      if (m.completedAt && m.completedAt.getTime() >= since.getTime()) {
        out.push(structuredClone(m));
      }
    }
    return out;
  }
}
