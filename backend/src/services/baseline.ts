// Duration baselines per query signature
import { Mutex } from "async-mutex";
import {
  BASELINE_MIN_SAMPLES,
  BASELINE_REFRESH_MS,
  BASELINE_SAMPLE_RETRIES
} from "../config/constants";
import { componentLogger } from "../config/logger";
import { baselineRefreshCounter } from "../config/metrics";
import { withSpan } from "../config/otel";
import { InputError, InsightError, NotFoundError } from "../errors";
import { withRetry } from "../utils/retry";
import type { BaselineStore } from "./stores";
import type { Baseline, Signature } from "../../../shared/types";

const log = componentLogger("baseline");

/** Historical duration samples (ms) for one signature. */
export type SampleProvider = (signature: Signature) => Promise<number[]>;

export interface BaselineConfig {
  minSamples: number;
  refreshIntervalMs: number;
  sampleRetries: number;
  retryDelayMs: number;
}

export const defaultBaselineConfig = (): BaselineConfig => ({
  minSamples: BASELINE_MIN_SAMPLES,
  refreshIntervalMs: BASELINE_REFRESH_MS,
  sampleRetries: BASELINE_SAMPLE_RETRIES,
  retryDelayMs: 100
});

/**
 * p-th percentile of an ascending array: linear interpolation between the
 * elements at floor(rank) and ceil(rank), where rank = p/100 × (n − 1).
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new InputError("Cannot take a percentile of an empty sample set");
  }
  if (!(p >= 0 && p <= 100)) {
    throw new InputError(`Percentile must be within [0, 100], got ${p}`);
  }
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

export function computeBaseline(
  signature: Signature,
  samples: readonly number[],
  now: Date = new Date()
): Baseline | null {
  const sorted = samples
    .filter((s) => Number.isFinite(s) && s >= 0)
    .sort((a, b) => a - b);
  if (sorted.length === 0) return null;

  const total = sorted.reduce((acc, s) => acc + s, 0);
  return {
    signature,
    sampleCount: sorted.length,
    minMs: sorted[0],
    maxMs: sorted[sorted.length - 1],
    meanMs: total / sorted.length,
    p50Ms: percentile(sorted, 50),
    p95Ms: percentile(sorted, 95),
    p99Ms: percentile(sorted, 99),
    lastUpdated: now
  };
}

export class BaselineCalculator {
  private readonly config: BaselineConfig;
  private readonly locks = new Map<Signature, Mutex>();

  constructor(
    private readonly store: BaselineStore,
    private readonly sampleProvider?: SampleProvider,
    config: Partial<BaselineConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = { ...defaultBaselineConfig(), ...config };
    if (this.config.minSamples < 1) {
      throw new InputError(`minSamples must be at least 1, got ${this.config.minSamples}`);
    }
  }

  get minSamples() {
    return this.config.minSamples;
  }

  /** Signatures with a refresh running or queued. */
  get pendingRefreshes(): number {
    return this.locks.size;
  }

  isStale(baseline: Baseline, now: Date = this.clock()): boolean {
    if (baseline.sampleCount < this.config.minSamples) return true;
    return now.getTime() - baseline.lastUpdated.getTime() > this.config.refreshIntervalMs;
  }

  /** Stored baseline, without refreshing. */
  async peek(signature: Signature): Promise<Baseline | null> {
    return await this.store.get(signature);
  }

  /**
   * Cached baseline when fresh; otherwise recomputed from `sampleProvider`
   * and stored. Refreshes of one signature are serialized, and a caller that
   * waited on the lock reuses the baseline the previous holder wrote.
   */
  async getOrRefresh(
    signature: Signature,
    sampleProvider: SampleProvider | undefined = this.sampleProvider
  ): Promise<Baseline> {
    return await withSpan(
      "baseline.getOrRefresh",
      async () => {
        const cached = await this.store.get(signature);
        if (cached && !this.isStale(cached)) {
          baselineRefreshCounter.labels("cached").inc();
          return cached;
        }
        if (!sampleProvider) {
          if (cached) return cached;
          baselineRefreshCounter.labels("missing").inc();
          throw new NotFoundError("baseline", signature);
        }
        const lock = this.lockFor(signature);
        try {
          return await lock.runExclusive(() => this.refresh(signature, sampleProvider));
        } finally {
          // Last holder out drops the entry; queued callers keep it locked.
          if (!lock.isLocked() && this.locks.get(signature) === lock) {
            this.locks.delete(signature);
          }
        }
      },
      { signature }
    );
  }

  private async refresh(signature: Signature, sampleProvider: SampleProvider): Promise<Baseline> {
    const current = await this.store.get(signature);
    if (current && !this.isStale(current)) {
      baselineRefreshCounter.labels("cached").inc();
      return current;
    }

    // Domain errors from the provider (e.g. NotFoundError) are final.
    const samples = await withRetry(() => sampleProvider(signature), {
      label: `samples for ${signature}`,
      retries: this.config.sampleRetries,
      initialDelayMs: this.config.retryDelayMs,
      isRetryable: (err) => !(err instanceof InsightError)
    });
    const fresh = computeBaseline(signature, samples, this.clock());
    if (!fresh) {
      if (current) {
        log.warn({ signature }, "no samples for stale baseline; keeping previous");
        baselineRefreshCounter.labels("cached").inc();
        return current;
      }
      baselineRefreshCounter.labels("missing").inc();
      throw new NotFoundError("baseline", signature);
    }

    await this.store.put(signature, fresh);
    baselineRefreshCounter.labels("refreshed").inc();
    log.debug({ signature, sampleCount: fresh.sampleCount }, "baseline refreshed");
    return fresh;
  }

  private lockFor(signature: Signature): Mutex {
    let lock = this.locks.get(signature);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(signature, lock);
    }
    return lock;
  }
}
