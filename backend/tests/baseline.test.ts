import { describe, it, expect, vi } from "vitest";
import { BaselineCalculator, computeBaseline, percentile } from "../src/services/baseline";
import { MemoryBaselineStore } from "../src/services/stores";
import { InputError, NotFoundError } from "../src/errors";
import { makeBaseline } from "./fixtures";

const NOW = new Date("2026-03-10T00:00:00Z");
const DAY_MS = 24 * 60 * 60 * 1000;
const clock = () => NOW;
const samples = (n: number, value = 1000) => Array.from({ length: n }, () => value);

describe("percentile", () => {
  const sorted = [10, 20, 30, 40, 50];

  it("should interpolate linearly between the nearest ranks", () => {
    expect(percentile(sorted, 50)).toBe(30);
    expect(percentile(sorted, 95)).toBeCloseTo(48, 9);
    expect(percentile(sorted, 99)).toBeCloseTo(49.6, 9);
    expect(percentile(sorted, 25)).toBe(20);
  });

  it("should return the extremes at p0 and p100", () => {
    expect(percentile(sorted, 0)).toBe(10);
    expect(percentile(sorted, 100)).toBe(50);
  });

  it("should return the only element of a single-sample set", () => {
    expect(percentile([7], 95)).toBe(7);
  });

  it("should reject empty input and out-of-range p", () => {
    expect(() => percentile([], 50)).toThrow(InputError);
    expect(() => percentile(sorted, 101)).toThrow(InputError);
    expect(() => percentile(sorted, -1)).toThrow(InputError);
  });
});

describe("computeBaseline", () => {
  it("should compute statistics from unsorted samples", () => {
    const b = computeBaseline("sig", [50, 10, 40, 20, 30], NOW);
    expect(b).toEqual({
      signature: "sig",
      sampleCount: 5,
      minMs: 10,
      maxMs: 50,
      meanMs: 30,
      p50Ms: 30,
      p95Ms: percentile([10, 20, 30, 40, 50], 95),
      p99Ms: percentile([10, 20, 30, 40, 50], 99),
      lastUpdated: NOW
    });
  });

  it("should keep percentiles ordered", () => {
    const values = Array.from({ length: 100 }, (_, i) => (i * 37) % 101);
    const b = computeBaseline("sig", values, NOW);
    expect(b).not.toBeNull();
    if (!b) return;
    expect(b.p50Ms).toBeLessThanOrEqual(b.p95Ms);
    expect(b.p95Ms).toBeLessThanOrEqual(b.p99Ms);
    expect(b.p99Ms).toBeLessThanOrEqual(b.maxMs);
  });

  it("should return null when no usable samples exist", () => {
    expect(computeBaseline("sig", [], NOW)).toBeNull();
    expect(computeBaseline("sig", [Number.NaN, -5], NOW)).toBeNull();
  });
});

describe("BaselineCalculator.getOrRefresh", () => {
  it("should compute and store a baseline when none exists", async () => {
    const store = new MemoryBaselineStore();
    const provider = vi.fn().mockResolvedValue(samples(25));
    const calc = new BaselineCalculator(store, provider, {}, clock);

    const b = await calc.getOrRefresh("sig");

    expect(provider).toHaveBeenCalledWith("sig");
    expect(b.sampleCount).toBe(25);
    expect(b.lastUpdated).toEqual(NOW);
    expect(await store.get("sig")).toEqual(b);
  });

  it("should return a fresh cached baseline without sampling", async () => {
    const store = new MemoryBaselineStore();
    const cached = makeBaseline({ signature: "sig", lastUpdated: new Date(NOW.getTime() - DAY_MS) });
    await store.put("sig", cached);
    const provider = vi.fn().mockResolvedValue(samples(25));
    const calc = new BaselineCalculator(store, provider, {}, clock);

    expect(await calc.getOrRefresh("sig")).toEqual(cached);
    expect(provider).not.toHaveBeenCalled();
  });

  it("should refresh when the baseline is older than the interval", async () => {
    const store = new MemoryBaselineStore();
    await store.put("sig", makeBaseline({ signature: "sig", lastUpdated: new Date(NOW.getTime() - 8 * DAY_MS) }));
    const provider = vi.fn().mockResolvedValue(samples(40, 2000));
    const calc = new BaselineCalculator(store, provider, {}, clock);

    const b = await calc.getOrRefresh("sig");

    expect(provider).toHaveBeenCalledTimes(1);
    expect(b.sampleCount).toBe(40);
    expect(b.p95Ms).toBe(2000);
  });

  it("should refresh when the baseline has too few samples", async () => {
    const store = new MemoryBaselineStore();
    await store.put("sig", makeBaseline({ signature: "sig", sampleCount: 5, lastUpdated: NOW }));
    const provider = vi.fn().mockResolvedValue(samples(21));
    const calc = new BaselineCalculator(store, provider, {}, clock);

    expect((await calc.getOrRefresh("sig")).sampleCount).toBe(21);
  });

  it("should fail with NotFoundError when nothing can be computed", async () => {
    const store = new MemoryBaselineStore();
    await expect(new BaselineCalculator(store, undefined, {}, clock).getOrRefresh("sig")).rejects.toThrow(NotFoundError);
    await expect(
      new BaselineCalculator(store, vi.fn().mockResolvedValue([]), {}, clock).getOrRefresh("sig")
    ).rejects.toThrow(NotFoundError);
    expect(store.size).toBe(0);
  });

  it("should keep a stale baseline when the provider has no samples", async () => {
    const store = new MemoryBaselineStore();
    const stale = makeBaseline({ signature: "sig", lastUpdated: new Date(NOW.getTime() - 30 * DAY_MS) });
    await store.put("sig", stale);
    const calc = new BaselineCalculator(store, vi.fn().mockResolvedValue([]), {}, clock);

    expect(await calc.getOrRefresh("sig")).toEqual(stale);
  });

  it("should refresh once when callers race on the same signature", async () => {
    const store = new MemoryBaselineStore();
    const provider = vi.fn(
      () => new Promise<number[]>((resolve) => setTimeout(() => resolve(samples(25)), 10))
    );
    const calc = new BaselineCalculator(store, provider, {}, clock);

    const [a, b] = await Promise.all([calc.getOrRefresh("sig"), calc.getOrRefresh("sig")]);

    expect(provider).toHaveBeenCalledTimes(1);
    expect(a).toEqual(b);
  });

  it("should release per-signature locks once refreshes settle", async () => {
    const store = new MemoryBaselineStore();
    let finish: (values: number[]) => void = () => undefined;
    const provider = vi.fn(
      (signature: string) =>
        signature === "slow"
          ? new Promise<number[]>((resolve) => {
              finish = resolve;
            })
          : Promise.resolve(samples(25))
    );
    const calc = new BaselineCalculator(store, provider, {}, clock);

    await Promise.all(["a", "b", "c"].map((sig) => calc.getOrRefresh(sig)));
    expect(calc.pendingRefreshes).toBe(0);

    const first = calc.getOrRefresh("slow");
    const second = calc.getOrRefresh("slow");
    await vi.waitFor(() => expect(provider).toHaveBeenCalledWith("slow"));
    expect(calc.pendingRefreshes).toBe(1);

    finish(samples(25));
    const [a, b] = await Promise.all([first, second]);
    expect(a).toEqual(b);
    expect(calc.pendingRefreshes).toBe(0);
  });

  it("should retry a failing sample provider", async () => {
    const store = new MemoryBaselineStore();
    const provider = vi
      .fn()
      .mockRejectedValueOnce(new Error("engine busy"))
      .mockResolvedValueOnce(samples(20));
    const calc = new BaselineCalculator(store, provider, { sampleRetries: 1, retryDelayMs: 1 }, clock);

    expect((await calc.getOrRefresh("sig")).sampleCount).toBe(20);
    expect(provider).toHaveBeenCalledTimes(2);
  });

  it("should not retry a provider that reports the signature as unknown", async () => {
    const provider = vi.fn().mockRejectedValue(new NotFoundError("baseline", "sig"));
    const calc = new BaselineCalculator(
      new MemoryBaselineStore(),
      provider,
      { sampleRetries: 3, retryDelayMs: 1 },
      clock
    );

    await expect(calc.getOrRefresh("sig")).rejects.toBeInstanceOf(NotFoundError);
    expect(provider).toHaveBeenCalledTimes(1);
  });

  it("should reject a minimum below one sample", () => {
    expect(() => new BaselineCalculator(new MemoryBaselineStore(), undefined, { minSamples: 0 })).toThrow(InputError);
  });
});
