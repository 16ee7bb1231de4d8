// Detection orchestration: runs the injected detectors over one or many executions
import { Semaphore } from "async-mutex";
import { DETECTION_CONCURRENCY, DETECTION_TIMEOUT_MS } from "../../config/constants";
import { componentLogger } from "../../config/logger";
import {
  batchDurationHistogram,
  batchRecordsCounter,
  detectorFailuresCounter,
  findingsCounter
} from "../../config/metrics";
import { addEvent, withSpan } from "../../config/otel";
import { InputError } from "../../errors";
import type { DetectionContext, Detector } from "../detectors";
import {
  SEVERITY_RANK,
  type ExecutionProfile,
  type ExecutionRecord,
  type Finding
} from "../../../../shared/types";

const log = componentLogger("orchestrator");

/** Resolves the profile for a record; null when the engine kept none. Throwing excludes the record. */
export type ProfileLookup = (
  record: ExecutionRecord,
  signal: AbortSignal
) => Promise<ExecutionProfile | null>;

export type ContextResolver = (
  record: ExecutionRecord,
  profile: ExecutionProfile | null,
  signal: AbortSignal
) => Promise<DetectionContext>;

export interface OrchestratorOptions {
  profileLookup?: ProfileLookup;
  contextResolver?: ContextResolver;
  concurrency?: number;
  timeoutMs?: number;
}

export interface BatchOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  concurrency?: number;
}

export interface ExcludedRecord {
  recordId: string;
  reason: string;
}

export interface BatchDetectionResult {
  findings: Record<string, Finding[]>;
  processedCount: number;
  excluded: ExcludedRecord[];
  /** Records never evaluated because the batch was cancelled. */
  skippedCount: number;
  cancelled: boolean;
}

function compareImprovement(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

/** Severity desc, estimated improvement desc (unknown last), then input order. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return findings
    .map((finding, index) => ({ finding, index }))
    .sort(
      (a, b) =>
        SEVERITY_RANK[b.finding.severity] - SEVERITY_RANK[a.finding.severity] ||
        compareImprovement(a.finding.estimatedImprovementPct, b.finding.estimatedImprovementPct) ||
        a.index - b.index
    )
    .map(({ finding }) => finding);
}

export class DetectionOrchestrator {
  private readonly detectors: readonly Detector[];
  private readonly profileLookup: ProfileLookup;
  private readonly contextResolver: ContextResolver;
  private readonly concurrency: number;
  private readonly timeoutMs: number;

  constructor(detectors: readonly Detector[], options: OrchestratorOptions = {}) {
    const names = new Set<string>();
    for (const d of detectors) {
      if (names.has(d.name)) throw new InputError(`Detector ${d.name} registered twice`);
      names.add(d.name);
    }
    const concurrency = options.concurrency ?? DETECTION_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InputError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.detectors = [...detectors];
    this.profileLookup = options.profileLookup ?? (async () => null);
    this.contextResolver = options.contextResolver ?? (async () => ({}));
    this.concurrency = concurrency;
    this.timeoutMs = options.timeoutMs ?? DETECTION_TIMEOUT_MS;
  }

  get detectorNames(): string[] {
    return this.detectors.map((d) => d.name);
  }

  detect(
    record: ExecutionRecord,
    profile: ExecutionProfile | null = null,
    context: DetectionContext = {}
  ): Finding[] {
    const collected: Finding[] = [];
    for (const detector of this.detectors) {
      try {
        collected.push(...detector.evaluate(record, profile, context));
      } catch (err) {
        detectorFailuresCounter.labels(detector.name).inc();
        log.error({ err, detector: detector.name, executionId: record.id }, "detector failed; skipping");
      }
    }
    const ordered = sortFindings(collected);
    for (const f of ordered) findingsCounter.labels(f.kind, f.severity).inc();
    return ordered;
  }

  /**
   * Evaluates records on a bounded pool. Records whose profile or context
   * lookup throws are excluded and reported. On abort or timeout the
   * findings gathered so far are returned. Record ids must be unique.
   */
  async detectBatch(
    records: readonly ExecutionRecord[],
    options: BatchOptions = {}
  ): Promise<BatchDetectionResult> {
    const seen = new Set<string>();
    for (const record of records) {
      if (seen.has(record.id)) throw new InputError(`Record ${record.id} appears twice in the batch`);
      seen.add(record.id);
    }
    const endTimer = batchDurationHistogram.startTimer();
    try {
      return await withSpan("detect.batch", () => this.runBatch(records, options), {
        recordCount: records.length
      });
    } finally {
      endTimer();
    }
  }

  private async runBatch(
    records: readonly ExecutionRecord[],
    options: BatchOptions
  ): Promise<BatchDetectionResult> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs));
    const signal = signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;

    const semaphore = new Semaphore(options.concurrency ?? this.concurrency);
    const findings = new Map<string, Finding[]>();
    const excluded: ExcludedRecord[] = [];
    let open = true;

    const evaluateOne = async (record: ExecutionRecord) => {
      if (signal.aborted) return;
      const [, release] = await semaphore.acquire();
      try {
        if (signal.aborted || !open) return;
        let profile: ExecutionProfile | null;
        let context: DetectionContext;
        try {
          profile = await this.profileLookup(record, signal);
          context = await this.contextResolver(record, profile, signal);
        } catch (err) {
          if (signal.aborted || !open) return;
          excluded.push({ recordId: record.id, reason: err instanceof Error ? err.message : String(err) });
          batchRecordsCounter.labels("excluded").inc();
          log.warn({ err, executionId: record.id }, "profile lookup failed; record excluded");
          return;
        }
        if (!open) return;
        findings.set(record.id, this.detect(record, profile, context));
        batchRecordsCounter.labels("processed").inc();
      } finally {
        release();
      }
    };

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<void>((resolve) => {
      onAbort = resolve;
      if (signal.aborted) resolve();
      else signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      await Promise.race([Promise.all(records.map(evaluateOne)), aborted]);
    } finally {
      open = false;
      if (onAbort) signal.removeEventListener("abort", onAbort);
    }

    const skippedCount = records.length - findings.size - excluded.length;
    if (skippedCount > 0) {
      batchRecordsCounter.labels("skipped").inc(skippedCount);
      addEvent("detect.batch.cancelled", { skippedCount });
      log.warn({ skippedCount, total: records.length }, "batch detection cancelled; returning partial results");
    }

    return {
      findings: Object.fromEntries(findings),
      processedCount: findings.size,
      excluded: [...excluded],
      skippedCount,
      cancelled: skippedCount > 0
    };
  }
}
