// src/application/statistical-evaluator.ts

export type ZScoreSample = Readonly<{
  bucketStart: number; // epoch ms
  currentCount: number;
  baselineCounts: readonly number[];
  mean: number;
  stddev: number;
  z: number;
}>;

/** Minimal logger interface accepted by StatisticalEvaluator. */
export type StatisticalEvaluatorLog = {
  debug: (obj: Record<string, unknown>, msg: string) => void;
};

type KeyState = {
  // Bucket start (epoch ms) -> count
  counts: Map<number, number>;
  // Earliest bucket seen for the key; buckets since then without events count as 0
  firstBucketStart: number;
  bucketMs: number;
  baselineBuckets: number;
};

/**
 * StatisticalEvaluator — per-key event-count buckets and z-score of the
 * current bucket against the most recent completed ones.
 *
 * Keys are `<rule_id>:<subject_id>`. The caller decides whether a z-score
 * fires; this class only keeps buckets and computes the statistics.
 */
export class StatisticalEvaluator {
  private readonly stateByKey = new Map<string, KeyState>();
  private readonly log: StatisticalEvaluatorLog | undefined;

  constructor(log?: StatisticalEvaluatorLog) {
    this.log = log;
  }

  /**
   * Counts one event and returns the z-score sample for its bucket,
   * or null while the baseline is not ready or has zero variance.
   */
  record(key: string, eventTimeMs: number, bucketSeconds: number, baselineBuckets: number): ZScoreSample | null {
    if (!Number.isFinite(eventTimeMs)) return null;
    if (!Number.isInteger(baselineBuckets) || baselineBuckets < 2) {
      throw new Error(`baselineBuckets must be an integer >= 2 (key ${key})`);
    }

    const bucketMs = bucketSeconds * 1000;

    // Bucket reference is derived from the EVENT timestamp, not from
    // wall-clock now(), so bucket keys are deterministic regardless of
    // when the worker processes the event.
    const eventBucketStart = Math.floor(eventTimeMs / bucketMs) * bucketMs;

    let state = this.stateByKey.get(key);
    if (state === undefined || state.bucketMs !== bucketMs || state.baselineBuckets !== baselineBuckets) {
      state = { counts: new Map<number, number>(), firstBucketStart: eventBucketStart, bucketMs, baselineBuckets };
      this.stateByKey.set(key, state);
    }
    state.firstBucketStart = Math.min(state.firstBucketStart, eventBucketStart);

    const currentCount = (state.counts.get(eventBucketStart) ?? 0) + 1;
    state.counts.set(eventBucketStart, currentCount);

    const oldestKept = eventBucketStart - baselineBuckets * bucketMs;
    for (const bucketStart of state.counts.keys()) {
      if (bucketStart < oldestKept) state.counts.delete(bucketStart);
    }

    const completedBuckets = Math.floor((eventBucketStart - state.firstBucketStart) / bucketMs);
    if (completedBuckets < baselineBuckets) {
      this.log?.debug(
        {
          key,
          bucketStart: new Date(eventBucketStart).toISOString(),
          currentCount,
          completedBucketsAvailable: completedBuckets,
          baselineBucketsRequired: baselineBuckets,
        },
        'StatEval: skipped — baseline not ready',
      );
      return null;
    }

    // The N buckets right before the current one, oldest first; empty ones count 0.
    const baselineCounts: number[] = [];
    for (let k = baselineBuckets; k >= 1; k--) {
      baselineCounts.push(state.counts.get(eventBucketStart - k * bucketMs) ?? 0);
    }

    const mean = this.mean(baselineCounts);
    const stddev = this.stddev(baselineCounts, mean);

    if (stddev <= 0) {
      this.log?.debug(
        { key, currentCount, baselineCounts, mean: this.round(mean, 4) },
        'StatEval: skipped — stddev is 0 (uniform baseline)',
      );
      return null;
    }

    const z = (currentCount - mean) / stddev;
    return {
      bucketStart: eventBucketStart,
      currentCount,
      baselineCounts,
      mean: this.round(mean, 4),
      stddev: this.round(stddev, 4),
      z: this.round(z, 4),
    };
  }

  /** Drops keys with no bucket inside their kept history. */
  sweep(nowMs: number): void {
    for (const [key, state] of this.stateByKey) {
      const oldestKept = nowMs - (state.baselineBuckets + 1) * state.bucketMs;
      let newest = -Infinity;
      for (const bucketStart of state.counts.keys()) newest = Math.max(newest, bucketStart);
      if (newest < oldestKept) this.stateByKey.delete(key);
    }
  }

  dropPrefix(prefix: string): void {
    for (const key of this.stateByKey.keys()) {
      if (key.startsWith(prefix)) this.stateByKey.delete(key);
    }
  }

  get keyCount(): number {
    return this.stateByKey.size;
  }

  // ----- helpers -----

  private mean(values: readonly number[]): number {
    let sum = 0;
    for (const v of values) sum += v;
    return sum / values.length;
  }

  // Population stddev (sufficient for anomaly detection baseline)
  private stddev(values: readonly number[], mean: number): number {
    let acc = 0;
    for (const v of values) {
      const d = v - mean;
      acc += d * d;
    }
    return Math.sqrt(acc / values.length);
  }

  private round(n: number, dp: number): number {
    const m = Math.pow(10, dp);
    return Math.round(n * m) / m;
  }
}
