import { createHistogram, RecordableHistogram } from "perf_hooks";

/**
 * Upper bucket edges in microseconds: 32·√2^k for k = 0..25, i.e. 32µs up to
 * 131072µs·√2 (~185ms). Even steps are exact powers of two.
 */
export const BUCKET_EDGES_MICROS: readonly number[] = Object.freeze(
  Array.from({ length: 26 }, (_, k) => 32 * 2 ** Math.floor(k / 2) * (k % 2 === 1 ? Math.SQRT2 : 1)),
);

export const OVERFLOW_BUCKET = BUCKET_EDGES_MICROS.length;

export interface Bucket {
  edgeMicros: number;
  /**
   * Number of samples ≤ `edgeMicros`.
   */
  cumulativeCount: number;
}

export interface LatencyStatsMillis {
  avg: number;
  p0: number;
  p50: number;
  p75: number;
  p90: number;
  p95: number;
  p99: number;
  p99_9: number;
  p100: number;
}

/**
 * Fixed logarithmic buckets plus an unbounded overflow bucket. Every instance
 * shares the same edge table.
 */
export class LatencyHistogram {
  // Non-cumulative; the last slot is overflow.
  private readonly counts: number[] = new Array<number>(BUCKET_EDGES_MICROS.length + 1).fill(0);
  private readonly micros: RecordableHistogram = createHistogram();
  private total = 0;

  record(sampleMicros: number): void {
    if (!Number.isFinite(sampleMicros) || sampleMicros < 0) {
      throw new RangeError(`Latency sample must be a non-negative finite number, got ${sampleMicros}`);
    }
    this.counts[bucketIndexOf(sampleMicros)] += 1;
    this.total += 1;
    // RecordableHistogram doesn't accept values below 1
    this.micros.record(Math.max(1, Math.round(sampleMicros)));
  }

  get count(): number {
    return this.total;
  }

  buckets(): Bucket[] {
    let cumulativeCount = 0;
    return BUCKET_EDGES_MICROS.map((edgeMicros, i) => {
      cumulativeCount += this.counts[i];
      return { edgeMicros, cumulativeCount };
    });
  }

  overflowCount(): number {
    return this.counts[OVERFLOW_BUCKET];
  }

  /**
   * Sample count of each bucket on its own, overflow last.
   */
  deltas(): number[] {
    return [...this.counts];
  }

  stats(): LatencyStatsMillis {
    if (this.total === 0) {
      return { avg: 0, p0: 0, p50: 0, p75: 0, p90: 0, p95: 0, p99: 0, p99_9: 0, p100: 0 };
    }
    return {
      avg: this.micros.mean / 1_000,
      p0: this.micros.min / 1_000,
      p50: this.micros.percentile(50) / 1_000,
      p75: this.micros.percentile(75) / 1_000,
      p90: this.micros.percentile(90) / 1_000,
      p95: this.micros.percentile(95) / 1_000,
      p99: this.micros.percentile(99) / 1_000,
      p99_9: this.micros.percentile(99.9) / 1_000,
      p100: this.micros.max / 1_000,
    };
  }
}

export function bucketIndexOf(sampleMicros: number): number {
  const index = BUCKET_EDGES_MICROS.findIndex((edge) => sampleMicros <= edge);
  return index === -1 ? OVERFLOW_BUCKET : index;
}

/**
 * Axis label for a bucket: `+inf` past the last edge, microseconds below 1ms.
 */
export function bucketName(index: number): string {
  if (index >= BUCKET_EDGES_MICROS.length) {
    return "+inf";
  }
  const micros = BUCKET_EDGES_MICROS[index];
  if (micros < 1000) {
    return `${micros.toFixed(2)}µs`;
  }
  return `${(micros / 1000).toFixed(2)}ms`;
}

export function formatDuration(micros: number): string {
  const whole = Math.floor(micros);
  if (whole < 1_000) {
    return `${whole}µs`;
  }
  if (whole < 1_000_000) {
    return `${trimZeros((whole / 1_000).toFixed(3))}ms`;
  }
  return `${trimZeros((whole / 1_000_000).toFixed(6))}s`;
}

function trimZeros(fixed: string): string {
  return fixed.replace(/\.?0+$/, "");
}
