import PQueue from "p-queue";
import { performance } from "perf_hooks";
import { ChartWriter } from "./chart.js";
import { LatencyHistogram } from "./histogram.js";
import { LatencyMetricsPublisher } from "./metrics.js";
import { ConsoleReporter, Reporter } from "./report.js";
import { BackendError, CorrectnessViolation, OperationName, StorageClient, StorageHandler } from "./storage-client.js";

export interface Clock {
  /// Milliseconds from an arbitrary origin.
  now(): number;

  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep,
};

export interface SequenceLatencies {
  writeMicros: number;
  readMicros: number;
  deleteMicros: number;
}

export interface CampaignResult {
  targetRate: number;
  durationSeconds: number;
  /**
   * Number of operation sequences dispatched.
   */
  scheduled: number;
  /**
   * Wall-clock time from the first dispatch until the last sequence completed.
   */
  durationMillis: number;
  missedDeadlines: number;
  missedDeadlinesRatio: number;
  histograms: Record<OperationName, LatencyHistogram>;
  /**
   * Where each operation's chart was written, if charts are enabled.
   */
  charts: Partial<Record<OperationName, string>>;
}

export const SMOKE_TEST_VALUE = "Hello World";

/**
 * Open-loop driver: sequences are dispatched on a fixed schedule regardless of
 * how long earlier ones take to complete.
 */
export class RatePacedDriver {
  private readonly client: StorageClient;
  private readonly payload: string;
  private readonly durationSeconds: number;
  private readonly clock: Clock;
  private readonly reporter: Reporter;
  private readonly chartWriter: ChartWriter | undefined;
  private readonly metrics: LatencyMetricsPublisher | undefined;
  private readonly progressMarker: number | undefined;
  // Key generation is a critical section; the queue admits one task at a time.
  private readonly keyLock = new PQueue({ concurrency: 1 });

  constructor(
    client: StorageClient,
    opts: {
      /**
       * Value written by every sequence; never mutated.
       */
      payload: string;
      campaignDurationSeconds: number;
      clock?: Clock;
      reporter?: Reporter;
      chartWriter?: ChartWriter;
      metrics?: LatencyMetricsPublisher;
      /**
       * Write a `+` to stdout every `progressMarker` dispatched sequences.
       */
      progressMarker?: number;
    },
  ) {
    if (!(opts.campaignDurationSeconds > 0)) {
      throw new RangeError(`Campaign duration must be positive, got ${opts.campaignDurationSeconds}`);
    }
    this.client = client;
    this.payload = opts.payload;
    this.durationSeconds = opts.campaignDurationSeconds;
    this.clock = opts.clock ?? systemClock;
    this.reporter = opts.reporter ?? new ConsoleReporter();
    this.chartWriter = opts.chartWriter;
    this.metrics = opts.metrics;
    this.progressMarker = opts.progressMarker;
  }

  async run(targetRates: readonly number[]): Promise<CampaignResult[]> {
    await this.client.init();
    this.reporter.clientInitialized(this.client);

    await this.smokeTest();

    const results: CampaignResult[] = [];
    for (const targetRate of targetRates) {
      results.push(await this.runCampaign(targetRate));
    }
    return results;
  }

  /**
   * Checks that the backend behaves as a key-value store before any timing
   * starts.
   */
  async smokeTest(): Promise<void> {
    this.reporter.smokeTestStarted();
    const key = await this.nextKey();
    const handler = this.client.handler();

    await handler.write(key, SMOKE_TEST_VALUE);
    const value = await handler.read(key);
    if (value !== SMOKE_TEST_VALUE) {
      throw new CorrectnessViolation(key, `read returned ${JSON.stringify(value)}, expected ${JSON.stringify(SMOKE_TEST_VALUE)}`);
    }
    await handler.delete(key);
    await assertDeleted(handler, key);

    this.reporter.smokeTestPassed();
  }

  async runCampaign(targetRate: number): Promise<CampaignResult> {
    if (!Number.isInteger(targetRate) || targetRate <= 0) {
      throw new RangeError(`Target rate must be a positive integer, got ${targetRate}`);
    }
    const scheduled = Math.round(targetRate * this.durationSeconds);
    const arrivalIntervalMs = 1_000 / targetRate;
    this.reporter.campaignStarted(targetRate, this.durationSeconds);

    const handler = this.client.handler();
    const tasks: Array<Promise<SequenceLatencies | undefined>> = [];
    const failures: unknown[] = [];
    let missedDeadlines = 0;

    const startTime = this.clock.now();
    // The schedule is fixed at the start; falling behind never moves it, so a
    // run of missed deadlines dispatches back-to-back until it catches up.
    for (let i = 0; i < scheduled && failures.length === 0; i++) {
      const scheduledTime = startTime + i * arrivalIntervalMs;
      const now = this.clock.now();
      if (now < scheduledTime) {
        await this.clock.sleep(scheduledTime - now);
      } else if (i > 0) {
        missedDeadlines += 1;
      }

      const key = await this.nextKey();
      tasks.push(
        this.runSequence(handler, key).then(
          (latencies) => latencies,
          (err: unknown) => {
            failures.push(err);
            return undefined;
          },
        ),
      );

      if (this.progressMarker && (i + 1) % this.progressMarker === 0) {
        process.stdout.write("+");
      }
    }
    if (this.progressMarker) {
      process.stdout.write("\n");
    }

    const completed = await Promise.all(tasks);
    const durationMillis = this.clock.now() - startTime;
    if (failures.length > 0) {
      throw failures[0];
    }

    const samples: SequenceLatencies[] = [];
    const histograms = {
      write: new LatencyHistogram(),
      read: new LatencyHistogram(),
      delete: new LatencyHistogram(),
    };
    for (const latencies of completed) {
      if (latencies === undefined) {
        continue;
      }
      samples.push(latencies);
      histograms.write.record(latencies.writeMicros);
      histograms.read.record(latencies.readMicros);
      histograms.delete.record(latencies.deleteMicros);
    }

    const charts: Partial<Record<OperationName, string>> = {};
    if (this.chartWriter) {
      for (const operation of ["write", "read", "delete"] as const) {
        charts[operation] = await this.chartWriter.write(`${operation}-qps-${targetRate}`, histograms[operation]);
      }
    }
    await this.metrics?.publish(this.client.name, targetRate, samples);

    const result: CampaignResult = {
      targetRate,
      durationSeconds: this.durationSeconds,
      scheduled,
      durationMillis,
      missedDeadlines,
      missedDeadlinesRatio: scheduled === 0 ? 0 : missedDeadlines / scheduled,
      histograms,
      charts,
    };
    this.reporter.campaignFinished(result);
    return result;
  }

  /// write → read → compare → delete → read must fail
  async runSequence(handler: StorageHandler, key: string): Promise<SequenceLatencies> {
    const writeStart = this.clock.now();
    await handler.write(key, this.payload);
    const writeEnd = this.clock.now();

    const value = await handler.read(key);
    const readEnd = this.clock.now();
    if (value !== this.payload) {
      throw new CorrectnessViolation(key, `read returned ${value.length} characters not matching the ${this.payload.length} written`);
    }

    const deleteStart = this.clock.now();
    await handler.delete(key);
    const deleteEnd = this.clock.now();

    await assertDeleted(handler, key);

    return {
      writeMicros: toMicros(writeEnd - writeStart),
      readMicros: toMicros(readEnd - writeEnd),
      deleteMicros: toMicros(deleteEnd - deleteStart),
    };
  }

  private nextKey(): Promise<string> {
    return this.keyLock.add(() => this.client.genUniqueKey());
  }
}

async function assertDeleted(handler: StorageHandler, key: string): Promise<void> {
  let value: string;
  try {
    value = await handler.read(key);
  } catch (err) {
    if (err instanceof BackendError) {
      return;
    }
    throw err;
  }
  throw new CorrectnessViolation(key, `read after delete succeeded with ${value.length} characters`);
}

function toMicros(millis: number): number {
  return Math.max(0, Math.round(millis * 1_000));
}

export async function sleep(ms: number) {
  await new Promise((resolve) => setTimeout(resolve, ms));
}
