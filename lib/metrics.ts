import { Configuration, createMetricsLogger, MetricsLogger, StorageResolution, Unit } from "aws-embedded-metrics";
import type { SequenceLatencies } from "./load-test-runner.js";

export const METRIC_NAMESPACE = "KvLatencyBench";
Configuration.namespace = METRIC_NAMESPACE;

export type MetricNames = "WriteLatency" | "ReadLatency" | "DeleteLatency";

const METRICS_RESOLUTION = StorageResolution.High;

export type MetricsSink = Pick<MetricsLogger, "setDimensions" | "putMetric" | "flush">;

/**
 * Emits every completed sequence as CloudWatch Embedded Metric Format records,
 * flushing in batches so a single record stays within the EMF value limits.
 */
export class LatencyMetricsPublisher {
  private readonly logger: MetricsSink;
  private readonly flushEvery: number;

  constructor(opts: { logger?: MetricsSink; flushEvery?: number } = {}) {
    this.logger = opts.logger ?? createMetricsLogger();
    this.flushEvery = opts.flushEvery ?? 100;
  }

  async publish(backend: string, targetRate: number, samples: SequenceLatencies[]): Promise<void> {
    let pending = 0;
    for (const sample of samples) {
      if (pending === 0) {
        this.logger.setDimensions({ Backend: backend, TargetRate: `${targetRate}` });
      }
      this.logger.putMetric($m("WriteLatency"), sample.writeMicros / 1_000, Unit.Milliseconds, METRICS_RESOLUTION);
      this.logger.putMetric($m("ReadLatency"), sample.readMicros / 1_000, Unit.Milliseconds, METRICS_RESOLUTION);
      this.logger.putMetric($m("DeleteLatency"), sample.deleteMicros / 1_000, Unit.Milliseconds, METRICS_RESOLUTION);
      pending += 1;
      if (pending === this.flushEvery) {
        await this.logger.flush();
        pending = 0;
      }
    }
    if (pending > 0) {
      await this.logger.flush();
    }
  }
}

function $m(metric: MetricNames) {
  return metric;
}
