import { formatDuration, LatencyHistogram } from "./histogram.js";
import type { CampaignResult } from "./load-test-runner.js";
import { OperationName, StorageClient } from "./storage-client.js";

const LABEL_WIDTH = 10;
const FILL_WIDTH = 100;
const RULE = "    " + "-".repeat(LABEL_WIDTH + 1 + FILL_WIDTH + 1 + 10);

/**
 * Text sparkline: every second edge gets a row whose fill is that row's share
 * of all samples, followed by the number of samples since the previous row. A
 * closing `+inf` row picks up whatever lies beyond the last row shown.
 */
export function renderHistogramText(histogram: LatencyHistogram): string[] {
  const total = histogram.count;
  const lines = [RULE];
  const row = (label: string, delta: number) => {
    const fill = total === 0 ? 0 : Math.ceil((delta * FILL_WIDTH) / total);
    lines.push(`    ${label.padEnd(LABEL_WIDTH)} ${".".repeat(fill)}${" ".repeat(FILL_WIDTH - fill)} ${delta}`);
  };

  let before = 0;
  histogram.buckets().forEach((bucket, i) => {
    if (i % 2 !== 0) {
      return;
    }
    row(formatDuration(bucket.edgeMicros), bucket.cumulativeCount - before);
    before = bucket.cumulativeCount;
  });
  row("+inf", total - before);

  lines.push(RULE);
  return lines;
}

export interface Reporter {
  clientInitialized(client: StorageClient): void;
  smokeTestStarted(): void;
  smokeTestPassed(): void;
  campaignStarted(targetRate: number, durationSeconds: number): void;
  campaignFinished(result: CampaignResult): void;
}

const OPERATIONS: OperationName[] = ["write", "read", "delete"];

export class ConsoleReporter implements Reporter {
  private readonly write: (line: string) => void;

  constructor(opts: { write?: (line: string) => void } = {}) {
    this.write = opts.write ?? ((line) => console.log(line));
  }

  clientInitialized(client: StorageClient) {
    this.write("INIT CLIENT");
    this.write(`  BACKEND:       ${client.name}`);
    for (const [key, value] of Object.entries(client.describe())) {
      const label = key.replace(/([a-z])([A-Z])/g, "$1 $2").toUpperCase();
      this.write(`  ${`${label}:`.padEnd(15)}${String(value)}`);
    }
  }

  smokeTestStarted() {
    this.write("TRY WRITE-READ-DELETE OPS");
  }

  smokeTestPassed() {
    this.write("  OK");
  }

  campaignStarted(targetRate: number, durationSeconds: number) {
    this.write("TEST:");
    this.write(`  QPS:           ${targetRate}`);
    this.write(`  TEST TIME (s): ${durationSeconds}`);
  }

  campaignFinished(result: CampaignResult) {
    this.write(`  DURATION TIME: ${formatDuration(result.durationMillis * 1_000)}`);
    this.write(`  MISSED SLEEP:  ${result.missedDeadlines} (${(result.missedDeadlinesRatio * 100).toFixed(2)}%)`);
    for (const operation of OPERATIONS) {
      this.write(`  ${operation.toUpperCase()} HISTOGRAM:`);
      for (const line of renderHistogramText(result.histograms[operation])) {
        this.write(line);
      }
      const chart = result.charts[operation];
      if (chart !== undefined) {
        this.write(`    See also: ${chart}`);
        this.write(RULE);
      }
    }
  }
}
