import { LatencyHistogram } from "../lib/histogram.js";
import { CampaignResult } from "../lib/load-test-runner.js";
import { ConsoleReporter, renderHistogramText } from "../lib/report.js";

const RULE = "    " + "-".repeat(122);

function row(label: string, fill: number, delta: number) {
  return `    ${label.padEnd(10)} ${".".repeat(fill)}${" ".repeat(100 - fill)} ${delta}`;
}

function histogramOf(...samples: number[]) {
  const histogram = new LatencyHistogram();
  samples.forEach((sample) => histogram.record(sample));
  return histogram;
}

describe("renderHistogramText", () => {
  test("shows every second edge followed by an overflow row", () => {
    const lines = renderHistogramText(histogramOf(50));

    expect(lines).toHaveLength(16);
    expect(lines[0]).toEqual(RULE);
    expect(lines[1]).toEqual(row("32µs", 0, 0));
    expect(lines[2]).toEqual(row("64µs", 100, 1));
    expect(lines[3]).toEqual(row("128µs", 0, 0));
    expect(lines[14]).toEqual(row("+inf", 0, 0));
    expect(lines[15]).toEqual(RULE);
    expect(lines.slice(1, 14).map((line) => line.slice(4, 14).trim())).toEqual([
      "32µs",
      "64µs",
      "128µs",
      "256µs",
      "512µs",
      "1.024ms",
      "2.048ms",
      "4.096ms",
      "8.192ms",
      "16.384ms",
      "32.768ms",
      "65.536ms",
      "131.072ms",
    ]);
  });

  test("row deltas add up to the number of samples", () => {
    const lines = renderHistogramText(histogramOf(10, 40, 50, 100, 1000, 140_000, 500_000));
    const deltas = lines.slice(1, -1).map((line) => Number.parseInt(line.split(" ").pop() ?? "", 10));

    expect(deltas.reduce((sum, delta) => sum + delta, 0)).toEqual(7);
    // 40µs is counted on the 64µs row together with 50µs; 140ms lies past the last row shown
    expect(deltas.slice(0, 3)).toEqual([1, 2, 1]);
    expect(deltas[deltas.length - 1]).toEqual(2);
  });

  test("sizes each fill by its share of the total, rounding up", () => {
    const lines = renderHistogramText(histogramOf(20, 20, 50));

    expect(lines[1]).toEqual(row("32µs", 67, 2));
    expect(lines[2]).toEqual(row("64µs", 34, 1));
  });

  test("renders an empty histogram with empty fills", () => {
    const lines = renderHistogramText(new LatencyHistogram());

    expect(lines[1]).toEqual(row("32µs", 0, 0));
    expect(lines[14]).toEqual(row("+inf", 0, 0));
  });
});

describe("ConsoleReporter", () => {
  test("reports duration, missed deadlines and the three histograms in order", () => {
    const lines: string[] = [];
    const reporter = new ConsoleReporter({ write: (line) => lines.push(line) });
    const result: CampaignResult = {
      targetRate: 20,
      durationSeconds: 1,
      scheduled: 20,
      durationMillis: 1_500,
      missedDeadlines: 3,
      missedDeadlinesRatio: 0.15,
      histograms: { write: histogramOf(50), read: histogramOf(50), delete: histogramOf(50) },
      charts: { write: "/charts/write-qps-20.svg" },
    };

    reporter.campaignStarted(20, 1);
    reporter.campaignFinished(result);

    expect(lines.slice(0, 6)).toEqual([
      "TEST:",
      "  QPS:           20",
      "  TEST TIME (s): 1",
      "  DURATION TIME: 1.5s",
      "  MISSED SLEEP:  3 (15.00%)",
      "  WRITE HISTOGRAM:",
    ]);
    expect(lines[22]).toEqual("    See also: /charts/write-qps-20.svg");
    expect(lines[23]).toEqual(RULE);
    expect(lines[24]).toEqual("  READ HISTOGRAM:");
    expect(lines[41]).toEqual("  DELETE HISTOGRAM:");
    expect(lines).toHaveLength(58);
  });
});
