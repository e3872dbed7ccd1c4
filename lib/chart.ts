import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import { bucketName, LatencyHistogram } from "./histogram.js";

export interface ChartWriter {
  /**
   * Persists a chart of `histogram` and returns where it was written.
   */
  write(name: string, histogram: LatencyHistogram): Promise<string>;
}

// Bar heights are in hundredths of a percent; the tallest bar is drawn at 8000.
const FULL_SCALE = 10_000;
const TALLEST_BAR = 8_000;

const WIDTH = (128 + 64) * 10;
const HEIGHT = 960;
const MARGIN = 64;
const CAPTION_SIZE = 48;
const X_LABEL_AREA = 128;
const Y_LABEL_AREA = 64 + 32;

export interface ChartBar {
  label: string;
  height: number;
}

/**
 * One bar per bucket including overflow, each proportional to its share of
 * all samples and scaled so the tallest bar sits at 80% of the axis.
 */
export function chartBars(histogram: LatencyHistogram): { bars: ChartBar[]; maxHeight: number } {
  const total = histogram.count;
  const heights = histogram.deltas().map((delta) => (total === 0 ? 0 : Math.ceil((delta * FULL_SCALE) / total)));
  const maxHeight = Math.max(0, ...heights);
  const bars = heights.map((height, i) => ({
    label: bucketName(i),
    height: maxHeight === 0 ? 0 : Math.floor((height * TALLEST_BAR) / maxHeight),
  }));
  return { bars, maxHeight };
}

export function renderHistogramSvg(name: string, histogram: LatencyHistogram): string {
  const { bars, maxHeight } = chartBars(histogram);

  const plotLeft = MARGIN + Y_LABEL_AREA;
  const plotRight = WIDTH - MARGIN;
  const plotTop = MARGIN + CAPTION_SIZE + 16;
  const plotBottom = HEIGHT - MARGIN - X_LABEL_AREA;
  const plotHeight = plotBottom - plotTop;
  const slot = (plotRight - plotLeft) / bars.length;
  const y = (value: number) => plotBottom - (value / FULL_SCALE) * plotHeight;

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">`,
    `<rect width="100%" height="100%" fill="white"/>`,
    `<text x="${WIDTH / 2}" y="${MARGIN + CAPTION_SIZE / 2}" font-family="sans-serif" font-size="${CAPTION_SIZE}" text-anchor="middle">${escapeXml(name)}</text>`,
  ];

  for (let tick = 0; tick <= FULL_SCALE; tick += 1_000) {
    const percent = (tick * maxHeight) / TALLEST_BAR / 100;
    parts.push(
      `<line x1="${plotLeft}" y1="${y(tick)}" x2="${plotRight}" y2="${y(tick)}" stroke="#e0e0e0"/>`,
      `<text x="${plotLeft - 8}" y="${y(tick)}" font-family="sans-serif" font-size="24" text-anchor="end" dominant-baseline="middle">${percent.toFixed(2)}%</text>`,
    );
  }

  bars.forEach((bar, i) => {
    const left = plotLeft + i * slot;
    const center = left + slot / 2;
    parts.push(
      `<rect x="${left + 2}" y="${y(bar.height)}" width="${slot - 4}" height="${plotBottom - y(bar.height)}" fill="red" fill-opacity="0.5"/>`,
      `<text x="${center}" y="${plotBottom + 8}" font-family="sans-serif" font-size="24" transform="rotate(90 ${center} ${plotBottom + 8})" dominant-baseline="middle">${escapeXml(bar.label)}</text>`,
    );
  });

  parts.push(
    `<line x1="${plotLeft}" y1="${plotBottom}" x2="${plotRight}" y2="${plotBottom}" stroke="black"/>`,
    `<line x1="${plotLeft}" y1="${plotTop}" x2="${plotLeft}" y2="${plotBottom}" stroke="black"/>`,
    `<text x="${(plotLeft + plotRight) / 2}" y="${HEIGHT - MARGIN / 2}" font-family="sans-serif" font-size="32" text-anchor="middle">bucket</text>`,
    `<text x="${MARGIN / 2}" y="${(plotTop + plotBottom) / 2}" font-family="sans-serif" font-size="32" text-anchor="middle" transform="rotate(-90 ${MARGIN / 2} ${(plotTop + plotBottom) / 2})">percent</text>`,
    `</svg>`,
  );
  return parts.join("\n") + "\n";
}

export class SvgChartWriter implements ChartWriter {
  private readonly directory: string;

  constructor(opts: { directory: string }) {
    this.directory = opts.directory;
  }

  async write(name: string, histogram: LatencyHistogram): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const file = path.join(this.directory, `${name}.svg`);
    await writeFile(file, renderHistogramSvg(name, histogram), "utf8");
    return file;
  }
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}
