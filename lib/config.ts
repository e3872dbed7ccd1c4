import { defaultPrefix } from "./clients/local-fs.js";

export type BackendKind = "localfs" | "dynamodb";

export interface BenchConfig {
  backend: BackendKind;
  payloadSizeBytes: number;
  /**
   * Campaigns run in this order, one per rate.
   */
  targetRates: number[];
  campaignDurationSeconds: number;
  localFsPrefix: string;
  /**
   * Charts are skipped when undefined.
   */
  chartDirectory: string | undefined;
  publishMetrics: boolean;
  tableName: string;
  dynamoDbEndpoint: string | undefined;
  dynamoDbRetries: number;
  /**
   * Dispatched sequences per `+` progress marker; 0 disables markers.
   */
  progressMarker: number;
}

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

export const DEFAULT_TARGET_RATES = [10, 20, 50, 100, 200, 500, 1000];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BenchConfig {
  const chartDirectory = env["KV_BENCH_CHART_DIR"] ?? "/tmp/images";
  return {
    backend: parseBackend(env["KV_BENCH_BACKEND"] ?? "localfs"),
    payloadSizeBytes: parseInteger(env, "KV_BENCH_PAYLOAD_SIZE", 1024, { min: 1 }),
    targetRates: parseRates(env["KV_BENCH_TARGET_RATES"]),
    campaignDurationSeconds: parseInteger(env, "KV_BENCH_DURATION_SECONDS", 30, { min: 1 }),
    localFsPrefix: env["KV_BENCH_PREFIX"] ?? defaultPrefix(),
    chartDirectory: chartDirectory === "" ? undefined : chartDirectory,
    publishMetrics: parseBoolean(env, "KV_BENCH_PUBLISH_METRICS"),
    tableName: env["TABLE_NAME"] ?? "kv-latency-bench",
    dynamoDbEndpoint: env["DYNAMODB_ENDPOINT"] || undefined,
    dynamoDbRetries: parseInteger(env, "KV_BENCH_DYNAMODB_RETRIES", 0, { min: 0 }),
    progressMarker: parseInteger(env, "KV_BENCH_PROGRESS", 100, { min: 0 }),
  };
}

function parseBackend(input: string): BackendKind {
  if (input === "localfs" || input === "dynamodb") {
    return input;
  }
  throw new ConfigError("KV_BENCH_BACKEND", `unsupported backend "${input}"`);
}

function parseInteger(env: NodeJS.ProcessEnv, variable: string, fallback: number, opts: { min: number }): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(variable, `expected an integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < opts.min) {
    throw new ConfigError(variable, `must be at least ${opts.min}, got ${value}`);
  }
  return value;
}

function parseRates(raw: string | undefined): number[] {
  if (raw === undefined || raw.trim() === "") {
    return [...DEFAULT_TARGET_RATES];
  }
  return raw.split(",").map((part) => {
    const trimmed = part.trim();
    if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) === 0) {
      throw new ConfigError("KV_BENCH_TARGET_RATES", `expected positive integers separated by commas, got "${raw}"`);
    }
    return Number.parseInt(trimmed, 10);
  });
}

function parseBoolean(env: NodeJS.ProcessEnv, variable: string): boolean {
  const raw = (env[variable] ?? "").trim().toLowerCase();
  if (raw === "" || raw === "false" || raw === "0") {
    return false;
  }
  if (raw === "true" || raw === "1") {
    return true;
  }
  throw new ConfigError(variable, `expected true or false, got "${env[variable]}"`);
}
