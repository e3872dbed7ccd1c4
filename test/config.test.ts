import { defaultPrefix } from "../lib/clients/local-fs.js";
import { ConfigError, DEFAULT_TARGET_RATES, loadConfig } from "../lib/config.js";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      backend: "localfs",
      payloadSizeBytes: 1024,
      targetRates: [10, 20, 50, 100, 200, 500, 1000],
      campaignDurationSeconds: 30,
      localFsPrefix: defaultPrefix(),
      chartDirectory: "/tmp/images",
      publishMetrics: false,
      tableName: "kv-latency-bench",
      dynamoDbEndpoint: undefined,
      dynamoDbRetries: 0,
      progressMarker: 100,
    });
  });

  test("reads every setting from the environment", () => {
    const config = loadConfig({
      KV_BENCH_BACKEND: "dynamodb",
      KV_BENCH_PAYLOAD_SIZE: "11",
      KV_BENCH_TARGET_RATES: "10, 20,1000",
      KV_BENCH_DURATION_SECONDS: "1",
      KV_BENCH_PREFIX: "/var/tmp/bench/",
      KV_BENCH_CHART_DIR: "",
      KV_BENCH_PUBLISH_METRICS: "true",
      TABLE_NAME: "objects",
      DYNAMODB_ENDPOINT: "http://localhost:8000",
      KV_BENCH_DYNAMODB_RETRIES: "3",
      KV_BENCH_PROGRESS: "0",
    });

    expect(config).toEqual({
      backend: "dynamodb",
      payloadSizeBytes: 11,
      targetRates: [10, 20, 1000],
      campaignDurationSeconds: 1,
      localFsPrefix: "/var/tmp/bench/",
      chartDirectory: undefined,
      publishMetrics: true,
      tableName: "objects",
      dynamoDbEndpoint: "http://localhost:8000",
      dynamoDbRetries: 3,
      progressMarker: 0,
    });
  });

  test("does not share the default rate list", () => {
    loadConfig({}).targetRates.push(5);
    expect(DEFAULT_TARGET_RATES).toEqual([10, 20, 50, 100, 200, 500, 1000]);
  });

  test("rejects an unknown backend", () => {
    expect(() => loadConfig({ KV_BENCH_BACKEND: "redis" })).toThrow(
      new ConfigError("KV_BENCH_BACKEND", 'unsupported backend "redis"'),
    );
  });

  test("rejects malformed rates", () => {
    expect(() => loadConfig({ KV_BENCH_TARGET_RATES: "10,fast" })).toThrow(ConfigError);
    expect(() => loadConfig({ KV_BENCH_TARGET_RATES: "10,0" })).toThrow(ConfigError);
    expect(() => loadConfig({ KV_BENCH_TARGET_RATES: "10,,20" })).toThrow(ConfigError);
  });

  test("rejects out of range integers", () => {
    expect(() => loadConfig({ KV_BENCH_DURATION_SECONDS: "0" })).toThrow(
      "KV_BENCH_DURATION_SECONDS: must be at least 1, got 0",
    );
    expect(() => loadConfig({ KV_BENCH_PAYLOAD_SIZE: "1.5" })).toThrow(
      'KV_BENCH_PAYLOAD_SIZE: expected an integer, got "1.5"',
    );
  });

  test("rejects a negative progress interval", () => {
    expect(() => loadConfig({ KV_BENCH_PROGRESS: "-5" })).toThrow(
      'KV_BENCH_PROGRESS: expected an integer, got "-5"',
    );
  });

  test("rejects a non-boolean metrics flag", () => {
    expect(() => loadConfig({ KV_BENCH_PUBLISH_METRICS: "yes" })).toThrow(
      'KV_BENCH_PUBLISH_METRICS: expected true or false, got "yes"',
    );
  });
});
