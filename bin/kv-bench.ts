#!/usr/bin/env node
import "source-map-support/register.js";
import * as dynamodb from "@aws-sdk/client-dynamodb";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import { inspect } from "util";
import { SvgChartWriter } from "../lib/chart.js";
import { DynamoDbStorageClient } from "../lib/clients/dynamodb.js";
import { LocalFsStorageClient } from "../lib/clients/local-fs.js";
import { BenchConfig, loadConfig } from "../lib/config.js";
import { buildRandomPayload } from "../lib/generators.js";
import { RatePacedDriver } from "../lib/load-test-runner.js";
import { LatencyMetricsPublisher } from "../lib/metrics.js";
import { BackendError, StorageClient } from "../lib/storage-client.js";

const dynamoDbClientTimeoutMs = 5_000;

inspect.defaultOptions.depth = 5;

function buildClient(config: BenchConfig): StorageClient {
  switch (config.backend) {
    case "localfs":
      return new LocalFsStorageClient({ prefix: config.localFsPrefix });

    case "dynamodb":
      return new DynamoDbStorageClient({
        dynamoDbClient: new dynamodb.DynamoDBClient({
          endpoint: config.dynamoDbEndpoint,
          requestHandler: new NodeHttpHandler({
            connectionTimeout: dynamoDbClientTimeoutMs,
            requestTimeout: dynamoDbClientTimeoutMs,
          }),
        }),
        tableName: config.tableName,
        retries: config.dynamoDbRetries,
      });
  }
}

async function main() {
  const config = loadConfig();
  const client = buildClient(config);

  const driver = new RatePacedDriver(client, {
    payload: buildRandomPayload(config.payloadSizeBytes),
    campaignDurationSeconds: config.campaignDurationSeconds,
    chartWriter: config.chartDirectory ? new SvgChartWriter({ directory: config.chartDirectory }) : undefined,
    metrics: config.publishMetrics ? new LatencyMetricsPublisher() : undefined,
    progressMarker: config.progressMarker > 0 ? config.progressMarker : undefined,
  });

  const startTime = Date.now();
  const results = await driver.run(config.targetRates);

  console.log({
    startTime: new Date(startTime).toISOString(),
    backend: client.name,
    client: client.describe(),
    payloadSizeBytes: config.payloadSizeBytes,
    campaigns: results.map((result) => ({
      targetRate: result.targetRate,
      scheduled: result.scheduled,
      durationMillis: result.durationMillis,
      missedDeadlines: result.missedDeadlines,
      writeLatencyStatsMillis: result.histograms.write.stats(),
      readLatencyStatsMillis: result.histograms.read.stats(),
      deleteLatencyStatsMillis: result.histograms.delete.stats(),
    })),
  });
}

main().catch((err: unknown) => {
  if (err instanceof BackendError) {
    console.error(`Backend ${err.operation} failed for key ${err.key}: ${err.message}`);
  } else {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  }
  process.exitCode = 1;
});
