import * as dynamodb from "@aws-sdk/client-dynamodb";
import * as ddc from "@aws-sdk/lib-dynamodb";
import pRetry from "p-retry";
import { monotonicFactory } from "ulid";
import { types } from "util";
import { BackendError, OperationName, StorageClient, StorageHandler } from "../storage-client.js";

export type RetryStrategy = <T>(fn: () => Promise<T>) => Promise<T>;

export const noRetry: RetryStrategy = async (fn) => fn();

const THROTTLING_ERRORS = new Set([
  "ProvisionedThroughputExceededException",
  "RequestLimitExceeded",
  "ThrottlingException",
]);

export function isThrottlingError(err: unknown): boolean {
  return types.isNativeError(err) && THROTTLING_ERRORS.has(err.name);
}

/**
 * Retries throttled requests only; every other failure surfaces on the first
 * attempt. The SDK's own retries happen underneath this.
 */
export function throttlingRetryStrategy(retries: number, opts: { minTimeout?: number } = {}): RetryStrategy {
  if (retries <= 0) {
    return noRetry;
  }
  return (fn) =>
    pRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          if (isThrottlingError(err)) {
            throw err;
          }
          throw new pRetry.AbortError(types.isNativeError(err) ? err : new Error(String(err)));
        }
      },
      {
        retries,
        minTimeout: opts.minTimeout ?? 20,
        factor: 1.2,
        randomize: true,
        maxTimeout: 200,
      },
    );
}

/**
 * Stores each object as a single item keyed by `pk`, with the payload in
 * `value`.
 */
export class DynamoDbStorageClient implements StorageClient {
  readonly name = "dynamodb";
  private readonly dynamoDbClient: dynamodb.DynamoDBClient;
  private readonly tableName: string;
  private readonly retries: number;
  private readonly ulid = monotonicFactory();
  private readonly sharedHandler: DynamoDbHandler;

  constructor(opts: {
    dynamoDbClient: dynamodb.DynamoDBClient;
    documentClient?: ddc.DynamoDBDocumentClient;
    tableName: string;
    retries?: number;
  }) {
    this.dynamoDbClient = opts.dynamoDbClient;
    this.tableName = opts.tableName;
    this.retries = opts.retries ?? 0;
    const documentClient =
      opts.documentClient ??
      ddc.DynamoDBDocumentClient.from(this.dynamoDbClient, {
        marshallOptions: { removeUndefinedValues: true },
      });
    this.sharedHandler = new DynamoDbHandler(documentClient, this.tableName, throttlingRetryStrategy(this.retries));
  }

  async init(): Promise<void> {
    try {
      await this.dynamoDbClient.send(new dynamodb.DescribeTableCommand({ TableName: this.tableName }));
      return;
    } catch (err) {
      if (!(err instanceof dynamodb.ResourceNotFoundException)) {
        throw err;
      }
    }

    await this.dynamoDbClient.send(
      new dynamodb.CreateTableCommand({
        TableName: this.tableName,
        KeySchema: [{ AttributeName: "pk", KeyType: "HASH" }],
        AttributeDefinitions: [{ AttributeName: "pk", AttributeType: "S" }],
        BillingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      }),
    );
    await dynamodb.waitUntilTableExists(
      { client: this.dynamoDbClient, maxWaitTime: 120 },
      { TableName: this.tableName },
    );
  }

  genUniqueKey(): string {
    return `kv#${this.ulid()}`;
  }

  handler(): StorageHandler {
    return this.sharedHandler;
  }

  describe() {
    return { tableName: this.tableName, retries: this.retries };
  }
}

class DynamoDbHandler implements StorageHandler {
  constructor(
    private readonly documentClient: ddc.DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly retryStrategy: RetryStrategy,
  ) {}

  async write(key: string, value: string): Promise<void> {
    await this.call("write", key, () =>
      this.documentClient.send(new ddc.PutCommand({ TableName: this.tableName, Item: { pk: key, value } })),
    );
  }

  async read(key: string): Promise<string> {
    const result = await this.call("read", key, () =>
      this.documentClient.send(new ddc.GetCommand({ TableName: this.tableName, Key: { pk: key }, ConsistentRead: true })),
    );
    if (result.Item === undefined) {
      throw new BackendError("read", key, new Error("not found"));
    }
    const value: unknown = result.Item["value"];
    if (typeof value !== "string") {
      throw new BackendError("read", key, new Error("item has no string value"));
    }
    return value;
  }

  async delete(key: string): Promise<void> {
    await this.call("delete", key, () =>
      this.documentClient.send(
        new ddc.DeleteCommand({
          TableName: this.tableName,
          Key: { pk: key },
          ConditionExpression: "attribute_exists(pk)",
        }),
      ),
    );
  }

  private async call<T>(operation: OperationName, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.retryStrategy(fn);
    } catch (err) {
      throw new BackendError(operation, key, err);
    }
  }
}
