import { types } from "util";

export type OperationName = "write" | "read" | "delete";

/**
 * The stateful side of a backend. Calls to `genUniqueKey` must be serialized
 * by the caller; everything else may happen once per process.
 */
export interface StorageClient {
  /**
   * Backend label used in reports and metric dimensions.
   */
  readonly name: string;

  /// Idempotent one-time setup, e.g. creating a directory or a table.
  init(): Promise<void>;

  /// Never returns the same key twice for one instance.
  genUniqueKey(): string;

  handler(): StorageHandler;

  /// Additional backend configuration to be included in reports.
  describe(): Record<string, unknown>;
}

/**
 * Stateless and reentrant: one instance may be shared by every in-flight
 * operation sequence.
 */
export interface StorageHandler {
  write(key: string, value: string): Promise<void>;

  read(key: string): Promise<string>;

  /// Must fail when the key does not exist.
  delete(key: string): Promise<void>;
}

export class BackendError extends Error {
  readonly operation: OperationName;
  readonly key: string;

  constructor(operation: OperationName, key: string, cause: unknown) {
    super(`${operation} ${key}: ${describeCause(cause)}`, { cause });
    this.name = "BackendError";
    this.operation = operation;
    this.key = key;
  }
}

export class CorrectnessViolation extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = "CorrectnessViolation";
    this.key = key;
  }
}

/// Errors may come from another realm (a vm context, a test sandbox), so
/// `instanceof Error` is not enough.
export function describeCause(cause: unknown): string {
  if (types.isNativeError(cause)) {
    return cause.message;
  }
  return String(cause);
}
