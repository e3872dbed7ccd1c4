import { mkdir, readFile, unlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { BackendError, StorageClient, StorageHandler } from "../storage-client.js";

export function defaultPrefix(): string {
  return path.join(tmpdir(), `iotest_${process.pid}`) + path.sep;
}

/**
 * Maps every key directly onto a file path under `prefix`.
 */
export class LocalFsStorageClient implements StorageClient {
  readonly name = "localfs";
  private readonly prefix: string;
  private autoIncrement = 0;

  constructor(opts: { prefix?: string } = {}) {
    this.prefix = opts.prefix ?? defaultPrefix();
  }

  async init(): Promise<void> {
    await mkdir(this.prefix, { recursive: true });
  }

  genUniqueKey(): string {
    const key = `${this.prefix}${this.autoIncrement}`;
    this.autoIncrement += 1;
    return key;
  }

  handler(): StorageHandler {
    return localFsHandler;
  }

  describe() {
    return { prefix: this.prefix, keysIssued: this.autoIncrement };
  }
}

const localFsHandler: StorageHandler = {
  async write(key, value) {
    try {
      await writeFile(key, value, "utf8");
    } catch (err) {
      throw new BackendError("write", key, err);
    }
  },

  async read(key) {
    try {
      return await readFile(key, "utf8");
    } catch (err) {
      throw new BackendError("read", key, err);
    }
  },

  async delete(key) {
    try {
      await unlink(key);
    } catch (err) {
      throw new BackendError("delete", key, err);
    }
  },
};
