import { runInNewContext } from "vm";
import { BackendError, describeCause } from "../lib/storage-client.js";

describe("describeCause", () => {
  test("uses the message of an error", () => {
    expect(describeCause(new Error("ENOENT: no such file or directory"))).toEqual("ENOENT: no such file or directory");
  });

  test("uses the message of an error created in another context", () => {
    const foreign: unknown = runInNewContext('new Error("ENOENT: no such file or directory")');

    expect(foreign instanceof Error).toBe(false);
    expect(describeCause(foreign)).toEqual("ENOENT: no such file or directory");
  });

  test("stringifies anything else", () => {
    expect(describeCause("throttled")).toEqual("throttled");
    expect(describeCause(42)).toEqual("42");
  });
});

describe("BackendError", () => {
  test("names the operation and key before the cause", () => {
    const err = new BackendError("write", "/tmp/kv/0", runInNewContext('new Error("ENOENT: no such file")'));

    expect(err.message).toEqual("write /tmp/kv/0: ENOENT: no such file");
    expect(err.operation).toEqual("write");
    expect(err.key).toEqual("/tmp/kv/0");
  });
});
