import { randomInt } from "crypto";

const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

// Alphanumeric, so each character is one byte on disk and on the wire.
export function buildRandomPayload(length: number): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Payload length must be a non-negative integer, got ${length}`);
  }
  const chars: string[] = [];
  for (let i = 0; i < length; i++) {
    chars.push(ALPHANUMERIC[randomInt(0, ALPHANUMERIC.length)]);
  }
  return chars.join("");
}
