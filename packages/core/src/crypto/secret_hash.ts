import { createHash, timingSafeEqual } from "crypto";

/**
 * Computes the fixed-length digest stored in place of a user's secret.
 * @returns 64 lowercase hex characters (SHA-256).
 */
export function hashSecret(secret: string): string {
  return createHash("sha256").update(secret, "utf8").digest("hex");
}

/**
 * Recomputes the digest of `secret` and compares it with `expectedHash`
 * in constant time.
 */
export function verifySecret(secret: string, expectedHash: string): boolean {
  const actual = Buffer.from(hashSecret(secret), "hex");
  const expected = Buffer.from(expectedHash, "hex");
  if (actual.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(actual, expected);
}
