import crypto from "crypto";
import type { JobIntegrity, VerificationResult } from "../models/job.model";

// Notification method names mapped to node crypto digest names.
export const HASH_ALGORITHMS = {
  md5: "md5",
  sha1: "sha1",
  sha224: "sha224",
  sha256: "sha256",
  sha384: "sha384",
  sha512: "sha512",
  "sha3-256": "sha3-256",
  "sha3-384": "sha3-384",
  "sha3-512": "sha3-512",
} as const;

export type HashAlgorithm = keyof typeof HASH_ALGORITHMS;

function isHashAlgorithm(name: string): name is HashAlgorithm {
  return Object.prototype.hasOwnProperty.call(HASH_ALGORITHMS, name);
}

export function resolveHashAlgorithm(method: string): HashAlgorithm | null {
  const name = method.trim().toLowerCase().replace(/_/g, "-");
  return isHashAlgorithm(name) ? name : null;
}

export function digestBase64(data: Buffer, algorithm: HashAlgorithm): string {
  return crypto
    .createHash(HASH_ALGORITHMS[algorithm])
    .update(data)
    .digest("base64");
}

/**
 * Compares the base64 digest of `data` with the value announced in the
 * notification. The comparison is exact and case-sensitive. Missing
 * integrity metadata or an unknown method yields a skipped result.
 */
export function verifyIntegrity(
  data: Buffer,
  expected: JobIntegrity | undefined,
): VerificationResult {
  if (!expected) {
    return { status: "skipped", reason: "no-integrity" };
  }

  const algorithm = resolveHashAlgorithm(expected.method);
  if (!algorithm) {
    return {
      status: "skipped",
      reason: "unsupported-method",
      method: expected.method,
    };
  }

  const actual = digestBase64(data, algorithm);

  return {
    status: "verified",
    match: actual === expected.expectedValueBase64,
    algorithm,
    expected: expected.expectedValueBase64,
    actual,
  };
}
