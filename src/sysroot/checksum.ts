/**
 * Archive digest computation and pinned-checksum verification.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { finished } from "node:stream/promises";

import { ChecksumComputationError, ChecksumMismatchError, extractErrorDetails } from "../errors.js";
import { normalizeSha256 } from "../validation.js";

/**
 * Stream a file through SHA-256.
 *
 * @returns Lower-case hex digest.
 * @throws ChecksumComputationError if the file cannot be read.
 */
export async function sha256File(path: string): Promise<string> {
  const hash = createHash("sha256");
  try {
    const stream = createReadStream(path);
    stream.on("data", (chunk) => hash.update(chunk));
    await finished(stream);
  } catch (e: unknown) {
    throw new ChecksumComputationError(
      `Failed to calculate sha256 for ${path}: ${extractErrorDetails(e)}`
    );
  }
  return hash.digest("hex");
}

/**
 * Compare an archive against its pinned digest.
 *
 * @param expected - Digest as the caller supplied it; reported verbatim on mismatch.
 * @returns The computed digest.
 * @throws ChecksumMismatchError if the digests differ.
 */
export async function verifyChecksum(archivePath: string, archiveName: string, expected: string): Promise<string> {
  const actual = await sha256File(archivePath);
  if (normalizeSha256(expected) !== actual) {
    throw new ChecksumMismatchError(archiveName, expected.trim(), actual);
  }
  return actual;
}
