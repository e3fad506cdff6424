import { createHash } from "crypto";
import { createReadStream } from "fs";

const HASH_CHUNK_SIZE = 64 * 1024;

export type HashResult =
  | { ok: true; hash: string }
  | { ok: false; error: string };

/**
 * Compute SHA256 hash of a file using streaming to handle large files efficiently
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    const stream = createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", reject);
  });
}

/**
 * Like computeFileHash, but read errors come back as a value instead of a rejection.
 */
export async function tryComputeFileHash(filePath: string): Promise<HashResult> {
  try {
    return { ok: true, hash: await computeFileHash(filePath) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
