import { createLogger } from "../logger";
import { tryComputeFileHash } from "../utils/hash";
import type { RunContext } from "./context";

const log = createLogger("dedup");

export type DedupResult =
  | { duplicate: true; hash: string; original: string }
  | { duplicate: false; hash?: string; error?: string };

/**
 * First file with a given content wins; later files with the same hash are duplicates.
 * Unreadable files are never reported as duplicates.
 */
export class Deduplicator {
  constructor(private ctx: RunContext) {}

  async isDuplicate(filePath: string): Promise<DedupResult> {
    const result = await tryComputeFileHash(filePath);
    if (!result.ok) {
      log.error({ file: filePath, error: result.error }, "Error calculating hash");
      return { duplicate: false, error: result.error };
    }

    const original = this.ctx.hashIndex.get(result.hash);
    if (original !== undefined) {
      this.ctx.stats.duplicates++;
      log.debug({ file: filePath, original, hash: result.hash }, "Duplicate found");
      return { duplicate: true, hash: result.hash, original };
    }

    this.ctx.hashIndex.set(result.hash, filePath);
    return { duplicate: false, hash: result.hash };
  }
}
