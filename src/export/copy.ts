import {
  constants,
  chmodSync,
  copyFileSync,
  existsSync,
  mkdirSync,
  statSync,
  utimesSync,
} from "fs";
import { join } from "path";
import { createLogger } from "../logger";
import { getUniqueFilename } from "../pipeline/naming";

const log = createLogger("copy");

export const COPIED_FILE_MODE = 0o644;

export type CopyResult =
  | { ok: true; destPath: string; filename: string }
  | { ok: false; destPath: string; error: string };

/**
 * Copy content plus access/modification times. Fails if destPath exists unless overwrite is set.
 */
export function copyWithTimestamps(src: string, destPath: string, overwrite = false): void {
  const stats = statSync(src);
  copyFileSync(src, destPath, overwrite ? 0 : constants.COPYFILE_EXCL);
  utimesSync(destPath, stats.atime, stats.mtime);
}

/**
 * Copy src into destDir under desiredName, or the next free variant of it.
 * Never overwrites an existing file.
 */
export function copyMediaFile(src: string, destDir: string, desiredName: string): CopyResult {
  let destPath = join(destDir, desiredName);

  try {
    if (!existsSync(destDir)) {
      mkdirSync(destDir, { recursive: true });
      log.debug({ destDir }, "Created destination directory");
    }

    const filename = getUniqueFilename(destDir, desiredName);
    destPath = join(destDir, filename);

    copyWithTimestamps(src, destPath);
    chmodSync(destPath, COPIED_FILE_MODE);

    return { ok: true, destPath, filename };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error({ file: src, destPath, error: message }, "Failed to copy file");
    return { ok: false, destPath, error: message };
  }
}
