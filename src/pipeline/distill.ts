import { existsSync, mkdirSync, readdirSync, statSync } from "fs";
import { join } from "path";
import { createLogger } from "../logger";
import { copyWithTimestamps } from "../export/copy";
import { isSymlinkToFile } from "../sources/local";

const log = createLogger("distill");

export class DistillError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DistillError";
  }
}

export interface DistillOptions {
  inputFolders: string[];
  n: number;
  offset?: number;
  outputFolder: string;
  onCopied?: (src: string, dest: string) => void;
  onSkippedFolder?: (folder: string) => void;
}

export interface DistillResult {
  copied: number;
  failed: number;
  skippedFolders: string[];
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Files (or symlinks to files) directly inside folder, sorted by name.
 */
export function listFilesSorted(folder: string): string[] {
  return readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile() || isSymlinkToFile(entry, join(folder, entry.name)))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Every nth entry starting at offset: offset, offset + n, offset + 2n, ...
 */
export function selectEveryNth<T>(items: T[], n: number, offset = 0): T[] {
  const selected: T[] = [];
  for (let i = offset; i < items.length; i += n) {
    selected.push(items[i]);
  }
  return selected;
}

export function distillImages(options: DistillOptions): DistillResult {
  const { inputFolders, n, outputFolder, onCopied, onSkippedFolder } = options;
  const offset = options.offset ?? 0;

  if (!Number.isInteger(n) || n < 1) {
    throw new DistillError(`-n must be a positive integer, got ${n}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new DistillError(`Offset must be a non-negative integer, got ${offset}`);
  }

  if (!existsSync(outputFolder)) {
    mkdirSync(outputFolder, { recursive: true });
  }

  const result: DistillResult = { copied: 0, failed: 0, skippedFolders: [] };

  for (const folder of inputFolders) {
    if (!isDirectory(folder)) {
      result.skippedFolders.push(folder);
      onSkippedFolder?.(folder);
      continue;
    }

    const selected = selectEveryNth(listFilesSorted(folder), n, offset);
    log.debug({ folder, selected: selected.length, n, offset }, "Selected files");

    for (const name of selected) {
      const src = join(folder, name);
      const dest = join(outputFolder, name);
      try {
        copyWithTimestamps(src, dest, true);
        result.copied++;
        onCopied?.(src, dest);
      } catch (err) {
        result.failed++;
        log.error({ file: src, dest, error: err instanceof Error ? err.message : String(err) }, "Failed to copy file");
      }
    }
  }

  return result;
}
