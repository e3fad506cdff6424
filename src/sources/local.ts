import { readdirSync, statSync, type Dirent } from "fs";
import { join, extname } from "path";
import type { FolderCategory, MediaFile, MediaKind, MediaSource } from "./types";
import { createLogger } from "../logger";
import { getEffectiveDate, isInDateRange } from "../utils/date";

const logger = createLogger("local-source");

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".jpg", ".jpeg", ".png", ".gif", ".bmp", ".tiff", ".webp",
]);

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  ".mp4", ".avi", ".mkv", ".mov", ".wmv", ".flv", ".webm", ".m4v",
]);

/**
 * Classify an extension (any case, with leading dot), or null for non-media files.
 */
export function classifyExtension(extension: string): MediaKind | null {
  const ext = extension.toLowerCase();
  if (IMAGE_EXTENSIONS.has(ext)) return "image";
  if (VIDEO_EXTENSIONS.has(ext)) return "video";
  return null;
}

/**
 * Symlinks to files count as files; symlinked directories are not followed.
 */
export function isSymlinkToFile(entry: Dirent, fullPath: string): boolean {
  if (!entry.isSymbolicLink()) return false;
  try {
    return statSync(fullPath).isFile();
  } catch {
    // dangling link
    return false;
  }
}

export interface LocalMediaSourceOptions {
  from: Date;  // inclusive
  to: Date;    // inclusive
}

export class LocalMediaSource implements MediaSource {
  folder: string;
  private category: FolderCategory;
  private from: Date;
  private to: Date;
  public walkedDirs = 0;
  public skippedOutOfRange = 0;

  constructor(folder: string, category: FolderCategory, options: LocalMediaSourceOptions) {
    this.folder = folder;
    this.category = category;
    this.from = options.from;
    this.to = options.to;
  }

  *scan(): Generator<MediaFile> {
    yield* this.scanDirectory(this.folder);
  }

  private *scanDirectory(dirPath: string): Generator<MediaFile> {
    let entries;
    try {
      entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (err) {
      logger.debug({ directory: dirPath, error: String(err) }, "Directory not readable, skipping");
      return;
    }
    this.walkedDirs++;

    const subdirs: string[] = [];

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        subdirs.push(fullPath);
        continue;
      }
      if (!entry.isFile() && !isSymlinkToFile(entry, fullPath)) continue;

      const extension = extname(entry.name).toLowerCase();
      const kind = classifyExtension(extension);
      if (!kind) continue;

      let effectiveDate: Date;
      try {
        effectiveDate = getEffectiveDate(fullPath);
      } catch (err) {
        logger.debug({ file: fullPath, error: String(err) }, "File not accessible, skipping");
        continue;
      }

      if (!isInDateRange(effectiveDate, this.from, this.to)) {
        this.skippedOutOfRange++;
        continue;
      }

      yield {
        path: fullPath,
        filename: entry.name,
        extension,
        kind,
        category: this.category,
        effectiveDate,
      };
    }

    for (const subdir of subdirs) {
      yield* this.scanDirectory(subdir);
    }
  }
}
