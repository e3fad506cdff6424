import { existsSync, mkdirSync } from "fs";
import { join } from "path";
import { createLogger } from "../logger";
import { LocalMediaSource } from "../sources/local";
import type { FolderCategory, FolderGroup, MediaFile } from "../sources/types";
import { formatDate } from "../utils/date";
import { copyMediaFile } from "../export/copy";
import { RunContext, type GatherStats } from "./context";
import { Deduplicator } from "./dedup";
import { cleanFilename, validateFilenameFormat } from "./naming";
import { routeMedia, SUBFOLDERS } from "./routing";

const log = createLogger("gather");

export const CATEGORY_ORDER: readonly FolderCategory[] = [
  "whatsapp_images",
  "whatsapp_videos",
  "image_folders",
];

export type GatherErrorCode = "invalid_date_range" | "output_exists";

export class GatherError extends Error {
  constructor(
    readonly code: GatherErrorCode,
    message: string
  ) {
    super(message);
    this.name = "GatherError";
  }
}

export type GatherEvent =
  | { type: "folder"; category: FolderCategory; folder: string }
  | { type: "copied"; src: string; dest: string }
  | { type: "duplicate"; src: string; original: string }
  | { type: "hash_failed"; src: string; error: string }
  | { type: "copy_failed"; src: string; dest: string; error: string };

export interface GatherOptions {
  from: Date;
  to: Date;
  outputBase: string;
  folderGroups: FolderGroup[];
  onEvent?: (event: GatherEvent) => void;
}

export interface GatherResult {
  outputPath: string;
  stats: GatherStats;
  warnings: string[];
}

export function getOutputPath(outputBase: string, to: Date): string {
  return join(outputBase, `allebilder-bis-${formatDate(to)}`);
}

/**
 * Collect media from every folder group into a fresh dated output directory.
 * Throws GatherError before touching the filesystem when the run can't start;
 * everything that goes wrong per file ends up in the stats, warnings or log.
 */
export async function gatherMedia(options: GatherOptions): Promise<GatherResult> {
  const { from, to, outputBase, folderGroups, onEvent } = options;

  if (formatDate(from) > formatDate(to)) {
    throw new GatherError("invalid_date_range", "from-date must be before or equal to to-date");
  }

  const outputPath = getOutputPath(outputBase, to);
  if (existsSync(outputPath)) {
    throw new GatherError(
      "output_exists",
      `Output directory '${outputPath}' already exists. Exiting to avoid overwriting.`
    );
  }

  for (const subfolder of Object.values(SUBFOLDERS)) {
    mkdirSync(join(outputPath, subfolder), { recursive: true });
  }
  log.info({ outputPath, from: formatDate(from), to: formatDate(to) }, "Starting media gathering");

  const ctx = new RunContext();
  const dedup = new Deduplicator(ctx);

  for (const category of CATEGORY_ORDER) {
    const folders = folderGroups
      .filter((group) => group.category === category)
      .flatMap((group) => group.folders);

    for (const folder of folders) {
      if (!existsSync(folder)) {
        ctx.warn(`Warning: Input folder does not exist: ${folder}`);
        continue;
      }

      onEvent?.({ type: "folder", category, folder });
      const source = new LocalMediaSource(folder, category, { from, to });

      for (const file of source.scan()) {
        await processFile(file, outputPath, ctx, dedup, onEvent);
      }

      log.debug(
        { folder, walkedDirs: source.walkedDirs, skippedOutOfRange: source.skippedOutOfRange },
        "Folder done"
      );
    }
  }

  return { outputPath, stats: ctx.stats, warnings: ctx.warnings };
}

async function processFile(
  file: MediaFile,
  outputPath: string,
  ctx: RunContext,
  dedup: Deduplicator,
  onEvent?: (event: GatherEvent) => void
): Promise<void> {
  const check = await dedup.isDuplicate(file.path);
  if (check.duplicate) {
    onEvent?.({ type: "duplicate", src: file.path, original: check.original });
    return;
  }
  if (check.error !== undefined) {
    onEvent?.({ type: "hash_failed", src: file.path, error: check.error });
  }

  const cleanName = cleanFilename(file.filename);
  if (!validateFilenameFormat(cleanName)) {
    ctx.warn(
      `Warning: Filename doesn't match YYYYMMDD_HHMMSS format or has unexpected extension: ${cleanName}`
    );
  }

  const route = routeMedia(file.category, file.kind);
  ctx.stats[route.counter]++;

  const result = copyMediaFile(file.path, join(outputPath, route.subfolder), cleanName);
  if (result.ok) {
    ctx.stats.processed++;
    onEvent?.({ type: "copied", src: file.path, dest: result.destPath });
  } else {
    onEvent?.({ type: "copy_failed", src: file.path, dest: result.destPath, error: result.error });
  }
}
