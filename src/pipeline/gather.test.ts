import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  utimesSync,
  writeFileSync,
} from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FolderGroup } from "../sources/types";
import { gatherMedia, GatherError, getOutputPath, type GatherEvent } from "./gather";

const FROM = new Date(2024, 0, 1);
const TO = new Date(2024, 0, 31);
const IN_RANGE = new Date(2024, 0, 10, 12, 0, 0);

describe("gatherMedia", () => {
  let tmpDir: string;
  let outputBase: string;
  let outputPath: string;

  function write(relPath: string, content: string, mtime: Date = IN_RANGE): string {
    const full = join(tmpDir, relPath);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
    utimesSync(full, mtime, mtime);
    return full;
  }

  function run(folderGroups: FolderGroup[], events: GatherEvent[] = []) {
    return gatherMedia({
      from: FROM,
      to: TO,
      outputBase,
      folderGroups,
      onEvent: (event) => events.push(event),
    });
  }

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "media-gather-run-"));
    outputBase = join(tmpDir, "export");
    outputPath = join(outputBase, "allebilder-bis-2024-01-31");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("names the output directory after the end date", () => {
    expect(getOutputPath("/x", TO)).toBe(join("/x", "allebilder-bis-2024-01-31"));
  });

  it("cleans and routes WhatsApp images without warnings", async () => {
    write("wa/IMG-20240115_WA0001.JPEG", "wa-photo");

    const result = await run([{ category: "whatsapp_images", folders: [join(tmpDir, "wa")] }]);

    expect(result.outputPath).toBe(outputPath);
    expect(readdirSync(join(outputPath, "Whatsapp-Bilder"))).toEqual(["20240115_WA0001.jpg"]);
    expect(result.warnings).toEqual([]);
    expect(result.stats).toEqual({
      processed: 1,
      duplicates: 0,
      whatsappImages: 1,
      whatsappVideos: 0,
      regularImages: 0,
      regularVideos: 0,
      warnings: 0,
    });
  });

  it("creates all three subfolders", async () => {
    await run([]);
    expect(readdirSync(outputPath).sort()).toEqual(["Bilder", "Videos", "Whatsapp-Bilder"]);
  });

  it("keeps only the first of identical files across folders", async () => {
    const a = write("reg1/a.jpg", "same-bytes");
    const b = write("reg2/b.jpg", "same-bytes");
    const events: GatherEvent[] = [];

    const result = await run(
      [{ category: "image_folders", folders: [join(tmpDir, "reg1"), join(tmpDir, "reg2")] }],
      events
    );

    expect(result.stats.duplicates).toBe(1);
    expect(result.stats.processed).toBe(1);
    expect(readdirSync(join(outputPath, "Bilder"))).toEqual(["a.jpg"]);
    expect(events).toContainEqual({ type: "duplicate", src: b, original: a });
    expect(result.warnings).toEqual([
      "Warning: Filename doesn't match YYYYMMDD_HHMMSS format or has unexpected extension: a.jpg",
    ]);
  });

  it("skips files outside the date range without touching counters", async () => {
    write("reg/photo.png", "old-photo", new Date(2023, 5, 1, 12, 0, 0));

    const result = await run([{ category: "image_folders", folders: [join(tmpDir, "reg")] }]);

    expect(result.stats.processed).toBe(0);
    expect(result.stats.duplicates).toBe(0);
    expect(result.stats.regularImages).toBe(0);
    expect(readdirSync(join(outputPath, "Bilder"))).toEqual([]);
  });

  it("routes regular and WhatsApp videos to Videos", async () => {
    write("reg/VID_20240115_120000.mp4", "reg-video");
    write("wav/VID-20240116-WA0003.mp4", "wa-video");

    const result = await run([
      { category: "image_folders", folders: [join(tmpDir, "reg")] },
      { category: "whatsapp_videos", folders: [join(tmpDir, "wav")] },
    ]);

    expect(readdirSync(join(outputPath, "Videos")).sort()).toEqual([
      "20240115_120000.mp4",
      "20240116-WA0003.mp4",
    ]);
    expect(result.stats.regularVideos).toBe(1);
    expect(result.stats.whatsappVideos).toBe(1);
    expect(result.warnings).toEqual([]);
  });

  it("processes categories in a fixed order", async () => {
    write("reg/20240102_100000.jpg", "reg");
    write("wa/20240103_WA0001.jpg", "wa");
    const events: GatherEvent[] = [];

    await run(
      [
        { category: "image_folders", folders: [join(tmpDir, "reg")] },
        { category: "whatsapp_images", folders: [join(tmpDir, "wa")] },
      ],
      events
    );

    const folderEvents = events.filter((e) => e.type === "folder");
    expect(folderEvents).toEqual([
      { type: "folder", category: "whatsapp_images", folder: join(tmpDir, "wa") },
      { type: "folder", category: "image_folders", folder: join(tmpDir, "reg") },
    ]);
  });

  it("advances WhatsApp numbers for same-named files in one run", async () => {
    write("wa1/IMG-20240115_WA0001.jpg", "first");
    write("wa2/IMG-20240115_WA0001.jpg", "second");

    const result = await run([
      { category: "whatsapp_images", folders: [join(tmpDir, "wa1"), join(tmpDir, "wa2")] },
    ]);

    const dest = join(outputPath, "Whatsapp-Bilder");
    expect(result.stats.processed).toBe(2);
    expect(readFileSync(join(dest, "20240115_WA0001.jpg"), "utf-8")).toBe("first");
    expect(readFileSync(join(dest, "20240115_WA0002.jpg"), "utf-8")).toBe("second");
  });

  it("keeps going after a failed copy without counting it", async () => {
    const waFirst = write("wa/IMG-20240115_WA0001.jpg", "wa-photo-1");
    const waSecond = write("wa/IMG-20240116_WA0002.jpg", "wa-photo-2");
    write("wav/VID-20240116-WA0003.mp4", "wa-video");
    write("reg/20240105_080000.jpg", "photo");
    const events: GatherEvent[] = [];
    const waDest = join(outputPath, "Whatsapp-Bilder");

    const result = await gatherMedia({
      from: FROM,
      to: TO,
      outputBase,
      folderGroups: [
        { category: "whatsapp_images", folders: [join(tmpDir, "wa")] },
        { category: "whatsapp_videos", folders: [join(tmpDir, "wav")] },
        { category: "image_folders", folders: [join(tmpDir, "reg")] },
      ],
      onEvent: (event) => {
        events.push(event);
        // Turn the WhatsApp image destination into a plain file so every copy into it fails
        if (event.type === "folder" && event.category === "whatsapp_images") {
          rmSync(waDest, { recursive: true, force: true });
          writeFileSync(waDest, "not a directory");
        }
      },
    });

    const failures = events.filter((e) => e.type === "copy_failed");
    expect(failures).toHaveLength(2);
    expect(failures).toContainEqual({
      type: "copy_failed",
      src: waFirst,
      dest: join(waDest, "20240115_WA0001.jpg"),
      error: expect.any(String),
    });
    expect(failures).toContainEqual({
      type: "copy_failed",
      src: waSecond,
      dest: join(waDest, "20240116_WA0002.jpg"),
      error: expect.any(String),
    });

    expect(result.stats.processed).toBe(2);
    expect(result.stats.whatsappImages).toBe(2);
    expect(result.stats.whatsappVideos).toBe(1);
    expect(result.stats.regularImages).toBe(1);
    expect(readdirSync(join(outputPath, "Videos"))).toEqual(["20240116-WA0003.mp4"]);
    expect(readdirSync(join(outputPath, "Bilder"))).toEqual(["20240105_080000.jpg"]);
    expect(readFileSync(waDest, "utf-8")).toBe("not a directory");
  });

  it("warns about missing input folders and continues", async () => {
    write("reg/20240105_080000.jpg", "photo");
    const missing = join(tmpDir, "does-not-exist");

    const result = await run([
      { category: "image_folders", folders: [missing, join(tmpDir, "reg")] },
    ]);

    expect(result.warnings).toEqual([`Warning: Input folder does not exist: ${missing}`]);
    expect(result.stats.warnings).toBe(1);
    expect(result.stats.processed).toBe(1);
  });

  it("aborts before copying when the output directory exists", async () => {
    write("reg/20240105_080000.jpg", "photo");
    mkdirSync(outputPath, { recursive: true });

    const promise = run([{ category: "image_folders", folders: [join(tmpDir, "reg")] }]);

    await expect(promise).rejects.toBeInstanceOf(GatherError);
    await expect(promise).rejects.toMatchObject({ code: "output_exists" });
    expect(readdirSync(outputPath)).toEqual([]);
  });

  it("rejects a start date after the end date", async () => {
    const promise = gatherMedia({
      from: new Date(2024, 1, 1),
      to: TO,
      outputBase,
      folderGroups: [],
    });

    await expect(promise).rejects.toMatchObject({ code: "invalid_date_range" });
    expect(existsSync(outputBase)).toBe(false);
  });
});
