import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import type { FolderGroup } from "./sources/types";

// A section is either a list of paths or a mapping like `folder1: /path`
const folderListSchema = z
  .union([z.array(z.string()), z.record(z.string())])
  .nullish()
  .transform((value) => {
    if (value == null) return [];
    return Array.isArray(value) ? value : Object.values(value);
  });

const configSchema = z.object({
  whatsapp_images: folderListSchema,
  whatsapp_videos: folderListSchema,
  image_folders: folderListSchema,
  output: z.object({
    base_folder: z.string().min(1),
  }),
});

export type Config = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_PATH = "config.yaml";

export type ConfigErrorCode = "not_found" | "invalid";

export class ConfigError extends Error {
  constructor(
    readonly code: ConfigErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function expandPath(p: string): string {
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  if (!existsSync(configPath)) {
    throw new ConfigError("not_found", `Configuration file '${configPath}' not found!`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError("invalid", `Could not parse '${configPath}': ${message}`);
  }

  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError("invalid", `Invalid configuration in '${configPath}': ${issues}`);
  }

  const config = parsed.data;

  // Expand paths
  config.whatsapp_images = config.whatsapp_images.map(expandPath);
  config.whatsapp_videos = config.whatsapp_videos.map(expandPath);
  config.image_folders = config.image_folders.map(expandPath);
  config.output.base_folder = expandPath(config.output.base_folder);

  return config;
}

export function toFolderGroups(config: Config): FolderGroup[] {
  return [
    { category: "whatsapp_images", folders: config.whatsapp_images },
    { category: "whatsapp_videos", folders: config.whatsapp_videos },
    { category: "image_folders", folders: config.image_folders },
  ];
}

export function getExampleConfig(): string {
  return `# media-gather configuration

whatsapp_images:
  - /path/to/whatsapp/images1
  - /path/to/whatsapp/images2

whatsapp_videos:
  - /path/to/whatsapp/videos1

image_folders:            # mixed photos and videos
  - /path/to/mixed/media1
  - /path/to/mixed/media2

output:
  base_folder: /path/to/output/directory
`;
}
