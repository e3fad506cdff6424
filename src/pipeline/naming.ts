import { existsSync } from "fs";
import { extname, join } from "path";

const STRIPPED_PREFIXES = ["IMG-", "IMG_", "VID_", "VID-"];

// YYYYMMDD, then _ or -, then a WhatsApp-style token (WA0001) or HHMMSS
const FILENAME_FORMAT = /^\d{4}(0[1-9]|1[0-2])(0[1-9]|[12][0-9]|3[01])[_-][W0-9][A0-9]\d{4}/;

const WA_SEQUENCE = /^(.*WA)(\d+)$/;
const WA_MAX_ATTEMPTS = 999n;

function splitExtension(filename: string): [string, string] {
  const ext = extname(filename);
  return [filename.slice(0, filename.length - ext.length), ext];
}

/**
 * Strip a camera/app prefix once and normalize the extension (lowercase, .jpeg -> .jpg).
 */
export function cleanFilename(filename: string): string {
  let [name, ext] = splitExtension(filename);

  const prefix = STRIPPED_PREFIXES.find((p) => name.startsWith(p));
  if (prefix) {
    name = name.slice(prefix.length);
  }

  ext = ext.toLowerCase();
  if (ext === ".jpeg") {
    ext = ".jpg";
  }

  return name + ext;
}

export function validateFilenameFormat(filename: string): boolean {
  if (!filename.endsWith(".jpg") && !filename.endsWith(".mp4")) {
    return false;
  }
  return FILENAME_FORMAT.test(filename);
}

/**
 * Return a name not present in targetDir right now. WhatsApp names (...WA0001)
 * advance their sequence number; anything else gets a _<n> suffix.
 */
export function getUniqueFilename(targetDir: string, filename: string): string {
  if (!existsSync(join(targetDir, filename))) {
    return filename;
  }

  const [name, ext] = splitExtension(filename);

  const waMatch = name.match(WA_SEQUENCE);
  if (waMatch) {
    const [, prefix, digits] = waMatch;
    // Sequence numbers can exceed Number.MAX_SAFE_INTEGER
    const current = BigInt(digits);
    for (let num = current + 1n; num <= current + WA_MAX_ATTEMPTS; num++) {
      const candidate = `${prefix}${num.toString().padStart(4, "0")}${ext}`;
      if (!existsSync(join(targetDir, candidate))) {
        return candidate;
      }
    }
  }

  let counter = 1;
  while (existsSync(join(targetDir, `${name}_${counter}${ext}`))) {
    counter++;
  }
  return `${name}_${counter}${ext}`;
}
