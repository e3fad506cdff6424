import type { GatherStats } from "../pipeline/context";

const RULE_WIDTH = 50;

const STAT_LABELS: Array<[keyof GatherStats, string]> = [
  ["processed", "Total files processed"],
  ["duplicates", "Duplicates skipped"],
  ["whatsappImages", "WhatsApp images"],
  ["whatsappVideos", "WhatsApp videos"],
  ["regularImages", "Regular images"],
  ["regularVideos", "Regular videos"],
  ["warnings", "Warnings"],
];

export function formatStatistics(stats: GatherStats): string[] {
  const rule = "=".repeat(RULE_WIDTH);
  return [
    rule,
    "PROCESSING STATISTICS",
    rule,
    ...STAT_LABELS.map(([key, label]) => `${label}: ${stats[key]}`),
    rule,
  ];
}

export function formatWarnings(warnings: string[]): string[] {
  if (warnings.length === 0) return [];
  return ["Warnings", "========", ...warnings];
}

/**
 * Print the end-of-run report: warnings first, then the statistics block
 */
export function printReport(outputPath: string, stats: GatherStats, warnings: string[]): void {
  const warningLines = formatWarnings(warnings);
  if (warningLines.length > 0) {
    console.log("");
    for (const line of warningLines) console.log(line);
  }

  console.log(`\nOutput folder: ${outputPath}`);
  console.log("");
  for (const line of formatStatistics(stats)) console.log(line);
}
