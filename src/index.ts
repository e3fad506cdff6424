#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { gatherCommand } from "./commands/gather";
import { distillCommand } from "./commands/distill";
import { parseDate } from "./utils/date";
import { DEFAULT_CONFIG_PATH } from "./config";

const program = new Command();

program
  .name("media-gather")
  .description("Maintain a personal photo and video library")
  .version("0.1.0");

// Parse date string (YYYY-MM-DD) to Date
function parseDateOption(value: string): Date {
  try {
    return parseDate(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function parseIntegerOption(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parseInt(value, 10);
}

program
  .command("gather")
  .description(
    "Organize images and videos from various folders with date filtering and deduplication"
  )
  .requiredOption("--from-date <date>", "Start date in YYYY-MM-DD format", parseDateOption)
  .option("--to-date <date>", "End date in YYYY-MM-DD format (default: yesterday)", parseDateOption)
  .option("--config <path>", "Path to configuration file", DEFAULT_CONFIG_PATH)
  .option("-v, --verbose", "Show debug logging")
  .action(gatherCommand);

program
  .command("distill")
  .description("Select every nth file from given folders and copy them to an output folder")
  .requiredOption("--input-folders <path...>", "List of input folders")
  .requiredOption("-n <number>", "Take every nth file", parseIntegerOption)
  .option("-o <number>", "Offset of the first file to take", parseIntegerOption, 0)
  .requiredOption("--output-folder <path>", "Folder where selected files will be copied")
  .action(distillCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(`Error during execution: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
