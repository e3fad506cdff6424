import ora from "ora";
import {
  ConfigError,
  type Config,
  DEFAULT_CONFIG_PATH,
  getExampleConfig,
  loadConfig,
  toFolderGroups,
} from "../config";
import { setLogLevel } from "../logger";
import { formatDate, yesterday } from "../utils/date";
import { printReport } from "../utils/table";
import { gatherMedia, GatherError, type GatherEvent } from "../pipeline/gather";

export interface GatherCommandOptions {
  fromDate: Date;
  toDate?: Date;
  config?: string;
  verbose?: boolean;
}

type Spinner = ReturnType<typeof ora>;

function formatEvent(event: GatherEvent): string {
  switch (event.type) {
    case "folder":
      return `Processing ${event.category} folder: ${event.folder}`;
    case "copied":
      return `Copied: ${event.src} -> ${event.dest}`;
    case "duplicate":
      return `Ignoring duplicate: ${event.src} (original: ${event.original})`;
    case "hash_failed":
      return `Error calculating hash for ${event.src}: ${event.error}`;
    case "copy_failed":
      return `Error copying ${event.src} to ${event.dest}: ${event.error}`;
  }
}

// Progress lines go above the spinner line
function logAboveSpinner(spinner: Spinner, line: string): void {
  spinner.clear();
  console.log(line);
  spinner.render();
}

function loadConfigOrExit(configPath: string, spinner: Spinner): Config {
  try {
    return loadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      spinner.fail(`Error: ${error.message}`);
      if (error.code === "not_found") {
        console.error("Please create a config file with the following structure:\n");
        console.error(getExampleConfig());
      }
      process.exit(1);
    }
    throw error;
  }
}

export async function gatherCommand(options: GatherCommandOptions): Promise<void> {
  const spinner = ora();
  if (options.verbose) {
    setLogLevel("debug");
  }

  const configPath = options.config ?? DEFAULT_CONFIG_PATH;
  const from = options.fromDate;
  const to = options.toDate ?? yesterday();

  const config = loadConfigOrExit(configPath, spinner);

  console.log(`Starting media organization from ${formatDate(from)} to ${formatDate(to)}`);
  spinner.start("Gathering media...");

  try {
    const result = await gatherMedia({
      from,
      to,
      outputBase: config.output.base_folder,
      folderGroups: toFolderGroups(config),
      onEvent: (event) => {
        if (event.type === "folder") {
          spinner.text = `Gathering ${event.category} from ${event.folder}`;
        }
        logAboveSpinner(spinner, formatEvent(event));
      },
    });

    spinner.succeed(`Copied ${result.stats.processed} file(s) to ${result.outputPath}`);
    printReport(result.outputPath, result.stats, result.warnings);
  } catch (error) {
    if (error instanceof GatherError) {
      spinner.fail(`Error: ${error.message}`);
    } else {
      const message = error instanceof Error ? error.message : String(error);
      spinner.fail(`Error during execution: ${message}`);
    }
    process.exit(1);
  }
}
