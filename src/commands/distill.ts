import ora from "ora";
import { distillImages } from "../pipeline/distill";

export interface DistillCommandOptions {
  inputFolders: string[];
  n: number;
  o?: number;
  outputFolder: string;
}

export async function distillCommand(options: DistillCommandOptions): Promise<void> {
  const spinner = ora();
  const logLine = (line: string) => {
    spinner.clear();
    console.log(line);
    spinner.render();
  };

  spinner.start(`Copying every nth file (n=${options.n}) to ${options.outputFolder}...`);
  try {
    const result = distillImages({
      inputFolders: options.inputFolders,
      n: options.n,
      offset: options.o,
      outputFolder: options.outputFolder,
      onCopied: (src, dest) => logLine(`Copied: ${src} -> ${dest}`),
      onSkippedFolder: (folder) => logLine(`Skipping non-existent folder: ${folder}`),
    });

    const summary = `Copied ${result.copied} file(s) to ${options.outputFolder}`;
    if (result.failed > 0) {
      spinner.warn(`${summary}, ${result.failed} failed`);
    } else {
      spinner.succeed(summary);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    spinner.fail(`Error: ${message}`);
    process.exit(1);
  }
}
