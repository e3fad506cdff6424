export interface GatherStats {
  processed: number;
  duplicates: number;
  whatsappImages: number;
  whatsappVideos: number;
  regularImages: number;
  regularVideos: number;
  warnings: number;
}

export type CategoryCounter = "whatsappImages" | "whatsappVideos" | "regularImages" | "regularVideos";

/**
 * State of a single gather run. Create one per run and drop it afterwards.
 */
export class RunContext {
  readonly stats: GatherStats = {
    processed: 0,
    duplicates: 0,
    whatsappImages: 0,
    whatsappVideos: 0,
    regularImages: 0,
    regularVideos: 0,
    warnings: 0,
  };
  readonly warnings: string[] = [];
  /** content hash -> first source path seen with it */
  readonly hashIndex = new Map<string, string>();

  warn(message: string): void {
    this.stats.warnings++;
    this.warnings.push(message);
  }
}
