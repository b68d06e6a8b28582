import type { Logger } from './logger.js';
import { ProgressEvent, ProgressReporter } from './types.js';

/**
 * Parses a percentage such as "12.5%" or " 7 ". Returns null for anything non-numeric.
 */
export const parsePercent = (value: string): number | null => {
  const cleaned = value.replace('%', '').trim();
  if (cleaned.length === 0) {
    return null;
  }
  const numeric = Number(cleaned);
  return Number.isFinite(numeric) ? numeric : null;
};

/**
 * Per-download filter that forwards progress only after it has advanced by at least
 * `updateInterval` percentage points since the last forwarded value.
 */
export class ProgressThrottle {
  private lastPercent = 0;

  constructor(
    private readonly url: string,
    private readonly updateInterval: number,
    private readonly reporter: ProgressReporter,
  ) {}

  get lastEmitted(): number {
    return this.lastPercent;
  }

  readonly handle = (event: ProgressEvent): void => {
    switch (event.status) {
      case 'downloading': {
        const percent = parsePercent(event.percent);
        if (percent === null) {
          return;
        }
        if (percent - this.lastPercent >= this.updateInterval) {
          this.reporter.progress(this.url, percent);
          this.lastPercent = percent;
        }
        break;
      }
      case 'finished':
        this.reporter.finished(this.url);
        break;
      case 'error':
        this.reporter.failed(this.url);
        break;
    }
  };
}

export interface ConsoleReporterOptions {
  readonly quiet?: boolean;
}

/**
 * Prints plain progress lines to the terminal and reports completion through the logger.
 */
export const createConsoleReporter = (logger: Logger, { quiet = false }: ConsoleReporterOptions = {}): ProgressReporter => ({
  progress: (_url: string, percent: number) => {
    if (!quiet) {
      console.log(`Progress: ${percent.toFixed(1)}%`);
    }
  },
  finished: (url: string) => {
    logger.info(`Download completed for: ${url}`);
  },
  failed: (url: string) => {
    logger.error(`Download error for: ${url}`);
  },
});
