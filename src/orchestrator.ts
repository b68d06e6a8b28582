import { createFetchOptions } from './download.js';
import { classifyFetchError, toErrorMessage } from './errors.js';
import { findExistingFile } from './existing.js';
import { LinkFile } from './linkFile.js';
import type { Logger } from './logger.js';
import { ProgressThrottle, createConsoleReporter } from './progress.js';
import {
  DownloadOutcome,
  FetchErrorKind,
  FetchOptions,
  MediaAdapter,
  MediaMetadata,
  ProgressReporter,
  RunStatistics,
  Settings,
} from './types.js';
import { UNKNOWN_TITLE, formatMegabytes } from './utils.js';

export type DownloadState = 'pending' | 'probing' | 'skipped' | 'downloading' | 'succeeded' | 'failed';

export interface OrchestratorOptions {
  readonly settings: Settings;
  readonly adapter: MediaAdapter;
  readonly logger: Logger;
  readonly reporter?: ProgressReporter;
}

const FAILURE_MESSAGES: Record<FetchErrorKind, (url: string, detail: string) => string> = {
  NotFound: (url) => `Content not found (404): ${url}`,
  Forbidden: (url) => `Access forbidden (403): ${url}`,
  UnsupportedUrl: (url) => `Unsupported URL format: ${url}`,
  ExtractionFailure: (url, detail) => `Extractor error for ${url}: ${detail}`,
  Generic: (url, detail) => `Download error for ${url}: ${detail}`,
};

/**
 * Drives each URL through probe, duplicate check and download, one at a time, and
 * records one outcome per eligible line.
 */
export class DownloadOrchestrator {
  private readonly settings: Settings;
  private readonly adapter: MediaAdapter;
  private readonly logger: Logger;
  private readonly reporter: ProgressReporter;
  private readonly fetchOptions: FetchOptions;
  private readonly probeOptions: FetchOptions;
  private readonly stats: RunStatistics = { processed: 0, success: 0, skipped: 0, error: 0 };

  constructor({ settings, adapter, logger, reporter }: OrchestratorOptions) {
    this.settings = settings;
    this.adapter = adapter;
    this.logger = logger;
    this.reporter = reporter ?? createConsoleReporter(logger, { quiet: settings.behavior.quietDownload });
    this.fetchOptions = createFetchOptions(settings);
    this.probeOptions = { ...this.fetchOptions, quiet: true };
  }

  get statistics(): Readonly<RunStatistics> {
    return { ...this.stats };
  }

  /**
   * Processes every eligible line of the link file and rewrites it with its outcome.
   */
  async run(links: LinkFile): Promise<Readonly<RunStatistics>> {
    for (const entry of links.eligibleEntries()) {
      this.logger.info(`Processing ${this.stats.processed + 1}: ${entry.url}`);
      const outcome = await this.processUrl(entry.url);
      await links.rewrite(entry.index, outcome);
    }

    this.logSummary();
    return this.statistics;
  }

  /**
   * Resolves a single URL to its outcome and counts it. Never throws.
   */
  async processUrl(url: string): Promise<DownloadOutcome> {
    let outcome: DownloadOutcome;
    try {
      outcome = await this.resolveOutcome(url);
    } catch (error) {
      const detail = toErrorMessage(error);
      this.logger.error(`Unexpected error downloading ${url}: ${detail}`);
      outcome = { status: 'error', kind: 'Generic', detail };
    }
    this.record(outcome);
    return outcome;
  }

  private async resolveOutcome(url: string): Promise<DownloadOutcome> {
    this.transition(url, 'pending', 'probing');
    const metadata = await this.probe(url);

    if (metadata) {
      const existing = await findExistingFile(url, metadata, this.settings);
      if (existing) {
        this.transition(url, 'probing', 'skipped');
        this.logger.info(`File already exists, skipping: ${existing}`);
        return { status: 'skipped', existingFilePath: existing };
      }
    }

    this.transition(url, 'probing', 'downloading');
    const throttle = new ProgressThrottle(url, this.settings.behavior.progressUpdateInterval, this.reporter);

    try {
      this.logger.info(`Starting download: ${url}`);
      const result = await this.adapter.fetch(url, this.fetchOptions, throttle.handle);
      this.transition(url, 'downloading', 'succeeded');
      return this.succeed(result);
    } catch (error) {
      this.transition(url, 'downloading', 'failed');
      const kind = classifyFetchError(error);
      const detail = toErrorMessage(error);
      this.logger.error(FAILURE_MESSAGES[kind](url, detail));
      return { status: 'error', kind, detail };
    }
  }

  // Probe failures only mean we go ahead without metadata.
  private async probe(url: string): Promise<MediaMetadata | null> {
    try {
      return await this.adapter.probe(url, this.probeOptions);
    } catch (error) {
      this.logger.debug(`Metadata probe failed for ${url}: ${toErrorMessage(error)}`);
      return null;
    }
  }

  private succeed(result: MediaMetadata): DownloadOutcome {
    const title = result.title || UNKNOWN_TITLE;
    this.logger.info(`Successfully downloaded: '${title}'`);
    if (result.duration) {
      this.logger.info(`Duration: ${result.duration.toFixed(2)} seconds`);
    }
    if (result.filesize) {
      this.logger.info(`File size: ${formatMegabytes(result.filesize)} MB`);
    }
    return { status: 'success', title };
  }

  private record(outcome: DownloadOutcome): void {
    this.stats.processed += 1;
    this.stats[outcome.status] += 1;
  }

  private transition(url: string, from: DownloadState, to: DownloadState): void {
    this.logger.debug({ url, from, to }, `${url}: ${from} -> ${to}`);
  }

  private logSummary(): void {
    this.logger.info('=== Download Summary ===');
    this.logger.info(`Total processed: ${this.stats.processed}`);
    this.logger.info(`Successful: ${this.stats.success}`);
    this.logger.info(`Skipped (existing): ${this.stats.skipped}`);
    this.logger.info(`Errors: ${this.stats.error}`);
  }
}
