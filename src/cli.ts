import { Command } from 'commander';
import { CliOverrides, DEFAULT_CONFIG_FILE } from './config.js';
import type { Logger } from './logger.js';
import { Settings } from './types.js';

export type CliOptions = {
  readonly config: string;
  readonly links?: string;
  readonly output?: string;
  readonly skipExisting?: boolean;
  readonly url?: string;
};

export const buildProgram = (): Command =>
  new Command()
    .name('batch-audio')
    .description('Download audio from the URLs listed in a links file')
    .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_FILE)
    .option('-l, --links <path>', 'text file containing links to download (overrides config)')
    .option('-o, --output <dir>', 'destination folder for downloads (overrides config)')
    .option('-s, --skip-existing', 'skip files that already exist (overrides config)')
    .option('-u, --url <url>', 'download a single URL and leave the links file untouched');

/**
 * Parses a full argv (node binary and script first).
 */
export const parseCliOptions = (argv: readonly string[]): CliOptions =>
  buildProgram().parse([...argv]).opts<CliOptions>();

/**
 * Maps parsed flags onto the settings overrides; absent flags leave the config alone.
 */
export const toOverrides = (options: CliOptions): CliOverrides => ({
  linksFile: options.links,
  outputDir: options.output,
  skipExisting: options.skipExisting,
});

export const logStartup = (logger: Logger, configPath: string, settings: Settings): void => {
  const { audio, paths, behavior } = settings;
  logger.info('=== Audio Downloader Started ===');
  logger.info(`Config file: ${configPath}`);
  logger.info(`Links file: ${paths.linksFile}`);
  logger.info(`Output directory: ${paths.outputDir}`);
  logger.info(`Skip existing files: ${behavior.skipExisting}`);
  logger.info(`Audio format: ${audio.codec} ${audio.quality}kbps ${audio.sampleRate}Hz`);
};
