import { DirectoryError, LinksFileError, toErrorMessage } from './errors.js';
import { LinkFile } from './linkFile.js';
import type { Logger } from './logger.js';
import { DownloadOrchestrator } from './orchestrator.js';
import { RunStatistics, Settings } from './types.js';
import { ensureOutputDir } from './utils.js';

export interface SessionOptions {
  /** Single-URL mode when set; the links file is neither read nor written. */
  readonly url?: string;
  readonly settings: Settings;
  readonly logger: Logger;
  readonly orchestrator: DownloadOrchestrator;
}

/**
 * Runs one download session. Resolves to null when a fatal condition stopped the run early.
 */
export const runSession = async ({
  url,
  settings,
  logger,
  orchestrator,
}: SessionOptions): Promise<Readonly<RunStatistics> | null> => {
  try {
    if (await ensureOutputDir(settings.paths.outputDir)) {
      logger.info(`Created output directory: ${settings.paths.outputDir}`);
    }
  } catch (error) {
    if (error instanceof DirectoryError) {
      logger.error(`${error.message}: ${toErrorMessage(error.cause)}`);
      logger.error('Cannot proceed without valid output directory');
      return null;
    }
    throw error;
  }

  let links: LinkFile;
  if (url) {
    logger.info(`Processing single URL: ${url}`);
    links = LinkFile.fromUrl(url, logger);
  } else {
    try {
      links = await LinkFile.load(settings.paths.linksFile, logger);
    } catch (error) {
      if (error instanceof LinksFileError) {
        logger.error(`${error.message}: ${toErrorMessage(error.cause)}`);
        return null;
      }
      throw error;
    }
  }

  const statistics = await orchestrator.run(links);
  logger.info('=== Audio Downloader Finished ===');
  return statistics;
};
