#!/usr/bin/env node
import process from 'node:process';
import { logStartup, parseCliOptions, toOverrides } from './cli.js';
import { resolveSettings } from './config.js';
import { YtDlpAdapter } from './download.js';
import { toErrorMessage } from './errors.js';
import { createConsoleLogger, createLogger } from './logger.js';
import { DownloadOrchestrator } from './orchestrator.js';
import { runSession } from './session.js';

const main = async (): Promise<void> => {
  const options = parseCliOptions(process.argv);
  const settings = await resolveSettings(options.config, toOverrides(options), createConsoleLogger());

  const logger = createLogger({
    level: settings.logging.level,
    consoleLevel: settings.logging.consoleLevel,
    logFile: settings.paths.logFile,
  });
  logStartup(logger, options.config, settings);

  const orchestrator = new DownloadOrchestrator({
    settings,
    adapter: new YtDlpAdapter(settings.downloader.binaryPath),
    logger,
  });

  const statistics = await runSession({ url: options.url, settings, logger, orchestrator });
  if (statistics === null) {
    process.exitCode = 1;
  }
};

void main().catch((error: unknown) => {
  console.error(`Fatal error: ${toErrorMessage(error)}`);
  process.exit(1);
});
