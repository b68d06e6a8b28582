/**
 * Configuration
 *
 * Resolves settings from built-in defaults, an optional JSON config file and CLI
 * overrides. Each field falls back to its own default when missing or invalid.
 */

import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { Settings } from './types.js';

export const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_SETTINGS: Settings = deepFreeze({
  audio: {
    codec: 'mp3',
    quality: '320',
    sampleRate: '48000',
  },
  paths: {
    linksFile: 'links.txt',
    outputDir: './audiodownloads',
    logFile: 'audiodownloader.log',
  },
  behavior: {
    skipExisting: true,
    progressUpdateInterval: 1.0,
    quietDownload: false,
  },
  logging: {
    level: 'INFO',
    consoleLevel: 'INFO',
  },
  downloader: {
    binaryPath: 'yt-dlp',
  },
});

export interface CliOverrides {
  readonly linksFile?: string;
  readonly outputDir?: string;
  readonly skipExisting?: boolean;
}

// Anything that is not a plain object counts as an empty section.
const section = <T extends z.ZodRawShape>(shape: T) =>
  z.preprocess(
    (value) => (typeof value === 'object' && value !== null && !Array.isArray(value) ? value : {}),
    z.object(shape),
  );

const text = (fallback: string) => z.string().min(1).catch(fallback);

const numericText = (fallback: string) =>
  z
    .union([z.string().min(1), z.number().finite()])
    .transform(String)
    .catch(fallback);

const configFileSchema = section({
  audio: section({
    codec: text(DEFAULT_SETTINGS.audio.codec),
    quality: numericText(DEFAULT_SETTINGS.audio.quality),
    sample_rate: numericText(DEFAULT_SETTINGS.audio.sampleRate),
  }),
  paths: section({
    links_file: text(DEFAULT_SETTINGS.paths.linksFile),
    output_dir: text(DEFAULT_SETTINGS.paths.outputDir),
    log_file: text(DEFAULT_SETTINGS.paths.logFile),
  }),
  behavior: section({
    skip_existing: z.boolean().catch(DEFAULT_SETTINGS.behavior.skipExisting),
    progress_update_interval: z
      .number()
      .finite()
      .nonnegative()
      .catch(DEFAULT_SETTINGS.behavior.progressUpdateInterval),
    quiet_download: z.boolean().catch(DEFAULT_SETTINGS.behavior.quietDownload),
  }),
  logging: section({
    level: text(DEFAULT_SETTINGS.logging.level),
    console_level: text(DEFAULT_SETTINGS.logging.consoleLevel),
  }),
  downloader: section({
    binary_path: text(DEFAULT_SETTINGS.downloader.binaryPath),
    ffmpeg_location: z.string().min(1).optional().catch(undefined),
  }),
});

type ConfigFile = z.infer<typeof configFileSchema>;

function deepFreeze<T extends object>(value: T): T {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

const toSettings = (file: ConfigFile): Settings => ({
  audio: {
    codec: file.audio.codec,
    quality: file.audio.quality,
    sampleRate: file.audio.sample_rate,
  },
  paths: {
    linksFile: file.paths.links_file,
    outputDir: file.paths.output_dir,
    logFile: file.paths.log_file,
  },
  behavior: {
    skipExisting: file.behavior.skip_existing,
    progressUpdateInterval: file.behavior.progress_update_interval,
    quietDownload: file.behavior.quiet_download,
  },
  logging: {
    level: file.logging.level,
    consoleLevel: file.logging.console_level,
  },
  downloader: {
    binaryPath: file.downloader.binary_path,
    ...(file.downloader.ffmpeg_location !== undefined
      ? { ffmpegLocation: file.downloader.ffmpeg_location }
      : {}),
  },
});

/**
 * Parses raw config file contents. Throws ConfigError on invalid JSON.
 */
export const parseConfig = (configPath: string, raw: string): Settings => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(configPath, `Invalid JSON in config file ${configPath}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
  return deepFreeze(toSettings(configFileSchema.parse(json)));
};

/**
 * Loads the config file, falling back to defaults when it is missing or unusable.
 */
export const loadConfig = async (configPath: string, logger: Logger): Promise<Settings> => {
  try {
    if (!(await fs.pathExists(configPath))) {
      logger.warn(`Config file ${configPath} not found, using defaults`);
      return DEFAULT_SETTINGS;
    }
    const raw = await fs.readFile(configPath, 'utf-8');
    const settings = parseConfig(configPath, raw);
    logger.info(`Loaded configuration from ${configPath}`);
    return settings;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error(`Error loading config file ${configPath}: ${toErrorMessage(error)}`);
    }
    logger.info('Using default configuration');
    return DEFAULT_SETTINGS;
  }
};

/**
 * Applies CLI overrides on top of loaded settings. skipExisting can only force-enable.
 */
export const applyOverrides = (settings: Settings, overrides: CliOverrides): Settings =>
  deepFreeze({
    ...settings,
    paths: {
      ...settings.paths,
      ...(overrides.linksFile ? { linksFile: overrides.linksFile } : {}),
      ...(overrides.outputDir ? { outputDir: overrides.outputDir } : {}),
    },
    behavior: {
      ...settings.behavior,
      ...(overrides.skipExisting ? { skipExisting: true } : {}),
    },
  });

/**
 * Loads the config file and layers the CLI overrides on top.
 */
export const resolveSettings = async (
  configPath: string,
  overrides: CliOverrides,
  logger: Logger,
): Promise<Settings> => applyOverrides(await loadConfig(configPath, logger), overrides);
