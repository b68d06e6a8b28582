/**
 * Logger
 *
 * Pino-based logger with a JSON file sink and a plain console sink.
 * Instances are handed to each component; nothing reads a global logger.
 */

import pino, { type Level, type Logger } from 'pino';
import pretty from 'pino-pretty';

export type { Logger };

export interface LoggerOptions {
  readonly level: string;
  readonly consoleLevel: string;
  readonly logFile: string;
}

const LEVEL_ALIASES: Record<string, Level> = {
  TRACE: 'trace',
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
  FATAL: 'fatal',
};

/**
 * Maps a config level name (case-insensitive) onto a pino level, defaulting to info.
 */
export const toPinoLevel = (name: string): Level => LEVEL_ALIASES[name.trim().toUpperCase()] ?? 'info';

const lowestLevel = (a: Level, b: Level): Level =>
  pino.levels.values[a] <= pino.levels.values[b] ? a : b;

// Message-only output, matching what a user expects on a terminal.
const createConsoleStream = () =>
  pretty({
    colorize: false,
    ignore: 'pid,hostname,time,level',
    hideObject: true,
    sync: true,
  });

/**
 * Builds the run logger: timestamped JSON lines into the log file, bare messages on stdout.
 */
export const createLogger = ({ level, consoleLevel, logFile }: LoggerOptions): Logger => {
  const fileLevel = toPinoLevel(level);
  const terminalLevel = toPinoLevel(consoleLevel);

  const streams = pino.multistream([
    { level: fileLevel, stream: pino.destination({ dest: logFile, mkdir: true, sync: true }) },
    { level: terminalLevel, stream: createConsoleStream() },
  ]);

  return pino(
    {
      level: lowestLevel(fileLevel, terminalLevel),
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: null,
    },
    streams,
  );
};

/**
 * Console-only logger used until settings (and the log file path) are known.
 */
export const createConsoleLogger = (level: Level = 'info'): Logger =>
  pino({ level, base: null }, createConsoleStream());
