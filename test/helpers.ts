import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { DEFAULT_SETTINGS } from '../src/config.js';
import type { Logger } from '../src/logger.js';
import {
  FetchOptions,
  MediaAdapter,
  MediaMetadata,
  ProgressEvent,
  ProgressReporter,
  Settings,
} from '../src/types.js';

export const createTempDir = (): Promise<string> => mkdtemp(path.join(os.tmpdir(), 'batch-audio-'));

export const silentLogger = (): Logger => pino({ level: 'silent' });

/**
 * Logger that keeps every message in memory, keyed by level label.
 */
export const capturingLogger = (): { logger: Logger; messages: (level?: string) => string[] } => {
  const records: { level: number; msg: string }[] = [];
  const logger = pino(
    { level: 'debug', base: null },
    {
      write: (line: string) => {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null && 'msg' in parsed && 'level' in parsed) {
          records.push({ level: Number(parsed.level), msg: String(parsed.msg) });
        }
      },
    },
  );
  const messages = (level?: string): string[] =>
    records
      .filter((record) => level === undefined || record.level === pino.levels.values[level])
      .map((record) => record.msg);
  return { logger, messages };
};

export interface SettingsOverrides {
  readonly skipExisting?: boolean;
  readonly linksFile?: string;
  readonly progressUpdateInterval?: number;
  readonly codec?: string;
}

export const makeSettings = (outputDir: string, overrides: SettingsOverrides = {}): Settings => ({
  ...DEFAULT_SETTINGS,
  audio: { ...DEFAULT_SETTINGS.audio, codec: overrides.codec ?? DEFAULT_SETTINGS.audio.codec },
  paths: {
    ...DEFAULT_SETTINGS.paths,
    outputDir,
    linksFile: overrides.linksFile ?? path.join(outputDir, 'links.txt'),
  },
  behavior: {
    ...DEFAULT_SETTINGS.behavior,
    skipExisting: overrides.skipExisting ?? DEFAULT_SETTINGS.behavior.skipExisting,
    progressUpdateInterval: overrides.progressUpdateInterval ?? DEFAULT_SETTINGS.behavior.progressUpdateInterval,
  },
});

export interface FakeBehaviour {
  readonly probe?: MediaMetadata | Error | null;
  readonly fetch?: MediaMetadata | Error | string;
  readonly progress?: readonly ProgressEvent[];
  readonly beforeFetch?: () => void;
}

/**
 * In-process stand-in for the extractor: answers from a table keyed by URL.
 */
export class FakeAdapter implements MediaAdapter {
  readonly probeCalls: string[] = [];
  readonly fetchCalls: string[] = [];
  readonly fetchOptions: FetchOptions[] = [];

  constructor(private readonly behaviours: Record<string, FakeBehaviour> = {}) {}

  async probe(url: string): Promise<MediaMetadata | null> {
    this.probeCalls.push(url);
    const result = this.behaviours[url]?.probe ?? null;
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  async fetch(url: string, options: FetchOptions, onProgress: (event: ProgressEvent) => void): Promise<MediaMetadata> {
    this.fetchCalls.push(url);
    this.fetchOptions.push(options);
    const behaviour = this.behaviours[url];
    behaviour?.beforeFetch?.();
    for (const event of behaviour?.progress ?? []) {
      onProgress(event);
    }
    const result = behaviour?.fetch ?? {};
    if (result instanceof Error || typeof result === 'string') {
      // Strings model extractors that reject with non-Error values.
      throw result;
    }
    return result;
  }
}

export class RecordingReporter implements ProgressReporter {
  readonly percents: number[] = [];
  readonly finishedUrls: string[] = [];
  readonly failedUrls: string[] = [];

  progress(_url: string, percent: number): void {
    this.percents.push(percent);
  }

  finished(url: string): void {
    this.finishedUrls.push(url);
  }

  failed(url: string): void {
    this.failedUrls.push(url);
  }
}
