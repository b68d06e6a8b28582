import { randomUUID } from 'node:crypto';
import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { z } from 'zod';
import { FetchError, classifyFetchMessage, toErrorMessage } from './errors.js';
import { FetchOptions, MediaAdapter, MediaMetadata, ProgressEvent, Settings } from './types.js';

/**
 * Builds the extractor options from the resolved settings.
 */
export const createFetchOptions = (settings: Settings): FetchOptions => ({
  format: 'bestaudio/best',
  outputTemplate: path.join(settings.paths.outputDir, '%(title)s.%(ext)s'),
  codec: settings.audio.codec,
  quality: settings.audio.quality,
  sampleRate: settings.audio.sampleRate,
  quiet: settings.behavior.quietDownload,
  noPlaylist: true,
  ...(settings.downloader.ffmpegLocation ? { ffmpegLocation: settings.downloader.ffmpegLocation } : {}),
});

const METADATA_TEMPLATE = '%(.{title,duration,filesize,filesize_approx})j';

/**
 * Arguments for a metadata-only run that prints the info JSON to stdout.
 */
export const buildProbeArgs = (url: string, options: FetchOptions): string[] => [
  url,
  '--dump-single-json',
  '--skip-download',
  '--no-warnings',
  '-f',
  options.format,
  ...(options.noPlaylist ? ['--no-playlist'] : []),
];

/**
 * Arguments for the audio download. The final metadata is written to `metadataFile`, which
 * leaves the progress lines on stdout.
 */
export const buildFetchArgs = (url: string, options: FetchOptions, metadataFile: string): string[] => {
  const args = [
    url,
    '-f',
    options.format,
    '-o',
    options.outputTemplate,
    '-x',
    '--audio-format',
    options.codec,
    '--audio-quality',
    options.quality,
    '--postprocessor-args',
    `ffmpeg:-ar ${options.sampleRate}`,
    '--newline',
    '--progress',
    '--print-to-file',
    `after_move:${METADATA_TEMPLATE}`,
    metadataFile,
  ];

  if (options.noPlaylist) {
    args.push('--no-playlist');
  }
  if (options.quiet) {
    args.push('--no-warnings');
  }
  if (options.ffmpegLocation) {
    args.push('--ffmpeg-location', options.ffmpegLocation);
  }

  return args;
};

const metadataSchema = z
  .object({
    title: z.string().nullish().catch(undefined),
    duration: z.number().nullish().catch(undefined),
    filesize: z.number().nullish().catch(undefined),
    filesize_approx: z.number().nullish().catch(undefined),
  })
  .transform((raw): MediaMetadata => {
    const filesize = raw.filesize ?? raw.filesize_approx ?? undefined;
    return {
      ...(raw.title ? { title: raw.title } : {}),
      ...(raw.duration ? { duration: raw.duration } : {}),
      ...(filesize ? { filesize } : {}),
    };
  });

/**
 * Parses an info JSON document printed by yt-dlp. Returns null when it is not an object.
 */
export const parseMetadata = (raw: string): MediaMetadata | null => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = metadataSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
};

const toFetchError = (error: unknown): FetchError => {
  if (error instanceof FetchError) {
    return error;
  }
  const message = toErrorMessage(error);
  let kind = classifyFetchMessage(message);
  if (kind === 'Generic' && /Unable to extract|ExtractorError/u.test(message)) {
    kind = 'ExtractionFailure';
  }
  return new FetchError(message, kind, { cause: error });
};

interface YtDlpProgress {
  readonly percent?: number;
}

interface YtDlpEmitter {
  on: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
  once: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
}

interface YtDlpWrap {
  exec: (args: string[]) => YtDlpEmitter;
  execPromise: (args: string[]) => Promise<string>;
}

type YtDlpWrapConstructor = new (binaryPath?: string) => YtDlpWrap;

// yt-dlp-wrap is CommonJS with a `default` export; depending on the loader we get either layer.
const resolveConstructor = (candidate: unknown): YtDlpWrapConstructor => {
  if (typeof candidate === 'function') {
    return candidate as YtDlpWrapConstructor;
  }
  if (typeof candidate === 'object' && candidate !== null && 'default' in candidate) {
    return resolveConstructor(candidate.default);
  }
  throw new Error('yt-dlp-wrap did not expose a constructor');
};

const isProgress = (value: unknown): value is YtDlpProgress =>
  typeof value === 'object' && value !== null && 'percent' in value;

// yt-dlp appends one JSON line per moved file; the last one describes the result.
const readMetadataFile = async (filePath: string): Promise<MediaMetadata> => {
  if (!(await fs.pathExists(filePath))) {
    return {};
  }
  const lines = (await fs.readFile(filePath, 'utf-8')).split(/\r?\n/u).filter((line) => line.startsWith('{'));
  const last = lines[lines.length - 1];
  return (last === undefined ? null : parseMetadata(last)) ?? {};
};

/**
 * Media adapter backed by the yt-dlp binary through yt-dlp-wrap.
 */
export class YtDlpAdapter implements MediaAdapter {
  private instancePromise: Promise<YtDlpWrap> | null = null;

  constructor(private readonly binaryPath: string) {}

  /**
   * Lazily instantiates the wrapper so the module is only loaded when a download runs.
   */
  private getYtDlp(): Promise<YtDlpWrap> {
    if (!this.instancePromise) {
      this.instancePromise = import('yt-dlp-wrap').then((module) => {
        const Constructor = resolveConstructor(module);
        return new Constructor(this.binaryPath);
      });
    }
    return this.instancePromise;
  }

  async probe(url: string, options: FetchOptions): Promise<MediaMetadata | null> {
    const ytDlp = await this.getYtDlp();
    const output = await ytDlp.execPromise(buildProbeArgs(url, options));
    return parseMetadata(output);
  }

  async fetch(
    url: string,
    options: FetchOptions,
    onProgress: (event: ProgressEvent) => void,
  ): Promise<MediaMetadata> {
    const ytDlp = await this.getYtDlp();
    const metadataFile = path.join(os.tmpdir(), `batch-audio-${randomUUID()}.json`);

    try {
      await this.runDownload(ytDlp, buildFetchArgs(url, options, metadataFile), onProgress);
      const metadata = await readMetadataFile(metadataFile);
      onProgress({ status: 'finished' });
      return metadata;
    } finally {
      await fs.remove(metadataFile);
    }
  }

  private runDownload(ytDlp: YtDlpWrap, args: string[], onProgress: (event: ProgressEvent) => void): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const runner = ytDlp.exec(args);

      runner.on('progress', (raw: unknown) => {
        if (isProgress(raw)) {
          onProgress({ status: 'downloading', percent: String(raw.percent) });
        }
      });
      // Non-zero exits arrive here with stderr folded into the message.
      runner.once('error', (error: unknown) => {
        onProgress({ status: 'error' });
        reject(toFetchError(error));
      });
      runner.once('close', (code: unknown) => {
        if (code !== 0) {
          onProgress({ status: 'error' });
          reject(new FetchError(`yt-dlp exited with code ${String(code)}`));
          return;
        }
        resolve();
      });
    });
  }
}
