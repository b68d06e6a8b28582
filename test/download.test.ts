import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  YtDlpAdapter,
  buildFetchArgs,
  buildProbeArgs,
  createFetchOptions,
  parseMetadata,
} from '../src/download.js';
import { FetchError, classifyFetchError, classifyFetchMessage } from '../src/errors.js';
import { ProgressEvent } from '../src/types.js';
import { createTempDir, makeSettings } from './helpers.js';

const URL_A = 'https://example.com/a';
const METADATA_FILE = '/tmp/metadata.json';

describe('createFetchOptions', () => {
  it('derives extractor options from settings', () => {
    expect(createFetchOptions(makeSettings('music'))).toEqual({
      format: 'bestaudio/best',
      outputTemplate: path.join('music', '%(title)s.%(ext)s'),
      codec: 'mp3',
      quality: '320',
      sampleRate: '48000',
      quiet: false,
      noPlaylist: true,
    });
  });
});

describe('yt-dlp arguments', () => {
  const options = createFetchOptions(makeSettings('music', { codec: 'flac' }));

  it('probes without downloading', () => {
    expect(buildProbeArgs(URL_A, options)).toEqual([
      URL_A,
      '--dump-single-json',
      '--skip-download',
      '--no-warnings',
      '-f',
      'bestaudio/best',
      '--no-playlist',
    ]);
  });

  it('extracts audio in the configured format and sample rate', () => {
    const args = buildFetchArgs(URL_A, options, METADATA_FILE);

    expect(args[0]).toBe(URL_A);
    expect(args.slice(args.indexOf('--audio-format'), args.indexOf('--audio-format') + 2)).toEqual([
      '--audio-format',
      'flac',
    ]);
    expect(args[args.indexOf('--postprocessor-args') + 1]).toBe('ffmpeg:-ar 48000');
    expect(args[args.indexOf('-o') + 1]).toBe(path.join('music', '%(title)s.%(ext)s'));
    expect(args).not.toContain('--ffmpeg-location');
  });

  it('writes the final metadata to a file instead of stdout', () => {
    const args = buildFetchArgs(URL_A, options, METADATA_FILE);
    const at = args.indexOf('--print-to-file');

    expect(args.slice(at, at + 3)).toEqual([
      '--print-to-file',
      'after_move:%(.{title,duration,filesize,filesize_approx})j',
      METADATA_FILE,
    ]);
    expect(args).not.toContain('--print');
  });

  it('adds the quiet and ffmpeg location flags when configured', () => {
    const args = buildFetchArgs(URL_A, { ...options, quiet: true, ffmpegLocation: '/opt/ffmpeg' }, METADATA_FILE);

    expect(args).toContain('--no-warnings');
    expect(args.slice(-2)).toEqual(['--ffmpeg-location', '/opt/ffmpeg']);
  });
});

describe('parseMetadata', () => {
  it('reads title, duration and the best size estimate', () => {
    expect(parseMetadata('{"title":"Alpha","duration":12.5,"filesize":null,"filesize_approx":2048}')).toEqual({
      title: 'Alpha',
      duration: 12.5,
      filesize: 2048,
    });
  });

  it('drops fields of the wrong type', () => {
    expect(parseMetadata('{"title":5,"duration":"long"}')).toEqual({});
  });

  it('returns null for anything that is not a JSON object', () => {
    expect(parseMetadata('[download]  5.0% of 3.00MiB')).toBeNull();
    expect(parseMetadata('[1, 2]')).toBeNull();
  });
});

describe('fetch error classification', () => {
  it('recognises HTTP and URL failures in the message', () => {
    expect(classifyFetchMessage('ERROR: HTTP Error 404: Not Found')).toBe('NotFound');
    expect(classifyFetchMessage('ERROR: HTTP Error 403: Forbidden')).toBe('Forbidden');
    expect(classifyFetchMessage('ERROR: Unsupported URL: https://example.com')).toBe('UnsupportedUrl');
    expect(classifyFetchMessage('Unable to extract uploader id')).toBe('Generic');
  });

  it('prefers the kind carried by a FetchError', () => {
    expect(classifyFetchError(new FetchError('HTTP Error 404', 'ExtractionFailure'))).toBe('ExtractionFailure');
    expect(classifyFetchError(new Error('HTTP Error 403'))).toBe('Forbidden');
    expect(classifyFetchError('HTTP Error 404')).toBe('NotFound');
  });
});

describe('YtDlpAdapter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  // Stand-in executable: the body sees the metadata target as $metadata_file.
  const fakeBinary = async (body: string): Promise<string> => {
    const binary = path.join(dir, 'fake-yt-dlp');
    const script = [
      '#!/bin/sh',
      'metadata_file=""',
      'while [ $# -gt 0 ]; do',
      '  if [ "$1" = "--print-to-file" ]; then metadata_file="$3"; fi',
      '  shift',
      'done',
      body,
      '',
    ].join('\n');
    await fs.writeFile(binary, script, { mode: 0o755 });
    return binary;
  };

  const download = async (body: string): Promise<{ result: unknown; events: ProgressEvent[] }> => {
    const adapter = new YtDlpAdapter(await fakeBinary(body));
    const events: ProgressEvent[] = [];
    const options = createFetchOptions(makeSettings(dir));
    const result = await adapter.fetch(URL_A, options, (event) => events.push(event)).catch((error: unknown) => error);
    return { result, events };
  };

  it('probes by reading the info JSON from stdout', async () => {
    const adapter = new YtDlpAdapter(await fakeBinary(`printf '%s\\n' '{"title":"Alpha","duration":61}'`));

    expect(await adapter.probe(URL_A, createFetchOptions(makeSettings(dir)))).toEqual({ title: 'Alpha', duration: 61 });
  });

  it('streams progress and returns the metadata written after the move', async () => {
    const { result, events } = await download(
      [
        `printf '%s\\n' '[download]  10.0% of 3.00MiB at 1.00MiB/s ETA 00:02'`,
        `printf '%s\\n' '[download] 100% of 3.00MiB in 00:03'`,
        `printf '%s\\n' '{"title":"Alpha","filesize":2048}' > "$metadata_file"`,
      ].join('\n'),
    );

    expect(result).toEqual({ title: 'Alpha', filesize: 2048 });
    expect(events).toEqual([
      { status: 'downloading', percent: '10' },
      { status: 'downloading', percent: '100' },
      { status: 'finished' },
    ]);
  });

  it('succeeds without metadata when nothing was written', async () => {
    const { result, events } = await download('exit 0');

    expect(result).toEqual({});
    expect(events).toEqual([{ status: 'finished' }]);
  });

  it('reports extractor failures from a non-zero exit', async () => {
    const { result, events } = await download(
      `printf '%s\\n' 'ERROR: [generic] Unable to extract title' >&2\nexit 1`,
    );

    expect(result).toBeInstanceOf(FetchError);
    expect(classifyFetchError(result)).toBe('ExtractionFailure');
    expect(events).toEqual([{ status: 'error' }]);
  });

  it('keeps HTTP failures ahead of the extractor wording', async () => {
    const { result } = await download(
      `printf '%s\\n' 'ERROR: [generic] Unable to extract: HTTP Error 404: Not Found' >&2\nexit 1`,
    );

    expect(classifyFetchError(result)).toBe('NotFound');
  });
});
