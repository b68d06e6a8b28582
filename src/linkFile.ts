import path from 'node:path';
import fs from 'fs-extra';
import { LinksFileError, toErrorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { DownloadOutcome, FetchErrorKind, LinkEntry } from './types.js';
import { COMMENT_MARKER, isHttpUrl } from './utils.js';

export const ERROR_TAGS: Record<FetchErrorKind, string> = {
  NotFound: 'NOT FOUND',
  Forbidden: 'FORBIDDEN',
  UnsupportedUrl: 'UNSUPPORTED URL',
  ExtractionFailure: 'EXTRACTOR ERROR',
  Generic: 'DOWNLOAD ERROR',
};

/**
 * A line is processed only if it is a bare http(s) URL; blanks and comments pass through.
 */
export const isEligibleLine = (text: string): boolean => {
  const trimmed = text.trim();
  return trimmed.length > 0 && !trimmed.startsWith(COMMENT_MARKER) && isHttpUrl(trimmed);
};

/**
 * Short text describing an outcome: the title, the skip reason or the error tag.
 */
export const summarizeOutcome = (outcome: DownloadOutcome): string => {
  switch (outcome.status) {
    case 'success':
      return outcome.title;
    case 'skipped':
      return `SKIPPED (exists: ${path.basename(outcome.existingFilePath)})`;
    case 'error':
      return `ERROR: ${ERROR_TAGS[outcome.kind]}`;
  }
};

/**
 * Comments out a processed URL and appends its outcome summary.
 */
export const formatAnnotation = (url: string, outcome: DownloadOutcome): string =>
  `${COMMENT_MARKER} ${url} ${COMMENT_MARKER} ${summarizeOutcome(outcome)}`;

/**
 * Splits file contents into entries, keeping each line's own terminator.
 */
export const parseLines = (raw: string): LinkEntry[] => {
  if (raw.length === 0) {
    return [];
  }
  return raw.split(/(?<=\n)/u).map((chunk, index) => {
    const eol = chunk.endsWith('\r\n') ? '\r\n' : chunk.endsWith('\n') ? '\n' : '';
    const text = chunk.slice(0, chunk.length - eol.length);
    return { index, text, eol, url: text.trim() };
  });
};

/**
 * In-memory view of the links file. Each rewrite replaces one line and, when backed by a
 * file, immediately writes the whole sequence through a temp file and rename.
 */
export class LinkFile {
  private lines: readonly LinkEntry[];

  private constructor(
    readonly filePath: string | null,
    lines: readonly LinkEntry[],
    private readonly logger: Logger,
  ) {
    this.lines = lines;
  }

  static async load(filePath: string, logger: Logger): Promise<LinkFile> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new LinksFileError(filePath, { cause: error });
    }
    const lines = parseLines(raw);
    logger.info(`Found ${lines.length} lines in ${filePath}`);
    return new LinkFile(filePath, lines, logger);
  }

  /**
   * Single-URL mode: one entry, never persisted.
   */
  static fromUrl(url: string, logger: Logger): LinkFile {
    return new LinkFile(null, [{ index: 0, text: url, eol: '', url: url.trim() }], logger);
  }

  get entries(): readonly LinkEntry[] {
    return this.lines;
  }

  get persistent(): boolean {
    return this.filePath !== null;
  }

  eligibleEntries(): LinkEntry[] {
    return this.lines.filter((entry) => isEligibleLine(entry.text));
  }

  toString(): string {
    return this.lines.map((entry) => `${entry.text}${entry.eol}`).join('');
  }

  async rewrite(index: number, outcome: DownloadOutcome): Promise<void> {
    const current = this.lines[index];
    if (!current) {
      throw new RangeError(`No line at index ${index}`);
    }

    const updated: LinkEntry = {
      ...current,
      text: formatAnnotation(current.url, outcome),
      eol: current.eol || '\n',
    };
    this.lines = this.lines.map((entry) => (entry.index === index ? updated : entry));

    if (this.filePath !== null) {
      await this.flush(this.filePath);
    }
  }

  private async flush(filePath: string): Promise<void> {
    const tempPath = `${filePath}.tmp`;
    try {
      await fs.writeFile(tempPath, this.toString(), 'utf-8');
      // Atomic replace; never leaves the target missing.
      await fs.rename(tempPath, filePath);
    } catch (error) {
      this.logger.error(`Failed to update links file: ${toErrorMessage(error)}`);
    }
  }
}
