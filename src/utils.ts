import fs from 'fs-extra';
import { DirectoryError } from './errors.js';

export const COMMENT_MARKER = '#';
export const UNKNOWN_TITLE = 'Unknown Title';

/**
 * Ensures the output directory exists so downloaded audio has a target path.
 * Returns true when the directory had to be created.
 */
export const ensureOutputDir = async (directory: string): Promise<boolean> => {
  try {
    const existed = await fs.pathExists(directory);
    await fs.ensureDir(directory);
    return !existed;
  } catch (error) {
    throw new DirectoryError(directory, { cause: error });
  }
};

/**
 * Detects whether a string starts with an http(s) scheme prefix.
 */
export const isHttpUrl = (input: string): boolean =>
  input.startsWith('https://') || input.startsWith('http://');

/**
 * Derives a title guess from the last path segment of a URL, ignoring trailing slashes.
 */
export const potentialTitleFromUrl = (url: string): string => {
  const trimmed = url.replace(/\/+$/u, '');
  const segments = trimmed.split('/');
  return segments[segments.length - 1] ?? '';
};

/**
 * Formats a byte count as megabytes with two decimals.
 */
export const formatMegabytes = (bytes: number): string => (bytes / (1024 * 1024)).toFixed(2);
