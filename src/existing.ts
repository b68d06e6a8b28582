import type { Dirent } from 'node:fs';
import path from 'node:path';
import fs from 'fs-extra';
import { MediaMetadata, Settings } from './types.js';
import { potentialTitleFromUrl } from './utils.js';

/**
 * Recursively scans a directory for the first file with the given extension whose name
 * contains `needle` (case-insensitive). Files of a directory are checked before its
 * subdirectories; unreadable directories are skipped.
 */
const scanForMatch = async (dirPath: string, extension: string, needle: string): Promise<string | null> => {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch {
    return null;
  }

  const lowered = needle.toLowerCase();
  const subdirectories: string[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      subdirectories.push(path.join(dirPath, entry.name));
    } else if (entry.isFile() && entry.name.endsWith(extension) && entry.name.toLowerCase().includes(lowered)) {
      return path.join(dirPath, entry.name);
    }
  }

  for (const subdirectory of subdirectories) {
    const match = await scanForMatch(subdirectory, extension, needle);
    if (match) {
      return match;
    }
  }

  return null;
};

/**
 * Looks for an already-downloaded file for `url`: first by the probed title, then by the
 * last URL path segment. Matching is a filename substring heuristic, so unrelated files
 * sharing a title fragment count as a hit.
 */
export const findExistingFile = async (
  url: string,
  metadata: MediaMetadata | null,
  settings: Settings,
): Promise<string | null> => {
  if (!settings.behavior.skipExisting) {
    return null;
  }

  const { outputDir } = settings.paths;
  const extension = `.${settings.audio.codec}`;

  const title = metadata?.title ?? '';
  if (title) {
    const byTitle = await scanForMatch(outputDir, extension, title);
    if (byTitle) {
      return byTitle;
    }
  }

  return scanForMatch(outputDir, extension, potentialTitleFromUrl(url));
};
