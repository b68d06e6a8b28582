import { FetchErrorKind } from './types.js';

interface ErrorOptionsWithCause {
  readonly cause?: unknown;
}

/**
 * Raised by the media adapter when a download fails; `kind` drives the annotation tag.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;

  constructor(message: string, kind: FetchErrorKind = 'Generic', options?: ErrorOptionsWithCause) {
    super(message, options);
    this.name = 'FetchError';
    this.kind = kind;
  }
}

/**
 * The output directory could not be created. Fatal for the run.
 */
export class DirectoryError extends Error {
  constructor(readonly directory: string, options?: ErrorOptionsWithCause) {
    super(`Failed to create output directory ${directory}`, options);
    this.name = 'DirectoryError';
  }
}

/**
 * The links file could not be read. Fatal in links-file mode.
 */
export class LinksFileError extends Error {
  constructor(readonly filePath: string, options?: ErrorOptionsWithCause) {
    super(`Error reading links file ${filePath}`, options);
    this.name = 'LinksFileError';
  }
}

/**
 * The config file was unreadable or malformed. Always recovered with defaults.
 */
export class ConfigError extends Error {
  constructor(readonly configPath: string, message: string, options?: ErrorOptionsWithCause) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Message of an Error, or the value itself as text.
 */
export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Maps extractor error text onto an error kind. HTTP and URL errors win over the
 * generic extraction failure message that usually accompanies them.
 */
export const classifyFetchMessage = (message: string): FetchErrorKind => {
  if (message.includes('HTTP Error 404')) {
    return 'NotFound';
  }
  if (message.includes('HTTP Error 403')) {
    return 'Forbidden';
  }
  if (message.includes('Unsupported URL')) {
    return 'UnsupportedUrl';
  }
  return 'Generic';
};

/**
 * Kind of a failed fetch: taken from a FetchError, otherwise read from the message.
 */
export const classifyFetchError = (error: unknown): FetchErrorKind =>
  error instanceof FetchError ? error.kind : classifyFetchMessage(toErrorMessage(error));
