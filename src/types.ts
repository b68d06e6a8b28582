export interface AudioSettings {
  readonly codec: string;
  readonly quality: string;
  readonly sampleRate: string;
}

export interface PathSettings {
  readonly linksFile: string;
  readonly outputDir: string;
  readonly logFile: string;
}

export interface BehaviorSettings {
  readonly skipExisting: boolean;
  readonly progressUpdateInterval: number;
  readonly quietDownload: boolean;
}

export interface LoggingSettings {
  readonly level: string;
  readonly consoleLevel: string;
}

export interface DownloaderSettings {
  readonly binaryPath: string;
  readonly ffmpegLocation?: string;
}

export interface Settings {
  readonly audio: AudioSettings;
  readonly paths: PathSettings;
  readonly behavior: BehaviorSettings;
  readonly logging: LoggingSettings;
  readonly downloader: DownloaderSettings;
}

export interface LinkEntry {
  readonly index: number;
  readonly text: string;
  readonly eol: string;
  readonly url: string;
}

export type FetchErrorKind = 'NotFound' | 'Forbidden' | 'UnsupportedUrl' | 'ExtractionFailure' | 'Generic';

export type DownloadOutcome =
  | { readonly status: 'success'; readonly title: string }
  | { readonly status: 'skipped'; readonly existingFilePath: string }
  | { readonly status: 'error'; readonly kind: FetchErrorKind; readonly detail: string };

export interface RunStatistics {
  processed: number;
  success: number;
  skipped: number;
  error: number;
}

export interface MediaMetadata {
  readonly title?: string;
  readonly duration?: number;
  readonly filesize?: number;
}

export type ProgressEvent =
  | { readonly status: 'downloading'; readonly percent: string }
  | { readonly status: 'finished' }
  | { readonly status: 'error' };

export interface FetchOptions {
  readonly format: string;
  readonly outputTemplate: string;
  readonly codec: string;
  readonly quality: string;
  readonly sampleRate: string;
  readonly quiet: boolean;
  readonly noPlaylist: boolean;
  readonly ffmpegLocation?: string;
}

/**
 * Narrow contract of the external extractor/downloader.
 */
export interface MediaAdapter {
  probe(url: string, options: FetchOptions): Promise<MediaMetadata | null>;
  fetch(url: string, options: FetchOptions, onProgress: (event: ProgressEvent) => void): Promise<MediaMetadata>;
}

export interface ProgressReporter {
  progress(url: string, percent: number): void;
  finished(url: string): void;
  failed(url: string): void;
}
