import { ScanError } from '../errors/index.js';
import { NamespaceForm, ScanMode } from '../namespace/index.js';
import { ReaderOptions, processReaderOptions } from '../reader/index.js';

/**
 * A file that can be scanned: a file on disk or an entry inside an archive.
 */
export interface SourceFile {
  /** Display path; archive entries use `archive.jar!/entry/name.clj` */
  readonly path: string;
  /** Read the whole text. Any handle opened here is closed before returning. */
  read(): string;
}

/**
 * Outcome of scanning one source file.
 */
export type FileScanResult =
  | { status: 'ok'; path: string; forms: NamespaceForm[] }
  | {
      status: 'unreadable';
      path: string;
      /** Forms read before the failure */
      forms: NamespaceForm[];
      error: ScanError;
    };

export interface ScanOptions {
  /** Skip unreadable files instead of throwing their ScanError (default true) */
  ignoreUnreadable?: boolean;
  /** Default `first`: one namespace form per file */
  mode?: ScanMode;
  /** Defaults to `processReaderOptions()` */
  reader?: ReaderOptions;
  /** minimatch globs, matched against paths relative to a scanned directory */
  exclude?: string[];
  /** File extensions treated as archives (default `['.jar']`) */
  archiveExtensions?: string[];
  /** Called once per scanned file, before strict mode throws */
  onResult?: (result: FileScanResult) => void;
}

export type ResolvedScanOptions = Required<Omit<ScanOptions, 'onResult'>> & Pick<ScanOptions, 'onResult'>;

export const DEFAULT_ARCHIVE_EXTENSIONS = ['.jar'];

/** `.clj` host sources and `.cljc` portable sources. */
export const SOURCE_FILE_PATTERN = /^.*\.cljc?$/;

export function isSourceFileName(name: string): boolean {
  return SOURCE_FILE_PATTERN.test(name);
}

export function resolveScanOptions(options: ScanOptions = {}): ResolvedScanOptions {
  return {
    ignoreUnreadable: options.ignoreUnreadable ?? true,
    mode: options.mode ?? 'first',
    reader: options.reader ?? processReaderOptions(),
    exclude: options.exclude ?? [],
    archiveExtensions: options.archiveExtensions ?? DEFAULT_ARCHIVE_EXTENSIONS,
    onResult: options.onResult,
  };
}
