export class NsscanError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NsscanError';
  }
}

export class ConfigError extends NsscanError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Malformed source text. Line and column are 1-based and point at the
 * character where reading failed.
 */
export class ReaderError extends NsscanError {
  constructor(message: string, public readonly line: number, public readonly column: number) {
    super(`${message} (line ${line}, column ${column})`, 'READER_ERROR');
    this.name = 'ReaderError';
  }
}

export class ScanError extends NsscanError {
  constructor(message: string, public readonly file?: string, options?: { cause?: unknown }) {
    super(message, 'SCAN_ERROR', options);
    this.name = 'ScanError';
  }
}

export class CorruptArchiveError extends NsscanError {
  constructor(public readonly archive: string, options?: { cause?: unknown }) {
    super(`archive file corrupt: ${archive}`, 'CORRUPT_ARCHIVE', options);
    this.name = 'CorruptArchiveError';
  }
}

// Exit code mapping
const EXIT_CODES: Record<string, number> = {
  ConfigError: 10,
  ReaderError: 30,
  ScanError: 40,
  CorruptArchiveError: 50,
  NsscanError: 1,
};

export function exitCodeFor(err: Error): number {
  return EXIT_CODES[err.name] ?? 1;
}

export function formatError(err: Error, format: 'json' | 'text' = 'text'): string {
  const exitCode = exitCodeFor(err);

  if (format === 'json') {
    return JSON.stringify({
      error: err.name,
      message: err.message,
      exitCode,
      ...(err instanceof ScanError && err.file ? { file: err.file } : {}),
      ...(err instanceof CorruptArchiveError ? { file: err.archive } : {}),
    }, null, 2);
  }

  return `Error [${err.name}]: ${err.message}`;
}
