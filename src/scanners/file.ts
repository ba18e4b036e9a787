import { readFileSync } from 'fs';
import { ScanError } from '../errors/index.js';
import { NamespaceForm, ScanMode, extractNamespaceForms } from '../namespace/index.js';
import { ReaderOptions, readForms } from '../reader/index.js';
import { FileScanResult, ResolvedScanOptions, ScanOptions, SourceFile, resolveScanOptions } from './base.js';

export function diskSource(path: string): SourceFile {
  return {
    path,
    read: () => readFileSync(path, 'utf-8'),
  };
}

/**
 * Scan one source file for namespace forms. Never throws for problems with
 * the file itself; those come back as an `unreadable` result.
 */
export function scanSource(source: SourceFile, mode: ScanMode, reader: ReaderOptions): FileScanResult {
  let text: string;
  try {
    text = source.read();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      status: 'unreadable',
      path: source.path,
      forms: [],
      error: new ScanError(`Cannot read ${source.path}: ${message}`, source.path, { cause: error }),
    };
  }

  const { forms, error } = extractNamespaceForms(readForms(text, reader), mode);
  if (error) {
    return {
      status: 'unreadable',
      path: source.path,
      forms,
      error: new ScanError(`Cannot parse ${source.path}: ${error.message}`, source.path, { cause: error }),
    };
  }
  return { status: 'ok', path: source.path, forms };
}

/**
 * Scan sources in order and concatenate their namespace forms.
 * In strict mode the first unreadable file aborts the scan.
 */
export function formsFromSources(sources: Iterable<SourceFile>, options: ResolvedScanOptions): NamespaceForm[] {
  const forms: NamespaceForm[] = [];
  for (const source of sources) {
    const result = scanSource(source, options.mode, options.reader);
    options.onResult?.(result);
    if (result.status === 'unreadable' && !options.ignoreUnreadable) {
      throw result.error;
    }
    forms.push(...result.forms);
  }
  return forms;
}

function scanFile(path: string, mode: ScanMode, options: ScanOptions): FileScanResult {
  const resolved = resolveScanOptions(options);
  const result = scanSource(diskSource(path), mode, resolved.reader);
  resolved.onResult?.(result);
  if (result.status === 'unreadable' && !resolved.ignoreUnreadable) {
    throw result.error;
  }
  return result;
}

/**
 * Returns all namespace forms in the given file.
 * Returns an empty array if there are none, and undefined if the file was
 * unreadable before any form was found (lenient mode only).
 *
 * @throws ScanError if the file is unreadable and `ignoreUnreadable` is false
 */
export function nsFormsForFile(path: string, options: Omit<ScanOptions, 'mode'> = {}): NamespaceForm[] | undefined {
  const result = scanFile(path, 'all', options);
  if (result.status === 'unreadable' && result.forms.length === 0) return undefined;
  return result.forms;
}

/**
 * Returns the first namespace form in the given file, or undefined if there
 * is none or the file was unreadable (lenient mode only).
 *
 * @throws ScanError if the file is unreadable and `ignoreUnreadable` is false
 */
export function nsFormForFile(path: string, options: Omit<ScanOptions, 'mode'> = {}): NamespaceForm | undefined {
  return scanFile(path, 'first', options).forms[0];
}
