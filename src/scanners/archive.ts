import AdmZip from 'adm-zip';
import { statSync } from 'fs';
import { extname } from 'path';
import { CorruptArchiveError } from '../errors/index.js';
import { NamespaceForm } from '../namespace/index.js';
import { DEFAULT_ARCHIVE_EXTENSIONS, FileScanResult, ScanOptions, SourceFile, isSourceFileName, resolveScanOptions } from './base.js';
import { formsFromSources, scanSource } from './file.js';

export function isArchive(path: string, archiveExtensions: string[] = DEFAULT_ARCHIVE_EXTENSIONS): boolean {
  const ext = extname(path).toLowerCase();
  if (!archiveExtensions.some(candidate => candidate.toLowerCase() === ext)) return false;
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Open an archive and list its `.clj`/`.cljc` entries in archive order.
 * Entries are read straight from the archive, not the filesystem.
 *
 * @throws CorruptArchiveError if the archive cannot be opened or enumerated
 */
export function archiveSources(archive: string): SourceFile[] {
  let entries: AdmZip.IZipEntry[];
  try {
    entries = new AdmZip(archive).getEntries();
  } catch (error) {
    throw new CorruptArchiveError(archive, { cause: error });
  }

  return entries
    .filter(entry => !entry.isDirectory && isSourceFileName(entry.entryName))
    .map(entry => ({
      path: `${archive}!/${entry.entryName}`,
      read: () => entry.getData().toString('utf-8'),
    }));
}

export function scanArchive(archive: string, options: ScanOptions = {}): FileScanResult[] {
  const { mode, reader, onResult } = resolveScanOptions(options);
  return archiveSources(archive).map(source => {
    const result = scanSource(source, mode, reader);
    onResult?.(result);
    return result;
  });
}

/**
 * Namespace forms in an archive's source entries. A corrupt archive is
 * always an error, whatever `ignoreUnreadable` says.
 */
export function namespaceFormsInArchive(archive: string, options: ScanOptions = {}): NamespaceForm[] {
  const resolved = resolveScanOptions(options);
  return formsFromSources(archiveSources(archive), resolved);
}
