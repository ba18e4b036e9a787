export {
  SOURCE_FILE_PATTERN,
  DEFAULT_ARCHIVE_EXTENSIONS,
  isSourceFileName,
  resolveScanOptions,
} from './base.js';
export type { SourceFile, FileScanResult, ScanOptions, ResolvedScanOptions } from './base.js';
export { diskSource, scanSource, formsFromSources, nsFormForFile, nsFormsForFile } from './file.js';
export { listSourceFiles, scanDirectory, namespaceFormsInDir, namespacesInDir } from './directory.js';
export { isArchive, archiveSources, scanArchive, namespaceFormsInArchive } from './archive.js';
