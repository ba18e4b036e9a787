import { statSync } from 'fs';
import { delimiter, join } from 'path';
import { NamespaceForm, prefixToPath } from '../namespace/index.js';
import { ScanOptions, isArchive, namespaceFormsInArchive, namespaceFormsInDir, resolveScanOptions } from '../scanners/index.js';

/** A classpath as a delimiter-separated string or a list of entries. */
export type Classpath = string | readonly string[];

export interface ClasspathScanOptions extends ScanOptions {
  /** Defaults to `process.env.CLASSPATH`, read at call time */
  classpath?: Classpath;
  /** Only return namespaces whose name starts with this prefix */
  prefix?: string;
}

export function splitClasspath(classpath: string): string[] {
  return classpath.split(delimiter).filter(entry => entry !== '');
}

export function classpathEntries(classpath?: Classpath): string[] {
  const value = classpath ?? process.env.CLASSPATH ?? '';
  return typeof value === 'string' ? splitClasspath(value) : [...value];
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Map one classpath entry to the namespace forms it contains.
 *
 * For a directory, `prefix` narrows the walk to the matching subdirectory,
 * which can save a lot of work on large source trees. For an archive, the
 * whole archive is scanned and forms are filtered by name. Other entries
 * contribute nothing.
 */
export function fileToNamespaceForms(prefix: string | undefined, entry: string, options: ScanOptions = {}): NamespaceForm[] {
  const resolved = resolveScanOptions(options);

  if (isDirectory(entry)) {
    const root = prefix ? join(entry, prefixToPath(prefix)) : entry;
    return namespaceFormsInDir(root, resolved);
  }

  if (isArchive(entry, resolved.archiveExtensions)) {
    const forms = namespaceFormsInArchive(entry, resolved);
    // Matched against the symbol's name, without any namespace qualifier
    return prefix ? forms.filter(form => form.symbol.name.startsWith(prefix)) : forms;
  }

  return [];
}

export function fileToNamespaces(prefix: string | undefined, entry: string, options: ScanOptions = {}): string[] {
  return fileToNamespaceForms(prefix, entry, options).map(form => form.name);
}

/**
 * Namespace forms on the classpath, in classpath order, from both
 * directories and archives.
 */
export function namespaceFormsOnClasspath(options: ClasspathScanOptions = {}): NamespaceForm[] {
  const { classpath, prefix, ...scanOptions } = options;
  return classpathEntries(classpath).flatMap(entry => fileToNamespaceForms(prefix, entry, scanOptions));
}

/** Names of the namespaces on the classpath; see `namespaceFormsOnClasspath`. */
export function namespacesOnClasspath(options: ClasspathScanOptions = {}): string[] {
  return namespaceFormsOnClasspath(options).map(form => form.name);
}
