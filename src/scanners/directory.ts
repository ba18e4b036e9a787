import { accessSync, constants, readdirSync, realpathSync, statSync, Stats } from 'fs';
import { basename, join, relative, sep } from 'path';
import { Minimatch } from 'minimatch';
import { NamespaceForm } from '../namespace/index.js';
import { FileScanResult, ScanOptions, isSourceFileName, resolveScanOptions } from './base.js';
import { diskSource, formsFromSources, scanSource } from './file.js';

function statOrUndefined(path: string): Stats | undefined {
  try {
    return statSync(path);
  } catch {
    // missing paths and dangling symlinks are not part of the tree
    return undefined;
  }
}

function isReadable(path: string): boolean {
  try {
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * List the readable `.clj`/`.cljc` files under `root` in pre-order, with the
 * entries of each directory visited in name order. Symlinked directories are
 * followed once per real path. A missing root yields no files.
 */
export function listSourceFiles(root: string, exclude: string[] = []): string[] {
  const matchers = exclude.map(pattern => new Minimatch(pattern, { dot: true }));
  const visited = new Set<string>();
  const files: string[] = [];

  const isExcluded = (path: string): boolean => {
    // globs always use forward slashes
    const rel = relative(root, path).split(sep).join('/');
    return rel !== '' && matchers.some(m => m.match(rel));
  };

  const walk = (path: string): void => {
    const stats = statOrUndefined(path);
    if (!stats || isExcluded(path)) return;

    if (stats.isFile()) {
      if (isSourceFileName(basename(path)) && isReadable(path)) files.push(path);
      return;
    }
    if (!stats.isDirectory()) return;

    const real = realpathSync(path);
    if (visited.has(real)) return;
    visited.add(real);

    let names: string[];
    try {
      names = readdirSync(path).sort();
    } catch {
      // unlistable directories contribute nothing
      return;
    }
    for (const name of names) {
      walk(join(path, name));
    }
  };

  walk(root);
  return files;
}

/** Scan every source file under `dir`, reporting each file's outcome. */
export function scanDirectory(dir: string, options: ScanOptions = {}): FileScanResult[] {
  const { mode, reader, exclude, onResult } = resolveScanOptions(options);
  return listSourceFiles(dir, exclude).map(path => {
    const result = scanSource(diskSource(path), mode, reader);
    onResult?.(result);
    return result;
  });
}

/**
 * Return the namespace forms found in source files under `dir`: by default
 * the first form of each file, in traversal order.
 */
export function namespaceFormsInDir(dir: string, options: ScanOptions = {}): NamespaceForm[] {
  const resolved = resolveScanOptions(options);
  return formsFromSources(listSourceFiles(dir, resolved.exclude).map(diskSource), resolved);
}

export function namespacesInDir(dir: string, options: ScanOptions = {}): string[] {
  return namespaceFormsInDir(dir, options).map(form => form.name);
}
