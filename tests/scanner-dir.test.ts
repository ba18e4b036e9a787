import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync, symlinkSync } from 'fs';
import { join } from 'path';
import {
  listSourceFiles, scanDirectory, namespaceFormsInDir, namespacesInDir, FileScanResult,
} from '../src/scanners/index.js';
import { ScanError } from '../src/errors/index.js';
import { CLJ_READER, makeTempDir, writeTree } from './helpers.js';

describe('Directory Walker', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeTree(root, {
      'a/b.clj': `(ns a.b "Doc.") (in-ns 'a.c)`,
      'a/d.cljc': '(ns a.d)',
      'a/notes.txt': '(ns a.notes)',
      'a/util.clj': '(def helper 1)',
      'e.clj': '(ns e)',
      'e.cljs': '(ns e.browser)',
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists only .clj and .cljc files, in pre-order', () => {
    expect(listSourceFiles(root)).toEqual([
      join(root, 'a', 'b.clj'),
      join(root, 'a', 'd.cljc'),
      join(root, 'a', 'util.clj'),
      join(root, 'e.clj'),
    ]);
  });

  it('returns the first namespace of each qualifying file', () => {
    expect(namespacesInDir(root, { reader: CLJ_READER })).toEqual(['a.b', 'a.d', 'e']);
  });

  it('returns every namespace form in all mode', () => {
    const forms = namespaceFormsInDir(root, { reader: CLJ_READER, mode: 'all' });
    expect(forms.map(f => f.name)).toEqual(['a.b', 'a.c', 'a.d', 'e']);
  });

  it('reports one result per qualifying file', () => {
    const results = scanDirectory(root, { reader: CLJ_READER });
    expect(results.map(r => r.status)).toEqual(['ok', 'ok', 'ok', 'ok']);
    expect(results.map(r => r.forms.length)).toEqual([1, 1, 0, 1]);
  });

  it('applies exclude globs relative to the directory', () => {
    expect(namespacesInDir(root, { reader: CLJ_READER, exclude: ['a/d.cljc'] })).toEqual(['a.b', 'e']);
    expect(namespacesInDir(root, { reader: CLJ_READER, exclude: ['**/*.cljc'] })).toEqual(['a.b', 'e']);
    expect(namespacesInDir(root, { reader: CLJ_READER, exclude: ['a'] })).toEqual(['e']);
  });

  it('returns nothing for a missing directory', () => {
    expect(namespacesInDir(join(root, 'missing'))).toEqual([]);
  });

  it('visits each real directory once', () => {
    symlinkSync(root, join(root, 'loop'), 'dir');
    expect(namespacesInDir(root, { reader: CLJ_READER })).toEqual(['a.b', 'a.d', 'e']);
  });

  it('skips a file nested too deeply to read and scans the rest', () => {
    writeTree(root, { 'd/deep.clj': '('.repeat(8000) });
    expect(namespacesInDir(root, { reader: CLJ_READER })).toEqual(['a.b', 'a.d', 'e']);
    const results = scanDirectory(root, { reader: CLJ_READER });
    expect(results.map(r => r.status)).toEqual(['ok', 'ok', 'ok', 'unreadable', 'ok']);
  });

  describe('unreadable files', () => {
    beforeEach(() => {
      writeTree(root, { 'c/broken.clj': '(ns c.broken' });
    });

    it('skips them in lenient mode', () => {
      expect(namespacesInDir(root, { reader: CLJ_READER })).toEqual(['a.b', 'a.d', 'e']);
    });

    it('reports them as unreadable', () => {
      const seen: FileScanResult[] = [];
      namespacesInDir(root, { reader: CLJ_READER, onResult: r => seen.push(r) });
      const unreadable = seen.filter(r => r.status === 'unreadable').map(r => r.path);
      expect(unreadable).toEqual([join(root, 'c', 'broken.clj')]);
    });

    it('aborts the scan in strict mode', () => {
      const seen: string[] = [];
      expect(() => namespacesInDir(root, {
        reader: CLJ_READER,
        ignoreUnreadable: false,
        onResult: r => seen.push(r.path),
      })).toThrow(ScanError);
      // e.clj comes after c/broken.clj and is never scanned
      expect(seen).not.toContain(join(root, 'e.clj'));
    });
  });
});
