import { mkdtempSync, mkdirSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import AdmZip from 'adm-zip';
import type { ReaderOptions } from '../src/reader/index.js';

export const CLJ_READER: ReaderOptions = { readCond: 'allow', features: ['clj'] };

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'nsscan-'));
}

/** Write files given as relative path -> content under `root`. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = join(root, relPath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

/** Build a zip archive at `path`. Give entries in name order. */
export function writeJar(path: string, entries: Record<string, string>): string {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'));
  }
  writeFileSync(path, zip.toBuffer());
  return path;
}
