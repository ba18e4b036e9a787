import { describe, it, expect, beforeEach, afterEach, vi, MockInstance } from 'vitest';
import { rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createProgram } from '../src/program.js';
import { CONFIG_FILE } from '../src/config/index.js';
import { makeTempDir, writeJar, writeTree } from './helpers.js';

class ExitCalled extends Error {
  constructor(public readonly exitCode: number | string | null | undefined) {
    super(`process.exit(${exitCode})`);
  }
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

describe('CLI', () => {
  let root: string;
  let log: MockInstance<typeof console.log>;
  let exit: MockInstance<typeof process.exit>;

  beforeEach(() => {
    root = makeTempDir();
    writeTree(root, {
      'src/a/b.clj': `(ns a.b "Doc.")\n(in-ns 'a.c)\n`,
      'src/a/plain.clj': '(ns a.plain)\n',
      'src/broken.clj': '(ns broken\n',
    });
    writeJar(join(root, 'dep.jar'), { 'lib/core.clj': '(ns lib.core (:require [a.b]))' });
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    exit = vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new ExitCalled(code);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  function printed(): string[] {
    return log.mock.calls.map(call => String(call[0]));
  }

  describe('list', () => {
    it('prints namespace names from the given entries', async () => {
      await run('list', join(root, 'src'), join(root, 'dep.jar'), '--dir', root);
      expect(printed()).toEqual(['a.b', 'a.plain', 'lib.core']);
    });

    it('filters by prefix', async () => {
      await run('list', join(root, 'src'), join(root, 'dep.jar'), '--prefix', 'lib', '--dir', root);
      expect(printed()).toEqual(['lib.core']);
    });

    it('includes later declarations with --all', async () => {
      await run('list', join(root, 'src'), '--all', '--dir', root);
      expect(printed()).toEqual(['a.b', 'a.c', 'a.plain']);
    });

    it('prints whole forms as JSON', async () => {
      await run('list', join(root, 'dep.jar'), '--forms', '--json', '--dir', root);
      expect(JSON.parse(printed()[0])).toEqual(['(ns lib.core (:require [a.b]))']);
    });

    describe('with a config file', () => {
      // The working directory of the test run is not `root`, so relative
      // entries only resolve if they are taken relative to --dir.
      it('reads the classpath relative to the project directory', async () => {
        writeFileSync(join(root, CONFIG_FILE), 'classpath: [src, dep.jar]\n');
        await run('list', '--dir', root);
        expect(printed()).toEqual(['a.b', 'a.plain', 'lib.core']);
      });

      it('applies the configured prefix and mode', async () => {
        writeFileSync(join(root, CONFIG_FILE), 'classpath: [src, dep.jar]\nprefix: a\nmode: all\n');
        await run('list', '--dir', root);
        expect(printed()).toEqual(['a.b', 'a.c', 'a.plain']);
      });

      it('lets the command line override the configured prefix and classpath', async () => {
        writeFileSync(join(root, CONFIG_FILE), 'classpath: [src]\nprefix: a\n');
        await run('list', join(root, 'dep.jar'), '--prefix', 'lib', '--dir', root);
        expect(printed()).toEqual(['lib.core']);
      });

      it('applies the configured strictness', async () => {
        writeFileSync(join(root, CONFIG_FILE), 'classpath: [src]\nignore_unreadable: false\n');
        await expect(run('list', '--dir', root)).rejects.toThrow(ExitCalled);
        expect(exit).toHaveBeenCalledWith(40);
      });
    });

    it('exits with the scan error code in strict mode', async () => {
      await expect(run('list', join(root, 'src'), '--strict', '--dir', root)).rejects.toThrow(ExitCalled);
      expect(exit).toHaveBeenCalledWith(40);
    });
  });

  describe('file', () => {
    it('prints the first namespace form', async () => {
      await run('file', join(root, 'src', 'a', 'b.clj'));
      expect(printed()).toEqual(['(ns a.b "Doc.")']);
    });

    it('prints every form with --all as JSON', async () => {
      await run('file', join(root, 'src', 'a', 'b.clj'), '--all', '--json');
      expect(JSON.parse(printed()[0])).toEqual([
        { kind: 'ns', name: 'a.b', form: '(ns a.b "Doc.")' },
        { kind: 'in-ns', name: 'a.c', form: '(in-ns a.c)' },
      ]);
    });
  });

  describe('path-for', () => {
    it('prints the relative path of a namespace', async () => {
      await run('path-for', 'my-app.core');
      expect(printed()).toEqual(['my_app/core.clj']);
    });

    it('takes another extension', async () => {
      await run('path-for', 'my-app.core', '--ext', '.cljc');
      expect(printed()).toEqual(['my_app/core.cljc']);
    });
  });

  describe('doc', () => {
    it('prints the namespace docstring', async () => {
      await run('doc', join(root, 'src', 'a', 'b.clj'));
      expect(printed()).toEqual(['Doc.']);
    });

    it('prints nothing for a namespace without a docstring', async () => {
      await run('doc', join(root, 'src', 'a', 'plain.clj'));
      expect(printed()).toEqual([]);
    });

    it('fails on an unreadable file', async () => {
      await expect(run('doc', join(root, 'src', 'broken.clj'))).rejects.toThrow(ExitCalled);
      expect(exit).toHaveBeenCalledWith(40);
    });
  });
});
