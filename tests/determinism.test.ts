import { describe, it, expect } from 'vitest';
import { pathFor, prefixToPath, namespaceForPath } from '../src/namespace/index.js';

describe('Namespace paths', () => {
  it('maps a namespace to a relative source path', () => {
    expect(pathFor('my-app.core')).toBe('my_app/core.clj');
    expect(pathFor('my-app.core', 'cljc')).toBe('my_app/core.cljc');
  });

  it('maps a prefix to a directory', () => {
    expect(prefixToPath('my-app.util')).toBe('my_app/util');
  });

  it('maps a path back to a namespace', () => {
    expect(namespaceForPath('my_app/core.clj')).toBe('my-app.core');
    expect(namespaceForPath('my_app\\core.cljc')).toBe('my-app.core');
  });

  it('round-trips names made of dashes, dots and alphanumerics', () => {
    for (const name of ['a', 'a.b', 'my-app.core-test', 'x1.y-2.z3', 'deeply.nested.name-space.v2']) {
      expect(namespaceForPath(pathFor(name))).toBe(name);
    }
  });
});
