import { describe, it, expect } from 'vitest';
import { parseConfig } from '../src/schemas/config.js';
import { resolveReaderOptions } from '../src/reader/index.js';
import { ConfigError } from '../src/errors/index.js';

describe('Schemas', () => {
  it('validates a full config', () => {
    const valid = {
      version: '1.0.0',
      classpath: ['src', 'test'],
      prefix: 'my-app',
      ignore_unreadable: true,
      mode: 'all',
      scan: { exclude: ['**/scratch/**'], archive_extensions: ['.jar', '.zip'] },
      reader: { read_cond: 'allow', features: ['clj', 'bb'] },
    };
    expect(() => parseConfig(valid)).not.toThrow();
  });

  it('rejects archive extensions without a dot', () => {
    expect(() => parseConfig({ scan: { archive_extensions: ['jar'] } })).toThrow();
  });

  it('rejects an unknown scan mode', () => {
    expect(() => parseConfig({ mode: 'some' })).toThrow();
  });
});

describe('Reader options from the environment', () => {
  it('defaults to allowing conditionals for clj', () => {
    expect(resolveReaderOptions({})).toEqual({ readCond: 'allow', features: ['clj'] });
  });

  it('reads mode and features', () => {
    const options = resolveReaderOptions({ NSSCAN_READ_COND: 'disallow', NSSCAN_FEATURES: ':clj, cljs' });
    expect(options).toEqual({ readCond: 'disallow', features: ['clj', 'cljs'] });
  });

  it('returns a frozen value', () => {
    const options = resolveReaderOptions({});
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.features)).toBe(true);
  });

  it('rejects an unknown read mode', () => {
    expect(() => resolveReaderOptions({ NSSCAN_READ_COND: 'maybe' })).toThrow(ConfigError);
  });
});
