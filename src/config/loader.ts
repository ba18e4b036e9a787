import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigError } from '../errors/index.js';
import { ReaderOptions, processReaderOptions } from '../reader/index.js';
import { ScanOptions } from '../scanners/index.js';
import { parseConfig, Config } from '../schemas/config.js';

export const CONFIG_FILE = '.nsscan.yaml';

/**
 * Load `.nsscan.yaml` from `projectPath`. A missing file yields the defaults.
 *
 * @throws ConfigError on invalid YAML or settings
 */
export function loadConfig(projectPath: string): Config {
  const configPath = join(projectPath, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return parseConfig({});
  }

  let data: unknown;
  try {
    data = yaml.load(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${CONFIG_FILE}: ${message}`);
  }

  try {
    // An empty file loads as undefined
    return parseConfig(data ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      throw new ConfigError(`Invalid ${CONFIG_FILE}: ${issue.path.join('.')}: ${issue.message}`);
    }
    throw error;
  }
}

export function readerOptionsFor(config: Config): ReaderOptions {
  if (!config.reader) return processReaderOptions();
  return Object.freeze({
    readCond: config.reader.read_cond,
    features: Object.freeze([...config.reader.features]),
  });
}

/** Scan options described by a config file. */
export function scanOptionsFor(config: Config): ScanOptions {
  return {
    ignoreUnreadable: config.ignore_unreadable,
    mode: config.mode,
    reader: readerOptionsFor(config),
    exclude: config.scan.exclude,
    archiveExtensions: config.scan.archive_extensions,
  };
}
