export * from './errors/index.js';
export * from './reader/index.js';
export * from './namespace/index.js';
export * from './scanners/index.js';
export * from './classpath/index.js';
export { loadConfig, scanOptionsFor, readerOptionsFor, CONFIG_FILE } from './config/index.js';
export { parseConfig, ConfigSchema } from './schemas/config.js';
export type { Config } from './schemas/config.js';
