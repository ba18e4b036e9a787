export { CONFIG_FILE, loadConfig, readerOptionsFor, scanOptionsFor } from './loader.js';
