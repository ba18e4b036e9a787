export { FormReader, readForms, readAllForms, MAX_NESTING_DEPTH } from './reader.js';
export { printForm } from './printer.js';
export { resolveReaderOptions, processReaderOptions, ReaderOptionsSchema } from './options.js';
export type { ReaderOptions } from './options.js';
export * from './forms.js';
