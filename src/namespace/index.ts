export {
  toNamespaceForm,
  collectNamespaceForms,
  extractNamespaceForms,
  namespaceFormToForm,
} from './extract.js';
export type { NamespaceForm, NamespaceKind, ScanMode, ExtractionResult } from './extract.js';
export { pathFor, prefixToPath, namespaceForPath } from './paths.js';
export { docFromNsForm, namespaceMetadata } from './doc.js';
