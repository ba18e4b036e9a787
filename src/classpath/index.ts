export {
  splitClasspath,
  classpathEntries,
  fileToNamespaceForms,
  fileToNamespaces,
  namespaceFormsOnClasspath,
  namespacesOnClasspath,
} from './resolver.js';
export type { Classpath, ClasspathScanOptions } from './resolver.js';
