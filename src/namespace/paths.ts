/**
 * Path of a namespace relative to a classpath root, e.g.
 * `my-app.core` -> `my_app/core.clj`.
 */
export function pathFor(namespace: string, extension = 'clj'): string {
  return `${prefixToPath(namespace)}.${extension}`;
}

/** Directory for a namespace prefix: `my-app.util` -> `my_app/util`. */
export function prefixToPath(prefix: string): string {
  return prefix.replace(/-/g, '_').replace(/\./g, '/');
}

/** Inverse of `pathFor`: `my_app/core.clj` -> `my-app.core`. */
export function namespaceForPath(relativePath: string): string {
  const normalized = relativePath.replace(/\\/g, '/');
  const slash = normalized.lastIndexOf('/');
  const dot = normalized.lastIndexOf('.');
  const withoutExt = dot > slash ? normalized.slice(0, dot) : normalized;
  return withoutExt.replace(/\//g, '.').replace(/_/g, '-');
}
