import { MapForm, kw, mapAssoc, mapGet, mapMerge } from '../reader/index.js';
import { NamespaceForm } from './extract.js';

/**
 * Metadata the `ns` macro would attach to the namespace symbol:
 * the symbol's reader metadata, then `:doc` from a docstring, then the
 * attr-map, each overriding the previous.
 */
export function namespaceMetadata(nsForm: NamespaceForm): MapForm | undefined {
  if (nsForm.kind !== 'ns') return undefined;

  let meta = nsForm.symbol.meta;
  let rest = nsForm.rest;

  const [docstring] = rest;
  if (docstring?.kind === 'string') {
    meta = mapAssoc(meta ?? { kind: 'map', items: [] }, kw('doc'), docstring);
    rest = rest.slice(1);
  }

  const [attrMap] = rest;
  if (attrMap?.kind === 'map') {
    meta = mapMerge(meta, attrMap);
  }

  return meta;
}

/**
 * Docstring of a namespace form, found without evaluating it. Only string
 * literals count; `in-ns` forms never have one.
 */
export function docFromNsForm(nsForm: NamespaceForm): string | undefined {
  const meta = namespaceMetadata(nsForm);
  if (!meta) return undefined;
  const doc = mapGet(meta, kw('doc'));
  return doc?.kind === 'string' ? doc.value : undefined;
}
