import { ReaderError } from '../errors/index.js';
import { Form, ListForm, SymbolForm, isList, isSymbol, list, sym, symbolText } from '../reader/index.js';

export type NamespaceKind = 'ns' | 'in-ns';

/**
 * A namespace declaration in canonical `(kind symbol ...rest)` shape.
 * For `in-ns`, the quote around the symbol has already been removed.
 */
export interface NamespaceForm {
  kind: NamespaceKind;
  symbol: SymbolForm;
  /** Full symbol text, e.g. `my-app.core` */
  name: string;
  rest: Form[];
}

/** `first` stops reading at the first namespace form; `all` reads the whole file. */
export type ScanMode = 'first' | 'all';

export interface ExtractionResult {
  forms: NamespaceForm[];
  /** Set when reading stopped on malformed input */
  error?: ReaderError;
}

function dropQuote(form: Form | undefined): Form | undefined {
  if (isList(form) && form.items.length === 2 && isSymbol(form.items[0], 'quote')) {
    return form.items[1];
  }
  return form;
}

/**
 * Normalize a top-level form into a namespace form.
 * Returns undefined for anything that is not `(ns sym ...)` or
 * `(in-ns sym ...)`/`(in-ns 'sym ...)`, including declarations whose
 * target is not a symbol.
 */
export function toNamespaceForm(form: Form): NamespaceForm | undefined {
  if (!isList(form)) return undefined;
  const [head, target, ...rest] = form.items;
  if (!isSymbol(head) || head.ns !== undefined) return undefined;
  const kind = head.name;
  if (kind !== 'ns' && kind !== 'in-ns') return undefined;

  const symbol = kind === 'in-ns' ? dropQuote(target) : target;
  if (!isSymbol(symbol)) return undefined;

  return { kind, symbol, name: symbolText(symbol), rest };
}

/**
 * Walk `forms` in order, keeping namespace forms, until `shouldStop` returns
 * true for what has been found so far. A `ReaderError` thrown by the form
 * source ends the walk; the forms found before it are kept.
 */
export function collectNamespaceForms(
  forms: Iterable<Form>,
  shouldStop: (found: readonly NamespaceForm[]) => boolean,
): ExtractionResult {
  const found: NamespaceForm[] = [];
  try {
    for (const form of forms) {
      const nsForm = toNamespaceForm(form);
      if (!nsForm) continue;
      found.push(nsForm);
      if (shouldStop(found)) break;
    }
  } catch (error) {
    if (error instanceof ReaderError) {
      return { forms: found, error };
    }
    throw error;
  }
  return { forms: found };
}

const STOP_CONDITIONS: Record<ScanMode, (found: readonly NamespaceForm[]) => boolean> = {
  first: found => found.length > 0,
  all: () => false,
};

export function extractNamespaceForms(forms: Iterable<Form>, mode: ScanMode): ExtractionResult {
  return collectNamespaceForms(forms, STOP_CONDITIONS[mode]);
}

/** Turn a namespace form back into a list, e.g. for printing. */
export function namespaceFormToForm(nsForm: NamespaceForm): ListForm {
  return list([sym(nsForm.kind), nsForm.symbol, ...nsForm.rest]);
}
