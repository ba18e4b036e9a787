/**
 * Syntax tree produced by the reader. Only data is represented here; nothing
 * is ever resolved or evaluated.
 */
export type Form =
  | SymbolForm
  | KeywordForm
  | StringForm
  | NumberForm
  | CharForm
  | BooleanForm
  | NilForm
  | RegexForm
  | ListForm
  | VectorForm
  | MapForm
  | SetForm
  | TaggedForm;

export interface SymbolForm {
  kind: 'symbol';
  /** Namespace part of a qualified symbol (`foo` in `foo/bar`) */
  ns?: string;
  name: string;
  meta?: MapForm;
}

export interface KeywordForm {
  kind: 'keyword';
  ns?: string;
  name: string;
  /** True for `::kw`, which would be resolved against the current namespace */
  auto: boolean;
}

export interface StringForm {
  kind: 'string';
  value: string;
}

export interface NumberForm {
  kind: 'number';
  /** Source text, kept as written so big and ratio literals survive */
  text: string;
}

export interface CharForm {
  kind: 'char';
  value: string;
}

export interface BooleanForm {
  kind: 'boolean';
  value: boolean;
}

export interface NilForm {
  kind: 'nil';
}

export interface RegexForm {
  kind: 'regex';
  source: string;
}

export interface ListForm {
  kind: 'list';
  items: Form[];
  meta?: MapForm;
}

export interface VectorForm {
  kind: 'vector';
  items: Form[];
  meta?: MapForm;
}

/** Keys and values alternate in `items`. */
export interface MapForm {
  kind: 'map';
  items: Form[];
  meta?: MapForm;
}

export interface SetForm {
  kind: 'set';
  items: Form[];
  meta?: MapForm;
}

export interface TaggedForm {
  kind: 'tagged';
  tag: SymbolForm;
  form: Form;
}

export type MetaCarrier = SymbolForm | ListForm | VectorForm | MapForm | SetForm;

export function sym(text: string): SymbolForm {
  const slash = text.indexOf('/');
  if (slash > 0 && text !== '/') {
    return { kind: 'symbol', ns: text.slice(0, slash), name: text.slice(slash + 1) };
  }
  return { kind: 'symbol', name: text };
}

export function kw(text: string): KeywordForm {
  const slash = text.indexOf('/');
  if (slash > 0) {
    return { kind: 'keyword', ns: text.slice(0, slash), name: text.slice(slash + 1), auto: false };
  }
  return { kind: 'keyword', name: text, auto: false };
}

export function str(value: string): StringForm {
  return { kind: 'string', value };
}

export function list(items: Form[]): ListForm {
  return { kind: 'list', items };
}

export function vector(items: Form[]): VectorForm {
  return { kind: 'vector', items };
}

export function map(items: Form[]): MapForm {
  return { kind: 'map', items };
}

export const TRUE: BooleanForm = { kind: 'boolean', value: true };
export const NIL: NilForm = { kind: 'nil' };

/** Full text of a symbol, `ns/name` when qualified. */
export function symbolText(s: SymbolForm): string {
  return s.ns ? `${s.ns}/${s.name}` : s.name;
}

export function isSymbol(form: Form | undefined, text?: string): form is SymbolForm {
  if (!form || form.kind !== 'symbol') return false;
  return text === undefined || symbolText(form) === text;
}

export function isList(form: Form | undefined): form is ListForm {
  return form !== undefined && form.kind === 'list';
}

export function canCarryMeta(form: Form): form is MetaCarrier {
  switch (form.kind) {
    case 'symbol':
    case 'list':
    case 'vector':
    case 'map':
    case 'set':
      return true;
    default:
      return false;
  }
}

/**
 * Structural equality, ignoring metadata (as Clojure's `=` does).
 * Maps and sets compare as unordered collections.
 */
export function formEquals(a: Form, b: Form): boolean {
  switch (a.kind) {
    case 'symbol':
      return b.kind === 'symbol' && a.ns === b.ns && a.name === b.name;
    case 'keyword':
      return b.kind === 'keyword' && a.ns === b.ns && a.name === b.name && a.auto === b.auto;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'number':
      return b.kind === 'number' && a.text === b.text;
    case 'char':
      return b.kind === 'char' && a.value === b.value;
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'nil':
      return b.kind === 'nil';
    case 'regex':
      return b.kind === 'regex' && a.source === b.source;
    case 'list':
    case 'vector':
      return (b.kind === 'list' || b.kind === 'vector') && itemsEqual(a.items, b.items);
    case 'map':
      return b.kind === 'map' && a.items.length === b.items.length &&
        entries(a).every(([k, v]) => {
          const other = mapGet(b, k);
          return other !== undefined && formEquals(v, other);
        });
    case 'set':
      return b.kind === 'set' && a.items.length === b.items.length &&
        a.items.every(x => b.items.some(y => formEquals(x, y)));
    case 'tagged':
      return b.kind === 'tagged' && formEquals(a.tag, b.tag) && formEquals(a.form, b.form);
  }
}

function itemsEqual(a: Form[], b: Form[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!formEquals(a[i], b[i])) return false;
  }
  return true;
}

/** Key/value pairs of a map form, in source order. */
export function entries(m: MapForm): Array<[Form, Form]> {
  const out: Array<[Form, Form]> = [];
  for (let i = 0; i + 1 < m.items.length; i += 2) {
    out.push([m.items[i], m.items[i + 1]]);
  }
  return out;
}

export function mapGet(m: MapForm, key: Form): Form | undefined {
  for (const [k, v] of entries(m)) {
    if (formEquals(k, key)) return v;
  }
  return undefined;
}

/** Returns a new map with `key` set to `value`, keeping entry order. */
export function mapAssoc(m: MapForm, key: Form, value: Form): MapForm {
  const items = [...m.items];
  for (let i = 0; i + 1 < items.length; i += 2) {
    if (formEquals(items[i], key)) {
      items[i + 1] = value;
      return { ...m, items };
    }
  }
  items.push(key, value);
  return { ...m, items };
}

/** Entries of `overrides` win over those of `base`. */
export function mapMerge(base: MapForm | undefined, overrides: MapForm): MapForm {
  let merged = base ?? map([]);
  for (const [k, v] of entries(overrides)) {
    merged = mapAssoc(merged, k, v);
  }
  return merged;
}
