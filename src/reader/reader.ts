import { ReaderError } from '../errors/index.js';
import {
  Form, MapForm, SymbolForm, KeywordForm,
  sym, list, vector, map, kw, TRUE, NIL,
  canCarryMeta, mapMerge,
} from './forms.js';
import { ReaderOptions } from './options.js';

/** Produced by `#_`, `#!` and reader conditionals with no matching branch. */
const NOTHING = Symbol('nothing');

/** Produced by `#?@`; its items are spliced into the enclosing collection. */
class Splice {
  constructor(readonly items: Form[]) {}
}

type ReadResult = Form | typeof NOTHING | Splice;

const TERMINATING = new Set(['"', ';', '@', '^', '`', '~', '(', ')', '[', ']', '{', '}', '\\']);

const NAMED_CHARS: Record<string, string> = {
  newline: '\n',
  space: ' ',
  tab: '\t',
  backspace: '\b',
  formfeed: '\f',
  return: '\r',
};

const STRING_ESCAPES: Record<string, string> = {
  t: '\t',
  r: '\r',
  n: '\n',
  b: '\b',
  f: '\f',
  '\\': '\\',
  '"': '"',
};

const INT_PATTERN = /^[-+]?(?:0|[1-9][0-9]*|0[xX][0-9A-Fa-f]+|0[0-7]+|[1-9][0-9]?[rR][0-9A-Za-z]+)N?$/;
const RATIO_PATTERN = /^[-+]?[0-9]+\/[0-9]+$/;
const FLOAT_PATTERN = /^[-+]?[0-9]+(?:\.[0-9]*)?(?:[eE][-+]?[0-9]+)?M?$/;

/** Deepest nesting of forms the reader accepts. */
export const MAX_NESTING_DEPTH = 1000;

function isWhitespace(ch: string): boolean {
  return ch === ',' || /\s/.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

/**
 * Reads top-level forms one at a time from source text.
 */
export class FormReader {
  private pos = 0;
  private line = 1;
  private column = 1;
  private depth = 0;

  constructor(private readonly source: string, private readonly options: ReaderOptions) {
    if (source.startsWith('\uFEFF')) this.pos = 1;
  }

  /**
   * Read the next top-level form.
   * @returns The form, or undefined at end of input
   * @throws ReaderError on malformed input
   */
  read(): Form | undefined {
    for (;;) {
      this.skipWhitespace();
      if (this.atEnd()) return undefined;
      const result = this.readOne();
      if (result === NOTHING) continue;
      if (result instanceof Splice) {
        throw this.error('Reader conditional splicing not allowed at the top level');
      }
      return result;
    }
  }

  private atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string | undefined {
    return this.source[this.pos];
  }

  private next(): string {
    const ch = this.source[this.pos];
    if (ch === undefined) throw this.error('EOF while reading');
    this.pos++;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private error(message: string): ReaderError {
    return new ReaderError(message, this.line, this.column);
  }

  private skipWhitespace(): void {
    while (!this.atEnd()) {
      const ch = this.source[this.pos];
      if (ch === ';') {
        this.skipLine();
      } else if (isWhitespace(ch)) {
        this.next();
      } else {
        return;
      }
    }
  }

  private skipLine(): void {
    while (!this.atEnd() && this.peek() !== '\n') this.next();
  }

  private readOne(): ReadResult {
    if (this.depth >= MAX_NESTING_DEPTH) throw this.error('Nesting too deep');
    this.depth++;
    try {
      return this.readForm();
    } finally {
      this.depth--;
    }
  }

  private readForm(): ReadResult {
    const ch = this.next();
    switch (ch) {
      case '(':
        return list(this.readDelimited(')', this.line));
      case '[':
        return vector(this.readDelimited(']', this.line));
      case '{':
        return this.readMap();
      case ')':
      case ']':
      case '}':
        throw this.error(`Unmatched delimiter: ${ch}`);
      case '"':
        return { kind: 'string', value: this.readString() };
      case '\\':
        return this.readChar();
      case '\'':
        return list([sym('quote'), this.readRequired()]);
      case '`':
        return list([sym('syntax-quote'), this.readRequired()]);
      case '~':
        if (this.peek() === '@') {
          this.next();
          return list([sym('clojure.core/unquote-splicing'), this.readRequired()]);
        }
        return list([sym('clojure.core/unquote'), this.readRequired()]);
      case '@':
        return list([sym('clojure.core/deref'), this.readRequired()]);
      case '^':
        return this.readMeta();
      case '#':
        return this.readDispatch();
      default:
        return this.readAtom(ch);
    }
  }

  /** Read a form that must be present, skipping discarded ones. */
  private readRequired(): Form {
    for (;;) {
      this.skipWhitespace();
      if (this.atEnd()) throw this.error('EOF while reading');
      const result = this.readOne();
      if (result === NOTHING) continue;
      if (result instanceof Splice) {
        throw this.error('Reader conditional splicing not allowed here');
      }
      return result;
    }
  }

  private readDelimited(close: string, startLine: number): Form[] {
    const items: Form[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.atEnd()) throw this.error(`EOF while reading, starting at line ${startLine}`);
      if (this.peek() === close) {
        this.next();
        return items;
      }
      const result = this.readOne();
      if (result === NOTHING) continue;
      if (result instanceof Splice) {
        items.push(...result.items);
      } else {
        items.push(result);
      }
    }
  }

  private readMap(): MapForm {
    const items = this.readDelimited('}', this.line);
    if (items.length % 2 !== 0) {
      throw this.error('Map literal must contain an even number of forms');
    }
    return map(items);
  }

  private readString(): string {
    let out = '';
    for (;;) {
      if (this.atEnd()) throw this.error('EOF while reading string');
      const ch = this.next();
      if (ch === '"') return out;
      if (ch !== '\\') {
        out += ch;
        continue;
      }
      const esc = this.next();
      if (Object.hasOwn(STRING_ESCAPES, esc)) {
        out += STRING_ESCAPES[esc];
      } else if (esc === 'u') {
        const hex = this.source.slice(this.pos, this.pos + 4);
        if (!/^[0-9A-Fa-f]{4}$/.test(hex)) throw this.error(`Invalid unicode escape: \\u${hex}`);
        for (let i = 0; i < 4; i++) this.next();
        out += String.fromCharCode(parseInt(hex, 16));
      } else if (esc >= '0' && esc <= '7') {
        let digits = esc;
        while (digits.length < 3 && /[0-7]/.test(this.peek() ?? '')) digits += this.next();
        const code = parseInt(digits, 8);
        if (code > 0o377) throw this.error('Octal escape sequence must be in range [0, 377]');
        out += String.fromCharCode(code);
      } else {
        throw this.error(`Unsupported escape character: \\${esc}`);
      }
    }
  }

  private readRegex(): string {
    let out = '';
    for (;;) {
      if (this.atEnd()) throw this.error('EOF while reading regex');
      const ch = this.next();
      if (ch === '"') return out;
      out += ch;
      if (ch === '\\') out += this.next();
    }
  }

  private readToken(initial: string): string {
    let token = initial;
    while (!this.atEnd()) {
      const ch = this.source[this.pos];
      if (isWhitespace(ch) || TERMINATING.has(ch)) break;
      token += this.next();
    }
    return token;
  }

  private readChar(): Form {
    if (this.atEnd()) throw this.error('EOF while reading character');
    const token = this.readToken(this.next());
    if (token.length === 1) return { kind: 'char', value: token };
    if (Object.hasOwn(NAMED_CHARS, token)) return { kind: 'char', value: NAMED_CHARS[token] };
    if (/^u[0-9A-Fa-f]{4}$/.test(token)) {
      return { kind: 'char', value: String.fromCharCode(parseInt(token.slice(1), 16)) };
    }
    if (/^o[0-7]{1,3}$/.test(token)) {
      const code = parseInt(token.slice(1), 8);
      if (code > 0o377) throw this.error('Octal escape sequence must be in range [0, 377]');
      return { kind: 'char', value: String.fromCharCode(code) };
    }
    throw this.error(`Unsupported character: \\${token}`);
  }

  private readAtom(initial: string): Form {
    const token = this.readToken(initial);
    if (isDigit(initial) || ((initial === '+' || initial === '-') && isDigit(token[1]))) {
      if (INT_PATTERN.test(token) || RATIO_PATTERN.test(token) || FLOAT_PATTERN.test(token)) {
        return { kind: 'number', text: token };
      }
      throw this.error(`Invalid number: ${token}`);
    }
    switch (token) {
      case 'nil': return NIL;
      case 'true': return TRUE;
      case 'false': return { kind: 'boolean', value: false };
    }
    if (token.startsWith(':')) return this.keyword(token);
    if (!this.validName(token)) throw this.error(`Invalid token: ${token}`);
    return sym(token);
  }

  private validName(text: string): boolean {
    if (text === '/') return true;
    if (text.endsWith(':') || text.includes('::')) return false;
    if (text.endsWith('/') && !text.endsWith('//')) return false;
    return true;
  }

  private keyword(token: string): KeywordForm {
    const auto = token.startsWith('::');
    const body = token.slice(auto ? 2 : 1);
    if (!body || body.startsWith(':') || !this.validName(body)) {
      throw this.error(`Invalid token: ${token}`);
    }
    return { ...kw(body), auto };
  }

  private readMeta(): Form {
    const metaForm = this.readRequired();
    let meta: MapForm;
    switch (metaForm.kind) {
      case 'symbol':
      case 'string':
        meta = map([kw('tag'), metaForm]);
        break;
      case 'keyword':
        meta = map([metaForm, TRUE]);
        break;
      case 'vector':
        meta = map([kw('param-tags'), metaForm]);
        break;
      case 'map':
        meta = metaForm;
        break;
      default:
        throw this.error('Metadata must be Symbol, Keyword, String, Map or Vector');
    }
    const target = this.readRequired();
    if (!canCarryMeta(target)) {
      throw this.error('Metadata can only be applied to symbols and collections');
    }
    return { ...target, meta: mapMerge(target.meta, meta) };
  }

  private readDispatch(): ReadResult {
    const ch = this.peek();
    if (ch === undefined) throw this.error('EOF while reading dispatch character');
    switch (ch) {
      case '{':
        this.next();
        return { kind: 'set', items: this.readDelimited('}', this.line) };
      case '"':
        this.next();
        return { kind: 'regex', source: this.readRegex() };
      case '(':
        this.next();
        return list([sym('fn*'), vector([]), list(this.readDelimited(')', this.line))]);
      case '\'':
        this.next();
        return list([sym('var'), this.readRequired()]);
      case '_':
        this.next();
        this.readRequired();
        return NOTHING;
      case '!':
        this.skipLine();
        return NOTHING;
      case '^':
        this.next();
        return this.readMeta();
      case '=':
        throw this.error('EvalReader not allowed');
      case '<':
        throw this.error('Unreadable form');
      case '#':
        this.next();
        return this.readSymbolicValue();
      case '?':
        this.next();
        return this.readConditional();
      case ':':
        this.next();
        return this.readNamespacedMap();
    }
    if (isWhitespace(ch)) throw this.error('No dispatch macro for whitespace');
    const tag = this.readRequired();
    if (tag.kind !== 'symbol') {
      throw this.error('Reader tag must be a symbol');
    }
    return { kind: 'tagged', tag, form: this.readRequired() };
  }

  private readSymbolicValue(): Form {
    const token = this.readToken('');
    if (token === 'Inf' || token === '-Inf' || token === 'NaN') {
      return { kind: 'number', text: `##${token}` };
    }
    throw this.error(`Unknown symbolic value: ##${token}`);
  }

  private readConditional(): ReadResult {
    const splicing = this.peek() === '@';
    if (splicing) this.next();
    if (this.options.readCond === 'disallow') {
      throw this.error('Conditional read not allowed');
    }
    if (this.peek() !== '(') {
      throw this.error('read-cond body must be a list');
    }
    const startLine = this.line;
    this.next();
    const clauses = this.readDelimited(')', startLine);
    if (clauses.length % 2 !== 0) {
      throw this.error('read-cond requires an even number of forms');
    }
    for (let i = 0; i < clauses.length; i += 2) {
      const feature = clauses[i];
      if (feature.kind !== 'keyword') {
        throw this.error('Feature should be a keyword');
      }
      if (feature.name !== 'default' && !this.options.features.includes(feature.name)) continue;
      const selected = clauses[i + 1];
      if (!splicing) return selected;
      if (selected.kind !== 'list' && selected.kind !== 'vector') {
        throw this.error('Spliced form in read-cond-splicing must be a list or vector');
      }
      return new Splice(selected.items);
    }
    return NOTHING;
  }

  private readNamespacedMap(): MapForm {
    const auto = this.peek() === ':';
    if (auto) this.next();
    const ns = this.readToken('');
    if (!auto && !ns) throw this.error('Namespaced map must specify a namespace');
    this.skipWhitespace();
    if (this.peek() !== '{') throw this.error('Namespaced map must specify a map');
    this.next();
    const { items } = this.readMap();
    for (const [i, key] of items.entries()) {
      if (i % 2 === 0) items[i] = this.qualifyKey(key, ns, auto);
    }
    return map(items);
  }

  private qualifyKey(key: Form, ns: string, auto: boolean): Form {
    if (key.kind === 'keyword' && !key.auto) {
      if (key.ns === '_') return { kind: 'keyword', name: key.name, auto: false };
      if (key.ns === undefined) {
        return { kind: 'keyword', name: key.name, auto, ...(ns ? { ns } : {}) };
      }
    }
    if (key.kind === 'symbol' && key.ns === undefined && ns) {
      return { ...key, ns } satisfies SymbolForm;
    }
    return key;
  }
}

/**
 * Lazily read the top-level forms of `source`. Reading stops at the end of
 * input; a malformed form makes the generator throw `ReaderError`.
 */
export function* readForms(source: string, options: ReaderOptions): Generator<Form, void, undefined> {
  const reader = new FormReader(source, options);
  for (;;) {
    const form = reader.read();
    if (form === undefined) return;
    yield form;
  }
}

export function readAllForms(source: string, options: ReaderOptions): Form[] {
  return [...readForms(source, options)];
}
