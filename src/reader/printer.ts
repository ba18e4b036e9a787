import { Form, symbolText, entries } from './forms.js';

const CHAR_NAMES: Record<string, string> = {
  '\n': 'newline',
  ' ': 'space',
  '\t': 'tab',
  '\b': 'backspace',
  '\f': 'formfeed',
  '\r': 'return',
};

function escapeString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r')
    .replace(/\f/g, '\\f')
    .replace(/\x08/g, '\\b');
}

/**
 * Print a form in reader syntax. Metadata is not printed.
 */
export function printForm(form: Form): string {
  switch (form.kind) {
    case 'symbol':
      return symbolText(form);
    case 'keyword':
      return (form.auto ? '::' : ':') + (form.ns ? `${form.ns}/` : '') + form.name;
    case 'string':
      return `"${escapeString(form.value)}"`;
    case 'number':
      return form.text;
    case 'char':
      return '\\' + (CHAR_NAMES[form.value] ?? form.value);
    case 'boolean':
      return String(form.value);
    case 'nil':
      return 'nil';
    case 'regex':
      return `#"${form.source}"`;
    case 'list':
      return `(${form.items.map(printForm).join(' ')})`;
    case 'vector':
      return `[${form.items.map(printForm).join(' ')}]`;
    case 'set':
      return `#{${form.items.map(printForm).join(' ')}}`;
    case 'map':
      return `{${entries(form).map(([k, v]) => `${printForm(k)} ${printForm(v)}`).join(', ')}}`;
    case 'tagged':
      return `#${symbolText(form.tag)} ${printForm(form.form)}`;
  }
}
