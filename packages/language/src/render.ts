import type { Value } from './value.js';

export function escapeString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

/** A payload's own `toString`, or a placeholder for plain objects and functions. */
function renderHostValue(payload: unknown): string {
  if (typeof payload === 'function') return '[host value]';
  if (typeof payload === 'object' && payload !== null) {
    const { toString } = payload;
    return typeof toString === 'function' && toString !== Object.prototype.toString
      ? String(payload)
      : '[host value]';
  }
  return String(payload);
}

function renderAll(values: readonly Value[]): string {
  return values.map(render).join(' ');
}

/**
 * Source text for a value. Everything except lambdas and host values reads
 * back to an equal value.
 */
export function render(value: Value): string {
  switch (value.tag) {
    case 'Boolean':
      return String(value.value);
    case 'Int':
      return value.value.toString();
    case 'String':
      return escapeString(value.value);
    case 'Nothing':
      return 'nothing';
    case 'Lambda':
      return '[lambda]';
    case 'List':
      return `[${renderAll(value.elements)}]`;
    case 'Tuple':
      return `'(${renderAll(value.elements)})`;
    case 'Set':
      return `#(${renderAll(value.elements)})`;
    case 'Record': {
      const fields = [...value.fields].map(([name, field]) => `${name}: ${render(field)}`);
      return `{${fields.join(' ')}}`;
    }
    case 'HostValue':
      return renderHostValue(value.payload);
  }
}
