import type { Element } from '@wander/core';

function param(name: string, tag: string | null): string {
  return tag === null ? name : `${name}: ${tag}`;
}

function all(elements: readonly Element[]): string {
  return elements.map(prettyElement).join(' ');
}

/** Compact, fully parenthesized rendering of a parse tree. */
export function prettyElement(element: Element): string {
  return element.match({
    Boolean: (value) => String(value),
    Int: (value) => String(value),
    String: (raw) => `"${raw}"`,
    Nothing: () => 'nothing',
    Name: (name) => name,
    TaggedName: (name, tag) => param(name, tag),
    HostFunction: (name) => `<host ${name}>`,
    Let: (decls, body) => {
      const bound = decls.map((d) => `${param(d.name, d.tag)} = ${prettyElement(d.value)}`);
      return `(let ${bound.join('; ')} in ${prettyElement(body)})`;
    },
    Grouping: (elements) => `(${all(elements)})`,
    Conditional: (cond, then, otherwise) =>
      `(if ${prettyElement(cond)} then ${prettyElement(then)} else ${prettyElement(otherwise)})`,
    Lambda: (name, input, output, body) => {
      const lambda = `(\\${param(name, input)} -> ${prettyElement(body)})`;
      return output === null ? lambda : `${lambda}: ${output}`;
    },
    Tuple: (elements) => `'(${all(elements)})`,
    List: (elements) => `[${all(elements)}]`,
    Set: (elements) => `#(${all(elements)})`,
    Record: (fields) => {
      const entries = [...fields].map(([name, value]) => `${name}: ${prettyElement(value)}`);
      return `{${entries.join(' ')}}`;
    },
    Forward: () => '>>',
  });
}
