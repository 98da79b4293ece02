import type { Expression } from './expression.js';

function param(name: string, type: string | null): string {
  return type === null ? name : `${name}: ${type}`;
}

function all(expressions: readonly Expression[]): string {
  return expressions.map(prettyExpression).join(' ');
}

/** Same notation as `prettyElement`, applications shown as `(f x y)`. */
export function prettyExpression(expr: Expression): string {
  switch (expr.tag) {
    case 'Boolean':
      return String(expr.value);
    case 'Int':
      return expr.value.toString();
    case 'String':
      return `"${expr.raw}"`;
    case 'Nothing':
      return 'nothing';
    case 'Name':
      return expr.name;
    case 'TaggedName':
      return param(expr.name, expr.type);
    case 'HostFunction':
      return `<host ${expr.name}>`;
    case 'Let': {
      const bound = expr.decls.map((d) => `${param(d.name, d.tag)} = ${prettyExpression(d.value)}`);
      return `(let ${bound.join('; ')} in ${prettyExpression(expr.body)})`;
    }
    case 'Conditional':
      return `(if ${prettyExpression(expr.cond)} then ${prettyExpression(expr.then)} else ${prettyExpression(expr.otherwise)})`;
    case 'Lambda': {
      const lambda = `(\\${param(expr.param, expr.input)} -> ${prettyExpression(expr.body)})`;
      return expr.output === null ? lambda : `${lambda}: ${expr.output}`;
    }
    case 'Application':
      return `(${all(expr.expressions)})`;
    case 'Tuple':
      return `'(${all(expr.elements)})`;
    case 'List':
      return `[${all(expr.elements)}]`;
    case 'Set':
      return `#(${all(expr.elements)})`;
    case 'Record': {
      const fields = [...expr.fields].map(([name, value]) => `${name}: ${prettyExpression(value)}`);
      return `{${fields.join(' ')}}`;
    }
  }
}
