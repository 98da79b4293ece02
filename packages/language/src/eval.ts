import { ESCAPES } from '@wander/syntax';
import { hostFunctionLambda, type Bindings } from './bindings.js';
import { EvalError } from './error.js';
import type { Expression } from './expression.js';
import { render } from './render.js';
import { Value, type HostApplication, type LambdaValue } from './value.js';

export function unescapeString(raw: string): string {
  let result = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (ch !== '\\') {
      result += ch;
      continue;
    }
    const escaped = raw.charAt(i + 1);
    const replacement = ESCAPES[escaped];
    if (replacement === undefined) {
      throw new EvalError(`Invalid escape sequence '\\${escaped}' in string.`);
    }
    result += replacement;
    i++;
  }
  return result;
}

function readField(name: string, bindings: Bindings): Value {
  const [base = name, ...fields] = name.split('.');
  const record = fields.length > 0 ? bindings.read(base) : undefined;
  if (record === undefined) {
    throw new EvalError(`Could not find name \`${name}\`.`);
  }

  let current: Value = record;
  let path = base;
  for (const field of fields) {
    if (current.tag !== 'Record') {
      throw new EvalError(`Could not access field \`${field}\`, \`${path}\` is not a record.`);
    }
    const next = current.fields.get(field);
    if (next === undefined) {
      throw new EvalError(`Record \`${path}\` has no field \`${field}\`.`);
    }
    current = next;
    path = `${path}.${field}`;
  }
  return current;
}

function hostFunctionValue(name: string, bindings: Bindings): Value | undefined {
  const fn = bindings.readHostFunction(name);
  if (fn === undefined) return undefined;
  return bindings.hostFunctionValue(fn) ?? fn.run([], bindings);
}

/** Scope chain first, then host functions, then fields of a bound record. */
export function readName(name: string, bindings: Bindings): Value {
  return bindings.read(name) ?? hostFunctionValue(name, bindings) ?? readField(name, bindings);
}

/** Runs on the caller's scope stack, so the function sees the bindings at the call site. */
function applyHostFunction(host: HostApplication, arg: Value, bindings: Bindings): Value {
  const fn = bindings.readHostFunction(host.name);
  if (fn === undefined) {
    throw new EvalError(`Could not find host function \`${host.name}\`.`);
  }
  const args = [...host.args, arg];
  return hostFunctionLambda(fn.binding, args) ?? fn.run(args, bindings);
}

function callError(fn: Value, applied: number, passed: number): EvalError {
  if (applied === 0) {
    return new EvalError(`Invalid function call, ${render(fn)} is not a function.`);
  }
  return new EvalError(`Too many arguments, ${passed} passed to a function that takes ${applied}.`);
}

function applyLambda(lambda: LambdaValue, arg: Value, bindings: Bindings): Value {
  if (lambda.host !== null) {
    return applyHostFunction(lambda.host, arg, bindings);
  }
  return bindings.withScopes(lambda.env, () => {
    bindings.bind(lambda.param, arg);
    return evaluate(lambda.body, bindings);
  });
}

/**
 * Applies `fn` to `args` one at a time. Used by host functions that take
 * lambdas, so nested calls stay on the caller's stack.
 */
export function applyValue(fn: Value, args: readonly Value[], bindings: Bindings): Value {
  let result = fn;
  let applied = 0;
  for (const arg of args) {
    if (result.tag !== 'Lambda') {
      throw callError(result, applied, args.length);
    }
    result = applyLambda(result, arg, bindings);
    applied++;
  }
  return result;
}

function evalApplication(expressions: readonly Expression[], bindings: Bindings): Value {
  const [head, ...args] = expressions;
  if (head === undefined) return Value.Nothing();

  let result = evaluate(head, bindings);
  let applied = 0;
  for (const arg of args) {
    if (result.tag !== 'Lambda') {
      throw callError(result, applied, args.length);
    }
    // Arguments are evaluated one by one, right before they are applied.
    const value = evaluate(arg, bindings);
    result = applyLambda(result, value, bindings);
    applied++;
  }
  return result;
}

function evalLet(expr: Extract<Expression, { tag: 'Let' }>, bindings: Bindings): Value {
  bindings.addScope();
  try {
    for (const decl of expr.decls) {
      bindings.bind(decl.name, evaluate(decl.value, bindings));
    }
    return evaluate(expr.body, bindings);
  } finally {
    bindings.removeScope();
  }
}

export function evaluate(expr: Expression, bindings: Bindings): Value {
  switch (expr.tag) {
    case 'Boolean':
      return Value.Boolean(expr.value);

    case 'Int':
      return Value.Int(expr.value);

    case 'String':
      return Value.String(unescapeString(expr.raw));

    case 'Nothing':
      return Value.Nothing();

    case 'Name':
      return readName(expr.name, bindings);

    case 'TaggedName':
      // Type tags are descriptive only.
      return readName(expr.name, bindings);

    case 'HostFunction': {
      const value = hostFunctionValue(expr.name, bindings);
      if (value === undefined) {
        throw new EvalError(`Could not find host function \`${expr.name}\`.`);
      }
      return value;
    }

    case 'Let':
      return evalLet(expr, bindings);

    case 'Conditional': {
      const cond = evaluate(expr.cond, bindings);
      if (cond.tag !== 'Boolean') {
        throw new EvalError(`Conditionals require a boolean value, found ${render(cond)}.`);
      }
      return evaluate(cond.value ? expr.then : expr.otherwise, bindings);
    }

    case 'Lambda':
      return Value.Lambda(
        expr.param,
        expr.input ?? 'Any',
        expr.output ?? 'Any',
        expr.body,
        bindings.capture(),
      );

    case 'Application':
      return evalApplication(expr.expressions, bindings);

    case 'Tuple':
      return Value.Tuple(expr.elements.map((e) => evaluate(e, bindings)));

    case 'List':
      return Value.List(expr.elements.map((e) => evaluate(e, bindings)));

    case 'Set':
      return Value.Set(expr.elements.map((e) => evaluate(e, bindings)));

    case 'Record': {
      const fields = new Map<string, Value>();
      for (const [name, field] of expr.fields) {
        fields.set(name, evaluate(field, bindings));
      }
      return Value.Record(fields);
    }
  }
}
