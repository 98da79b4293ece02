import type { Scope } from './bindings.js';
import type { Expression } from './expression.js';

export type Value =
  | { tag: 'Boolean'; value: boolean }
  | { tag: 'Int'; value: bigint }
  | { tag: 'String'; value: string }
  | { tag: 'Nothing' }
  | {
      tag: 'Lambda';
      param: string;
      input: string;
      output: string;
      body: Expression;
      /** Scope chain the lambda was created in, shared rather than copied. */
      env: readonly Scope[];
      /** Set when this lambda stands in for a host function still collecting arguments. */
      host: HostApplication | null;
    }
  | { tag: 'List'; elements: Value[] }
  | { tag: 'Tuple'; elements: Value[] }
  | { tag: 'Set'; elements: Value[] }
  | { tag: 'Record'; fields: ReadonlyMap<string, Value> }
  | { tag: 'HostValue'; payload: unknown };

export type LambdaValue = Extract<Value, { tag: 'Lambda' }>;

export interface HostApplication {
  name: string;
  args: readonly Value[];
}

export const Value = {
  Boolean: (value: boolean): Value => ({ tag: 'Boolean', value }),
  Int: (value: bigint): Value => ({ tag: 'Int', value }),
  String: (value: string): Value => ({ tag: 'String', value }),
  Nothing: (): Value => ({ tag: 'Nothing' }),
  Lambda: (
    param: string,
    input: string,
    output: string,
    body: Expression,
    env: readonly Scope[],
    host: HostApplication | null = null,
  ): LambdaValue => ({ tag: 'Lambda', param, input, output, body, env, host }),
  List: (elements: Value[]): Value => ({ tag: 'List', elements }),
  Tuple: (elements: Value[]): Value => ({ tag: 'Tuple', elements }),
  /** Builds a set, dropping members structurally equal to an earlier one. */
  Set: (elements: readonly Value[]): Value => {
    const unique: Value[] = [];
    for (const element of elements) {
      if (!unique.some((member) => equals(member, element))) {
        unique.push(element);
      }
    }
    return { tag: 'Set', elements: unique };
  },
  Record: (fields: ReadonlyMap<string, Value>): Value => ({ tag: 'Record', fields }),
  HostValue: (payload: unknown): Value => ({ tag: 'HostValue', payload }),
};

function equalSequences(left: readonly Value[], right: readonly Value[]): boolean {
  return left.length === right.length && left.every((value, i) => {
    const other = right[i];
    return other !== undefined && equals(value, other);
  });
}

/**
 * Structural equality. Sets ignore member order, records ignore field order,
 * lambdas are only equal to themselves.
 */
export function equals(left: Value, right: Value): boolean {
  switch (left.tag) {
    case 'Boolean':
      return right.tag === 'Boolean' && right.value === left.value;
    case 'Int':
      return right.tag === 'Int' && right.value === left.value;
    case 'String':
      return right.tag === 'String' && right.value === left.value;
    case 'Nothing':
      return right.tag === 'Nothing';
    case 'Lambda':
      return left === right;
    case 'List':
      return right.tag === 'List' && equalSequences(left.elements, right.elements);
    case 'Tuple':
      return right.tag === 'Tuple' && equalSequences(left.elements, right.elements);
    case 'Set':
      return (
        right.tag === 'Set' &&
        left.elements.length === right.elements.length &&
        left.elements.every((member) => right.elements.some((other) => equals(member, other)))
      );
    case 'Record': {
      if (right.tag !== 'Record' || left.fields.size !== right.fields.size) return false;
      for (const [name, value] of left.fields) {
        const other = right.fields.get(name);
        if (other === undefined || !equals(value, other)) return false;
      }
      return true;
    }
    case 'HostValue':
      return right.tag === 'HostValue' && Object.is(left.payload, right.payload);
  }
}
