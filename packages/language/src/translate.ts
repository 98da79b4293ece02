import { Element } from '@wander/core';
import { TranslateError } from './error.js';
import { Expression } from './expression.js';

function isForward(element: Element): boolean {
  return element.match({
    Forward: () => true,
    Boolean: () => false,
    Int: () => false,
    String: () => false,
    Nothing: () => false,
    Name: () => false,
    TaggedName: () => false,
    HostFunction: () => false,
    Let: () => false,
    Grouping: () => false,
    Conditional: () => false,
    Lambda: () => false,
    Tuple: () => false,
    List: () => false,
    Set: () => false,
    Record: () => false,
  });
}

/**
 * Rewrites `a >> f x >> g` into `g (f x a)`: everything left of a `>>`
 * becomes the last argument of the terms to its right.
 */
export function resolveForwards(elements: readonly Element[]): Element[] {
  const segments: Element[][] = [[]];
  for (const element of elements) {
    if (isForward(element)) {
      segments.push([]);
    } else {
      segments[segments.length - 1]?.push(element);
    }
  }

  const [head = [], ...rest] = segments;
  if (rest.length === 0) return head;
  if (head.length === 0) {
    throw new TranslateError('Invalid pipe: nothing before `>>` to forward.');
  }

  let accumulated = head;
  for (const segment of rest) {
    if (segment.length === 0) {
      throw new TranslateError('Invalid pipe: `>>` must be followed by a function.');
    }
    accumulated = [...segment, Element.Grouping(accumulated)];
  }
  return accumulated;
}

function expressAll(elements: readonly Element[]): Expression[] {
  return elements.map(express);
}

function expressGrouping(elements: readonly Element[]): Expression {
  const expressions = expressAll(resolveForwards(elements));
  const [only] = expressions;
  if (only === undefined) return Expression.Nothing();
  if (expressions.length === 1) return only;
  return Expression.Application(expressions);
}

export function express(element: Element): Expression {
  return element.match({
    Boolean: (value) => Expression.Boolean(value),
    Int: (value) => Expression.Int(value),
    String: (raw) => Expression.String(raw),
    Nothing: () => Expression.Nothing(),
    Name: (name) => Expression.Name(name),
    TaggedName: (name, tag) => Expression.TaggedName(name, tag),
    HostFunction: (name) => Expression.HostFunction(name),
    Let: (decls, body) =>
      Expression.Let(
        decls.map((decl) => ({ name: decl.name, tag: decl.tag, value: express(decl.value) })),
        express(body),
      ),
    Grouping: (elements) => expressGrouping(elements),
    Conditional: (cond, then, otherwise) =>
      Expression.Conditional(express(cond), express(then), express(otherwise)),
    Lambda: (param, input, output, body) => Expression.Lambda(param, input, output, express(body)),
    Tuple: (elements) => Expression.Tuple(expressAll(elements)),
    List: (elements) => Expression.List(expressAll(elements)),
    Set: (elements) => Expression.Set(expressAll(elements)),
    Record: (fields) =>
      Expression.Record(
        new Map([...fields].map(([name, value]): [string, Expression] => [name, express(value)])),
      ),
    Forward: () => {
      // The parser only emits `>>` inside groupings, which resolveForwards clears.
      throw new Error('internal error: unresolved `>>` reached express');
    },
  });
}

export function translate(element: Element): Expression {
  return express(element);
}
