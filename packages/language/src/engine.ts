import { WanderError, type Element } from '@wander/core';
import { Lexer, isTrivia, parse, tokenize, type Token } from '@wander/syntax';
import type { Bindings } from './bindings.js';
import { evaluate } from './eval.js';
import type { Expression } from './expression.js';
import { transform, type TransformerSource } from './transform.js';
import { translate } from './translate.js';
import type { Value } from './value.js';

export type Result<T> = { ok: true; value: T } | { ok: false; error: WanderError };

export interface Introspection {
  /** Lexer output with whitespace and comments kept. */
  tokensWithWhitespace: Token[];
  tokens: Token[];
  /** `tokens` after every registered token transformer ran. */
  transformed: Token[];
  element: Element;
  expression: Expression;
}

function capture<T>(body: () => T): Result<T> {
  try {
    return { ok: true, value: body() };
  } catch (e) {
    if (e instanceof WanderError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/** Runs `script` against `bindings`; scopes it opens are closed again on every path. */
export function run(script: string, bindings: Bindings): Result<Value> {
  return capture(() => {
    const tokens = transform(tokenize(script), bindings);
    const expression = translate(parse(tokens));
    return evaluate(expression, bindings);
  });
}

/**
 * Every intermediate stage of `run`, stopping short of evaluation. Only the
 * registered token transformers are read from `bindings`.
 */
export function introspect(script: string, bindings: TransformerSource): Result<Introspection> {
  return capture(() => {
    const tokensWithWhitespace = new Lexer(script).tokenize().map((located) => located.token);
    const tokens = tokensWithWhitespace.filter((token) => !isTrivia(token));
    const transformed = transform(tokens, bindings);
    const element = parse(transformed);
    const expression = translate(element);
    return { tokensWithWhitespace, tokens, transformed, element, expression };
  });
}
