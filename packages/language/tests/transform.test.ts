import { WanderError } from '@wander/core';
import { Token, tokenText, tokenize } from '@wander/syntax';
import { describe, expect, it } from 'vitest';
import { Bindings } from '../src/bindings.js';
import { run } from '../src/engine.js';
import { transform, type TokenTransformer } from '../src/transform.js';
import { Value } from '../src/value.js';

const yes: TokenTransformer = (tokens) =>
  tokens.map((token) => (token.name?.[0] === 'yes' ? Token.boolean(true) : token));

describe('transform', () => {
  it('returns the tokens unchanged without transformers', () => {
    const tokens = tokenize('a b');
    expect(transform(tokens, new Bindings())).toEqual(tokens);
  });

  it('runs transformers in registration order', () => {
    const bindings = new Bindings();
    bindings.bindTokenTransformer('Test', 'wrap', (tokens) => [
      Token.openSquare(),
      ...tokens,
      Token.closeSquare(),
    ]);
    bindings.bindTokenTransformer('Test', 'tag', (tokens) => [Token.name('tagged'), ...tokens]);
    expect(transform(tokenize('1'), bindings).map(tokenText)).toEqual(['tagged', '[', '1', ']']);
  });

  it('rewrites scripts before they are parsed', () => {
    const bindings = new Bindings();
    bindings.bindTokenTransformer('Test', 'yes', yes);
    const result = run('[yes yes]', bindings);
    expect(result).toEqual({
      ok: true,
      value: Value.List([Value.Boolean(true), Value.Boolean(true)]),
    });
  });

  it('fails the run when a transformer rejects the tokens', () => {
    const bindings = new Bindings();
    bindings.bindTokenTransformer('Test', 'strict', () => {
      throw new WanderError('Token transformer `Test.strict` rejected the script.');
    });
    const result = run('1', bindings);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Token transformer `Test.strict` rejected the script.');
    }
  });
});
