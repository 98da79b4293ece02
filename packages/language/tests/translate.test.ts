import { Element } from '@wander/core';
import { parse, tokenize } from '@wander/syntax';
import { describe, expect, it } from 'vitest';
import { TranslateError } from '../src/error.js';
import { Expression } from '../src/expression.js';
import { prettyExpression } from '../src/pretty.js';
import { resolveForwards, translate } from '../src/translate.js';

function translated(source: string): string {
  return prettyExpression(translate(parse(tokenize(source))));
}

describe('translate', () => {
  it('unwraps single-element groupings', () => {
    expect(translated('1')).toBe('1');
    expect(translated('((x))')).toBe('x');
  });

  it('turns empty groupings into nothing', () => {
    expect(translated('')).toBe('nothing');
    expect(translated('()')).toBe('nothing');
  });

  it('turns longer groupings into applications', () => {
    expect(translated('f x (g y)')).toBe('(f x (g y))');
  });

  it('translates nested forms', () => {
    expect(translated('let val x = 5 in f x end')).toBe('(let x = 5 in (f x))');
    expect(translated('if b then 1 else 2 end')).toBe('(if b then 1 else 2)');
    expect(translated('\\x y -> f x')).toBe('(\\x -> (\\y -> (f x)))');
    expect(translated('[1 (f x)] {a: (g)}')).toBe('([1 (f x)] {a: g})');
  });

  it('produces expression values', () => {
    expect(translate(parse(tokenize('"a\\tb"')))).toEqual(Expression.String('a\\tb'));
    expect(translate(parse(tokenize('x: Int')))).toEqual(Expression.TaggedName('x', 'Int'));
  });
});

describe('pipes', () => {
  it('passes the left side as the last argument', () => {
    expect(translated('false >> not')).toBe('(not false)');
    expect(translated('x >> f y')).toBe('(f y x)');
  });

  it('chains left to right', () => {
    expect(translated('a >> f >> g x')).toBe('(g x (f a))');
  });

  it('resolves pipes inside nested groupings', () => {
    expect(translated('h (a >> f)')).toBe('(h (f a))');
  });

  it('rejects a pipe with nothing before it', () => {
    expect(() => translated('>> f')).toThrow(TranslateError);
    expect(() => translated('>> f')).toThrow('Invalid pipe: nothing before `>>` to forward.');
  });

  it('rejects a pipe with nothing after it', () => {
    expect(() => translated('a >>')).toThrow('Invalid pipe: `>>` must be followed by a function.');
    expect(() => translated('a >> >> f')).toThrow('Invalid pipe');
  });

  it('leaves sequences without pipes untouched', () => {
    const elements = [Element.Name('f'), Element.Int(1n)];
    expect(resolveForwards(elements)).toEqual(elements);
  });
});
