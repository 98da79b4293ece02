import { describe, expect, it } from 'vitest';
import { LexError } from '../src/error.js';
import { Lexer, tokenize } from '../src/lexer.js';
import { Token, tokenText } from '../src/token.js';

function texts(source: string): string[] {
  return tokenize(source).map(tokenText);
}

describe('tokenize', () => {
  it('reads literals and names', () => {
    expect(tokenize('true false 42 -7 "hi" nothing Bool.and x_1')).toEqual([
      Token.boolean(true),
      Token.boolean(false),
      Token.int(42n),
      Token.int(-7n),
      Token.string('hi'),
      Token.nothing(),
      Token.name('Bool.and'),
      Token.name('x_1'),
    ]);
  });

  it('reads keywords only as whole words', () => {
    expect(tokenize('let val in end if then else letter')).toEqual([
      Token.let(),
      Token.val(),
      Token.in(),
      Token.end(),
      Token.if(),
      Token.then(),
      Token.else(),
      Token.name('letter'),
    ]);
  });

  it('reads punctuation', () => {
    expect(texts("\\x -> '( ) #( [ ] { a: 1 } = ? >>")).toEqual([
      '\\', 'x', '->', "'", '(', ')', '#', '(', '[', ']', '{', 'a', ':', '1', '}', '=', '?', '>>',
    ]);
  });

  it('keeps string escapes raw', () => {
    expect(tokenize('"a\\nb\\"c"')).toEqual([Token.string('a\\nb\\"c')]);
  });

  it('drops whitespace and comments', () => {
    expect(tokenize('1 -- a comment\n  2')).toEqual([Token.int(1n), Token.int(2n)]);
  });

  it('treats object property names as plain names', () => {
    expect(tokenize('constructor toString')).toEqual([
      Token.name('constructor'),
      Token.name('toString'),
    ]);
  });

  it('accepts the full 64-bit integer range', () => {
    expect(tokenize('9223372036854775807 -9223372036854775808')).toEqual([
      Token.int(9223372036854775807n),
      Token.int(-9223372036854775808n),
    ]);
  });
});

describe('Lexer', () => {
  it('keeps trivia and spans', () => {
    const located = new Lexer('x\n  -- note\ny').tokenize();
    expect(located.map((t) => t.token)).toEqual([
      Token.name('x'),
      Token.whitespace('\n  '),
      Token.comment('-- note'),
      Token.whitespace('\n'),
      Token.name('y'),
    ]);
    expect(located[4]?.span).toEqual({
      start: { offset: 12, line: 3, col: 1 },
      end: { offset: 13, line: 3, col: 2 },
    });
  });
});

describe('lex errors', () => {
  it('rejects an unterminated string', () => {
    expect(() => tokenize('"abc')).toThrow('Lex error at 1:1: unterminated string');
  });

  it('rejects a string ending in a backslash', () => {
    expect(() => tokenize('"abc\\')).toThrow('unterminated string');
  });

  it('rejects an unknown escape', () => {
    expect(() => tokenize('"a\\qb"')).toThrow("Lex error at 1:4: invalid escape sequence '\\q'");
  });

  it('rejects integers outside 64 bits', () => {
    expect(() => tokenize('9223372036854775808')).toThrow(
      'integer literal 9223372036854775808 is out of range',
    );
  });

  it('rejects stray characters', () => {
    expect(() => tokenize('1 > 2')).toThrow("Lex error at 1:3: unexpected character '>'");
    expect(() => tokenize('a - b')).toThrow("unexpected character '-'");
    expect(() => tokenize('@')).toThrow("unexpected character '@'");
  });

  it('reports the position on the error', () => {
    try {
      tokenize('x\n  $');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LexError);
      if (e instanceof LexError) {
        expect(e.pos).toEqual({ offset: 4, line: 2, col: 3 });
      }
    }
  });
});
