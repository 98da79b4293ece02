import { LexError, ParseError, Token, prettyElement, tokenText } from '@wander/syntax';
import { describe, expect, it } from 'vitest';
import { Bindings } from '../src/bindings.js';
import { introspect, run } from '../src/engine.js';
import { TranslateError } from '../src/error.js';
import { prettyExpression } from '../src/pretty.js';
import { common } from '../src/prelude.js';
import { escapeString, render } from '../src/render.js';
import { Value } from '../src/value.js';

function value(script: string): Value {
  const result = run(script, common());
  if (!result.ok) throw result.error;
  return result.value;
}

describe('run', () => {
  it('reports lex errors as failed results', () => {
    const result = run('"abc', new Bindings());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(LexError);
      expect(result.error.message).toBe('Lex error at 1:1: unterminated string');
    }
  });

  it('reports parse errors as failed results', () => {
    const result = run('[1', new Bindings());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.message).toBe('Parse error: no production matched at `[ 1`');
    }
  });

  it('lets errors from outside the language through', () => {
    const bindings = new Bindings();
    bindings.bindHostFunction({
      binding: {
        name: 'Test.crash',
        parameters: [{ name: 'value', type: 'Any' }],
        result: 'Nothing',
        docString: 'Fails with a host error.',
      },
      run: () => {
        throw new Error('host failure');
      },
    });
    expect(() => run('Test.crash 1', bindings)).toThrow('host failure');
    expect(bindings.depth).toBe(1);
  });
});

describe('introspect', () => {
  it('exposes every stage', () => {
    const bindings = common();
    const result = introspect('x -- c\n>> f', bindings);
    expect(result.ok).toBe(true);
    if (result.ok) {
      const stages = result.value;
      expect(stages.tokensWithWhitespace.map(tokenText)).toEqual([
        'x',
        ' ',
        '-- c',
        '\n',
        '>>',
        ' ',
        'f',
      ]);
      expect(stages.tokens.map(tokenText)).toEqual(['x', '>>', 'f']);
      expect(stages.transformed).toEqual(stages.tokens);
      expect(prettyElement(stages.element)).toBe('(x >> f)');
      expect(prettyExpression(stages.expression)).toBe('(f x)');
    }
    expect(bindings.depth).toBe(1);
  });

  it('shows transformed tokens', () => {
    const bindings = new Bindings();
    bindings.bindTokenTransformer('Test', 'negate', (tokens) => [Token.name('Bool.not'), ...tokens]);
    const result = introspect('true', bindings);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.tokens).toEqual([Token.boolean(true)]);
      expect(result.value.transformed).toEqual([Token.name('Bool.not'), Token.boolean(true)]);
      expect(prettyExpression(result.value.expression)).toBe('(Bool.not true)');
    }
  });

  it('only needs the registered transformers', () => {
    const result = introspect('[1]', { tokenTransformers: () => [] });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(prettyExpression(result.value.expression)).toBe('[1]');
    }
  });

  it('reports translation errors', () => {
    const result = introspect('>> f', new Bindings());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TranslateError);
    }
  });
});

describe('render', () => {
  it('renders each kind of value', () => {
    expect(render(Value.Boolean(false))).toBe('false');
    expect(render(Value.Int(-3n))).toBe('-3');
    expect(render(Value.String('say "hi"\n'))).toBe('"say \\"hi\\"\\n"');
    expect(render(Value.Nothing())).toBe('nothing');
    expect(render(Value.List([]))).toBe('[]');
    expect(render(Value.Tuple([Value.Int(1n), Value.Nothing()]))).toBe("'(1 nothing)");
    expect(render(Value.Set([Value.Int(1n), Value.Int(2n)]))).toBe('#(1 2)');
    expect(render(Value.Record(new Map([['a', Value.Int(24n)], ['b', Value.Boolean(true)]])))).toBe(
      '{a: 24 b: true}',
    );
    expect(render(Value.HostValue('conn-1'))).toBe('conn-1');
  });

  it('renders opaque host values with a placeholder', () => {
    class Handle {
      toString(): string {
        return 'handle#7';
      }
    }
    expect(render(Value.HostValue({ id: 1 }))).toBe('[host value]');
    expect(render(Value.HostValue(Object.create(null)))).toBe('[host value]');
    expect(render(Value.HostValue(() => 1))).toBe('[host value]');
    expect(render(Value.HostValue(new Handle()))).toBe('handle#7');
    expect(render(Value.HostValue(42))).toBe('42');
  });

  it('escapes backslashes before quotes', () => {
    expect(escapeString('a\\"\tb')).toBe('"a\\\\\\"\\tb"');
  });

  it('keeps escaped strings in source form', () => {
    expect(render(value('"hello,\\nworld"'))).toBe('"hello,\\nworld"');
  });

  it('renders values that read back as equal values', () => {
    const sources = [
      'true',
      '-5',
      '"hello,\\nworld"',
      '"tab\\there \\\\ \\"q\\""',
      'nothing',
      '[1 "a" [false]]',
      "'(1 2)",
      '#(1 2)',
      '(a: 24)',
      '{a: {b: [1]} c: "x"}',
    ];
    for (const source of sources) {
      const first = value(source);
      expect(value(render(first))).toEqual(first);
    }
  });
});
