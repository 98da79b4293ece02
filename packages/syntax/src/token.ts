import type { Span } from '@wander/core';

export type Token = {
  boolean?: [value: boolean];
  int?: [value: bigint];
  string?: [raw: string];
  name?: [name: string];
  let?: [];
  in?: [];
  end?: [];
  if?: [];
  then?: [];
  else?: [];
  val?: [];
  nothing?: [];
  lambda?: [];
  arrow?: [];
  forward?: [];
  openParen?: [];
  closeParen?: [];
  openSquare?: [];
  closeSquare?: [];
  openBrace?: [];
  closeBrace?: [];
  colon?: [];
  equalSign?: [];
  hash?: [];
  singleQuote?: [];
  questionMark?: [];
  whitespace?: [text: string];
  comment?: [text: string];
};

export const Token = {
  boolean: (value: boolean): Token => ({ boolean: [value] }),
  int: (value: bigint): Token => ({ int: [value] }),
  string: (raw: string): Token => ({ string: [raw] }),
  name: (name: string): Token => ({ name: [name] }),
  let: (): Token => ({ let: [] }),
  in: (): Token => ({ in: [] }),
  end: (): Token => ({ end: [] }),
  if: (): Token => ({ if: [] }),
  then: (): Token => ({ then: [] }),
  else: (): Token => ({ else: [] }),
  val: (): Token => ({ val: [] }),
  nothing: (): Token => ({ nothing: [] }),
  lambda: (): Token => ({ lambda: [] }),
  arrow: (): Token => ({ arrow: [] }),
  forward: (): Token => ({ forward: [] }),
  openParen: (): Token => ({ openParen: [] }),
  closeParen: (): Token => ({ closeParen: [] }),
  openSquare: (): Token => ({ openSquare: [] }),
  closeSquare: (): Token => ({ closeSquare: [] }),
  openBrace: (): Token => ({ openBrace: [] }),
  closeBrace: (): Token => ({ closeBrace: [] }),
  colon: (): Token => ({ colon: [] }),
  equalSign: (): Token => ({ equalSign: [] }),
  hash: (): Token => ({ hash: [] }),
  singleQuote: (): Token => ({ singleQuote: [] }),
  questionMark: (): Token => ({ questionMark: [] }),
  whitespace: (text: string): Token => ({ whitespace: [text] }),
  comment: (text: string): Token => ({ comment: [text] }),
} as const;

export interface LocatedToken {
  span: Span;
  token: Token;
}

export function isTrivia(token: Token): boolean {
  return !!(token.whitespace || token.comment);
}

/** Source-like rendering of a single token, used in diagnostics. */
export function tokenText(t: Token): string {
  if (t.boolean) return String(t.boolean[0]);
  if (t.int) return String(t.int[0]);
  if (t.string) return `"${t.string[0]}"`;
  if (t.name) return t.name[0];
  if (t.let) return 'let';
  if (t.in) return 'in';
  if (t.end) return 'end';
  if (t.if) return 'if';
  if (t.then) return 'then';
  if (t.else) return 'else';
  if (t.val) return 'val';
  if (t.nothing) return 'nothing';
  if (t.lambda) return '\\';
  if (t.arrow) return '->';
  if (t.forward) return '>>';
  if (t.openParen) return '(';
  if (t.closeParen) return ')';
  if (t.openSquare) return '[';
  if (t.closeSquare) return ']';
  if (t.openBrace) return '{';
  if (t.closeBrace) return '}';
  if (t.colon) return ':';
  if (t.equalSign) return '=';
  if (t.hash) return '#';
  if (t.singleQuote) return "'";
  if (t.questionMark) return '?';
  if (t.whitespace) return t.whitespace[0];
  if (t.comment) return t.comment[0];
  return '<unknown>';
}
