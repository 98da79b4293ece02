import type { Pos, Span } from '@wander/core';
import { LexError } from './error.js';
import { Token, isTrivia, type LocatedToken } from './token.js';

const KEYWORDS = new Map<string, () => Token>([
  ['true', () => Token.boolean(true)],
  ['false', () => Token.boolean(false)],
  ['let', () => Token.let()],
  ['in', () => Token.in()],
  ['end', () => Token.end()],
  ['if', () => Token.if()],
  ['then', () => Token.then()],
  ['else', () => Token.else()],
  ['val', () => Token.val()],
  ['nothing', () => Token.nothing()],
]);

const PUNCTUATION: Record<string, () => Token> = {
  '\\': () => Token.lambda(),
  '(': () => Token.openParen(),
  ')': () => Token.closeParen(),
  '[': () => Token.openSquare(),
  ']': () => Token.closeSquare(),
  '{': () => Token.openBrace(),
  '}': () => Token.closeBrace(),
  ':': () => Token.colon(),
  '=': () => Token.equalSign(),
  '#': () => Token.hash(),
  "'": () => Token.singleQuote(),
  '?': () => Token.questionMark(),
};

/** Characters allowed after a backslash inside a string literal. */
export const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  '\\': '\\',
  '"': '"',
};

const INT_MIN = -(2n ** 63n);
const INT_MAX = 2n ** 63n - 1n;

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isNameStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isNameChar(ch: string): boolean {
  return isNameStart(ch) || isDigit(ch) || ch === '.';
}

export class Lexer {
  private offset = 0;
  private line = 1;
  private col = 1;

  constructor(private source: string) {}

  private pos(): Pos {
    return { offset: this.offset, line: this.line, col: this.col };
  }

  private peek(): string | undefined {
    return this.source[this.offset];
  }

  private peekAt(offset: number): string | undefined {
    return this.source[this.offset + offset];
  }

  private advance(): string {
    const ch = this.source.charAt(this.offset);
    this.offset++;
    if (ch === '\n') {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return ch;
  }

  private located(start: Pos, token: Token): LocatedToken {
    const span: Span = { start, end: this.pos() };
    return { span, token };
  }

  private readWhile(check: (ch: string) => boolean): string {
    const begin = this.offset;
    for (let ch = this.peek(); ch !== undefined && check(ch); ch = this.peek()) {
      this.advance();
    }
    return this.source.slice(begin, this.offset);
  }

  private readInt(start: Pos): LocatedToken {
    const begin = this.offset;
    if (this.peek() === '-') this.advance();
    this.readWhile((ch) => isDigit(ch));
    const value = BigInt(this.source.slice(begin, this.offset));
    if (value < INT_MIN || value > INT_MAX) {
      throw new LexError(start, `integer literal ${value} is out of range`);
    }
    return this.located(start, Token.int(value));
  }

  private readString(start: Pos): LocatedToken {
    this.advance(); // opening "
    let raw = '';
    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        throw new LexError(start, 'unterminated string');
      }
      this.advance();
      if (ch === '"') {
        return this.located(start, Token.string(raw));
      }
      if (ch === '\\') {
        const escaped = this.peek();
        if (escaped === undefined) {
          throw new LexError(start, 'unterminated string');
        }
        if (ESCAPES[escaped] === undefined) {
          throw new LexError(this.pos(), `invalid escape sequence '\\${escaped}'`);
        }
        this.advance();
        raw += ch + escaped;
        continue;
      }
      raw += ch;
    }
  }

  private readName(start: Pos): LocatedToken {
    const name = this.readWhile(isNameChar);
    const keyword = KEYWORDS.get(name);
    return this.located(start, keyword ? keyword() : Token.name(name));
  }

  next(): LocatedToken | null {
    const ch = this.peek();
    if (ch === undefined) return null;
    const start = this.pos();

    if (isWhitespace(ch)) {
      return this.located(start, Token.whitespace(this.readWhile(isWhitespace)));
    }

    if (ch === '-') {
      const following = this.peekAt(1);
      if (following === '-') {
        return this.located(start, Token.comment(this.readWhile((c) => c !== '\n')));
      }
      if (following === '>') {
        this.advance();
        this.advance();
        return this.located(start, Token.arrow());
      }
      if (isDigit(following)) {
        return this.readInt(start);
      }
      throw new LexError(start, `unexpected character '-'`);
    }

    if (ch === '>') {
      if (this.peekAt(1) === '>') {
        this.advance();
        this.advance();
        return this.located(start, Token.forward());
      }
      throw new LexError(start, `unexpected character '>'`);
    }

    if (ch === '"') return this.readString(start);
    if (isDigit(ch)) return this.readInt(start);
    if (isNameStart(ch)) return this.readName(start);

    const punctuation = PUNCTUATION[ch];
    if (punctuation) {
      this.advance();
      return this.located(start, punctuation());
    }

    throw new LexError(start, `unexpected character '${ch}'`);
  }

  /** Every token in source order, whitespace and comments included. */
  tokenize(): LocatedToken[] {
    const tokens: LocatedToken[] = [];
    for (let tok = this.next(); tok !== null; tok = this.next()) {
      tokens.push(tok);
    }
    return tokens;
  }
}

/** The token stream the parser consumes: trivia removed, spans dropped. */
export function tokenize(source: string): Token[] {
  return new Lexer(source)
    .tokenize()
    .map((located) => located.token)
    .filter((token) => !isTrivia(token));
}
