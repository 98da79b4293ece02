import { WanderError, type Pos } from '@wander/core';

export class LexError extends WanderError {
  constructor(
    public pos: Pos,
    message: string,
  ) {
    super(`Lex error at ${pos.line}:${pos.col}: ${message}`);
    this.name = 'LexError';
  }
}

export class ParseError extends WanderError {
  constructor(message: string) {
    super(`Parse error: ${message}`);
    this.name = 'ParseError';
  }
}
