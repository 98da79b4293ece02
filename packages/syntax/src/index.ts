export { Lexer, tokenize, ESCAPES } from './lexer.js';
export { Parser, parse } from './parser.js';
export { prettyElement } from './pretty.js';
export { LexError, ParseError } from './error.js';
export { Token, type LocatedToken, isTrivia, tokenText } from './token.js';
