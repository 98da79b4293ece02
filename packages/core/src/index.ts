export type { Pos, Span } from './span.js';
export { WanderError } from './error.js';
export { Element, type LetDecl } from './element.js';
