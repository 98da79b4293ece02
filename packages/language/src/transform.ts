import type { Token } from '@wander/syntax';
import type { Bindings } from './bindings.js';

/**
 * A pure rewrite of the token stream, run before parsing. It rejects a stream
 * by throwing a `WanderError`.
 */
export type TokenTransformer = (tokens: readonly Token[]) => Token[];

/** The part of `Bindings` the token stage reads. */
export type TransformerSource = Pick<Bindings, 'tokenTransformers'>;

/** Runs every registered transformer over `tokens`, in registration order. */
export function transform(tokens: readonly Token[], bindings: TransformerSource): Token[] {
  let result = [...tokens];
  for (const [, transformer] of bindings.tokenTransformers()) {
    result = transformer(result);
  }
  return result;
}
