import type { Bindings } from './bindings.js';
import type { Value } from './value.js';

/** Descriptive type names. Nothing checks them at run time. */
export type WanderType =
  | 'Any'
  | 'Boolean'
  | 'Int'
  | 'String'
  | 'Nothing'
  | 'Lambda'
  | 'List'
  | 'Tuple'
  | 'Set'
  | 'Record'
  | 'HostValue';

export interface HostParameter {
  name: string;
  type: WanderType;
}

export interface HostFunctionBinding {
  /** Qualified, dotted name, e.g. `Bool.and`. */
  name: string;
  parameters: readonly HostParameter[];
  result: WanderType;
  docString: string;
}

/**
 * A function supplied by the embedding application. `run` receives exactly
 * `binding.parameters.length` arguments and throws a `WanderError` to reject
 * them.
 */
export interface HostFunction {
  readonly binding: HostFunctionBinding;
  run(args: readonly Value[], bindings: Bindings): Value;
}
