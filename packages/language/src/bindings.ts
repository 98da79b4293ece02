import { Expression } from './expression.js';
import type { HostFunction, HostFunctionBinding } from './host.js';
import type { TokenTransformer } from './transform.js';
import { Value, type LambdaValue } from './value.js';

export type Scope = Map<string, Value>;

/**
 * Curried lambda standing in for a host function that has received `args` so
 * far. Returns `null` once no parameters remain, when the function is ready
 * to run.
 */
export function hostFunctionLambda(
  binding: HostFunctionBinding,
  args: readonly Value[],
): LambdaValue | null {
  const param = binding.parameters[args.length];
  if (param === undefined) return null;
  const output = args.length + 1 === binding.parameters.length ? binding.result : 'Lambda';
  return Value.Lambda(param.name, param.type, output, Expression.HostFunction(binding.name), [], {
    name: binding.name,
    args,
  });
}

/**
 * The environment a script runs in: a stack of scopes (innermost last) plus
 * the host function and token transformer registries.
 */
export class Bindings {
  private readonly root: Scope = new Map();
  private scopes: Scope[] = [this.root];
  private readonly hostFunctions = new Map<string, HostFunction>();
  private readonly transformers = new Map<string, TokenTransformer>();

  /** Number of scopes currently on the stack. */
  get depth(): number {
    return this.scopes.length;
  }

  addScope(): void {
    this.scopes.push(new Map());
  }

  removeScope(): void {
    if (this.scopes.length <= 1) {
      throw new Error('internal error: attempted to remove the root scope');
    }
    this.scopes.pop();
  }

  read(name: string): Value | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const value = this.scopes[i]?.get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  bind(name: string, value: Value): void {
    const scope = this.scopes[this.scopes.length - 1] ?? this.root;
    scope.set(name, value);
  }

  // ── Host functions ─────────────────────────────────────────────

  bindHostFunction(fn: HostFunction): void {
    const { name } = fn.binding;
    this.hostFunctions.set(name, fn);
    const lambda = hostFunctionLambda(fn.binding, []);
    if (lambda !== null) {
      this.root.set(name, lambda);
    }
  }

  readHostFunction(name: string): HostFunction | undefined {
    return this.hostFunctions.get(name);
  }

  /** Value a host function name resolves to when nothing in scope shadows it. */
  hostFunctionValue(fn: HostFunction): LambdaValue | null {
    return hostFunctionLambda(fn.binding, []);
  }

  /** Documentation of every host function, sorted by name. */
  environment(): HostFunctionBinding[] {
    return [...this.hostFunctions.values()]
      .map((fn) => fn.binding)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  // ── Token transformers ─────────────────────────────────────────

  /** Replacing a transformer moves it to the end of the run order. */
  bindTokenTransformer(module: string, name: string, transformer: TokenTransformer): void {
    const key = `${module}.${name}`;
    this.transformers.delete(key);
    this.transformers.set(key, transformer);
  }

  readTokenTransformer(name: string): TokenTransformer | undefined {
    return this.transformers.get(name);
  }

  /** Registered transformers in registration order. */
  tokenTransformers(): [string, TokenTransformer][] {
    return [...this.transformers];
  }

  boundNames(): Set<string> {
    const names = new Set<string>(this.hostFunctions.keys());
    for (const scope of this.scopes) {
      for (const name of scope.keys()) {
        names.add(name);
      }
    }
    return names;
  }

  // ── Closures ───────────────────────────────────────────────────

  /** The current scope chain, for a lambda to close over. */
  capture(): readonly Scope[] {
    return [...this.scopes];
  }

  /**
   * Runs `body` with `chain` plus one fresh scope as the scope stack, then
   * puts the caller's stack back, whether `body` returns or throws.
   */
  withScopes<T>(chain: readonly Scope[], body: () => T): T {
    const saved = this.scopes;
    this.scopes = [...chain, new Map()];
    try {
      return body();
    } finally {
      this.scopes = saved;
    }
  }
}
