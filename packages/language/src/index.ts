export { Expression, type LetBinding } from './expression.js';
export { translate, express, resolveForwards } from './translate.js';
export { Value, type LambdaValue, type HostApplication, equals } from './value.js';
export { Bindings, type Scope, hostFunctionLambda } from './bindings.js';
export type { WanderType, HostParameter, HostFunctionBinding, HostFunction } from './host.js';
export { type TokenTransformer, type TransformerSource, transform } from './transform.js';
export { evaluate, applyValue, readName, unescapeString } from './eval.js';
export { render, escapeString } from './render.js';
export { prettyExpression } from './pretty.js';
export { TranslateError, EvalError } from './error.js';
export { type Result, type Introspection, run, introspect } from './engine.js';
export { common } from './prelude.js';
