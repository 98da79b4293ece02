import { WanderError } from '@wander/core';

export class TranslateError extends WanderError {
  constructor(message: string) {
    super(message);
    this.name = 'TranslateError';
  }
}

export class EvalError extends WanderError {
  constructor(message: string) {
    super(message);
    this.name = 'EvalError';
  }
}
