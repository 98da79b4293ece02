import { Bindings } from './bindings.js';
import { EvalError } from './error.js';
import { applyValue } from './eval.js';
import type { HostFunction, HostFunctionBinding } from './host.js';
import { Value, equals } from './value.js';

function booleans(name: string, args: readonly Value[]): boolean[] {
  return args.map((arg) => {
    if (arg.tag !== 'Boolean') {
      throw new EvalError(`\`${name}\` function requires boolean parameters.`);
    }
    return arg.value;
  });
}

class EqFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'Core.eq',
    parameters: [
      { name: 'left', type: 'Any' },
      { name: 'right', type: 'Any' },
    ],
    result: 'Boolean',
    docString: 'Check if two values are equal.',
  };

  run([left, right]: readonly Value[]): Value {
    if (left === undefined || right === undefined) {
      throw new EvalError('`Core.eq` function requires two parameters.');
    }
    return Value.Boolean(equals(left, right));
  }
}

class AssertEqFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'Assert.assertEq',
    parameters: [
      { name: 'value', type: 'Any' },
      { name: 'expected', type: 'Any' },
    ],
    result: 'Nothing',
    docString: 'Assert that two values are equal.',
  };

  run([value, expected]: readonly Value[]): Value {
    if (value === undefined || expected === undefined) {
      throw new EvalError('`Assert.assertEq` function requires two parameters.');
    }
    if (!equals(value, expected)) {
      throw new EvalError('Assertion failed!');
    }
    return Value.Nothing();
  }
}

class AndFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'Bool.and',
    parameters: [
      { name: 'left', type: 'Boolean' },
      { name: 'right', type: 'Boolean' },
    ],
    result: 'Boolean',
    docString: 'Check if two boolean values are both true.',
  };

  run(args: readonly Value[]): Value {
    return Value.Boolean(booleans(this.binding.name, args).every(Boolean));
  }
}

class OrFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'Bool.or',
    parameters: [
      { name: 'left', type: 'Boolean' },
      { name: 'right', type: 'Boolean' },
    ],
    result: 'Boolean',
    docString: 'Check if at least one of two boolean values is true.',
  };

  run(args: readonly Value[]): Value {
    return Value.Boolean(booleans(this.binding.name, args).some(Boolean));
  }
}

class NotFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'Bool.not',
    parameters: [{ name: 'value', type: 'Boolean' }],
    result: 'Boolean',
    docString: 'Return the opposite of the boolean value passed.',
  };

  run([value]: readonly Value[]): Value {
    if (value?.tag !== 'Boolean') {
      throw new EvalError('`Bool.not` function requires one boolean parameter.');
    }
    return Value.Boolean(!value.value);
  }
}

class AtFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'List.at',
    parameters: [
      { name: 'offset', type: 'Int' },
      { name: 'list', type: 'List' },
    ],
    result: 'Any',
    docString: 'Get the value at a given location.',
  };

  run([offset, list]: readonly Value[]): Value {
    if (offset?.tag !== 'Int' || list?.tag !== 'List') {
      throw new EvalError('`List.at` function requires an int and a list.');
    }
    const element = offset.value < 0n ? undefined : list.elements[Number(offset.value)];
    if (element === undefined) {
      throw new EvalError(
        `\`List.at\` offset ${offset.value} is out of bounds for a list of length ${list.elements.length}.`,
      );
    }
    return element;
  }
}

class LengthFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'List.length',
    parameters: [{ name: 'list', type: 'List' }],
    result: 'Int',
    docString: 'Count the values in a list.',
  };

  run([list]: readonly Value[]): Value {
    if (list?.tag !== 'List') {
      throw new EvalError('`List.length` function requires a list.');
    }
    return Value.Int(BigInt(list.elements.length));
  }
}

class MapFunction implements HostFunction {
  readonly binding: HostFunctionBinding = {
    name: 'List.map',
    parameters: [
      { name: 'fn', type: 'Lambda' },
      { name: 'list', type: 'List' },
    ],
    result: 'List',
    docString: 'Apply a function to every value in a list.',
  };

  run([fn, list]: readonly Value[], bindings: Bindings): Value {
    if (fn?.tag !== 'Lambda' || list?.tag !== 'List') {
      throw new EvalError('`List.map` function requires a function and a list.');
    }
    const lambda: Value = fn;
    return Value.List(list.elements.map((element) => applyValue(lambda, [element], bindings)));
  }
}

/** Bindings preloaded with the functions every script can rely on. */
export function common(): Bindings {
  const bindings = new Bindings();
  bindings.bindHostFunction(new EqFunction());
  bindings.bindHostFunction(new AssertEqFunction());
  bindings.bindHostFunction(new AndFunction());
  bindings.bindHostFunction(new OrFunction());
  bindings.bindHostFunction(new NotFunction());
  bindings.bindHostFunction(new AtFunction());
  bindings.bindHostFunction(new LengthFunction());
  bindings.bindHostFunction(new MapFunction());
  return bindings;
}
