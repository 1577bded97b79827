import { ModelError } from '../core/errors.js';
import { lengthVariableName, zeroArray } from '../expression/arrays.js';
import { arrayValue, boolLiteral, intLiteral, literal, realLiteral, type ArrayElement, type Expression } from '../expression/model.js';
import type { ArrayType, DataType } from '../expression/types.js';

export interface Variable {
  readonly name: string;
  readonly type: DataType;
  readonly initialValue: Expression;
  readonly transient: boolean;
}

export interface Constant {
  readonly name: string;
  readonly type: DataType;
  readonly value: Expression;
}

/** `false`, `0`, `0.0` or a zero-filled array. */
export function defaultValue(type: DataType): Expression {
  if (typeof type === 'string') {
    switch (type) {
      case 'bool':
        return boolLiteral(false);
      case 'int':
        return intLiteral(0);
      case 'real':
        return realLiteral(0);
    }
  }
  if (type.kind === 'bounded') return type.base === 'int' ? intLiteral(0) : realLiteral(0);
  return arrayValue(zeroArray(type.base, type.maxSizes));
}

export function createVariable(name: string, type: DataType, initialValue?: Expression, transient = false): Variable {
  if (typeof type !== 'string' && type.kind === 'array' && type.maxSizes.some((size) => !Number.isInteger(size) || size <= 0)) {
    throw new ModelError(`Array variable '${name}' needs a positive size in every dimension`);
  }
  return { name, type, initialValue: initialValue ?? defaultValue(type), transient };
}

/** Type of `<name>.dK_len`: an int for K = 1, else an int array over the first K-1 dimensions. */
export function lengthVariableType(type: ArrayType, dimension: number): DataType {
  return dimension === 1 ? 'int' : { kind: 'array', base: 'int', maxSizes: type.maxSizes.slice(0, dimension - 1) };
}

/**
 * Length companions of an array variable, one per dimension.
 * `lengths` holds their initial values (see `literalLengths`); zero when absent.
 */
export function lengthVariables(name: string, type: ArrayType, lengths?: readonly ArrayElement[], transient = false): Variable[] {
  return type.maxSizes.map((_, i) => {
    const dimension = i + 1;
    const lengthType = lengthVariableType(type, dimension);
    const init = lengths?.[i];
    const initialValue = init === undefined ? undefined : init.type === 'array' ? arrayValue(init) : literal(init);
    return createVariable(lengthVariableName(name, dimension), lengthType, initialValue, transient);
  });
}
