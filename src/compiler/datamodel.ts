import type { Automaton } from '../automaton/automaton.js';
import { createVariable, lengthVariables, type Variable } from '../automaton/variable.js';
import { CompileTypeError } from '../core/errors.js';
import { lengthVariableName, literalLengths } from '../expression/arrays.js';
import { arrayValue, identifier, intLiteral, realLiteral, type Expression, type NumericBase } from '../expression/model.js';
import { fitLiteral, parseExpression, parseSource } from '../expression/parse.js';
import { describeType, inferType, isArrayType, scalarOf, type ArrayType, type DataType, type TypeLookup } from '../expression/types.js';
import type { ChartData } from '../chart/types.js';

const TYPE_PATTERN = /^(bool|u?int(?:8|16|32|64)|float(?:32|64)|string)((?:\[\d*\])*)$/;

export interface DeclaredType {
  type: DataType;
  /** Declared as `string`: an int array of UTF-8 bytes. */
  string: boolean;
}

function baseOf(name: string): 'bool' | NumericBase {
  if (name === 'bool') return 'bool';
  return name.startsWith('float') ? 'real' : 'int';
}

/**
 * Map a declared type such as `int32`, `float64[3][]` or `string` to a JANI
 * type. Unsized dimensions take `maxArraySize`.
 */
export function parseTypeString(text: string, maxArraySize: number): DeclaredType {
  const match = TYPE_PATTERN.exec(text.replace(/\s+/g, ''));
  const [, name, suffix = ''] = match ?? [];
  if (!name) {
    throw new CompileTypeError(`Unknown data type '${text}'`, {
      hint: 'Use bool, int8..int64, uint8..uint64, float32, float64 or string, optionally followed by [N] or [].',
    });
  }
  const sizes = [...suffix.matchAll(/\[(\d*)\]/g)].map(([, size]) => (size ? Number(size) : maxArraySize));
  if (name === 'string') {
    if (sizes.length > 0) throw new CompileTypeError(`Arrays of strings are not supported: '${text}'`);
    return { type: { kind: 'array', base: 'int', maxSizes: [maxArraySize] }, string: true };
  }
  const base = baseOf(name);
  if (sizes.length === 0) return { type: base, string: false };
  if (base === 'bool') throw new CompileTypeError(`Arrays of bool are not supported: '${text}'`);
  return { type: { kind: 'array', base, maxSizes: sizes }, string: false };
}

function boundExpression(bound: string | number, base: NumericBase): Expression {
  if (typeof bound === 'string') return parseExpression(bound);
  if (base === 'int') {
    if (!Number.isInteger(bound)) throw new CompileTypeError(`Bound ${bound} of an int variable must be an integer`);
    return intLiteral(bound);
  }
  return realLiteral(bound);
}

function withBounds(data: ChartData, type: DataType): DataType {
  if (data.lowerBound === undefined && data.upperBound === undefined) return type;
  if (typeof type !== 'string' || type === 'bool') {
    throw new CompileTypeError(`Bounds are only allowed on int and real variables, not on ${describeType(type)}`);
  }
  return {
    kind: 'bounded',
    base: type,
    ...(data.lowerBound !== undefined ? { lowerBound: boundExpression(data.lowerBound, type) } : {}),
    ...(data.upperBound !== undefined ? { upperBound: boundExpression(data.upperBound, type) } : {}),
  };
}

function arrayDeclaration(data: ChartData, type: ArrayType, lookup: TypeLookup): Variable[] {
  if (data.expr === undefined) {
    return [createVariable(data.id, type), ...lengthVariables(data.id, type)];
  }
  const parsed = parseSource(data.expr);
  if (parsed.literal) {
    const init = arrayValue(fitLiteral(parsed, type));
    const lengths = literalLengths(fitLiteral(parsed, type, false), type);
    return [createVariable(data.id, type, init), ...lengthVariables(data.id, type, lengths)];
  }
  if (parsed.expr.kind === 'identifier') {
    const source = parsed.expr.name;
    const sourceType = lookup(source);
    if (!sourceType || !isArrayType(sourceType) || sourceType.maxSizes.length !== type.maxSizes.length) {
      throw new CompileTypeError(`'${data.id}' can only be initialised from an array with ${type.maxSizes.length} dimension(s)`);
    }
    const companions = lengthVariables(data.id, type).map((companion, i) =>
      createVariable(companion.name, companion.type, identifier(lengthVariableName(source, i + 1)))
    );
    return [createVariable(data.id, type, parsed.expr), ...companions];
  }
  return [createVariable(data.id, type, parsed.expr), ...lengthVariables(data.id, type)];
}

function scalarDeclaration(data: ChartData, type: DataType, lookup: TypeLookup): Variable {
  if (data.expr === undefined) return createVariable(data.id, type);
  const init = parseExpression(data.expr);
  const valueType = inferType(init, lookup);
  if (valueType) {
    const expected = scalarOf(type);
    const actual = isArrayType(valueType) ? undefined : scalarOf(valueType);
    const fits = actual === expected || (expected === 'real' && actual === 'int');
    if (!fits) {
      throw new CompileTypeError(`Initial value '${data.expr}' of '${data.id}' is ${describeType(valueType)}, expected ${describeType(type)}`);
    }
  }
  return createVariable(data.id, type, init);
}

/** Variables of one datamodel entry: the variable itself, then any length companions. */
export function dataVariables(data: ChartData, maxArraySize: number, lookup: TypeLookup): Variable[] {
  const { type } = parseTypeString(data.type, maxArraySize);
  if (isArrayType(type)) {
    if (data.lowerBound !== undefined || data.upperBound !== undefined) {
      throw new CompileTypeError(`Bounds are only allowed on int and real variables, not on ${describeType(type)}`);
    }
    return arrayDeclaration(data, type, lookup);
  }
  return [scalarDeclaration(data, withBounds(data, type), lookup)];
}

export function declareData(automaton: Automaton, data: readonly ChartData[], maxArraySize: number, lookup: TypeLookup): void {
  for (const entry of data) {
    for (const variable of dataVariables(entry, maxArraySize, lookup)) automaton.addVariable(variable);
  }
}
