import { CompileTypeError } from '../core/errors.js';
import { expressionToJson, type JaniOperand } from './json.js';
import { operandOf, type ArrayValue, type Expression, type NumericBase, type Value } from './model.js';

export type BasicType = 'bool' | 'int' | 'real';

export interface BoundedType {
  readonly kind: 'bounded';
  readonly base: NumericBase;
  readonly lowerBound?: Expression;
  readonly upperBound?: Expression;
}

export interface ArrayType {
  readonly kind: 'array';
  readonly base: NumericBase;
  /** Capacity of each dimension, outermost first. */
  readonly maxSizes: readonly number[];
}

export type DataType = BasicType | BoundedType | ArrayType;

export type JaniType = BasicType | { kind: 'bounded'; base: NumericBase; 'lower-bound'?: JaniOperand; 'upper-bound'?: JaniOperand } | { kind: 'array'; base: JaniType };

export function isArrayType(type: DataType): type is ArrayType {
  return typeof type !== 'string' && type.kind === 'array';
}

/** The scalar type a value of `type` behaves as in arithmetic. */
export function scalarOf(type: DataType): BasicType {
  return typeof type === 'string' ? type : type.base;
}

export function describeType(type: DataType): string {
  if (typeof type === 'string') return type;
  if (type.kind === 'bounded') return `bounded ${type.base}`;
  return `${type.base}${type.maxSizes.map((size) => `[${size}]`).join('')}`;
}

export function dataTypeToJson(type: DataType): JaniType {
  if (typeof type === 'string') return type;
  if (type.kind === 'bounded') {
    return {
      kind: 'bounded',
      base: type.base,
      ...(type.lowerBound ? { 'lower-bound': expressionToJson(type.lowerBound) } : {}),
      ...(type.upperBound ? { 'upper-bound': expressionToJson(type.upperBound) } : {}),
    };
  }
  let json: JaniType = type.base;
  for (let i = 0; i < type.maxSizes.length; i++) json = { kind: 'array', base: json };
  return json;
}

/** Type of an array literal, sized by its own extent. */
export function arrayTypeOf(value: ArrayValue): ArrayType {
  const sizes: number[] = [];
  let level: ArrayValue | undefined = value;
  while (level) {
    sizes.push(level.elements.length);
    const first: ArrayValue['elements'][number] | undefined = level.elements[0];
    level = first && first.type === 'array' ? first : undefined;
  }
  return { kind: 'array', base: value.base, maxSizes: sizes };
}

export function valueType(value: Value): DataType {
  switch (value.type) {
    case 'bool':
    case 'int':
    case 'real':
      return value.type;
    case 'constant':
      return 'real';
    case 'array':
      return arrayTypeOf(value);
  }
}

/** Join of two numeric types: int only if both are int. */
function numericJoin(a: BasicType, b: BasicType): BasicType {
  return a === 'int' && b === 'int' ? 'int' : 'real';
}

export type TypeLookup = (name: string) => DataType | undefined;

const BOOLEAN_OPS = new Set(['∧', '∨', '⇒', '¬', '=', '≠', '<', '≤', '>', '≥']);
const REAL_OPS = new Set(['/', 'pow', 'log', 'sin', 'cos', 'to_m', 'to_rad', 'norm2d', 'dot2d', 'cross2d', 'intersect', 'distance', 'distance_to_point']);
const INT_OPS = new Set(['floor', 'ceil', 'round', 'to_cm', 'to_deg']);

/**
 * Static type of `expr`; `undefined` when it references a name `lookup`
 * does not know.
 */
export function inferType(expr: Expression, lookup: TypeLookup): DataType | undefined {
  switch (expr.kind) {
    case 'identifier':
      return lookup(expr.name);
    case 'literal':
      return valueType(expr.value);
    case 'distribution':
      return 'real';
    case 'operator':
      break;
  }
  const { op } = expr;
  if (BOOLEAN_OPS.has(op)) return 'bool';
  if (REAL_OPS.has(op)) return 'real';
  if (INT_OPS.has(op)) return 'int';
  const scalar = (role: string): BasicType | undefined => {
    const type = inferType(operandOf(expr, role), lookup);
    return type === undefined ? undefined : scalarOf(type);
  };
  switch (op) {
    case '+':
    case '-':
    case '*':
    case '%':
    case 'min':
    case 'max': {
      const left = scalar('left');
      const right = scalar('right');
      return left && right ? numericJoin(left, right) : undefined;
    }
    case 'abs':
      return scalar('exp');
    case 'ite': {
      const then = inferType(operandOf(expr, 'then'), lookup);
      const otherwise = inferType(operandOf(expr, 'else'), lookup);
      if (!then || !otherwise) return then ?? otherwise;
      if (isArrayType(then) || isArrayType(otherwise)) return then;
      const a = scalarOf(then);
      const b = scalarOf(otherwise);
      if (a === b) return a;
      return a === 'bool' || b === 'bool' ? undefined : 'real';
    }
    case 'aa': {
      const base = inferType(operandOf(expr, 'exp'), lookup);
      if (!base) return undefined;
      if (!isArrayType(base)) throw new CompileTypeError(`Cannot index a value of type ${describeType(base)}`);
      const rest = base.maxSizes.slice(1);
      return rest.length === 0 ? base.base : { kind: 'array', base: base.base, maxSizes: rest };
    }
    case 'av': {
      const elements = operandOf(expr, 'elements');
      return elements.kind === 'literal' ? valueType(elements.value) : undefined;
    }
    case 'ac': {
      const element = inferType(operandOf(expr, 'exp'), lookup);
      if (!element) return undefined;
      return isArrayType(element)
        ? { kind: 'array', base: element.base, maxSizes: [0, ...element.maxSizes] }
        : { kind: 'array', base: scalarOf(element) === 'real' ? 'real' : 'int', maxSizes: [0] };
    }
    default:
      return undefined;
  }
}

/**
 * Type of a field that received values of both `a` and `b`:
 * int and real widen to real, anything else must match.
 */
export function unifyTypes(a: DataType, b: DataType): DataType | undefined {
  if (isArrayType(a) || isArrayType(b)) {
    if (!isArrayType(a) || !isArrayType(b) || a.maxSizes.length !== b.maxSizes.length) return undefined;
    if (a.base === b.base) return a;
    return { kind: 'array', base: 'real', maxSizes: a.maxSizes };
  }
  const sa = scalarOf(a);
  const sb = scalarOf(b);
  if (sa === sb) return a;
  if (sa === 'bool' || sb === 'bool') return undefined;
  return 'real';
}
