import { Buffer } from 'node:buffer';
import { CompileTypeError, UnsupportedConstructError } from '../core/errors.js';
import {
  arrayAccess,
  identifier,
  operandOf,
  type ArrayElement,
  type ArrayValue,
  type Expression,
  type NumericBase,
} from './model.js';

/** Base type and per-dimension capacity of a fixed-size array target. */
export interface ArrayShape {
  readonly base: NumericBase;
  readonly maxSizes: readonly number[];
}

export function lengthVariableName(name: string, dimension: number): string {
  return `${name}.d${dimension}_len`;
}

export interface AccessChain {
  root: string;
  /** Index expressions, outermost array first. */
  indexes: Expression[];
}

/** Decompose `a[i][j]` into `{ root: 'a', indexes: [i, j] }`. Plain identifiers have no indexes. */
export function accessChainOf(expr: Expression): AccessChain | undefined {
  if (expr.kind === 'identifier') return { root: expr.name, indexes: [] };
  if (expr.kind !== 'operator' || expr.op !== 'aa') return undefined;
  const inner = accessChainOf(operandOf(expr, 'exp'));
  if (!inner) return undefined;
  return { root: inner.root, indexes: [...inner.indexes, operandOf(expr, 'index')] };
}

/**
 * Length of dimension `dimension` of `root`, for the sub-array selected by
 * the first `dimension - 1` indexes.
 */
export function dimensionLength(root: string, dimension: number, indexes: readonly Expression[]): Expression {
  let ref: Expression = identifier(lengthVariableName(root, dimension));
  for (const index of indexes.slice(0, dimension - 1)) {
    ref = arrayAccess(ref, index);
  }
  return ref;
}

/**
 * What `.length` reads on `target`: `x.length` is dimension 1 of `x`,
 * `x[i].length` dimension 2 of `x` at row `i`, and so on by chain depth.
 */
export function lengthReference(target: Expression): Expression {
  const chain = accessChainOf(target);
  if (!chain) {
    throw new UnsupportedConstructError("'.length' is only supported on variables and array element accesses");
  }
  return dimensionLength(chain.root, chain.indexes.length + 1, chain.indexes);
}

export function zeroElement(base: NumericBase, sizes: readonly number[]): ArrayElement {
  if (sizes.length === 0) return { type: base, value: 0 };
  return zeroArray(base, sizes);
}

export function zeroArray(base: NumericBase, sizes: readonly number[]): ArrayValue {
  const [size = 0, ...rest] = sizes;
  return { type: 'array', base, elements: Array.from({ length: size }, () => zeroElement(base, rest)) };
}

/**
 * Check a literal against its target shape and, with `pad`, zero-fill every
 * dimension up to its capacity.
 */
export function fitArrayValue(value: ArrayValue, shape: ArrayShape, pad = true): ArrayValue {
  return fitLevel(value, shape.base, shape.maxSizes, pad);
}

function fitLevel(value: ArrayValue, base: NumericBase, sizes: readonly number[], pad: boolean): ArrayValue {
  const [size, ...rest] = sizes;
  if (size === undefined) {
    throw new CompileTypeError('Array literal has more dimensions than its target');
  }
  if (value.elements.length > size) {
    throw new CompileTypeError(`Array literal has ${value.elements.length} elements but the target holds at most ${size}`);
  }
  const elements = value.elements.map((el): ArrayElement => {
    if (rest.length === 0) {
      if (el.type === 'array') throw new CompileTypeError('Array literal has more dimensions than its target');
      if (el.type === 'real' && base === 'int') {
        throw new CompileTypeError(`Real value ${el.value} cannot be stored in an int array`);
      }
      return { type: base, value: el.value };
    }
    if (el.type !== 'array') throw new CompileTypeError('Array literal has fewer dimensions than its target');
    return fitLevel(el, base, rest, pad);
  });
  if (pad) {
    while (elements.length < size) elements.push(zeroElement(base, rest));
  }
  return { type: 'array', base, elements };
}

/**
 * Initial values of the length variables of an unpadded literal:
 * an int for dimension 1, then int arrays shaped like the leading dimensions.
 */
export function literalLengths(value: ArrayValue, shape: ArrayShape): ArrayElement[] {
  return shape.maxSizes.map((_, i) => lengthsOfDimension(value, i + 1, shape.maxSizes));
}

function lengthsOfDimension(value: ArrayValue, dimension: number, sizes: readonly number[]): ArrayElement {
  if (dimension === 1) return { type: 'int', value: value.elements.length };
  const [size = 0, ...rest] = sizes;
  const inner = rest.slice(0, dimension - 2);
  const elements = value.elements.map((el) => {
    if (el.type !== 'array') throw new CompileTypeError('Array literal has fewer dimensions than its target');
    return lengthsOfDimension(el, dimension - 1, rest);
  });
  while (elements.length < size) elements.push(zeroElement('int', inner));
  return { type: 'array', base: 'int', elements };
}

/** UTF-8 bytes of `text`, as stored in an int array. */
export function encodeString(text: string): ArrayValue {
  return {
    type: 'array',
    base: 'int',
    elements: [...Buffer.from(text, 'utf8')].map((code) => ({ type: 'int' as const, value: code })),
  };
}

export function arrayDepth(value: ArrayValue): number {
  const first = value.elements[0];
  return first && first.type === 'array' ? 1 + arrayDepth(first) : 1;
}
