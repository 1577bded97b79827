import { CompileTypeError, ExpressionSyntaxError } from '../core/errors.js';
import { mapExpressionParserError } from '../core/diagnostics.js';
import { parseWithChevrotain } from '../core/pipeline.js';
import type { Diagnostic } from '../core/types.js';
import { fitArrayValue, type ArrayShape } from './arrays.js';
import { tokenize } from './lexer.js';
import { arrayValue, renameEventData, type ArrayValue, type Expression } from './model.js';
import { parse } from './parser.js';
import { analyzeExpression, arrayValueOf, type LiteralArrayKind } from './semantics.js';

export interface ParseExpressionOptions {
  /** Target shape when the expression is assigned to (or initialises) an array. */
  arrayShape?: ArrayShape;
  /** Event whose payload `_event.data.*` refers to. */
  eventDataPrefix?: string;
  /** Zero-fill array literals up to the shape's capacity. Defaults to true. */
  pad?: boolean;
}

/** An expression as written, before any target shape is applied. */
export interface ParsedSource {
  source: string;
  expr: Expression;
  /** Set when the whole expression is an array or string literal. */
  literal?: { kind: LiteralArrayKind; value: ArrayValue };
}

/** Lexer and parser diagnostics for `source`; empty when it is well formed. */
export function validateExpression(source: string): Diagnostic[] {
  return parseWithChevrotain(source, { tokenize, parse, mapParserError: mapExpressionParserError }).errors;
}

export function parseSource(source: string): ParsedSource {
  const { cst, errors } = parseWithChevrotain(source, { tokenize, parse, mapParserError: mapExpressionParserError });
  if (!cst) {
    throw new ExpressionSyntaxError(source, errors);
  }
  const { expr, literalKind } = analyzeExpression(cst);
  const value = literalKind ? arrayValueOf(expr) : undefined;
  return { source, expr, ...(literalKind && value ? { literal: { kind: literalKind, value } } : {}) };
}

/** Check a literal against `shape`; strings only fit one-dimensional int arrays. */
export function fitLiteral(parsed: ParsedSource, shape: ArrayShape, pad = true): ArrayValue {
  if (!parsed.literal) {
    throw new CompileTypeError(`'${parsed.source}' is not an array literal`);
  }
  if (parsed.literal.kind === 'string' && (shape.base !== 'int' || shape.maxSizes.length !== 1)) {
    throw new CompileTypeError(`String '${parsed.source}' can only be stored in a one-dimensional int array`);
  }
  return fitArrayValue(parsed.literal.value, shape, pad);
}

export function parseExpression(source: string, options: ParseExpressionOptions = {}): Expression {
  const parsed = parseSource(source);
  if (parsed.literal && options.arrayShape) {
    return arrayValue(fitLiteral(parsed, options.arrayShape, options.pad ?? true));
  }
  if (parsed.literal?.kind === 'string') {
    throw new CompileTypeError(`String '${source}' is only allowed where an int array is expected`);
  }
  return renameEventData(parsed.expr, options.eventDataPrefix);
}
