import {
  binary,
  boolLiteral,
  identifier,
  operator,
  unary,
  type Expression,
  type OperatorExpression,
} from './model.js';

/** Strings are taken as identifiers. */
export type ExprLike = Expression | string;

export function toExpression(value: ExprLike): Expression {
  return typeof value === 'string' ? identifier(value) : value;
}

export const and = (left: ExprLike, right: ExprLike) => binary('∧', toExpression(left), toExpression(right));
export const or = (left: ExprLike, right: ExprLike) => binary('∨', toExpression(left), toExpression(right));
export const not = (exp: ExprLike) => unary('¬', toExpression(exp));
export const eq = (left: ExprLike, right: ExprLike) => binary('=', toExpression(left), toExpression(right));
export const lt = (left: ExprLike, right: ExprLike) => binary('<', toExpression(left), toExpression(right));
export const gt = (left: ExprLike, right: ExprLike) => binary('>', toExpression(left), toExpression(right));
export const ge = (left: ExprLike, right: ExprLike) => binary('≥', toExpression(left), toExpression(right));

export const plus = (left: ExprLike, right: ExprLike) => binary('+', toExpression(left), toExpression(right));
export const minus = (left: ExprLike, right: ExprLike) => binary('-', toExpression(left), toExpression(right));
export const times = (left: ExprLike, right: ExprLike) => binary('*', toExpression(left), toExpression(right));
export const divide = (left: ExprLike, right: ExprLike) => binary('/', toExpression(left), toExpression(right));
export const modulo = (left: ExprLike, right: ExprLike) => binary('%', toExpression(left), toExpression(right));
export const power = (left: ExprLike, right: ExprLike) => binary('pow', toExpression(left), toExpression(right));
export const minimum = (left: ExprLike, right: ExprLike) => binary('min', toExpression(left), toExpression(right));
export const maximum = (left: ExprLike, right: ExprLike) => binary('max', toExpression(left), toExpression(right));
export const absolute = (exp: ExprLike) => unary('abs', toExpression(exp));
export const floorOf = (exp: ExprLike) => unary('floor', toExpression(exp));

export function ite(cond: ExprLike, then: ExprLike, otherwise: ExprLike): OperatorExpression {
  return operator('ite', { if: toExpression(cond), then: toExpression(then), else: toExpression(otherwise) });
}

/** Left-folded conjunction; `true` when there is nothing to conjoin. */
export function conjunction(parts: readonly Expression[]): Expression {
  const [first, ...rest] = parts;
  if (!first) return boolLiteral(true);
  return rest.reduce<Expression>((acc, part) => and(acc, part), first);
}
