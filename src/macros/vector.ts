import { divide, floorOf, modulo, plus, power, minus, times, type ExprLike } from '../expression/generators.js';
import { constantLiteral, intLiteral, realLiteral, type Expression } from '../expression/model.js';

export const norm2d = (x: ExprLike, y: ExprLike): Expression => power(plus(times(x, x), times(y, y)), realLiteral(0.5));

export const cross2d = (x1: ExprLike, y1: ExprLike, x2: ExprLike, y2: ExprLike): Expression => minus(times(x1, y2), times(y1, x2));

export const dot2d = (x1: ExprLike, y1: ExprLike, x2: ExprLike, y2: ExprLike): Expression => plus(times(x1, x2), times(y1, y2));

export const round = (value: ExprLike): Expression => floorOf(plus(value, realLiteral(0.5)));

export const toCm = (value: ExprLike): Expression => round(times(value, realLiteral(100.0)));

export const toM = (value: ExprLike): Expression => times(value, realLiteral(0.01));

export const toDeg = (value: ExprLike): Expression =>
  modulo(round(times(value, divide(intLiteral(180), constantLiteral('π')))), intLiteral(360));

export const toRad = (value: ExprLike): Expression => times(value, divide(constantLiteral('π'), intLiteral(180)));
