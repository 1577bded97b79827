import { UnknownOperatorError, CompileTypeError } from '../core/errors.js';
import {
  isOpcode,
  mapOperands,
  numericValueOf,
  operandOf,
  type Expression,
  type OperatorExpression,
} from '../expression/model.js';
import { minus } from '../expression/generators.js';
import { BOUNDARY_COUNT, Boundaries, expandDistance, expandIntersect, robotPoseCm, toBarrier } from './geometry.js';
import { cross2d, dot2d, norm2d, round, toCm, toDeg, toM, toRad } from './vector.js';

/** Values of the model constants, by name. */
export type ConstantValues = ReadonlyMap<string, Expression>;

function nameOperand(expr: OperatorExpression, role: string): string {
  const operand = operandOf(expr, role);
  if (operand.kind !== 'identifier') {
    throw new CompileTypeError(`Operand '${role}' of '${expr.op}' must be a plain name`);
  }
  return operand.name;
}

/**
 * Rewrite macro opcodes into primitive JANI operators.
 * Total on well-formed trees, and expanding the result again changes nothing.
 */
export function expandExpression(expr: Expression, constants: ConstantValues): Expression {
  let boundaries: Boundaries | undefined;
  const boundariesOnce = () => {
    if (!boundaries) {
      const count = constants.get(BOUNDARY_COUNT);
      boundaries = Boundaries.fromConstant(count && count.kind === 'literal' ? numericValueOf(count.value) : undefined);
    }
    return boundaries;
  };

  const expand = (node: Expression): Expression => {
    if (node.kind !== 'operator') return node;
    if (!isOpcode(node.op)) throw new UnknownOperatorError(node.op);
    switch (node.op) {
      case 'intersect':
        return expandIntersect(nameOperand(node, 'robot'), toBarrier(nameOperand(node, 'barrier')), boundariesOnce());
      case 'distance':
        return expandDistance(nameOperand(node, 'robot'), toBarrier(nameOperand(node, 'barrier')), boundariesOnce());
      case 'distance_to_point': {
        const pose = robotPoseCm(nameOperand(node, 'robot'));
        const x = toCm(expand(operandOf(node, 'x')));
        const y = toCm(expand(operandOf(node, 'y')));
        return toM(norm2d(minus(pose.x, x), minus(pose.y, y)));
      }
      default:
        break;
    }
    const inner = mapOperands(node, expand);
    const arg = (role: string) => operandOf(inner, role);
    switch (inner.op) {
      case 'norm2d':
        return norm2d(arg('x'), arg('y'));
      case 'cross2d':
        return cross2d(arg('x1'), arg('y1'), arg('x2'), arg('y2'));
      case 'dot2d':
        return dot2d(arg('x1'), arg('y1'), arg('x2'), arg('y2'));
      case 'round':
        return round(arg('exp'));
      case 'to_cm':
        return toCm(arg('exp'));
      case 'to_m':
        return toM(arg('exp'));
      case 'to_deg':
        return toDeg(arg('exp'));
      case 'to_rad':
        return toRad(arg('exp'));
      default:
        return inner;
    }
  };

  return expand(expr);
}
