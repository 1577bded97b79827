import { CompileTypeError, UnsupportedConstructError, type CompileErrorOptions } from '../core/errors.js';
import {
  constantLiteral,
  operatorOf,
  rolesOf,
  uniform,
  type Expression,
  type NamedConstant,
  type Opcode,
} from './model.js';

interface CallForm {
  callee: string;
  op: Opcode;
  /** Roles that only accept a plain identifier (robot and barrier names). */
  identifierRoles?: readonly string[];
  /** Value of the last role when the caller leaves it out. */
  defaultLast?: () => Expression;
}

const CALL_FORMS: readonly CallForm[] = [
  { callee: 'Math.abs', op: 'abs' },
  { callee: 'Math.floor', op: 'floor' },
  { callee: 'Math.ceil', op: 'ceil' },
  { callee: 'Math.sin', op: 'sin' },
  { callee: 'Math.cos', op: 'cos' },
  { callee: 'Math.pow', op: 'pow' },
  { callee: 'Math.min', op: 'min' },
  { callee: 'Math.max', op: 'max' },
  { callee: 'Math.log', op: 'log', defaultLast: () => constantLiteral('e') },
  { callee: 'Math.round', op: 'round' },
  { callee: 'Geometry.norm2d', op: 'norm2d' },
  { callee: 'Geometry.dot2d', op: 'dot2d' },
  { callee: 'Geometry.cross2d', op: 'cross2d' },
  { callee: 'Geometry.intersect', op: 'intersect', identifierRoles: ['robot', 'barrier'] },
  { callee: 'Geometry.distance', op: 'distance', identifierRoles: ['robot', 'barrier'] },
  { callee: 'Geometry.distanceToPoint', op: 'distance_to_point', identifierRoles: ['robot'] },
  { callee: 'Units.toCm', op: 'to_cm' },
  { callee: 'Units.toM', op: 'to_m' },
  { callee: 'Units.toDeg', op: 'to_deg' },
  { callee: 'Units.toRad', op: 'to_rad' },
];

const BY_CALLEE = new Map(CALL_FORMS.map((form) => [form.callee, form]));
const BY_OPCODE = new Map(CALL_FORMS.map((form) => [form.op, form]));

export const RANDOM_CALLEE = 'Math.random';

/** Named constants reachable as `Math.E` and `Math.PI`. */
export const CONSTANT_MEMBERS: Readonly<Record<string, NamedConstant>> = {
  'Math.E': 'e',
  'Math.PI': 'π',
};

export function constantMember(name: NamedConstant): string {
  return name === 'e' ? 'Math.E' : 'Math.PI';
}

/** Call syntax used to print `op`, if it has one. */
export function calleeOf(op: Opcode): string | undefined {
  return BY_OPCODE.get(op)?.callee;
}

function arityText(counts: readonly number[]) {
  return counts.join(' or ');
}

/** Build the expression for a whitelisted call. */
export function buildCall(callee: string, args: readonly Expression[], position: CompileErrorOptions = {}): Expression {
  if (callee === RANDOM_CALLEE) {
    if (args.length !== 0) {
      throw new CompileTypeError(`${callee} takes no arguments, got ${args.length}`, position);
    }
    return uniform(0, 1);
  }
  const form = BY_CALLEE.get(callee);
  if (!form) {
    throw new UnsupportedConstructError(`Unsupported function call '${callee}'`, {
      ...position,
      hint: 'Only Math.*, Geometry.* and Units.* functions can be called in expressions.',
    });
  }
  const roles = rolesOf(form.op);
  const accepted = form.defaultLast ? [roles.length - 1, roles.length] : [roles.length];
  if (!accepted.includes(args.length)) {
    throw new CompileTypeError(`${callee} expects ${arityText(accepted)} argument(s), got ${args.length}`, position);
  }
  const operands: Record<string, Expression> = {};
  roles.forEach((role, i) => {
    const arg = args[i] ?? form.defaultLast?.();
    if (!arg) return;
    if (form.identifierRoles?.includes(role) && arg.kind !== 'identifier') {
      throw new CompileTypeError(`Argument '${role}' of ${callee} must be a plain name`, position);
    }
    operands[role] = arg;
  });
  return operatorOf(form.op, operands);
}
