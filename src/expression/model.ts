import { ModelError } from '../core/errors.js';

export type NamedConstant = 'e' | 'π';
export type NumericBase = 'int' | 'real';

export type Value =
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'int'; readonly value: number }
  | { readonly type: 'real'; readonly value: number }
  | { readonly type: 'constant'; readonly name: NamedConstant }
  | ArrayValue;

/** Nested per dimension: the elements of an N-dimensional array are (N-1)-dimensional arrays. */
export interface ArrayValue {
  readonly type: 'array';
  readonly base: NumericBase;
  readonly elements: readonly ArrayElement[];
}

export type ArrayElement = { readonly type: 'int' | 'real'; readonly value: number } | ArrayValue;

const BINARY = ['left', 'right'] as const;
const UNARY = ['exp'] as const;
const VECTOR = ['x1', 'y1', 'x2', 'y2'] as const;
const ROBOT_BARRIER = ['robot', 'barrier'] as const;

/** Operand roles of every opcode. The table is closed: nothing else is an Expression operator. */
export const OPERAND_ROLES = {
  // logic and comparison
  '∧': BINARY,
  '∨': BINARY,
  '⇒': BINARY,
  '¬': UNARY,
  '=': BINARY,
  '≠': BINARY,
  '<': BINARY,
  '≤': BINARY,
  '>': BINARY,
  '≥': BINARY,
  // arithmetic
  '+': BINARY,
  '-': BINARY,
  '*': BINARY,
  '/': BINARY,
  '%': BINARY,
  pow: BINARY,
  log: BINARY,
  min: BINARY,
  max: BINARY,
  abs: UNARY,
  floor: UNARY,
  ceil: UNARY,
  sin: UNARY,
  cos: UNARY,
  ite: ['if', 'then', 'else'],
  // arrays
  aa: ['exp', 'index'],
  ac: ['var', 'length', 'exp'],
  av: ['elements'],
  // macros
  round: UNARY,
  to_cm: UNARY,
  to_m: UNARY,
  to_deg: UNARY,
  to_rad: UNARY,
  norm2d: ['x', 'y'],
  dot2d: VECTOR,
  cross2d: VECTOR,
  intersect: ROBOT_BARRIER,
  distance: ROBOT_BARRIER,
  distance_to_point: ['robot', 'x', 'y'],
} as const satisfies Record<string, readonly string[]>;

export type Opcode = keyof typeof OPERAND_ROLES;
export type RoleOf<O extends Opcode> = (typeof OPERAND_ROLES)[O][number];
export type OperandsOf<O extends Opcode> = { readonly [R in RoleOf<O>]: Expression };

export type BinaryOpcode = { [O in Opcode]: (typeof OPERAND_ROLES)[O] extends typeof BINARY ? O : never }[Opcode];
export type UnaryOpcode = { [O in Opcode]: (typeof OPERAND_ROLES)[O] extends typeof UNARY ? O : never }[Opcode];

export const MACRO_OPCODES: ReadonlySet<Opcode> = new Set<Opcode>([
  'round', 'to_cm', 'to_m', 'to_deg', 'to_rad', 'norm2d', 'dot2d', 'cross2d', 'intersect', 'distance', 'distance_to_point',
]);

/** Spellings accepted on input and mapped to the canonical opcode. */
export const OPCODE_ALIASES: Readonly<Record<string, Opcode>> = {
  '&&': '∧',
  and: '∧',
  '||': '∨',
  or: '∨',
  '!': '¬',
  '=>': '⇒',
  '==': '=',
  '!=': '≠',
  '<=': '≤',
  '>=': '≥',
};

export interface IdentifierExpression {
  readonly kind: 'identifier';
  readonly name: string;
}

export interface LiteralExpression {
  readonly kind: 'literal';
  readonly value: Value;
}

export interface OperatorExpression {
  readonly kind: 'operator';
  readonly op: Opcode;
  readonly operands: Readonly<Record<string, Expression>>;
}

export interface DistributionExpression {
  readonly kind: 'distribution';
  readonly distribution: 'Uniform';
  readonly lower: number;
  readonly upper: number;
}

export type Expression = IdentifierExpression | LiteralExpression | OperatorExpression | DistributionExpression;

export function isOpcode(op: string): op is Opcode {
  return Object.prototype.hasOwnProperty.call(OPERAND_ROLES, op);
}

export function resolveOpcode(op: string): Opcode | undefined {
  if (isOpcode(op)) return op;
  return OPCODE_ALIASES[op];
}

export function isMacroOpcode(op: Opcode): boolean {
  return MACRO_OPCODES.has(op);
}

export function identifier(name: string): IdentifierExpression {
  return { kind: 'identifier', name };
}

export function literal(value: Value): LiteralExpression {
  return { kind: 'literal', value };
}

export function intLiteral(value: number): LiteralExpression {
  return literal({ type: 'int', value });
}

export function realLiteral(value: number): LiteralExpression {
  return literal({ type: 'real', value });
}

export function boolLiteral(value: boolean): LiteralExpression {
  return literal({ type: 'bool', value });
}

export function constantLiteral(name: NamedConstant): LiteralExpression {
  return literal({ type: 'constant', name });
}

/** Operand roles of `op`, in table order. */
export function rolesOf(op: Opcode): readonly string[] {
  return OPERAND_ROLES[op];
}

/**
 * Build an operator node. Only the roles listed for the opcode are copied,
 * so the node always carries exactly the table's operand set.
 */
export function operator<O extends Opcode>(op: O, operands: OperandsOf<O>): OperatorExpression {
  return operatorOf(op, operands);
}

/** Untyped variant of {@link operator} for operand sets assembled at run time. */
export function operatorOf(op: Opcode, operands: Readonly<Record<string, Expression>>): OperatorExpression {
  const record: Record<string, Expression> = {};
  for (const role of rolesOf(op)) {
    const operand = operands[role];
    if (!operand) throw new ModelError(`Operator '${op}' requires operand '${role}'`);
    record[role] = operand;
  }
  return { kind: 'operator', op, operands: record };
}

export function binary(op: BinaryOpcode, left: Expression, right: Expression): OperatorExpression {
  return { kind: 'operator', op, operands: { left, right } };
}

export function unary(op: UnaryOpcode, exp: Expression): OperatorExpression {
  return { kind: 'operator', op, operands: { exp } };
}

export function arrayAccess(exp: Expression, index: Expression): OperatorExpression {
  return operator('aa', { exp, index });
}

export function arrayValue(value: ArrayValue): OperatorExpression {
  return operator('av', { elements: literal(value) });
}

export function uniform(lower: number, upper: number): DistributionExpression {
  if (!(lower <= upper)) {
    throw new ModelError(`Uniform distribution bounds must satisfy lower <= upper, got [${lower}, ${upper}]`);
  }
  return { kind: 'distribution', distribution: 'Uniform', lower, upper };
}

/** Operand by role; a missing role is a broken invariant of the closed table. */
export function operandOf(expr: OperatorExpression, role: string): Expression {
  const found = expr.operands[role];
  if (!found) {
    throw new ModelError(`Operator '${expr.op}' has no operand '${role}'`);
  }
  return found;
}

/** New operator node with every operand passed through `fn`. */
export function mapOperands(expr: OperatorExpression, fn: (operand: Expression, role: string) => Expression): OperatorExpression {
  const record: Record<string, Expression> = {};
  for (const role of rolesOf(expr.op)) {
    record[role] = fn(operandOf(expr, role), role);
  }
  return { kind: 'operator', op: expr.op, operands: record };
}

/** True if `pred` holds for `expr` or any node below it. */
export function someNode(expr: Expression, pred: (node: Expression) => boolean): boolean {
  if (pred(expr)) return true;
  if (expr.kind !== 'operator') return false;
  return Object.values(expr.operands).some((operand) => someNode(operand, pred));
}

export function containsMacro(expr: Expression): boolean {
  return someNode(expr, (node) => node.kind === 'operator' && isMacroOpcode(node.op));
}

export function containsDistribution(expr: Expression): boolean {
  return someNode(expr, (node) => node.kind === 'distribution');
}

/** Names of all identifiers referenced by `expr`, in first-seen order. */
export function collectIdentifiers(expr: Expression): string[] {
  const seen = new Set<string>();
  someNode(expr, (node) => {
    if (node.kind === 'identifier') seen.add(node.name);
    return false;
  });
  return [...seen];
}

export const EVENT_DATA_PREFIX = '_event.data.';

/** Rewrite `_event.data.x` identifiers to the global `<event>.x` variables carrying the event payload. */
export function renameEventData(expr: Expression, eventName: string | undefined): Expression {
  if (eventName === undefined) return expr;
  switch (expr.kind) {
    case 'identifier':
      return expr.name.startsWith(EVENT_DATA_PREFIX)
        ? identifier(`${eventName}.${expr.name.slice(EVENT_DATA_PREFIX.length)}`)
        : expr;
    case 'literal':
    case 'distribution':
      return expr;
    case 'operator':
      return mapOperands(expr, (operand) => renameEventData(operand, eventName));
  }
}

export function isNumericLiteral(expr: Expression): expr is LiteralExpression & { value: { type: 'int' | 'real'; value: number } } {
  return expr.kind === 'literal' && (expr.value.type === 'int' || expr.value.type === 'real');
}

/** Numeric value of a literal, resolving the named constants. */
export function numericValueOf(value: Value): number | undefined {
  switch (value.type) {
    case 'int':
    case 'real':
      return value.value;
    case 'constant':
      return value.name === 'e' ? Math.E : Math.PI;
    case 'bool':
    case 'array':
      return undefined;
  }
}
