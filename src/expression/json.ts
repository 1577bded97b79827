import { z } from 'zod';
import { ModelError, UnknownOperatorError } from '../core/errors.js';
import {
  boolLiteral,
  constantLiteral,
  identifier,
  intLiteral,
  literal,
  operandOf,
  operatorOf,
  realLiteral,
  resolveOpcode,
  rolesOf,
  uniform,
  type ArrayElement,
  type ArrayValue,
  type Expression,
  type NamedConstant,
} from './model.js';

export interface JaniOperator {
  op: string;
  [role: string]: JaniOperand;
}

export type JaniExpression =
  | string
  | number
  | boolean
  | { constant: NamedConstant }
  | { distribution: 'Uniform'; args: [number, number] }
  | JaniOperator;

/** Operand values: expressions, or the nested element lists of `av`. */
export type JaniOperand = JaniExpression | JaniOperand[];

export const janiExpressionSchema: z.ZodType<JaniOperand> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.object({ constant: z.enum(['e', 'π']) }).strict(),
    z.object({ distribution: z.literal('Uniform'), args: z.tuple([z.number(), z.number()]) }).strict(),
    z.object({ op: z.string() }).catchall(janiExpressionSchema),
    z.array(janiExpressionSchema),
  ])
);

function elementToJson(el: ArrayElement): JaniOperand {
  if (el.type !== 'array') return el.value;
  return { op: 'av', elements: el.elements.map(elementToJson) };
}

function valueToJson(expr: Expression): JaniOperand {
  if (expr.kind !== 'literal') return expressionToJson(expr);
  const { value } = expr;
  switch (value.type) {
    case 'bool':
    case 'int':
    case 'real':
      return value.value;
    case 'constant':
      return { constant: value.name };
    case 'array':
      return value.elements.map(elementToJson);
  }
}

/** JANI JSON of an expression. Macro opcodes are written as-is; expand them first for model output. */
export function expressionToJson(expr: Expression): JaniOperand {
  switch (expr.kind) {
    case 'identifier':
      return expr.name;
    case 'literal':
      return valueToJson(expr);
    case 'distribution':
      return { distribution: expr.distribution, args: [expr.lower, expr.upper] };
    case 'operator': {
      const json: JaniOperator = { op: expr.op };
      for (const role of rolesOf(expr.op)) {
        json[role] = valueToJson(operandOf(expr, role));
      }
      return json;
    }
  }
}

function elementFromJson(json: JaniOperand, path: string): ArrayElement {
  if (typeof json === 'number') {
    return Number.isInteger(json) ? { type: 'int', value: json } : { type: 'real', value: json };
  }
  if (Array.isArray(json)) return arrayFromJson(json, path);
  if (typeof json === 'object' && 'op' in json && json.op === 'av' && Array.isArray(json.elements)) {
    return arrayFromJson(json.elements, path);
  }
  throw new ModelError(`Array element at ${path} must be a number or a nested array`);
}

function arrayFromJson(items: readonly JaniOperand[], path: string): ArrayValue {
  const elements = items.map((item, i) => elementFromJson(item, `${path}[${i}]`));
  const real = elements.some(function isReal(el: ArrayElement): boolean {
    return el.type === 'array' ? el.elements.some(isReal) : el.type === 'real';
  });
  const base = real ? 'real' : 'int';
  const rebase = (el: ArrayElement): ArrayElement =>
    el.type === 'array' ? { type: 'array', base, elements: el.elements.map(rebase) } : { type: base, value: el.value };
  return { type: 'array', base, elements: elements.map(rebase) };
}

function fromOperand(json: JaniOperand, path: string): Expression {
  if (typeof json === 'string') return identifier(json);
  if (typeof json === 'boolean') return boolLiteral(json);
  if (typeof json === 'number') return Number.isInteger(json) ? intLiteral(json) : realLiteral(json);
  if (Array.isArray(json)) {
    throw new ModelError(`Unexpected array at ${path}; arrays are only allowed as 'elements' of 'av'`);
  }
  if (!('op' in json)) {
    return 'constant' in json ? constantLiteral(json.constant) : uniform(json.args[0], json.args[1]);
  }
  const op = resolveOpcode(json.op);
  if (!op) throw new UnknownOperatorError(json.op);
  const operands: Record<string, Expression> = {};
  for (const role of rolesOf(op)) {
    const operand = json[role];
    if (operand === undefined) throw new ModelError(`Operator '${json.op}' at ${path} is missing operand '${role}'`);
    if (op === 'av') {
      if (!Array.isArray(operand)) throw new ModelError(`Operator 'av' at ${path} needs an 'elements' list`);
      operands[role] = literal(arrayFromJson(operand, `${path}.elements`));
    } else {
      operands[role] = fromOperand(operand, `${path}.${role}`);
    }
  }
  const extra = Object.keys(json).filter((key) => key !== 'op' && !rolesOf(op).includes(key));
  if (extra.length > 0) {
    throw new ModelError(`Operator '${json.op}' at ${path} has unexpected operand(s): ${extra.join(', ')}`);
  }
  return operatorOf(op, operands);
}

/**
 * Read an expression from JANI JSON. Opcode aliases (`&&`, `==`, …) are
 * normalised to their canonical symbols.
 */
export function expressionFromJson(json: unknown, path = '<expression>'): Expression {
  const parsed = janiExpressionSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${path}.${issue.path.join('.')}` : path;
    throw new ModelError(`Invalid expression at ${where}: ${issue?.message ?? 'unrecognised value'}`);
  }
  return fromOperand(parsed.data, path);
}
