import { z } from 'zod';
import { ModelError } from '../core/errors.js';
import { janiExpressionSchema, expressionFromJson, expressionToJson, type JaniOperand } from '../expression/json.js';
import type { Expression } from '../expression/model.js';
import { parseExpression } from '../expression/parse.js';
import { expandExpression, type ConstantValues } from '../macros/expand.js';

const FILTER_FUNCTIONS = ['min', 'max', 'sum', 'avg', 'count', '∀', '∃', 'argmin', 'argmax', 'values'] as const;

export type FilterFunction = (typeof FILTER_FUNCTIONS)[number];

const stepBoundsSchema = z
  .object({ lower: janiExpressionSchema.optional(), upper: janiExpressionSchema.optional() })
  .strict()
  .refine((b) => b.lower !== undefined || b.upper !== undefined, { message: 'step-bounds needs a lower or an upper bound' });

const pathCommon = { comment: z.string().optional(), 'step-bounds': stepBoundsSchema.optional() };

const pathSchema = z.discriminatedUnion('op', [
  z.object({ op: z.enum(['F', 'G']), exp: janiExpressionSchema, ...pathCommon }).strict(),
  z.object({ op: z.enum(['U', 'W']), left: janiExpressionSchema, right: janiExpressionSchema, ...pathCommon }).strict(),
]);

export const propertyExpressionSchema = z
  .object({
    op: z.literal('filter'),
    fun: z.enum(FILTER_FUNCTIONS),
    values: z.object({ op: z.enum(['Pmin', 'Pmax']), exp: pathSchema }).strict(),
    states: z.object({ op: z.literal('initial') }).strict(),
  })
  .strict();

export const propertySchema = z.object({ name: z.string().min(1), expression: propertyExpressionSchema }).strict();

export type PropertyInput = z.infer<typeof propertySchema>;

export interface StepBounds {
  lower?: Expression;
  upper?: Expression;
}

export type PathFormula =
  | { op: 'F' | 'G'; exp: Expression; stepBounds?: StepBounds; comment?: string }
  | { op: 'U' | 'W'; left: Expression; right: Expression; stepBounds?: StepBounds; comment?: string };

export interface ModelProperty {
  name: string;
  fun: FilterFunction;
  /** Probability operator over the path formula, evaluated from the initial states. */
  values: { op: 'Pmin' | 'Pmax'; path: PathFormula };
}

export interface PropertyJson {
  name: string;
  expression: {
    op: 'filter';
    fun: FilterFunction;
    values: { op: 'Pmin' | 'Pmax'; exp: Record<string, unknown> };
    states: { op: 'initial' };
  };
}

/** Strings are expression source; anything else is JANI expression JSON. */
function operand(json: JaniOperand, path: string): Expression {
  if (typeof json === 'string') return parseExpression(json);
  return expressionFromJson(json, path);
}

function stepBounds(json: z.infer<typeof stepBoundsSchema> | undefined, path: string): StepBounds | undefined {
  if (!json) return undefined;
  return {
    ...(json.lower !== undefined ? { lower: operand(json.lower, `${path}.lower`) } : {}),
    ...(json.upper !== undefined ? { upper: operand(json.upper, `${path}.upper`) } : {}),
  };
}

function pathFormula(json: z.infer<typeof pathSchema>, path: string): PathFormula {
  const bounds = stepBounds(json['step-bounds'], `${path}.step-bounds`);
  const extra = { ...(bounds ? { stepBounds: bounds } : {}), ...(json.comment !== undefined ? { comment: json.comment } : {}) };
  switch (json.op) {
    case 'F':
    case 'G':
      return { op: json.op, exp: operand(json.exp, `${path}.exp`), ...extra };
    case 'U':
    case 'W':
      return { op: json.op, left: operand(json.left, `${path}.left`), right: operand(json.right, `${path}.right`), ...extra };
  }
}

/** Read a property from its descriptor entry. Unsupported shapes raise a ModelError. */
export function parseProperty(input: unknown): ModelProperty {
  const parsed = propertySchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new ModelError(`Unsupported property at ${where}: ${issue?.message ?? 'invalid value'}`, {
      hint: "Properties are filters over 'Pmin' or 'Pmax' of an F, G, U or W path formula, from the initial states.",
    });
  }
  const { name, expression } = parsed.data;
  return { name, fun: expression.fun, values: { op: expression.values.op, path: pathFormula(expression.values.exp, name) } };
}

export function propertyToJson(property: ModelProperty, constants: ConstantValues): PropertyJson {
  const exp = (expr: Expression) => expressionToJson(expandExpression(expr, constants));
  const { path } = property.values;
  const formula: Record<string, unknown> = {};
  if (path.comment !== undefined) formula.comment = path.comment;
  formula.op = path.op;
  switch (path.op) {
    case 'F':
    case 'G':
      formula.exp = exp(path.exp);
      break;
    default:
      formula.left = exp(path.left);
      formula.right = exp(path.right);
  }
  if (path.stepBounds) {
    formula['step-bounds'] = {
      ...(path.stepBounds.lower ? { lower: exp(path.stepBounds.lower) } : {}),
      ...(path.stepBounds.upper ? { upper: exp(path.stepBounds.upper) } : {}),
    };
  }
  return {
    name: property.name,
    expression: { op: 'filter', fun: property.fun, values: { op: property.values.op, exp: formula }, states: { op: 'initial' } },
  };
}
