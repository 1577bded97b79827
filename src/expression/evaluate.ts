import { ConfigurationError } from '../core/errors.js';
import { numericValueOf, operandOf, type Expression } from './model.js';

export type ConstantValue = number | boolean;

/** Looks up the defining expression of a named constant. */
export type ConstantResolver = (name: string) => Expression | undefined;

function numeric(value: ConstantValue, op: string): number {
  if (typeof value !== 'number') throw new ConfigurationError(`Operator '${op}' expects a number, got ${value}`);
  return value;
}

function bool(value: ConstantValue, op: string): boolean {
  if (typeof value !== 'boolean') throw new ConfigurationError(`Operator '${op}' expects a boolean, got ${value}`);
  return value;
}

/**
 * Value of an expression built only from literals and constants.
 * Anything else (variables, arrays, distributions, macros) is a ConfigurationError.
 */
export function evaluateConstant(expr: Expression, resolve: ConstantResolver, visiting: ReadonlySet<string> = new Set()): ConstantValue {
  switch (expr.kind) {
    case 'literal': {
      if (expr.value.type === 'bool') return expr.value.value;
      const value = numericValueOf(expr.value);
      if (value === undefined) throw new ConfigurationError('Array values are not compile-time constants');
      return value;
    }
    case 'identifier': {
      const definition = resolve(expr.name);
      if (!definition) throw new ConfigurationError(`'${expr.name}' is not a constant`);
      if (visiting.has(expr.name)) throw new ConfigurationError(`Constant '${expr.name}' is defined in terms of itself`);
      return evaluateConstant(definition, resolve, new Set([...visiting, expr.name]));
    }
    case 'distribution':
      throw new ConfigurationError('Random values are not compile-time constants');
    case 'operator':
      break;
  }

  const { op } = expr;
  const arg = (role: string) => evaluateConstant(operandOf(expr, role), resolve, visiting);
  const num = (role: string) => numeric(arg(role), op);
  switch (op) {
    case '+':
      return num('left') + num('right');
    case '-':
      return num('left') - num('right');
    case '*':
      return num('left') * num('right');
    case '/':
      return num('left') / num('right');
    case '%':
      return num('left') % num('right');
    case 'pow':
      return Math.pow(num('left'), num('right'));
    case 'log':
      return Math.log(num('left')) / Math.log(num('right'));
    case 'min':
      return Math.min(num('left'), num('right'));
    case 'max':
      return Math.max(num('left'), num('right'));
    case 'abs':
      return Math.abs(num('exp'));
    case 'floor':
      return Math.floor(num('exp'));
    case 'ceil':
      return Math.ceil(num('exp'));
    case 'sin':
      return Math.sin(num('exp'));
    case 'cos':
      return Math.cos(num('exp'));
    case '<':
      return num('left') < num('right');
    case '≤':
      return num('left') <= num('right');
    case '>':
      return num('left') > num('right');
    case '≥':
      return num('left') >= num('right');
    case '=':
      return arg('left') === arg('right');
    case '≠':
      return arg('left') !== arg('right');
    case '∧':
      return bool(arg('left'), op) && bool(arg('right'), op);
    case '∨':
      return bool(arg('left'), op) || bool(arg('right'), op);
    case '⇒':
      return !bool(arg('left'), op) || bool(arg('right'), op);
    case '¬':
      return !bool(arg('exp'), op);
    case 'ite':
      return bool(arg('if'), op) ? arg('then') : arg('else');
    default:
      throw new ConfigurationError(`Operator '${op}' cannot be evaluated at compile time`);
  }
}
