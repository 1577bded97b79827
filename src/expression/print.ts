import { UnsupportedConstructError } from '../core/errors.js';
import { calleeOf, constantMember, RANDOM_CALLEE } from './calls.js';
import { operandOf, rolesOf, type ArrayElement, type Expression, type Opcode, type Value } from './model.js';

// Binding strength, loosest first. Calls, accesses and atoms bind tightest.
const PRECEDENCE: Partial<Record<Opcode, number>> = {
  ite: 1,
  '∨': 2,
  '∧': 3,
  '=': 4,
  '≠': 4,
  '<': 5,
  '≤': 5,
  '>': 5,
  '≥': 5,
  '+': 6,
  '-': 6,
  '*': 7,
  '/': 7,
  '%': 7,
  '¬': 8,
};

const UNARY_LEVEL = 8;
const ATOM_LEVEL = 9;

const INFIX: Partial<Record<Opcode, string>> = {
  '∨': '||',
  '∧': '&&',
  '=': '==',
  '≠': '!=',
  '<': '<',
  '≤': '<=',
  '>': '>',
  '≥': '>=',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
};

function printNumber(type: 'int' | 'real', value: number): string {
  if (type === 'int') return String(value);
  const text = String(value);
  return /[.eE]|Infinity|NaN/.test(text) ? text : `${text}.0`;
}

function printElement(el: ArrayElement): string {
  if (el.type === 'array') return `[${el.elements.map(printElement).join(', ')}]`;
  return printNumber(el.type, el.value);
}

function printValue(value: Value): string {
  switch (value.type) {
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
    case 'real':
      return printNumber(value.type, value.value);
    case 'constant':
      return constantMember(value.name);
    case 'array':
      return printElement(value);
  }
}

function levelOf(expr: Expression): number {
  if (expr.kind === 'literal') {
    const { value } = expr;
    return (value.type === 'int' || value.type === 'real') && value.value < 0 ? UNARY_LEVEL : ATOM_LEVEL;
  }
  if (expr.kind !== 'operator') return ATOM_LEVEL;
  return PRECEDENCE[expr.op] ?? ATOM_LEVEL;
}

function wrap(expr: Expression, needsParens: boolean): string {
  const text = printExpression(expr);
  return needsParens ? `(${text})` : text;
}

/** Source text that parses back to `expr`. */
export function printExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'identifier':
      return expr.name;
    case 'literal':
      return printValue(expr.value);
    case 'distribution':
      if (expr.lower === 0 && expr.upper === 1) return `${RANDOM_CALLEE}()`;
      throw new UnsupportedConstructError(`Uniform(${expr.lower}, ${expr.upper}) has no expression syntax`);
    case 'operator':
      break;
  }

  const { op } = expr;
  const level = levelOf(expr);
  const infix = INFIX[op];
  if (infix) {
    const left = operandOf(expr, 'left');
    const right = operandOf(expr, 'right');
    return `${wrap(left, levelOf(left) < level)} ${infix} ${wrap(right, levelOf(right) <= level)}`;
  }

  switch (op) {
    case '¬': {
      const inner = operandOf(expr, 'exp');
      return `!${wrap(inner, levelOf(inner) < UNARY_LEVEL)}`;
    }
    case 'ite': {
      const test = operandOf(expr, 'if');
      return `${wrap(test, levelOf(test) <= level)} ? ${printExpression(operandOf(expr, 'then'))} : ${printExpression(operandOf(expr, 'else'))}`;
    }
    case 'aa': {
      const base = operandOf(expr, 'exp');
      return `${wrap(base, levelOf(base) < ATOM_LEVEL)}[${printExpression(operandOf(expr, 'index'))}]`;
    }
    case 'av':
      return printExpression(operandOf(expr, 'elements'));
    case '⇒':
    case 'ac':
      throw new UnsupportedConstructError(`Operator '${op}' has no expression syntax`);
    default: {
      const callee = calleeOf(op);
      if (!callee) throw new UnsupportedConstructError(`Operator '${op}' has no expression syntax`);
      const args = rolesOf(op).map((role) => printExpression(operandOf(expr, role)));
      return `${callee}(${args.join(', ')})`;
    }
  }
}
