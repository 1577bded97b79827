import { describe, expect, it } from 'vitest';
import { UnsupportedConstructError } from '../../src/core/errors.js';
import { binary, identifier, intLiteral, operator, realLiteral, uniform } from '../../src/expression/model.js';
import { parseExpression } from '../../src/expression/parse.js';
import { printExpression } from '../../src/expression/print.js';

describe('printExpression', () => {
  it('prints infix operators with the parentheses precedence needs', () => {
    expect(printExpression(parseExpression('x + 1 < limit'))).toBe('x + 1 < limit');
    expect(printExpression(parseExpression('(a + b) * c'))).toBe('(a + b) * c');
    expect(printExpression(parseExpression('a - (b - c)'))).toBe('a - (b - c)');
    expect(printExpression(parseExpression('!(a && b)'))).toBe('!(a && b)');
  });

  it('prints reals with a decimal point', () => {
    expect(printExpression(realLiteral(2))).toBe('2.0');
    expect(printExpression(parseExpression('[1, 2.5]'))).toBe('[1.0, 2.5]');
  });

  it('prints calls in their whitelisted form', () => {
    expect(printExpression(parseExpression('Math.log(x)'))).toBe('Math.log(x, Math.E)');
    expect(printExpression(parseExpression('Geometry.norm2d(x, y)'))).toBe('Geometry.norm2d(x, y)');
    expect(printExpression(uniform(0, 1))).toBe('Math.random()');
  });

  it('prints negation as a subtraction from zero', () => {
    expect(printExpression(parseExpression('-x'))).toBe('0 - x');
    expect(printExpression(parseExpression('a - -3'))).toBe('a - -3');
  });

  it('refuses opcodes without surface syntax', () => {
    expect(() => printExpression(binary('⇒', identifier('a'), identifier('b')))).toThrow(UnsupportedConstructError);
    expect(() => printExpression(uniform(1, 2))).toThrow(UnsupportedConstructError);
  });
});

describe('parse after print', () => {
  const sources = [
    'x + 1 < limit',
    'a || b && !c',
    '(a || b) && c',
    'a - (b - c) * 2 % 3',
    'a / b / c',
    'c ? x : y + 1',
    '(c ? x : y) + 1',
    'a[i + 1][j] >= 2.5',
    'Math.max(Math.abs(x), Math.floor(y))',
    'Math.log(x, 2) != Math.pow(2, n)',
    'Math.sin(Math.PI) == Math.cos(Math.E)',
    'Geometry.distanceToPoint(r1, gx, gy) <= Units.toM(d)',
    'x == -1',
    'a - -3',
    '[1, 2.5]',
    'true && !false',
  ];

  it.each(sources)('reproduces %s', (source) => {
    const expr = parseExpression(source);
    expect(parseExpression(printExpression(expr))).toEqual(expr);
  });

  it('reproduces trees built directly', () => {
    const tree = operator('ite', {
      if: binary('∧', identifier('a'), binary('≠', identifier('b'), intLiteral(0))),
      then: binary('min', identifier('x'), realLiteral(0.5)),
      else: binary('%', binary('+', identifier('x'), intLiteral(1)), intLiteral(3)),
    });
    expect(parseExpression(printExpression(tree))).toEqual(tree);
  });
});
