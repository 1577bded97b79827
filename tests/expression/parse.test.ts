import { describe, expect, it } from 'vitest';
import { CompileTypeError, ExpressionSyntaxError, UnsupportedConstructError } from '../../src/core/errors.js';
import { and, eq, not } from '../../src/expression/generators.js';
import {
  arrayAccess,
  arrayValue,
  binary,
  boolLiteral,
  constantLiteral,
  identifier,
  intLiteral,
  operator,
  realLiteral,
  uniform,
  unary,
} from '../../src/expression/model.js';
import { parseExpression, validateExpression } from '../../src/expression/parse.js';

const x = identifier('x');

describe('parseExpression', () => {
  it('maps operators to the primitive opcodes', () => {
    expect(parseExpression('x + 1 < limit')).toEqual(binary('<', binary('+', x, intLiteral(1)), identifier('limit')));
  });

  it('binds && tighter than ||', () => {
    expect(parseExpression('a || b && c')).toEqual(
      binary('∨', identifier('a'), binary('∧', identifier('b'), identifier('c')))
    );
  });

  it('turns a conditional into ite', () => {
    expect(parseExpression('c ? 1 : 2')).toEqual(
      operator('ite', { if: identifier('c'), then: intLiteral(1), else: intLiteral(2) })
    );
  });

  it('types numbers by their spelling', () => {
    expect(parseExpression('42')).toEqual(intLiteral(42));
    expect(parseExpression('1.0')).toEqual(realLiteral(1));
    expect(parseExpression('1e3')).toEqual(realLiteral(1000));
  });

  it('folds a minus sign into a numeric literal and rewrites other negations', () => {
    expect(parseExpression('-3')).toEqual(intLiteral(-3));
    expect(parseExpression('-2.5')).toEqual(realLiteral(-2.5));
    expect(parseExpression('-x')).toEqual(binary('-', intLiteral(0), x));
    expect(parseExpression('!done')).toEqual(unary('¬', identifier('done')));
  });

  it('flattens member access and nests computed access', () => {
    expect(parseExpression('robot.pose.x')).toEqual(identifier('robot.pose.x'));
    expect(parseExpression('m[i][j]')).toEqual(arrayAccess(arrayAccess(identifier('m'), identifier('i')), identifier('j')));
  });

  it('reads .length through the length companions', () => {
    expect(parseExpression('a.length')).toEqual(identifier('a.d1_len'));
    expect(parseExpression('a[i].length')).toEqual(arrayAccess(identifier('a.d2_len'), identifier('i')));
    expect(parseExpression('a[i][j].length')).toEqual(
      arrayAccess(arrayAccess(identifier('a.d3_len'), identifier('i')), identifier('j'))
    );
  });

  it('rejects .length on anything but variables and element accesses', () => {
    expect(() => parseExpression('(a + 1).length')).toThrow(UnsupportedConstructError);
  });

  it('maps the whitelisted calls', () => {
    expect(parseExpression('Math.abs(x)')).toEqual(unary('abs', x));
    expect(parseExpression('Math.max(x, 2)')).toEqual(binary('max', x, intLiteral(2)));
    expect(parseExpression('Math.log(x)')).toEqual(binary('log', x, constantLiteral('e')));
    expect(parseExpression('Math.log(x, 2)')).toEqual(binary('log', x, intLiteral(2)));
    expect(parseExpression('Math.round(x)')).toEqual(unary('round', x));
    expect(parseExpression('Math.random()')).toEqual(uniform(0, 1));
    expect(parseExpression('Geometry.distance(r1, all)')).toEqual(
      operator('distance', { robot: identifier('r1'), barrier: identifier('all') })
    );
    expect(parseExpression('Units.toCm(d)')).toEqual(unary('to_cm', identifier('d')));
  });

  it('resolves the named constants', () => {
    expect(parseExpression('Math.PI')).toEqual(constantLiteral('π'));
    expect(parseExpression('Math.E')).toEqual(constantLiteral('e'));
  });

  it('rejects calls outside the whitelist', () => {
    expect(() => parseExpression('foo(1)')).toThrow(UnsupportedConstructError);
    expect(() => parseExpression('Math.sqrt(2)')).toThrow(UnsupportedConstructError);
  });

  it('checks the argument count and plain-name arguments', () => {
    expect(() => parseExpression('Math.pow(1)')).toThrow(CompileTypeError);
    expect(() => parseExpression('Math.random(1)')).toThrow(CompileTypeError);
    expect(() => parseExpression('Geometry.intersect(r1 + 1, all)')).toThrow(CompileTypeError);
  });

  it('rejects names that are not values', () => {
    expect(() => parseExpression('True')).toThrow(CompileTypeError);
    expect(() => parseExpression('x == null')).toThrow(CompileTypeError);
  });

  it('renames event payload references', () => {
    expect(parseExpression('_event.data.v + 1', { eventDataPrefix: 'ev' })).toEqual(
      binary('+', identifier('ev.v'), intLiteral(1))
    );
  });
});

describe('array and string literals', () => {
  it('pads a literal to its target shape', () => {
    expect(parseExpression('[1, 2]', { arrayShape: { base: 'real', maxSizes: [3] } })).toEqual(
      arrayValue({
        type: 'array',
        base: 'real',
        elements: [
          { type: 'real', value: 1 },
          { type: 'real', value: 2 },
          { type: 'real', value: 0 },
        ],
      })
    );
  });

  it('encodes strings as UTF-8 bytes', () => {
    expect(parseExpression('"ab"', { arrayShape: { base: 'int', maxSizes: [4] } })).toEqual(
      arrayValue({
        type: 'array',
        base: 'int',
        elements: [
          { type: 'int', value: 97 },
          { type: 'int', value: 98 },
          { type: 'int', value: 0 },
          { type: 'int', value: 0 },
        ],
      })
    );
  });

  it('rejects literals that do not fit', () => {
    expect(() => parseExpression('[1.5]', { arrayShape: { base: 'int', maxSizes: [2] } })).toThrow(CompileTypeError);
    expect(() => parseExpression('[1, 2, 3]', { arrayShape: { base: 'int', maxSizes: [2] } })).toThrow(CompileTypeError);
    expect(() => parseExpression('[[1]]', { arrayShape: { base: 'int', maxSizes: [2] } })).toThrow(CompileTypeError);
  });

  it('only allows strings where an int array is expected', () => {
    expect(() => parseExpression('"ab"')).toThrow(CompileTypeError);
    expect(() => parseExpression('"ab"', { arrayShape: { base: 'real', maxSizes: [4] } })).toThrow(CompileTypeError);
  });

  it('rejects literals used as arithmetic operands', () => {
    expect(() => parseExpression('[1, 2] + 1')).toThrow(CompileTypeError);
  });

  it('unrolls equality against a string', () => {
    const s = identifier('s');
    expect(parseExpression('s == "ab"')).toEqual(
      and(and(eq(identifier('s.d1_len'), intLiteral(2)), eq(arrayAccess(s, intLiteral(0)), intLiteral(97))), eq(arrayAccess(s, intLiteral(1)), intLiteral(98)))
    );
  });

  it('negates the unrolled equality for !=', () => {
    const s = identifier('s');
    expect(parseExpression('"a" != s')).toEqual(
      not(and(eq(identifier('s.d1_len'), intLiteral(1)), eq(arrayAccess(s, intLiteral(0)), intLiteral(97))))
    );
  });

  it('unrolls nested literals over nested indexes', () => {
    const m = identifier('m');
    const row = arrayAccess(m, intLiteral(0));
    expect(parseExpression('m == [[5]]')).toEqual(
      and(eq(identifier('m.d1_len'), intLiteral(1)), and(eq(arrayAccess(identifier('m.d2_len'), intLiteral(0)), intLiteral(1)), eq(arrayAccess(row, intLiteral(0)), intLiteral(5))))
    );
  });

  it('keeps bool literals', () => {
    expect(parseExpression('true && !false')).toEqual(binary('∧', boolLiteral(true), unary('¬', boolLiteral(false))));
  });
});

describe('syntax errors', () => {
  it('reports a missing closing parenthesis at the end of the input', () => {
    try {
      parseExpression('(a + b');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ExpressionSyntaxError);
      if (!(err instanceof ExpressionSyntaxError)) return;
      expect(err.code).toBe('EX-MISSING-RPAREN');
      expect(err.line).toBe(1);
      expect(err.column).toBe(7);
      expect(err.source).toBe('(a + b');
    }
  });

  it('flags assignment and strict equality inside expressions', () => {
    expect(validateExpression('a = 1')[0]?.code).toBe('EX-ASSIGN-IN-EXPR');
    expect(validateExpression('a === 1')[0]?.code).toBe('EX-STRICT-EQ');
  });

  it('reports an unexpected end of input', () => {
    expect(validateExpression('a +')[0]?.code).toBe('EX-UNEXPECTED-END');
  });

  it('returns no diagnostics for well-formed text', () => {
    expect(validateExpression('a + 1 < b[2]')).toEqual([]);
  });
});
