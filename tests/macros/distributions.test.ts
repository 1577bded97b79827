import { describe, expect, it } from 'vitest';
import { binary, identifier, realLiteral, uniform } from '../../src/expression/model.js';
import { expandDistributions } from '../../src/macros/distributions.js';

describe('expandDistributions', () => {
  it('spreads a uniform draw over evenly spaced options', () => {
    const x = identifier('x');
    expect(expandDistributions(binary('+', x, uniform(0, 1)), 4)).toEqual([
      binary('+', x, realLiteral(0)),
      binary('+', x, realLiteral(0.25)),
      binary('+', x, realLiteral(0.5)),
      binary('+', x, realLiteral(0.75)),
    ]);
  });

  it('honours the bounds of the draw', () => {
    expect(expandDistributions(uniform(2, 4), 2)).toEqual([realLiteral(2), realLiteral(3)]);
  });

  it('takes the product of several draws in operand order', () => {
    expect(expandDistributions(binary('*', uniform(0, 1), uniform(0, 2)), 2)).toEqual([
      binary('*', realLiteral(0), realLiteral(0)),
      binary('*', realLiteral(0), realLiteral(1)),
      binary('*', realLiteral(0.5), realLiteral(0)),
      binary('*', realLiteral(0.5), realLiteral(1)),
    ]);
  });

  it('returns deterministic expressions unchanged', () => {
    const expr = binary('+', identifier('x'), realLiteral(1));
    const options = expandDistributions(expr, 10);
    expect(options).toHaveLength(1);
    expect(options[0]).toBe(expr);
  });
});
