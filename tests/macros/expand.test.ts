import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/core/errors.js';
import { minus } from '../../src/expression/generators.js';
import {
  binary,
  boolLiteral,
  collectIdentifiers,
  constantLiteral,
  containsMacro,
  identifier,
  intLiteral,
  operandOf,
  realLiteral,
  uniform,
  unary,
  type Expression,
} from '../../src/expression/model.js';
import { parseExpression } from '../../src/expression/parse.js';
import { expandExpression } from '../../src/macros/expand.js';
import { norm2d, toCm, toM } from '../../src/macros/vector.js';

const noConstants = new Map<string, Expression>();
const fourBoundaries = new Map<string, Expression>([['boundaries.count', intLiteral(4)]]);

function expand(source: string, constants: ReadonlyMap<string, Expression> = noConstants): Expression {
  return expandExpression(parseExpression(source), constants);
}

describe('expandExpression', () => {
  it('rewrites the vector macros', () => {
    const x = identifier('x');
    const y = identifier('y');
    expect(expand('Geometry.norm2d(x, y)')).toEqual(
      binary('pow', binary('+', binary('*', x, x), binary('*', y, y)), realLiteral(0.5))
    );
    expect(expand('Geometry.cross2d(a, b, c, d)')).toEqual(
      binary('-', binary('*', identifier('a'), identifier('d')), binary('*', identifier('b'), identifier('c')))
    );
    expect(expand('Geometry.dot2d(a, b, c, d)')).toEqual(
      binary('+', binary('*', identifier('a'), identifier('c')), binary('*', identifier('b'), identifier('d')))
    );
  });

  it('rewrites the unit conversions', () => {
    const v = identifier('v');
    const round = (e: Expression) => unary('floor', binary('+', e, realLiteral(0.5)));
    expect(expand('Math.round(v)')).toEqual(round(v));
    expect(expand('Units.toCm(v)')).toEqual(round(binary('*', v, realLiteral(100))));
    expect(expand('Units.toM(v)')).toEqual(binary('*', v, realLiteral(0.01)));
    expect(expand('Units.toDeg(v)')).toEqual(
      binary('%', round(binary('*', v, binary('/', intLiteral(180), constantLiteral('π')))), intLiteral(360))
    );
    expect(expand('Units.toRad(v)')).toEqual(binary('*', v, binary('/', constantLiteral('π'), intLiteral(180))));
  });

  it('expands macros nested inside primitive operators', () => {
    expect(expand('Math.round(x) > 1')).toEqual(
      binary('>', unary('floor', binary('+', identifier('x'), realLiteral(0.5))), intLiteral(1))
    );
  });

  it('leaves distributions alone', () => {
    const draw = uniform(0, 1);
    expect(expandExpression(draw, noConstants)).toBe(draw);
  });

  it('expands distance_to_point from the centimeter pose', () => {
    expect(expand('Geometry.distanceToPoint(r1, 1, 2)')).toEqual(
      toM(
        norm2d(
          minus('robots.r1.pose.x_cm', toCm(intLiteral(1))),
          minus('robots.r1.pose.y_cm', toCm(intLiteral(2)))
        )
      )
    );
  });

  it('folds the distance over four boundaries as nested min', () => {
    let node = expand('Geometry.distance(r1, boundaries)', fourBoundaries);
    const terms: Expression[] = [];
    for (let i = 0; i < 4; i++) {
      expect(node).toMatchObject({ kind: 'operator', op: 'min' });
      if (node.kind !== 'operator') return;
      terms.push(operandOf(node, 'left'));
      node = operandOf(node, 'right');
    }
    expect(node).toEqual(boolLiteral(true));

    const [first, , , last] = terms;
    if (!first || !last) return;
    expect(first).toMatchObject({ kind: 'operator', op: '-' });
    if (first.kind !== 'operator') return;
    expect(operandOf(first, 'right')).toEqual(identifier('robots.r1.shape.radius'));
    expect(collectIdentifiers(first)).toContain('boundaries.1.x');
    expect(collectIdentifiers(first)).not.toContain('boundaries.2.x');
    // The last segment closes the polygon back to vertex 0.
    expect(collectIdentifiers(last)).toEqual(expect.arrayContaining(['boundaries.3.x', 'boundaries.0.x']));
  });

  it('combines boundaries with the obstacle stubs', () => {
    const intersect = expand('Geometry.intersect(r1, all)', fourBoundaries);
    expect(intersect).toMatchObject({ kind: 'operator', op: 'max' });
    if (intersect.kind !== 'operator') return;
    expect(operandOf(intersect, 'right')).toEqual(realLiteral(0));
    expect(expand('Geometry.distance(r1, obstacles)', fourBoundaries)).toEqual(boolLiteral(true));
    expect(expand('Geometry.intersect(r1, obstacles)', fourBoundaries)).toEqual(realLiteral(0));
  });

  it('reads the robot path for intersections', () => {
    const names = collectIdentifiers(expand('Geometry.intersect(r1, boundaries)', fourBoundaries));
    expect(names).toEqual(
      expect.arrayContaining(['robots.r1.pose.x', 'robots.r1.goal.y', 'robots.r1.shape.radius', 'boundaries.3.y'])
    );
  });

  it('requires a valid boundary count for the geometric macros', () => {
    expect(() => expand('Geometry.distance(r1, all)')).toThrow(ConfigurationError);
    expect(() => expand('Geometry.distance(r1, all)', new Map([['boundaries.count', intLiteral(1)]]))).toThrow(
      "Constant 'boundaries.count' must be an integer greater than 1, got 1"
    );
    expect(() => expand('Geometry.distance(r1, all)', new Map([['boundaries.count', realLiteral(2.5)]]))).toThrow(
      ConfigurationError
    );
  });

  it('rejects unknown barriers', () => {
    expect(() => expand('Geometry.distance(r1, walls)', fourBoundaries)).toThrow("Unknown barrier 'walls'");
  });

  it('is idempotent and leaves no macros behind', () => {
    const sources = [
      'Geometry.norm2d(Units.toCm(x), y) + Math.round(z)',
      'Units.toDeg(Units.toRad(a)) == 90',
      'Geometry.intersect(r1, all) > 0.5 || Geometry.distance(r1, boundaries) < 0.1',
      'Geometry.distanceToPoint(r1, Math.round(gx), gy)',
      'x + 1 < limit',
    ];
    for (const source of sources) {
      const once = expand(source, fourBoundaries);
      expect(containsMacro(once)).toBe(false);
      expect(expandExpression(once, fourBoundaries)).toEqual(once);
    }
  });
});
