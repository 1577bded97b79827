import { ConfigurationError } from '../core/errors.js';
import { absolute, and, divide, eq, ge, ite, lt, maximum, minimum, minus, or, times } from '../expression/generators.js';
import { boolLiteral, realLiteral, type Expression } from '../expression/model.js';
import { cross2d, dot2d, norm2d } from './vector.js';

export const BOUNDARY_COUNT = 'boundaries.count';

/** The closed boundary polygon, with a vertex count known to be an integer above 1. */
export class Boundaries {
  private constructor(readonly count: number) {}

  static fromConstant(value: number | undefined): Boundaries {
    if (value === undefined) {
      throw new ConfigurationError(`Constant '${BOUNDARY_COUNT}' is required by the geometry macros`, {
        hint: 'Declare the environment boundaries in the model descriptor.',
      });
    }
    if (!Number.isInteger(value) || value <= 1) {
      throw new ConfigurationError(`Constant '${BOUNDARY_COUNT}' must be an integer greater than 1, got ${value}`);
    }
    return new Boundaries(value);
  }
}

function vertex(index: number) {
  return { x: `boundaries.${index}.x`, y: `boundaries.${index}.y` };
}

function robotNames(robot: string) {
  return {
    radius: `robots.${robot}.shape.radius`,
    poseX: `robots.${robot}.pose.x`,
    poseY: `robots.${robot}.pose.y`,
    poseXCm: `robots.${robot}.pose.x_cm`,
    poseYCm: `robots.${robot}.pose.y_cm`,
    goalX: `robots.${robot}.goal.x`,
    goalY: `robots.${robot}.goal.y`,
  };
}

// Obstacles are not modelled yet: these stubs keep the fold neutral.
const INTERSECT_OBSTACLE_STUB = (): Expression => realLiteral(0.0);
const DISTANCE_OBSTACLE_STUB = (): Expression => boolLiteral(true);

/**
 * Fraction in [0, 1] of the robot's path (pose to goal) after which it
 * touches boundary segment `index`; 0 when it never comes within its radius.
 */
function intersectBoundary(robot: string, index: number, boundaries: Boundaries): Expression {
  const r = robotNames(robot);
  const a = vertex(index);
  const b = vertex((index + 1) % boundaries.count);
  const ab = { x: minus(b.x, a.x), y: minus(b.y, a.y) };
  const ba = { x: minus(a.x, b.x), y: minus(a.y, b.y) };
  const ea = { x: minus(a.x, r.goalX), y: minus(a.y, r.goalY) };
  const eb = { x: minus(b.x, r.goalX), y: minus(b.y, r.goalY) };
  const es = { x: minus(r.poseX, r.goalX), y: minus(r.poseY, r.goalY) };

  const norm = norm2d(ab.x, ab.y);
  const vDist = divide(absolute(cross2d(ab.x, ab.y, ea.x, ea.y)), norm);
  const haDist = divide(dot2d(ab.x, ab.y, ea.x, ea.y), norm);
  const hbDist = divide(dot2d(ba.x, ba.y, eb.x, eb.y), norm);
  const perpendicular = eq(dot2d(ab.x, ab.y, es.x, es.y), realLiteral(0.0));
  const parallel = eq(cross2d(ab.x, ab.y, es.x, es.y), realLiteral(0.0));

  const haInterp = ite(
    and(ge(haDist, realLiteral(0.0)), lt(haDist, r.radius)),
    divide(minus(times(norm, r.radius), dot2d(ab.x, ab.y, ea.x, ea.y)), dot2d(ba.x, ba.y, es.x, es.y)),
    realLiteral(1.0)
  );
  const hbInterp = ite(
    and(ge(hbDist, realLiteral(0.0)), lt(hbDist, r.radius)),
    divide(minus(times(norm, r.radius), dot2d(ba.x, ba.y, eb.x, eb.y)), dot2d(ab.x, ab.y, es.x, es.y)),
    realLiteral(1.0)
  );
  const hInterp = ite(perpendicular, realLiteral(1.0), minimum(haInterp, hbInterp));
  const vInterp = ite(
    or(parallel, ge(vDist, r.radius)),
    realLiteral(1.0),
    divide(minus(times(norm, r.radius), absolute(cross2d(ab.x, ab.y, ea.x, ea.y))), absolute(cross2d(ab.x, ab.y, es.x, es.y)))
  );
  return ite(ge(maximum(vDist, maximum(haDist, hbDist)), r.radius), realLiteral(0.0), minimum(hInterp, vInterp));
}

/** Clearance between the robot's border and boundary segment `index`. */
function distanceBoundary(robot: string, index: number, boundaries: Boundaries): Expression {
  const r = robotNames(robot);
  const a = vertex(index);
  const b = vertex((index + 1) % boundaries.count);
  const ab = { x: minus(b.x, a.x), y: minus(b.y, a.y) };
  const ba = { x: minus(a.x, b.x), y: minus(a.y, b.y) };
  const ra = { x: minus(a.x, r.poseX), y: minus(a.y, r.poseY) };
  const rb = { x: minus(b.x, r.poseX), y: minus(b.y, r.poseY) };

  const norm = norm2d(ab.x, ab.y);
  const vDist = divide(absolute(cross2d(ab.x, ab.y, ra.x, ra.y)), norm);
  const haDist = divide(dot2d(ab.x, ab.y, ra.x, ra.y), norm);
  const hbDist = divide(dot2d(ba.x, ba.y, rb.x, rb.y), norm);
  const hDist = maximum(maximum(haDist, hbDist), realLiteral(0.0));
  return minus(norm2d(hDist, vDist), r.radius);
}

/**
 * `combine(term(i), fold(i + 1))` over boundaries `from..count-1`, ending in `base`.
 * Depth is bounded by the validated vertex count.
 */
function foldBoundaries(
  boundaries: Boundaries,
  term: (index: number) => Expression,
  combine: (head: Expression, rest: Expression) => Expression,
  base: () => Expression,
  from = 0
): Expression {
  if (from >= boundaries.count) return base();
  return combine(term(from), foldBoundaries(boundaries, term, combine, base, from + 1));
}

export type Barrier = 'all' | 'boundaries' | 'obstacles';

export function toBarrier(name: string): Barrier {
  if (name === 'all' || name === 'boundaries' || name === 'obstacles') return name;
  throw new ConfigurationError(`Unknown barrier '${name}'`, { hint: "Use 'all', 'boundaries' or 'obstacles'." });
}

export function expandIntersect(robot: string, barrier: Barrier, boundaries: Boundaries): Expression {
  const boundaryTerms = () =>
    foldBoundaries(boundaries, (i) => intersectBoundary(robot, i, boundaries), maximum, () => realLiteral(0.0));
  switch (barrier) {
    case 'all':
      return maximum(boundaryTerms(), INTERSECT_OBSTACLE_STUB());
    case 'boundaries':
      return boundaryTerms();
    case 'obstacles':
      return INTERSECT_OBSTACLE_STUB();
  }
}

export function expandDistance(robot: string, barrier: Barrier, boundaries: Boundaries): Expression {
  const boundaryTerms = () =>
    foldBoundaries(boundaries, (i) => distanceBoundary(robot, i, boundaries), minimum, () => boolLiteral(true));
  switch (barrier) {
    case 'all':
      return maximum(boundaryTerms(), DISTANCE_OBSTACLE_STUB());
    case 'boundaries':
      return boundaryTerms();
    case 'obstacles':
      return DISTANCE_OBSTACLE_STUB();
  }
}

export function robotPoseCm(robot: string) {
  const r = robotNames(robot);
  return { x: r.poseXCm, y: r.poseYCm };
}
