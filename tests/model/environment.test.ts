import { describe, expect, it } from 'vitest';
import { intLiteral, realLiteral } from '../../src/expression/model.js';
import { loadEnvironment, type Environment } from '../../src/model/environment.js';
import { Model } from '../../src/model/model.js';

const environment: Environment = {
  sim_step: 0.1,
  boundaries: [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 0, y: 1 },
  ],
  robots: [
    {
      name: 'r1',
      pose: { x: 1.234, y: 0.5, theta: 1 },
      shape: { radius: 0.2, height: 0.3 },
      linear_velocity: 0.5,
      angular_velocity: 0.1,
    },
  ],
};

describe('loadEnvironment', () => {
  it('declares the boundary polygon as constants', () => {
    const model = new Model('m');
    loadEnvironment(model, environment);
    const constants = model.constantValues();
    expect(constants.get('sim_step')).toEqual(realLiteral(0.1));
    expect(constants.get('boundaries.count')).toEqual(intLiteral(3));
    expect(constants.get('boundaries.1.x')).toEqual(realLiteral(1));
    expect(constants.get('boundaries.2.y')).toEqual(realLiteral(1));
  });

  it('stores robot poses in whole centimeters and degrees', () => {
    const model = new Model('m');
    loadEnvironment(model, environment);
    expect(model.getVariable('robots.r1.pose.x_cm')?.initialValue).toEqual(intLiteral(123));
    expect(model.getVariable('robots.r1.pose.y_cm')?.initialValue).toEqual(intLiteral(50));
    expect(model.getVariable('robots.r1.pose.theta_deg')?.initialValue).toEqual(intLiteral(57));
    expect(model.constantValues().get('robots.r1.shape.radius')).toEqual(realLiteral(0.2));
  });

  it('declares the metric pose and goal as transient reals', () => {
    const model = new Model('m');
    loadEnvironment(model, environment);
    expect(model.getVariable('robots.r1.goal.x')).toEqual({
      name: 'robots.r1.goal.x',
      type: 'real',
      initialValue: realLiteral(0),
      transient: true,
    });
    expect(model.variables.filter((v) => v.transient)).toHaveLength(6);
  });
});
