import { z } from 'zod';
import { createVariable, type Constant } from '../automaton/variable.js';
import { intLiteral, realLiteral } from '../expression/model.js';
import type { Model } from './model.js';

const point = z.object({ x: z.number(), y: z.number() });

export const robotSchema = z.object({
  name: z.string().min(1),
  pose: z.object({ x: z.number(), y: z.number(), theta: z.number() }),
  shape: z.object({ radius: z.number().nonnegative(), height: z.number().nonnegative() }),
  linear_velocity: z.number(),
  angular_velocity: z.number(),
});

/** The robot's world: its polygonal boundary, the robots in it and the simulation step. */
export const environmentSchema = z.object({
  sim_step: z.number().positive(),
  boundaries: z.array(point),
  robots: z.array(robotSchema),
  // Accepted but not modelled yet: obstacle terms of the geometric macros are constant stubs.
  obstacles: z.array(z.unknown()).optional(),
});

export type Environment = z.infer<typeof environmentSchema>;

const toCm = (meters: number) => Math.trunc(meters * 100);
const toDeg = (radians: number) => Math.trunc((radians * 180) / Math.PI);

const realConstant = (name: string, value: number): Constant => ({ name, type: 'real', value: realLiteral(value) });

/**
 * Declare the environment's constants and robot state in `model`.
 * Poses are stored in whole centimeters and degrees; the metric views are transient.
 */
export function loadEnvironment(model: Model, env: Environment): void {
  model.addConstant(realConstant('sim_step', env.sim_step));
  model.addConstant({ name: 'boundaries.count', type: 'int', value: intLiteral(env.boundaries.length) });
  env.boundaries.forEach((vertex, i) => {
    model.addConstant(realConstant(`boundaries.${i}.x`, vertex.x));
    model.addConstant(realConstant(`boundaries.${i}.y`, vertex.y));
  });

  for (const robot of env.robots) {
    const prefix = `robots.${robot.name}`;
    model.addVariables([
      createVariable(`${prefix}.pose.x_cm`, 'int', intLiteral(toCm(robot.pose.x))),
      createVariable(`${prefix}.pose.y_cm`, 'int', intLiteral(toCm(robot.pose.y))),
      createVariable(`${prefix}.pose.theta_deg`, 'int', intLiteral(toDeg(robot.pose.theta))),
      ...['pose.x', 'pose.y', 'pose.theta', 'goal.x', 'goal.y', 'goal.theta'].map((field) =>
        createVariable(`${prefix}.${field}`, 'real', undefined, true)
      ),
    ]);
    model.addConstant(realConstant(`${prefix}.shape.radius`, robot.shape.radius));
    model.addConstant(realConstant(`${prefix}.shape.height`, robot.shape.height));
    model.addConstant(realConstant(`${prefix}.linear_velocity`, robot.linear_velocity));
    model.addConstant(realConstant(`${prefix}.angular_velocity`, robot.angular_velocity));
  }
}
