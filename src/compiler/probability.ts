import { ModelError, isCompileError } from '../core/errors.js';
import { PROBABILITY_EPSILON } from '../core/types.js';
import { evaluateConstant, type ConstantValue } from '../expression/evaluate.js';
import { parseExpression } from '../expression/parse.js';
import type { ConstantValues } from '../macros/expand.js';
import type { TransitionTarget } from '../chart/types.js';

function evaluate(prob: string, constants: ConstantValues): ConstantValue {
  try {
    return evaluateConstant(parseExpression(prob), (name) => constants.get(name));
  } catch (err) {
    if (isCompileError(err)) {
      throw new ModelError(`Probability '${prob}' is not a compile-time constant: ${err.message}`, { hint: err.hint });
    }
    throw err;
  }
}

function explicitProbability(prob: string | number, constants: ConstantValues): number {
  if (typeof prob === 'number') return prob;
  const value = evaluate(prob, constants);
  if (typeof value !== 'number') throw new ModelError(`Probability '${prob}' is not a number`);
  return value;
}

/**
 * Probability of each target, in order. A target without one takes what is
 * left. Every value must be positive and they must sum to 1.
 */
export function targetProbabilities(targets: readonly TransitionTarget[], constants: ConstantValues): number[] {
  let total = 0;
  const probabilities = targets.map((target) => {
    const p = target.prob === undefined ? 1 - total : explicitProbability(target.prob, constants);
    if (!(p > 0)) {
      throw new ModelError(`Probability of target '${target.target}' must be greater than 0, got ${p}`);
    }
    total += p;
    return p;
  });
  if (Math.abs(1 - total) > PROBABILITY_EPSILON) {
    throw new ModelError(`Target probabilities sum to ${total}, expected 1`, {
      hint: 'Leave the probability of the last target out to give it the remainder.',
    });
  }
  return probabilities;
}
