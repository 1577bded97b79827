import { and, not } from '../expression/generators.js';
import { boolLiteral, type Expression } from '../expression/model.js';

/**
 * Guard of a transition or branch that only fires when none of the earlier
 * siblings did: `(current or true) ∧ ¬prev1 ∧ ¬prev2 …`.
 */
export function mergeConditions(previous: readonly Expression[], current?: Expression): Expression {
  return previous.reduce<Expression>((joint, prev) => and(joint, not(prev)), current ?? boolLiteral(true));
}
