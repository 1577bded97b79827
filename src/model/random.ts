import { assignment, targetOf, type Destination, type Edge } from '../automaton/edge.js';
import type { Variable } from '../automaton/variable.js';
import { ModelError } from '../core/errors.js';
import { containsDistribution, realLiteral } from '../expression/model.js';
import { printExpression } from '../expression/print.js';
import { expandDistributions } from '../macros/distributions.js';
import type { Model } from './model.js';

/** Action of the edge that carries the assignments left after a random draw. */
export const CONTINUATION_ACTION = 'act';

function checkInitialValue(variable: Variable, owner: string): void {
  if (containsDistribution(variable.initialValue)) {
    throw new ModelError(
      `Variable '${variable.name}'${owner} starts from a random value (${printExpression(variable.initialValue)}), which is not supported`,
      { hint: 'Draw the value on the first transition instead.' }
    );
  }
}

/**
 * Split every destination at its first random assignment: the destination
 * moves to an intermediate location, an action-less edge draws one of the
 * `nOptions` values with equal probability, and an `act` edge carries the
 * remaining assignments on to the original target.
 */
function expandEdge(edge: Edge, nOptions: number, edgeId = `${edge.location}_${edge.action}`): Edge[] {
  if (edge.action === undefined) return [edge];
  const generated: Edge[] = [];
  const destinations = edge.destinations.map((dest, d): Destination => {
    for (let i = 0; i < dest.assignments.length; i++) {
      const current = dest.assignments[i];
      if (!current || !containsDistribution(current.value)) continue;
      const options = expandDistributions(current.value, nOptions);
      const expandedLocation = `${edgeId}_dest_${d}_expanded_assign_${i}`;
      const afterLocation = `${edgeId}_dest_${d}_after_assign_${i}`;
      generated.push({
        location: expandedLocation,
        destinations: options.map((option) => ({
          location: afterLocation,
          probability: realLiteral(1 / options.length),
          assignments: [assignment(current.ref, option)],
        })),
      });
      const continuation: Edge = {
        location: afterLocation,
        action: CONTINUATION_ACTION,
        destinations: [{ location: targetOf(edge, dest), probability: realLiteral(1), assignments: dest.assignments.slice(i + 1) }],
      };
      generated.push(...expandEdge(continuation, nOptions));
      return { ...dest, location: expandedLocation, assignments: dest.assignments.slice(0, i) };
    }
    return dest;
  });
  return [{ ...edge, destinations }, ...generated];
}

/**
 * Name for the locations an edge's draws introduce. Edges sharing a source
 * location and action take their ordinal among those edges.
 */
function edgeIds(edges: readonly Edge[]): string[] {
  const keys = edges.map((edge) => `${edge.location}_${edge.action}`);
  const counts = new Map<string, number>();
  for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1);
  const seen = new Map<string, number>();
  return keys.map((key) => {
    if ((counts.get(key) ?? 0) < 2) return key;
    const k = seen.get(key) ?? 0;
    seen.set(key, k + 1);
    return `${key}_${k}`;
  });
}

/** Replace random assignments in every automaton by explicit probabilistic branching. */
export function expandRandomAssignments(model: Model, nOptions: number): void {
  if (!Number.isInteger(nOptions) || nOptions < 1) {
    throw new ModelError(`The number of random options must be a positive integer, got ${nOptions}`);
  }
  for (const variable of model.variables) checkInitialValue(variable, '');
  for (const automaton of model.automata) {
    for (const variable of automaton.variables) checkInitialValue(variable, ` of automaton '${automaton.name}'`);
    const ids = edgeIds(automaton.edges);
    automaton.replaceEdges(automaton.edges.flatMap((edge, k) => expandEdge(edge, nOptions, ids[k])));
  }
  if (model.getComposition()) model.completeComposition();
}
