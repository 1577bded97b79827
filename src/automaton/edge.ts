import { ModelError } from '../core/errors.js';
import { realLiteral, type Expression } from '../expression/model.js';

export interface Assignment {
  /** An identifier or an `aa` chain. */
  readonly ref: Expression;
  readonly value: Expression;
  /** Assignments with a lower index happen first; equal indexes are simultaneous. */
  readonly index: number;
}

export interface Destination {
  /** Unset while the body that leads to it is still being compiled. */
  location?: string;
  probability: Expression;
  assignments: Assignment[];
}

export interface Edge {
  location: string;
  /** Only edges produced by random-assignment expansion have no action. */
  action?: string;
  guard?: Expression;
  destinations: Destination[];
}

export function destination(location: string | undefined, assignments: Assignment[] = [], probability: Expression = realLiteral(1)): Destination {
  return { location, probability, assignments };
}

export function assignment(ref: Expression, value: Expression, index = 0): Assignment {
  if (ref.kind !== 'identifier' && !(ref.kind === 'operator' && ref.op === 'aa')) {
    throw new ModelError('Assignment target must be a variable or an array element');
  }
  return { ref, value, index };
}

/** Next free priority index after `assignments`. */
export function nextAssignmentIndex(assignments: readonly Assignment[]): number {
  return assignments.length === 0 ? 0 : Math.max(...assignments.map((a) => a.index)) + 1;
}

export function sortedAssignments(assignments: readonly Assignment[]): Assignment[] {
  return [...assignments].sort((a, b) => a.index - b.index);
}

/** Target of a finalised destination. */
export function targetOf(edge: Edge, dest: Destination): string {
  if (dest.location === undefined) {
    throw new ModelError(`Edge from '${edge.location}'${edge.action ? ` (${edge.action})` : ''} has a destination without a target location`);
  }
  return dest.location;
}
