import {
  assignment,
  destination,
  nextAssignmentIndex,
  type Assignment,
  type Destination,
  type Edge,
} from '../automaton/edge.js';
import { CompileTypeError, ModelError } from '../core/errors.js';
import { boolLiteral, identifier, realLiteral, renameEventData, type Expression } from '../expression/model.js';
import { parseExpression, parseSource, type ParsedSource } from '../expression/parse.js';
import { arrayDepth } from '../expression/arrays.js';
import { inferType, isArrayType, scalarOf, type DataType } from '../expression/types.js';
import type { IfStep, SendStep, Step } from '../chart/types.js';
import { arrayAssignments, compileAssign } from './assign.js';
import type { BodyContext } from './context.js';
import { sendAction } from './events.js';
import { mergeConditions } from './guards.js';
import { hashParts } from './hash.js';

/** The edge currently being extended: where it leaves from, and the destination still missing its target. */
interface OpenSegment {
  readonly header?: { location: string; action: string };
  readonly probability: Expression;
  readonly assignments: readonly Assignment[];
}

export interface BodyResult {
  /** Destination of the edge the body starts on. */
  head: Destination;
  edges: Edge[];
  locations: string[];
}

interface WalkState {
  segment: OpenSegment;
  head?: Destination;
  edges: Edge[];
  locations: string[];
}

export interface BodyTarget {
  /** Location of the edge the body is attached to. */
  source: string;
  target: string;
  probability: Expression;
  hash: string;
}

function close(state: WalkState, location: string): WalkState {
  const { segment } = state;
  const dest = destination(location, [...segment.assignments], segment.probability);
  if (!segment.header) return { ...state, head: dest };
  const edge: Edge = { location: segment.header.location, action: segment.header.action, destinations: [dest] };
  return { ...state, edges: [...state.edges, edge] };
}

function open(state: WalkState, location: string, action: string, assignments: readonly Assignment[] = []): WalkState {
  return { ...state, segment: { header: { location, action }, probability: realLiteral(1), assignments } };
}

/** Type carried by a send parameter; arrays take the model capacity in every dimension. */
function payloadType(parsed: ParsedSource, ctx: BodyContext): DataType {
  const capacity = ctx.env.maxArraySize;
  if (parsed.literal) {
    const dims = parsed.literal.kind === 'string' ? 1 : arrayDepth(parsed.literal.value);
    return { kind: 'array', base: parsed.literal.value.base, maxSizes: Array.from({ length: dims }, () => capacity) };
  }
  const inferred = inferType(renameEventData(parsed.expr, ctx.dataEvent), ctx.lookup);
  if (!inferred) {
    throw new CompileTypeError(`Cannot determine the type of '${parsed.source}'`, {
      hint: 'Declare the event and its fields in the model descriptor.',
    });
  }
  if (isArrayType(inferred)) return { kind: 'array', base: inferred.base, maxSizes: inferred.maxSizes.map(() => capacity) };
  return scalarOf(inferred);
}

function sendAssignments(step: SendStep, ctx: BodyContext): Assignment[] {
  const event = ctx.env.events.ensure(step.event);
  const assignments: Assignment[] = [];
  for (const param of step.params ?? []) {
    const parsed = parseSource(param.expr);
    const inferred = payloadType(parsed, ctx);
    event.recordPayload(new Map([[param.name, inferred]]));
    const declared = event.fieldType(param.name);
    const type = declared ?? inferred;
    const target = `${step.event}.${param.name}`;
    if (isArrayType(type)) {
      assignments.push(...arrayAssignments(target, type, parsed, ctx, 0).map((a) => ({ ...a, index: 0 })));
    } else {
      assignments.push(assignment(identifier(target), parseExpression(param.expr, { eventDataPrefix: ctx.dataEvent }), 0));
    }
  }
  event.addSender(ctx.automaton.name, sendAction(step.event));
  assignments.push(assignment(identifier(`${step.event}.valid`), boolLiteral(true), 0));
  return assignments;
}

function branchEdges(step: IfStep, ctx: BodyContext, before: string, after: string, hash: string): { edges: Edge[]; locations: string[] } {
  const ifHash = hashParts([step]);
  const previous: Expression[] = [];
  const edges: Edge[] = [];
  const locations: string[] = [];
  const branches = [...step.branches.map((b) => ({ cond: b.cond, body: b.body })), { cond: undefined, body: step.else ?? [] }];
  branches.forEach((branch, i) => {
    const cond = branch.cond === undefined ? undefined : parseExpression(branch.cond, { eventDataPrefix: ctx.dataEvent });
    const sub = bodyEdges(ctx, branch.body, {
      source: before,
      target: after,
      hash: [hash, ifHash, String(i)].join('-'),
      guard: mergeConditions(previous, cond),
    });
    edges.push(...sub.edges);
    locations.push(...sub.locations);
    if (cond) previous.push(cond);
  });
  return { edges, locations };
}

function walkStep(state: WalkState, step: Step, i: number, ctx: BodyContext, at: BodyTarget): WalkState {
  const intermediate = `${at.source}-${at.hash}-${i}`;
  switch (step.kind) {
    case 'assign': {
      const { segment } = state;
      const added = compileAssign(step, ctx, nextAssignmentIndex(segment.assignments));
      return { ...state, segment: { ...segment, assignments: [...segment.assignments, ...added] } };
    }
    case 'send': {
      const closed = close(state, intermediate);
      const next = open(closed, intermediate, sendAction(step.event), sendAssignments(step, ctx));
      return { ...next, locations: [...next.locations, intermediate] };
    }
    case 'if': {
      const before = `${intermediate}_before_if`;
      const after = `${intermediate}_after_if`;
      const closed = close(state, before);
      const branches = branchEdges(step, ctx, before, after, at.hash);
      const next = open(
        { ...closed, edges: [...closed.edges, ...branches.edges], locations: [...closed.locations, ...branches.locations] },
        after,
        `${at.source}-${at.target}-${at.hash}`
      );
      return { ...next, locations: [...next.locations, before, after] };
    }
    default: {
      const unreachable: never = step;
      return unreachable;
    }
  }
}

/**
 * Compile `body` as the continuation of an edge leaving `at.source`.
 * Returns the destination to append to that edge, plus the edges and
 * locations the body's sends and conditionals introduce.
 */
export function compileBody(ctx: BodyContext, body: readonly Step[], at: BodyTarget): BodyResult {
  let state: WalkState = { segment: { probability: at.probability, assignments: [] }, edges: [], locations: [] };
  body.forEach((step, i) => {
    state = walkStep(state, step, i, ctx, at);
  });
  state = close(state, at.target);
  const { head } = state;
  if (!head) throw new ModelError(`Body from '${at.source}' produced no destination`);
  return { head, edges: state.edges, locations: state.locations };
}

export interface SubAutomaton {
  source: string;
  target: string;
  hash: string;
  guard?: Expression;
  /** Defaults to `<source>-<target>-parent-<hash>`. */
  action?: string;
}

/** A standalone edge running `body` from `source` to `target`, with everything it needs. */
export function bodyEdges(ctx: BodyContext, body: readonly Step[], sub: SubAutomaton): { edges: Edge[]; locations: string[] } {
  const action = sub.action ?? `${sub.source}-${sub.target}-parent-${sub.hash}`;
  const result = compileBody(ctx, body, { source: sub.source, target: sub.target, probability: realLiteral(1), hash: sub.hash });
  const start: Edge = { location: sub.source, action, ...(sub.guard ? { guard: sub.guard } : {}), destinations: [result.head] };
  return { edges: [start, ...result.edges], locations: result.locations };
}
