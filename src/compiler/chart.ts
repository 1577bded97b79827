import { Automaton } from '../automaton/automaton.js';
import type { Edge } from '../automaton/edge.js';
import { ModelError, withErrorContext } from '../core/errors.js';
import { realLiteral, renameEventData, type Expression } from '../expression/model.js';
import { parseExpression } from '../expression/parse.js';
import type { Chart, ChartNode, ChartState, ChartTransition, TransitionTarget } from '../chart/types.js';
import { bodyEdges, compileBody } from './body.js';
import { automatonLookup, bodyContext, type CompileEnvironment } from './context.js';
import { declareData } from './datamodel.js';
import { isEventSynched, receiveAction } from './events.js';
import { mergeConditions } from './guards.js';
import { hashParts } from './hash.js';
import { targetProbabilities } from './probability.js';

const EVENTLESS = '';
const BT_ROOT_PREFIX = 'bt_root_fsm_';

/** What a state's transitions have claimed so far, per trigger event ('' for event-less). */
interface StateRecord {
  readonly id: string;
  readonly conditions: Map<string, Expression[]>;
  readonly unconditional: Set<string>;
}

export function isRootChart(chart: Chart): boolean {
  return chart.kind === 'bt-root' || chart.name.startsWith(BT_ROOT_PREFIX);
}

function transitionLabel(transition: ChartTransition, position: number): string {
  return transition.event ?? `eventless#${position}`;
}

class ChartCompiler {
  readonly automaton: Automaton;
  private readonly states = new Map<string, ChartState>();
  private readonly records = new Map<string, StateRecord>();

  constructor(
    private readonly chart: Chart,
    private readonly env: CompileEnvironment
  ) {
    this.automaton = new Automaton(chart.name);
  }

  visit(node: ChartNode): void {
    switch (node.kind) {
      case 'root':
        return this.root(node.chart);
      case 'datamodel':
        return declareData(this.automaton, node.data, this.env.maxArraySize, automatonLookup(this.automaton, this.env));
      case 'state':
        return withErrorContext({ state: node.state.id }, () => this.state(node.state));
      case 'transition':
        return withErrorContext({ state: node.state.id, transition: transitionLabel(node.transition, node.position) }, () =>
          this.transition(node.state, node.transition)
        );
      default: {
        const unreachable: never = node;
        return unreachable;
      }
    }
  }

  private root(chart: Chart): void {
    for (const state of chart.states) {
      if (this.states.has(state.id)) throw new ModelError(`State '${state.id}' is declared twice`);
      this.states.set(state.id, state);
    }
    this.requireState(chart.initial);
    this.visit({ kind: 'datamodel', data: chart.datamodel ?? [] });
    for (const state of chart.states) this.visit({ kind: 'state', state });
    this.addSelfLoops();
    this.addEntry();
  }

  private requireState(id: string): ChartState {
    const state = this.states.get(id);
    if (!state) throw new ModelError(`State '${id}' not found in chart '${this.chart.name}'`);
    return state;
  }

  private state(state: ChartState): void {
    this.automaton.addLocation(state.id);
    const record: StateRecord = { id: state.id, conditions: new Map(), unconditional: new Set() };
    this.records.set(state.id, record);
    let hasEventTransition = false;
    (state.transitions ?? []).forEach((transition, position) => {
      const event = transition.event ?? EVENTLESS;
      if (transition.event !== undefined) hasEventTransition = true;
      if (record.unconditional.has(event)) {
        throw new ModelError(
          event === EVENTLESS
            ? `State '${state.id}' already has an unconditional event-less transition`
            : `Event '${event}' in state '${state.id}' already has an unconditional transition`
        );
      }
      this.visit({ kind: 'transition', state, transition, position });
      if (transition.cond === undefined) {
        record.unconditional.add(event);
      } else {
        record.conditions.set(event, [...(record.conditions.get(event) ?? []), parseExpression(transition.cond)]);
      }
    });
    if (hasEventTransition && record.unconditional.has(EVENTLESS)) {
      throw new ModelError(`State '${state.id}' can always leave without an event, so its event transitions never fire`, {
        hint: 'Give the event-less transition a condition, or move the event transitions to another state.',
      });
    }
  }

  private targetsOf(transition: ChartTransition): TransitionTarget[] {
    if (transition.targets) return transition.targets;
    if (transition.target === undefined) throw new ModelError('Transition has no target');
    return [{ target: transition.target, body: transition.body }];
  }

  private transition(state: ChartState, transition: ChartTransition): void {
    const record = this.records.get(state.id);
    if (!record) throw new ModelError(`State '${state.id}' is compiled out of order`);
    const { event, cond: condSource } = transition;
    const targets = this.targetsOf(transition);
    const probabilities = targetProbabilities(targets, this.env.constants);
    const plan = targets.map((target, i) => ({ target, probability: probabilities[i], state: this.requireState(target.target) }));

    let action: string;
    if (event !== undefined) {
      action = receiveAction(event);
      this.env.events.ensure(event).addReceiver(this.automaton.name, action);
    } else {
      action = `transition-${state.id}-eventless-${hashParts([state.id, condSource ?? null])}`;
    }
    const cond = condSource === undefined ? undefined : parseExpression(condSource);
    const previous = record.conditions.get(event ?? EVENTLESS) ?? [];
    const edge: Edge = {
      location: state.id,
      action,
      guard: renameEventData(mergeConditions(previous, cond), event),
      destinations: [],
    };

    const ctx = bodyContext(this.automaton, this.env, event);
    const extraEdges: Edge[] = [];
    const extraLocations: string[] = [];
    let cumulative = 0;
    for (const { target, probability, state: targetState } of plan) {
      cumulative += probability;
      const body = [...(state.onExit ?? []), ...(target.body ?? []), ...(targetState.onEntry ?? [])];
      const hash = hashParts([state.id, target.target, action, condSource ?? null, String(cumulative)]);
      const result = compileBody(ctx, body, { source: state.id, target: target.target, probability: realLiteral(probability), hash });
      edge.destinations.push(result.head);
      extraEdges.push(...result.edges);
      extraLocations.push(...result.locations);
    }

    this.automaton.addEdge(edge);
    for (const extra of extraEdges) this.automaton.addEdge(extra);
    for (const location of extraLocations) this.automaton.addLocation(location);
  }

  /** Empty `<event>_on_receive` loops so a state never blocks an event another state handles. */
  private addSelfLoops(): void {
    if (isRootChart(this.chart)) return;
    const handled = new Set<string>();
    for (const record of this.records.values()) {
      for (const event of [...record.unconditional, ...record.conditions.keys()]) {
        if (event !== EVENTLESS) handled.add(event);
      }
    }
    for (const record of this.records.values()) {
      if (record.unconditional.has(EVENTLESS)) continue;
      for (const event of handled) {
        if (record.unconditional.has(event)) continue;
        const conditions = record.conditions.get(event) ?? [];
        if (conditions.length === 0 && isEventSynched(event)) continue;
        const guard = conditions.length > 0 ? renameEventData(mergeConditions(conditions), event) : undefined;
        const { edges } = bodyEdges(bodyContext(this.automaton, this.env, event), [], {
          source: record.id,
          target: record.id,
          hash: '',
          guard,
          action: receiveAction(event),
        });
        for (const loop of edges) this.automaton.addEdge(loop);
      }
    }
  }

  /** Runs the initial state's on-entry body once, from a dedicated start location. */
  private addEntry(): void {
    const initial = this.requireState(this.chart.initial);
    const onEntry = initial.onEntry ?? [];
    if (onEntry.length === 0) {
      this.automaton.setInitialLocation(initial.id);
      return;
    }
    const source = `${initial.id}-first-exec`;
    const { edges, locations } = withErrorContext({ state: source }, () =>
      bodyEdges(bodyContext(this.automaton, this.env), onEntry, {
        source,
        target: initial.id,
        hash: hashParts([source, initial.id, 'onentry']),
      })
    );
    this.automaton.setInitialLocation(source);
    for (const edge of edges) this.automaton.addEdge(edge);
    for (const location of locations) this.automaton.addLocation(location);
  }
}

/** Compile one chart into its automaton, registering its events in `env.events`. */
export function compileChart(chart: Chart, env: CompileEnvironment): Automaton {
  return withErrorContext({ automaton: chart.name }, () => {
    const compiler = new ChartCompiler(chart, env);
    compiler.visit({ kind: 'root', chart });
    return compiler.automaton;
  });
}
