import { describe, expect, it } from 'vitest';
import { Automaton } from '../../src/automaton/automaton.js';
import { destination } from '../../src/automaton/edge.js';
import { ModelError } from '../../src/core/errors.js';
import { EventsHolder } from '../../src/compiler/events.js';
import { realLiteral } from '../../src/expression/model.js';
import { Model } from '../../src/model/model.js';
import { buildEventSyncs, declareEventVariables, eventVariables } from '../../src/model/syncs.js';

function chartAutomaton(name: string, actions: string[]): Automaton {
  const automaton = new Automaton(name);
  automaton.setInitialLocation('s');
  for (const action of actions) automaton.addEdge({ location: 's', action, destinations: [destination('s', [], realLiteral(1))] });
  return automaton;
}

describe('buildEventSyncs', () => {
  it('joins senders and receivers through an event automaton', () => {
    const model = new Model('m');
    model.addAutomaton(chartAutomaton('A', ['ev_on_send']));
    model.addAutomaton(chartAutomaton('B', ['ev_on_receive']));
    const events = new EventsHolder();
    const ev = events.ensure('ev');
    ev.addSender('A', 'ev_on_send');
    ev.addReceiver('B', 'ev_on_receive');

    const live = declareEventVariables(model, events);
    expect(live).toEqual([ev]);
    expect(model.variables.map((v) => v.name)).toEqual(['ev.valid']);

    const composition = buildEventSyncs(model, live);
    expect(composition.toJSON()).toEqual({
      elements: [{ automaton: 'A' }, { automaton: 'B' }, { automaton: 'ev' }],
      syncs: [
        { result: 'ev_on_receive', synchronise: [null, 'ev_on_receive', 'ev_on_receive'] },
        { result: 'ev_on_send', synchronise: ['ev_on_send', null, 'ev_on_send'] },
      ],
    });
    const buffer = model.getAutomaton('ev');
    expect(buffer?.getInitialLocation()).toBe('waiting');
    expect(buffer?.edges.map((e) => [e.location, e.action, e.destinations[0]?.location])).toEqual([
      ['waiting', 'ev_on_send', 'received'],
      ['received', 'ev_on_receive', 'waiting'],
    ]);
  });

  it('lets events nobody receives loop in place', () => {
    const model = new Model('m');
    model.addAutomaton(chartAutomaton('A', ['log_on_send']));
    const events = new EventsHolder();
    events.ensure('log').addSender('A', 'log_on_send');
    buildEventSyncs(model, declareEventVariables(model, events));
    expect(model.getAutomaton('log')?.edges.map((e) => [e.location, e.action, e.destinations[0]?.location])).toEqual([
      ['waiting', 'log_on_send', 'waiting'],
    ]);
  });
});

describe('declareEventVariables', () => {
  it('drops removable interfaces nobody sends', () => {
    const model = new Model('m');
    model.addAutomaton(chartAutomaton('B', ['action_nav_feedback_on_receive', 'other']));
    const events = new EventsHolder();
    events.ensure('action_nav_feedback').addReceiver('B', 'action_nav_feedback_on_receive');
    expect(declareEventVariables(model, events)).toEqual([]);
    expect(model.getAutomaton('B')?.getActions()).toEqual(['other']);
    expect(model.variables).toEqual([]);
  });

  it('rejects other events that are received but never sent', () => {
    const model = new Model('m');
    const events = new EventsHolder();
    events.ensure('lonely').addReceiver('B', 'lonely_on_receive');
    expect(() => declareEventVariables(model, events)).toThrow(new ModelError("Event 'lonely' is received by B but never sent"));
  });

  it('skips events without senders or receivers', () => {
    const events = new EventsHolder();
    events.declare('unused', new Map());
    expect(declareEventVariables(new Model('m'), events)).toEqual([]);
  });
});

describe('eventVariables', () => {
  it('declares the valid flag, the fields and their length companions', () => {
    const events = new EventsHolder();
    const scan = events.declare('scan', new Map([['data', { kind: 'array' as const, base: 'int' as const, maxSizes: [4] }]]));
    expect(eventVariables(scan).map((v) => v.name)).toEqual(['scan.valid', 'scan.data', 'scan.data.d1_len']);
  });
});
