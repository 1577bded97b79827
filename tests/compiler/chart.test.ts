import { describe, expect, it } from 'vitest';
import { ModelError } from '../../src/core/errors.js';
import { compileChart } from '../../src/compiler/chart.js';
import { hashParts } from '../../src/compiler/hash.js';
import { and, gt, lt, not } from '../../src/expression/generators.js';
import { boolLiteral, identifier, intLiteral, realLiteral } from '../../src/expression/model.js';
import type { Chart } from '../../src/chart/types.js';
import { testEnvironment } from './helpers.js';

const counter = [{ id: 'x', type: 'int32' }];

const lamp: Chart = {
  name: 'lamp',
  initial: 'off',
  datamodel: counter,
  states: [
    { id: 'off', transitions: [{ event: 'toggle', target: 'on' }] },
    {
      id: 'on',
      transitions: [
        { event: 'toggle', cond: 'x > 0', target: 'off' },
        { event: 'reset', target: 'off' },
      ],
    },
  ],
};

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('compileChart', () => {
  it('compiles event transitions into receive edges', () => {
    const env = testEnvironment();
    const automaton = compileChart(lamp, env);
    expect(automaton.name).toBe('lamp');
    expect(automaton.getInitialLocation()).toBe('off');
    expect(automaton.getLocations()).toEqual(['off', 'on']);
    expect(automaton.variables.map((v) => v.name)).toEqual(['x']);

    const [first, second, third] = automaton.edges;
    expect(first).toEqual({
      location: 'off',
      action: 'toggle_on_receive',
      guard: boolLiteral(true),
      destinations: [{ location: 'on', probability: realLiteral(1), assignments: [] }],
    });
    expect(second?.guard).toEqual(gt('x', intLiteral(0)));
    expect(third?.action).toBe('reset_on_receive');
    expect(env.events.get('toggle')?.receivers.get('lamp')).toBe('toggle_on_receive');
  });

  it('adds self-loops so no state blocks a handled event', () => {
    const { edges } = compileChart(lamp, testEnvironment());
    expect(edges).toHaveLength(5);
    const [, , , offLoop, onLoop] = edges;
    expect(offLoop).toEqual({
      location: 'off',
      action: 'reset_on_receive',
      destinations: [{ location: 'off', probability: realLiteral(1), assignments: [] }],
    });
    expect(onLoop?.location).toBe('on');
    expect(onLoop?.action).toBe('toggle_on_receive');
    expect(onLoop?.guard).toEqual(and(boolLiteral(true), not(gt('x', intLiteral(0)))));
  });

  it('adds no self-loops to root charts or for synchronised events', () => {
    expect(compileChart({ ...lamp, kind: 'bt-root' }, testEnvironment()).edges).toHaveLength(3);
    const ticked: Chart = {
      name: 'node',
      initial: 'a',
      states: [{ id: 'a', transitions: [{ event: 'bt_1_tick', target: 'b' }] }, { id: 'b' }],
    };
    expect(compileChart(ticked, testEnvironment()).edges).toHaveLength(1);
  });

  it('guards later transitions on the same event against earlier ones', () => {
    const chart: Chart = {
      name: 'signs',
      initial: 's',
      datamodel: counter,
      states: [
        {
          id: 's',
          transitions: [
            { event: 'go', cond: 'x > 0', target: 's' },
            { event: 'go', cond: 'x < 0', target: 's' },
          ],
        },
      ],
    };
    const [, second] = compileChart(chart, testEnvironment()).edges;
    expect(second?.guard).toEqual(and(lt('x', intLiteral(0)), not(gt('x', intLiteral(0)))));
  });

  it('rejects a second unconditional transition on the same event', () => {
    const chart: Chart = {
      name: 'dup',
      initial: 's',
      states: [{ id: 's', transitions: [{ event: 'go', target: 's' }, { event: 'go', target: 's' }] }],
    };
    const err = caught(() => compileChart(chart, testEnvironment()));
    expect(err).toBeInstanceOf(ModelError);
    if (!(err instanceof ModelError)) return;
    expect(err.context).toEqual({ automaton: 'dup', state: 's' });
    expect(err.describe()).toBe("dup/s: Event 'go' in state 's' already has an unconditional transition");
  });

  it('rejects targets that do not exist', () => {
    const chart: Chart = { name: 'lost', initial: 's', states: [{ id: 's', transitions: [{ event: 'go', target: 'nowhere' }] }] };
    expect(() => compileChart(chart, testEnvironment())).toThrow("State 'nowhere' not found in chart 'lost'");
  });

  it('names event-less transitions after their state and condition', () => {
    const chart: Chart = { name: 'auto', initial: 's', states: [{ id: 's', transitions: [{ target: 't' }] }, { id: 't' }] };
    const [edge] = compileChart(chart, testEnvironment()).edges;
    expect(edge?.action).toBe(`transition-s-eventless-${hashParts(['s', null])}`);
  });

  it('splits probabilistic targets into destinations', () => {
    const chart: Chart = {
      name: 'coin',
      initial: 'flip',
      states: [
        { id: 'flip', transitions: [{ event: 'go', targets: [{ target: 'heads', prob: 0.25 }, { target: 'tails' }] }] },
        { id: 'heads' },
        { id: 'tails' },
      ],
    };
    const [edge] = compileChart(chart, testEnvironment()).edges;
    expect(edge?.destinations).toEqual([
      { location: 'heads', probability: realLiteral(0.25), assignments: [] },
      { location: 'tails', probability: realLiteral(0.75), assignments: [] },
    ]);
  });

  it('registers no receiver when the probabilities are invalid', () => {
    const env = testEnvironment();
    const chart: Chart = {
      name: 'bad',
      initial: 's',
      states: [{ id: 's', transitions: [{ event: 'go', targets: [{ target: 's', prob: 1.2 }] }] }],
    };
    expect(() => compileChart(chart, env)).toThrow(ModelError);
    expect(env.events.has('go')).toBe(false);
  });

  it('runs on-exit, transition and on-entry bodies in that order', () => {
    const chart: Chart = {
      name: 'seq',
      initial: 'a',
      datamodel: counter,
      states: [
        {
          id: 'a',
          onExit: [{ kind: 'assign', location: 'x', expr: '1' }],
          transitions: [{ event: 'go', target: 'b', body: [{ kind: 'assign', location: 'x', expr: '2' }] }],
        },
        { id: 'b', onEntry: [{ kind: 'assign', location: 'x', expr: '3' }] },
      ],
    };
    const [edge] = compileChart(chart, testEnvironment()).edges;
    expect(edge?.destinations[0]?.assignments).toEqual([
      { ref: identifier('x'), value: intLiteral(1), index: 0 },
      { ref: identifier('x'), value: intLiteral(2), index: 1 },
      { ref: identifier('x'), value: intLiteral(3), index: 2 },
    ]);
  });

  it('runs the initial on-entry body from a first-exec location', () => {
    const chart: Chart = {
      name: 'boot',
      initial: 'idle',
      datamodel: counter,
      states: [{ id: 'idle', onEntry: [{ kind: 'assign', location: 'x', expr: '1' }] }],
    };
    const automaton = compileChart(chart, testEnvironment());
    const hash = hashParts(['idle-first-exec', 'idle', 'onentry']);
    expect(automaton.getInitialLocation()).toBe('idle-first-exec');
    expect(automaton.edges).toEqual([
      {
        location: 'idle-first-exec',
        action: `idle-first-exec-idle-parent-${hash}`,
        destinations: [
          { location: 'idle', probability: realLiteral(1), assignments: [{ ref: identifier('x'), value: intLiteral(1), index: 0 }] },
        ],
      },
    ]);
  });
});
