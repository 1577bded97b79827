import { describe, expect, it } from 'vitest';
import { bodyEdges, compileBody } from '../../src/compiler/body.js';
import { hashParts } from '../../src/compiler/hash.js';
import { and, gt, not } from '../../src/expression/generators.js';
import { boolLiteral, identifier, intLiteral, realLiteral } from '../../src/expression/model.js';
import type { Step } from '../../src/chart/types.js';
import { testContext } from './helpers.js';

const assign = (location: string, expr: string): Step => ({ kind: 'assign', location, expr });

describe('compileBody', () => {
  it('keeps plain assignments on the starting destination', () => {
    const ctx = testContext({ x: 'int' });
    const result = compileBody(ctx, [assign('x', '1'), assign('x', 'x + 1')], {
      source: 's',
      target: 't',
      probability: realLiteral(0.5),
      hash: 'h',
    });
    expect(result.head.location).toBe('t');
    expect(result.head.probability).toEqual(realLiteral(0.5));
    expect(result.head.assignments.map((a) => a.index)).toEqual([0, 1]);
    expect(result.edges).toEqual([]);
    expect(result.locations).toEqual([]);
  });

  it('splits the body at a send', () => {
    const ctx = testContext({ x: 'int' });
    const result = compileBody(
      ctx,
      [assign('x', '1'), { kind: 'send', event: 'ev', params: [{ name: 'v', expr: 'x' }] }, assign('x', '2')],
      { source: 's', target: 't', probability: realLiteral(1), hash: 'h' }
    );
    expect(result.head).toEqual({
      location: 's-h-1',
      probability: realLiteral(1),
      assignments: [{ ref: identifier('x'), value: intLiteral(1), index: 0 }],
    });
    expect(result.edges).toEqual([
      {
        location: 's-h-1',
        action: 'ev_on_send',
        destinations: [
          {
            location: 't',
            probability: realLiteral(1),
            assignments: [
              { ref: identifier('ev.v'), value: identifier('x'), index: 0 },
              { ref: identifier('ev.valid'), value: boolLiteral(true), index: 0 },
              { ref: identifier('x'), value: intLiteral(2), index: 1 },
            ],
          },
        ],
      },
    ]);
    expect(result.locations).toEqual(['s-h-1']);
    const event = ctx.env.events.get('ev');
    expect(event?.fieldType('v')).toBe('int');
    expect(event?.senders.get('robot')).toBe('ev_on_send');
  });

  it('sends string literals as byte arrays', () => {
    const ctx = testContext({});
    const result = compileBody(ctx, [{ kind: 'send', event: 'say', params: [{ name: 'text', expr: '"hi"' }] }], {
      source: 's',
      target: 't',
      probability: realLiteral(1),
      hash: 'h',
    });
    expect(ctx.env.events.get('say')?.fieldType('text')).toEqual({ kind: 'array', base: 'int', maxSizes: [4] });
    const [sendEdge] = result.edges;
    expect(sendEdge?.destinations[0]?.assignments.map((a) => a.ref)).toEqual([
      identifier('say.text'),
      identifier('say.text.d1_len'),
      identifier('say.valid'),
    ]);
    expect(sendEdge?.destinations[0]?.assignments.map((a) => a.index)).toEqual([0, 0, 0]);
  });

  it('compiles an if into guarded branch edges that join again', () => {
    const ctx = testContext({ x: 'int' });
    const step: Step = { kind: 'if', branches: [{ cond: 'x > 0', body: [assign('x', '1')] }] };
    const result = compileBody(ctx, [step], { source: 's', target: 't', probability: realLiteral(1), hash: 'h' });

    const before = 's-h-0_before_if';
    const after = 's-h-0_after_if';
    const cond = gt('x', intLiteral(0));
    const branchAction = (i: number) => `${before}-${after}-parent-h-${hashParts([step])}-${i}`;

    expect(result.head).toEqual({ location: before, probability: realLiteral(1), assignments: [] });
    expect(result.edges).toEqual([
      {
        location: before,
        action: branchAction(0),
        guard: cond,
        destinations: [
          { location: after, probability: realLiteral(1), assignments: [{ ref: identifier('x'), value: intLiteral(1), index: 0 }] },
        ],
      },
      {
        location: before,
        action: branchAction(1),
        guard: and(boolLiteral(true), not(cond)),
        destinations: [{ location: after, probability: realLiteral(1), assignments: [] }],
      },
      {
        location: after,
        action: 's-t-h',
        destinations: [{ location: 't', probability: realLiteral(1), assignments: [] }],
      },
    ]);
    expect(result.locations).toEqual([before, after]);
  });
});

describe('bodyEdges', () => {
  it('starts with a guarded edge under the parent action', () => {
    const ctx = testContext({ x: 'int' });
    const { edges } = bodyEdges(ctx, [assign('x', '3')], { source: 'a', target: 'b', hash: 'k', guard: boolLiteral(true) });
    expect(edges).toEqual([
      {
        location: 'a',
        action: 'a-b-parent-k',
        guard: boolLiteral(true),
        destinations: [
          { location: 'b', probability: realLiteral(1), assignments: [{ ref: identifier('x'), value: intLiteral(3), index: 0 }] },
        ],
      },
    ]);
  });
});
