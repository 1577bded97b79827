import { describe, expect, it } from 'vitest';
import { ModelError } from '../../src/core/errors.js';
import { Composition } from '../../src/model/composition.js';

describe('Composition', () => {
  it('writes sync vectors by result, with null for absent elements', () => {
    const composition = new Composition(['A', 'B']);
    composition.addSync('go', { B: 'b_go', A: 'a_go' });
    composition.addSync('alpha', { A: 'x' });
    expect(composition.toJSON()).toEqual({
      elements: [{ automaton: 'A' }, { automaton: 'B' }],
      syncs: [
        { result: 'alpha', synchronise: ['x', null] },
        { result: 'go', synchronise: ['a_go', 'b_go'] },
      ],
    });
    expect(composition.syncCount).toBe(2);
    expect([...composition.syncedActions('A')]).toEqual(['a_go', 'x']);
  });

  it('rejects vectors over unknown or missing elements', () => {
    const composition = new Composition(['A']);
    expect(() => composition.addSync('z', { C: 'c' })).toThrow(
      new ModelError("Sync 'z' refers to 'C', which is not an element of the composition")
    );
    expect(() => composition.addSync('z', {})).toThrow("Sync 'z' has no participants");
    expect(() => composition.addElement('A')).toThrow("Automaton 'A' appears twice in the composition");
  });

  it('reads an explicit composition', () => {
    const json = {
      elements: [{ automaton: 'A' }, { automaton: 'B' }],
      syncs: [{ result: 'go', synchronise: ['a_go', null] }],
    };
    const composition = Composition.fromJson(json);
    expect([...composition.syncedActions('A')]).toEqual(['a_go']);
    expect(composition.syncedActions('B').size).toBe(0);
    expect(composition.toJSON()).toEqual(json);
  });

  it('rejects vectors of the wrong width', () => {
    expect(() =>
      Composition.fromJson({ elements: [{ automaton: 'A' }, { automaton: 'B' }], syncs: [{ result: 'go', synchronise: ['a'] }] })
    ).toThrow("Sync #0 ('go') lists 1 actions for 2 elements");
  });
});
