import { ModelError } from '../core/errors.js';

export interface SyncVectorJson {
  result: string;
  /** One entry per element, in element order; null where the element does not take part. */
  synchronise: (string | null)[];
}

export interface CompositionJson {
  elements: { automaton: string }[];
  syncs: SyncVectorJson[];
}

interface Sync {
  readonly result: string;
  /** automaton → action */
  readonly participants: ReadonlyMap<string, string>;
}

/** Parallel composition of the model's automata with their synchronisation vectors. */
export class Composition {
  private readonly elementList: string[] = [];
  private readonly syncList: Sync[] = [];

  constructor(elements: readonly string[] = []) {
    for (const element of elements) this.addElement(element);
  }

  addElement(automaton: string): void {
    if (this.elementList.includes(automaton)) {
      throw new ModelError(`Automaton '${automaton}' appears twice in the composition`);
    }
    this.elementList.push(automaton);
  }

  get elements(): readonly string[] {
    return this.elementList;
  }

  addSync(result: string, participants: Readonly<Record<string, string>>): void {
    const entries = Object.entries(participants);
    if (entries.length === 0) throw new ModelError(`Sync '${result}' has no participants`);
    for (const [automaton] of entries) {
      if (!this.elementList.includes(automaton)) {
        throw new ModelError(`Sync '${result}' refers to '${automaton}', which is not an element of the composition`);
      }
    }
    this.syncList.push({ result, participants: new Map(entries) });
  }

  /** Actions of `automaton` that some sync vector already covers. */
  syncedActions(automaton: string): Set<string> {
    const actions = new Set<string>();
    for (const sync of this.syncList) {
      const action = sync.participants.get(automaton);
      if (action !== undefined) actions.add(action);
    }
    return actions;
  }

  get syncCount(): number {
    return this.syncList.length;
  }

  /** Syncs are listed by result; vectors with the same result keep their insertion order. */
  toJSON(): CompositionJson {
    const syncs = [...this.syncList].sort((a, b) => (a.result < b.result ? -1 : a.result > b.result ? 1 : 0));
    return {
      elements: this.elementList.map((automaton) => ({ automaton })),
      syncs: syncs.map((sync) => ({
        result: sync.result,
        synchronise: this.elementList.map((automaton) => sync.participants.get(automaton) ?? null),
      })),
    };
  }

  static fromJson(json: CompositionJson): Composition {
    const composition = new Composition(json.elements.map((element) => element.automaton));
    json.syncs.forEach((sync, i) => {
      if (sync.synchronise.length !== composition.elementList.length) {
        throw new ModelError(
          `Sync #${i} ('${sync.result}') lists ${sync.synchronise.length} actions for ${composition.elementList.length} elements`
        );
      }
      const participants: Record<string, string> = {};
      sync.synchronise.forEach((action, j) => {
        const automaton = composition.elementList[j];
        if (action !== null && automaton !== undefined) participants[automaton] = action;
      });
      composition.addSync(sync.result, participants);
    });
    return composition;
  }
}
