import type { Automaton } from '../automaton/automaton.js';
import type { TypeLookup } from '../expression/types.js';
import type { ConstantValues } from '../macros/expand.js';
import type { EventsHolder } from './events.js';

/** What every chart compilation of one model shares. */
export interface CompileEnvironment {
  readonly events: EventsHolder;
  /** Capacity of unbounded array dimensions and strings. */
  readonly maxArraySize: number;
  /** Types of model-level variables and constants. */
  readonly globalType: TypeLookup;
  /** Model constants; transition probabilities are evaluated over them. */
  readonly constants: ConstantValues;
}

/** State of the body walk: the automaton being built and the event whose payload `_event.data` reads. */
export interface BodyContext {
  readonly automaton: Automaton;
  readonly env: CompileEnvironment;
  readonly lookup: TypeLookup;
  readonly dataEvent?: string;
}

/** Automaton variables first, then model variables and constants, then event payloads. */
export function automatonLookup(automaton: Automaton, env: CompileEnvironment): TypeLookup {
  return (name) => automaton.getVariable(name)?.type ?? env.globalType(name) ?? env.events.variableType(name);
}

export function bodyContext(automaton: Automaton, env: CompileEnvironment, dataEvent?: string): BodyContext {
  return { automaton, env, lookup: automatonLookup(automaton, env), dataEvent };
}
