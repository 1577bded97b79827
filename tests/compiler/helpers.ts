import { Automaton } from '../../src/automaton/automaton.js';
import { createVariable, lengthVariables } from '../../src/automaton/variable.js';
import { bodyContext, type BodyContext, type CompileEnvironment } from '../../src/compiler/context.js';
import { EventsHolder } from '../../src/compiler/events.js';
import type { Expression } from '../../src/expression/model.js';
import { isArrayType, type DataType } from '../../src/expression/types.js';

export function testEnvironment(constants: ReadonlyMap<string, Expression> = new Map()): CompileEnvironment {
  return { events: new EventsHolder(), maxArraySize: 4, globalType: () => undefined, constants };
}

/** A body context over an automaton `name` declaring `variables` (and their length companions). */
export function testContext(variables: Record<string, DataType>, dataEvent?: string, name = 'robot'): BodyContext {
  const automaton = new Automaton(name);
  for (const [id, type] of Object.entries(variables)) {
    automaton.addVariable(createVariable(id, type));
    if (isArrayType(type)) for (const companion of lengthVariables(id, type)) automaton.addVariable(companion);
  }
  return bodyContext(automaton, testEnvironment(), dataEvent);
}
