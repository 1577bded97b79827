import type { Constant } from '../automaton/variable.js';
import { ConfigurationError } from '../core/errors.js';
import { evaluateConstant } from '../expression/evaluate.js';
import { boolLiteral, intLiteral, realLiteral, type Expression } from '../expression/model.js';
import { parseExpression } from '../expression/parse.js';
import type { DataType } from '../expression/types.js';
import type { Chart } from '../chart/types.js';
import { compileChart } from '../compiler/chart.js';
import type { CompileEnvironment } from '../compiler/context.js';
import { parseTypeString } from '../compiler/datamodel.js';
import { EventsHolder } from '../compiler/events.js';
import { Composition } from './composition.js';
import type { ConstantDeclaration, ModelDescriptor } from './descriptor.js';
import { loadEnvironment } from './environment.js';
import { Model, type JaniModelJson } from './model.js';
import { parseProperty } from './properties.js';
import { expandRandomAssignments } from './random.js';
import { buildEventSyncs, declareEventVariables } from './syncs.js';

export interface CompiledModel {
  model: Model;
  json: JaniModelJson;
}

function constantValue(decl: ConstantDeclaration, model: Model): Expression {
  const value =
    typeof decl.value === 'string'
      ? evaluateConstant(parseExpression(decl.value), (name) => model.constantValues().get(name))
      : decl.value;
  switch (decl.type) {
    case 'bool':
      if (typeof value !== 'boolean') throw new ConfigurationError(`Constant '${decl.name}' is bool but its value is ${value}`);
      return boolLiteral(value);
    case 'int':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new ConfigurationError(`Constant '${decl.name}' is int but its value is ${value}`);
      }
      return intLiteral(value);
    case 'real':
      if (typeof value !== 'number') throw new ConfigurationError(`Constant '${decl.name}' is real but its value is ${value}`);
      return realLiteral(value);
  }
}

function declareConstants(model: Model, constants: readonly ConstantDeclaration[]): void {
  for (const decl of constants) {
    const constant: Constant = { name: decl.name, type: decl.type, value: constantValue(decl, model) };
    model.addConstant(constant);
  }
}

function declareEvents(descriptor: ModelDescriptor): EventsHolder {
  const events = new EventsHolder();
  for (const event of descriptor.events) {
    const fields = new Map<string, DataType>(
      Object.entries(event.fields).map(([field, type]) => [field, parseTypeString(type, descriptor.maxArraySize).type])
    );
    events.declare(event.name, fields);
  }
  return events;
}

/** Charts in descriptor order; file references are looked up in `loaded`, keyed by the reference as written. */
function collectCharts(descriptor: ModelDescriptor, loaded: Readonly<Record<string, Chart>>): Chart[] {
  return descriptor.charts.map((entry) => {
    if (typeof entry !== 'string') return entry;
    const chart = Object.prototype.hasOwnProperty.call(loaded, entry) ? loaded[entry] : undefined;
    if (!chart) {
      throw new ConfigurationError(`Chart file '${entry}' was not loaded`, {
        hint: 'Pass the loaded charts alongside the descriptor, or inline them.',
      });
    }
    return chart;
  });
}

/**
 * Build the JANI model a descriptor describes:
 * globals first, then one automaton per chart, the event automata and
 * their synchronisation, random-assignment expansion and the properties.
 */
export function compileModel(descriptor: ModelDescriptor, charts: Readonly<Record<string, Chart>> = {}): CompiledModel {
  const model = new Model(descriptor.name);
  if (descriptor.description !== undefined) model.description = descriptor.description;
  if (descriptor.environment) loadEnvironment(model, descriptor.environment);
  declareConstants(model, descriptor.constants);

  const events = declareEvents(descriptor);
  const env: CompileEnvironment = {
    events,
    maxArraySize: descriptor.maxArraySize,
    globalType: (name) => model.typeOf(name),
    constants: model.constantValues(),
  };
  for (const chart of collectCharts(descriptor, charts)) {
    model.addAutomaton(compileChart(chart, env));
  }

  const live = declareEventVariables(model, events);
  model.setComposition(descriptor.composition ? Composition.fromJson(descriptor.composition) : buildEventSyncs(model, live));
  expandRandomAssignments(model, descriptor.randomOptions);

  for (const input of descriptor.properties) model.addProperty(parseProperty(input));
  return { model, json: model.toJSON() };
}
