import type { Automaton } from '../automaton/automaton.js';
import { sortedAssignments, targetOf, type Edge } from '../automaton/edge.js';
import type { Constant, Variable } from '../automaton/variable.js';
import { ModelError } from '../core/errors.js';
import { expressionToJson, type JaniOperand } from '../expression/json.js';
import type { Expression } from '../expression/model.js';
import { dataTypeToJson, type DataType, type JaniType } from '../expression/types.js';
import { expandExpression } from '../macros/expand.js';
import type { Composition, CompositionJson } from './composition.js';
import { propertyToJson, type ModelProperty, type PropertyJson } from './properties.js';

export const JANI_FEATURES = ['arrays', 'trigonometric-functions'] as const;
export const DEFAULT_DESCRIPTION = 'Generated from state-charts by chart2jani';

export interface VariableJson {
  name: string;
  type: JaniType;
  transient: boolean;
  'initial-value': JaniOperand;
}

export interface ConstantJson {
  name: string;
  type: JaniType;
  value: JaniOperand;
}

export interface AssignmentJson {
  ref: JaniOperand;
  value: JaniOperand;
  index: number;
}

export interface DestinationJson {
  location: string;
  probability: { exp: JaniOperand };
  assignments: AssignmentJson[];
}

export interface EdgeJson {
  location: string;
  action?: string;
  guard?: { exp: JaniOperand };
  destinations: DestinationJson[];
}

export interface AutomatonJson {
  name: string;
  locations: { name: string }[];
  'initial-locations': string[];
  edges: EdgeJson[];
  variables?: VariableJson[];
}

export interface JaniModelJson {
  'jani-version': 1;
  name: string;
  type: 'mdp';
  features: string[];
  metadata: { description: string };
  variables: VariableJson[];
  constants: ConstantJson[];
  actions: { name: string }[];
  automata: AutomatonJson[];
  system: CompositionJson;
  properties: PropertyJson[];
}

/** The whole JANI model: global declarations, automata, their composition and the properties to check. */
export class Model {
  readonly name: string;
  description = DEFAULT_DESCRIPTION;
  private readonly variableMap = new Map<string, Variable>();
  private readonly constantMap = new Map<string, Constant>();
  private readonly automatonList: Automaton[] = [];
  private composition?: Composition;
  private readonly propertyList: ModelProperty[] = [];

  constructor(name: string) {
    this.name = name;
  }

  addVariable(variable: Variable): void {
    if (this.variableMap.has(variable.name) || this.constantMap.has(variable.name)) {
      throw new ModelError(`Global '${variable.name}' is declared twice`);
    }
    this.variableMap.set(variable.name, variable);
  }

  addVariables(variables: readonly Variable[]): void {
    for (const variable of variables) this.addVariable(variable);
  }

  addConstant(constant: Constant): void {
    if (this.constantMap.has(constant.name) || this.variableMap.has(constant.name)) {
      throw new ModelError(`Global '${constant.name}' is declared twice`);
    }
    this.constantMap.set(constant.name, constant);
  }

  get variables(): readonly Variable[] {
    return [...this.variableMap.values()];
  }

  get constants(): readonly Constant[] {
    return [...this.constantMap.values()];
  }

  getVariable(name: string): Variable | undefined {
    return this.variableMap.get(name);
  }

  /** Constant values by name, as macro expansion and probability evaluation read them. */
  constantValues(): Map<string, Expression> {
    return new Map([...this.constantMap.values()].map((constant) => [constant.name, constant.value]));
  }

  /** Type of a global variable or constant. */
  typeOf(name: string): DataType | undefined {
    return this.variableMap.get(name)?.type ?? this.constantMap.get(name)?.type;
  }

  addAutomaton(automaton: Automaton): void {
    if (this.getAutomaton(automaton.name)) throw new ModelError(`Automaton '${automaton.name}' is defined twice`);
    this.automatonList.push(automaton);
  }

  getAutomaton(name: string): Automaton | undefined {
    return this.automatonList.find((automaton) => automaton.name === name);
  }

  get automata(): readonly Automaton[] {
    return this.automatonList;
  }

  /** Drop every edge labelled `action`, in all automata. */
  removeEdgesWithAction(action: string): number {
    return this.automatonList.reduce((removed, automaton) => removed + automaton.removeEdgesWithAction(action), 0);
  }

  /**
   * Install the composition. It must name every automaton exactly once;
   * actions no sync covers get an identity vector of their own.
   */
  setComposition(composition: Composition): void {
    const names = this.automatonList.map((automaton) => automaton.name);
    const missing = names.filter((name) => !composition.elements.includes(name));
    const unknown = composition.elements.filter((name) => !names.includes(name));
    if (missing.length > 0 || unknown.length > 0) {
      const details = [
        missing.length > 0 ? `missing: ${missing.join(', ')}` : '',
        unknown.length > 0 ? `unknown: ${unknown.join(', ')}` : '',
      ].filter(Boolean);
      throw new ModelError(`The composition must list each automaton once (${details.join('; ')})`);
    }
    this.composition = composition;
    this.completeComposition();
  }

  /** Add identity sync vectors for actions that appeared since the composition was set. */
  completeComposition(): void {
    const composition = this.requireComposition();
    for (const automaton of this.automatonList) {
      const synced = composition.syncedActions(automaton.name);
      for (const action of automaton.getActions()) {
        if (!synced.has(action)) composition.addSync(action, { [automaton.name]: action });
      }
    }
  }

  getComposition(): Composition | undefined {
    return this.composition;
  }

  private requireComposition(): Composition {
    if (!this.composition) throw new ModelError(`Model '${this.name}' has no composition`);
    return this.composition;
  }

  addProperty(property: ModelProperty): void {
    if (this.propertyList.some((p) => p.name === property.name)) {
      throw new ModelError(`Property '${property.name}' is defined twice`);
    }
    this.propertyList.push(property);
  }

  get properties(): readonly ModelProperty[] {
    return this.propertyList;
  }

  /** Every edge action in the model, sorted. */
  actions(): string[] {
    const actions = new Set<string>();
    for (const automaton of this.automatonList) {
      for (const action of automaton.getActions()) actions.add(action);
    }
    return [...actions].sort();
  }

  toJSON(): JaniModelJson {
    const composition = this.requireComposition();
    const constants = this.constantValues();
    const exp = (expr: Expression) => expressionToJson(expandExpression(expr, constants));
    return {
      'jani-version': 1,
      name: this.name,
      type: 'mdp',
      features: [...JANI_FEATURES],
      metadata: { description: this.description },
      variables: this.variables.map((variable) => variableToJson(variable, exp)),
      constants: this.constants.map((constant) => ({
        name: constant.name,
        type: dataTypeToJson(constant.type),
        value: exp(constant.value),
      })),
      actions: this.actions().map((name) => ({ name })),
      automata: this.automatonList.map((automaton) => automatonToJson(automaton, exp)),
      system: composition.toJSON(),
      properties: this.propertyList.map((property) => propertyToJson(property, constants)),
    };
  }
}

type ExpressionWriter = (expr: Expression) => JaniOperand;

function variableToJson(variable: Variable, exp: ExpressionWriter): VariableJson {
  return {
    name: variable.name,
    type: dataTypeToJson(variable.type),
    transient: variable.transient,
    'initial-value': exp(variable.initialValue),
  };
}

function edgeToJson(edge: Edge, exp: ExpressionWriter): EdgeJson {
  return {
    location: edge.location,
    ...(edge.action !== undefined ? { action: edge.action } : {}),
    ...(edge.guard ? { guard: { exp: exp(edge.guard) } } : {}),
    destinations: edge.destinations.map((dest) => ({
      location: targetOf(edge, dest),
      probability: { exp: exp(dest.probability) },
      assignments: sortedAssignments(dest.assignments).map((a) => ({ ref: exp(a.ref), value: exp(a.value), index: a.index })),
    })),
  };
}

function automatonToJson(automaton: Automaton, exp: ExpressionWriter): AutomatonJson {
  const variables = automaton.variables;
  return {
    name: automaton.name,
    locations: automaton
      .getLocations()
      .sort()
      .map((name) => ({ name })),
    'initial-locations': [automaton.getInitialLocation()],
    edges: automaton.edges.map((edge) => edgeToJson(edge, exp)),
    ...(variables.length > 0 ? { variables: variables.map((variable) => variableToJson(variable, exp)) } : {}),
  };
}

/** JANI JSON text of a finished model. */
export function serializeModel(model: Model, indent = 2): string {
  return JSON.stringify(model.toJSON(), null, indent);
}
