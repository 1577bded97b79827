import { ModelError } from '../core/errors.js';
import type { Edge } from './edge.js';
import type { Variable } from './variable.js';

/** A JANI automaton under construction. Locations and edges are only added, except for removable interfaces. */
export class Automaton {
  readonly name: string;
  private readonly locations = new Set<string>();
  private initial?: string;
  private edgeList: Edge[] = [];
  private readonly variableMap = new Map<string, Variable>();

  constructor(name: string) {
    this.name = name;
  }

  addLocation(location: string): void {
    this.locations.add(location);
  }

  hasLocation(location: string): boolean {
    return this.locations.has(location);
  }

  getLocations(): string[] {
    return [...this.locations];
  }

  setInitialLocation(location: string): void {
    this.addLocation(location);
    this.initial = location;
  }

  getInitialLocation(): string {
    if (this.initial === undefined) throw new ModelError(`Automaton '${this.name}' has no initial location`);
    return this.initial;
  }

  addEdge(edge: Edge): void {
    this.addLocation(edge.location);
    for (const dest of edge.destinations) {
      if (dest.location !== undefined) this.addLocation(dest.location);
    }
    this.edgeList.push(edge);
  }

  get edges(): readonly Edge[] {
    return this.edgeList;
  }

  /** Swap the edge list wholesale; used by passes that rewrite edges. */
  replaceEdges(edges: Edge[]): void {
    this.edgeList = [];
    for (const edge of edges) this.addEdge(edge);
  }

  removeEdgesWithAction(action: string): number {
    const before = this.edgeList.length;
    this.edgeList = this.edgeList.filter((edge) => edge.action !== action);
    return before - this.edgeList.length;
  }

  /** Every action used by an edge, in first-seen order. */
  getActions(): string[] {
    const actions = new Set<string>();
    for (const edge of this.edgeList) {
      if (edge.action !== undefined) actions.add(edge.action);
    }
    return [...actions];
  }

  addVariable(variable: Variable): void {
    if (this.variableMap.has(variable.name)) {
      throw new ModelError(`Variable '${variable.name}' is declared twice in automaton '${this.name}'`);
    }
    this.variableMap.set(variable.name, variable);
  }

  getVariable(name: string): Variable | undefined {
    return this.variableMap.get(name);
  }

  get variables(): readonly Variable[] {
    return [...this.variableMap.values()];
  }
}
