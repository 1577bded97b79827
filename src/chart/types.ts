/** Expressions in charts are written in the expression language, e.g. `x + 1 < limit`. */
export type ExpressionSource = string;

export interface AssignStep {
  kind: 'assign';
  /** Variable or array element, e.g. `a[i]`. */
  location: ExpressionSource;
  expr: ExpressionSource;
}

export interface SendParam {
  name: string;
  expr: ExpressionSource;
}

export interface SendStep {
  kind: 'send';
  event: string;
  params?: SendParam[];
}

export interface IfBranch {
  cond: ExpressionSource;
  body: Step[];
}

export interface IfStep {
  kind: 'if';
  branches: IfBranch[];
  else?: Step[];
}

export type Step = AssignStep | SendStep | IfStep;

export interface ChartData {
  id: string;
  /** `bool`, `int32`, `float64`, `string`, `int32[3][]`, … */
  type: string;
  expr?: ExpressionSource;
  lowerBound?: ExpressionSource | number;
  upperBound?: ExpressionSource | number;
}

export interface TransitionTarget {
  target: string;
  /** Compile-time constant; the residual probability when left out. */
  prob?: ExpressionSource | number;
  body?: Step[];
}

export interface ChartTransition {
  event?: string;
  cond?: ExpressionSource;
  target?: string;
  body?: Step[];
  targets?: TransitionTarget[];
}

export interface ChartState {
  id: string;
  onEntry?: Step[];
  onExit?: Step[];
  transitions?: ChartTransition[];
}

export type ChartKind = 'default' | 'bt-root';

export interface Chart {
  name: string;
  kind?: ChartKind;
  initial: string;
  datamodel?: ChartData[];
  states: ChartState[];
}

/** Structural constructs of a chart. Executable steps are compiled by the body walk. */
export type ChartNode =
  | { kind: 'root'; chart: Chart }
  | { kind: 'datamodel'; data: ChartData[] }
  | { kind: 'state'; state: ChartState }
  | { kind: 'transition'; state: ChartState; transition: ChartTransition; position: number };
