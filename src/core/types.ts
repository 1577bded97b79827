export interface Diagnostic {
  line: number;
  column: number;
  message: string;
  severity: 'error' | 'warning';
  code?: string;
  hint?: string;
  length?: number;
}

/** Where in a chart an error was raised. Rendered as `automaton/state/transition`. */
export interface CompileContext {
  automaton?: string;
  state?: string;
  transition?: string;
}

export const DEFAULT_MAX_ARRAY_SIZE = 100;
export const DEFAULT_RANDOM_OPTIONS = 100;
/** Tolerance on the total probability of one transition. */
export const PROBABILITY_EPSILON = 1e-6;
