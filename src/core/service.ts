import { validateChart } from '../chart/schema.js';
import type { Chart } from '../chart/types.js';
import { expressionFromJson, expressionToJson, type JaniOperand } from '../expression/json.js';
import type { Expression } from '../expression/model.js';
import { parseExpression } from '../expression/parse.js';
import { expandExpression } from '../macros/expand.js';
import { compileModel } from '../model/compile.js';
import { validateDescriptor } from '../model/descriptor.js';
import type { JaniModelJson } from '../model/model.js';
import { errorAt } from './errorBuilder.js';
import { isCompileError } from './errors.js';
import type { Diagnostic } from './types.js';

export interface CompileResult {
  model?: JaniModelJson;
  errors: Diagnostic[];
}

export interface ExpressionResult {
  expression?: JaniOperand;
  errors: Diagnostic[];
}

/** Reads the text of a chart file named in a descriptor; undefined when there is no such file. */
export type ChartReader = (reference: string) => string | undefined;

/** Run `fn`, turning compile errors into diagnostics. Anything else is a bug and propagates. */
function collect<T>(fn: () => T): { value?: T; errors: Diagnostic[] } {
  try {
    return { value: fn(), errors: [] };
  } catch (err) {
    if (isCompileError(err)) return { errors: [err.toDiagnostic()] };
    throw err;
  }
}

/** Parse JSON text; a syntax error becomes a diagnostic at the position the runtime reports. */
export function parseJson(text: string, what: string): { value?: unknown; errors: Diagnostic[] } {
  try {
    return { value: JSON.parse(text), errors: [] };
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    const offset = /position (\d+)/.exec(err.message)?.[1];
    let line = 1;
    let column = 1;
    if (offset !== undefined) {
      const before = text.slice(0, Number(offset)).split(/\r?\n/);
      line = before.length;
      column = (before[before.length - 1] ?? '').length + 1;
    }
    return { errors: [errorAt(line, column, `Invalid JSON in ${what}: ${err.message}`, { code: 'IN-JSON' })] };
  }
}

/**
 * Compile a descriptor given as a JSON value. Chart file references are
 * looked up in `charts`, keyed by the reference exactly as written.
 */
export function compileDescriptor(input: unknown, charts: Readonly<Record<string, unknown>> = {}): CompileResult {
  const checked = validateDescriptor(input);
  if (!checked.ok) return { errors: checked.errors };
  const loaded: Record<string, Chart> = {};
  const errors: Diagnostic[] = [];
  for (const reference of checked.descriptor.charts) {
    if (typeof reference !== 'string') continue;
    if (!Object.prototype.hasOwnProperty.call(charts, reference)) {
      errors.push(errorAt(1, 1, `Chart '${reference}' was not provided`, { code: 'MO-CONFIG' }));
      continue;
    }
    const chart = validateChart(charts[reference]);
    if (chart.ok) loaded[reference] = chart.chart;
    else errors.push(...chart.errors.map((e) => ({ ...e, message: `${reference}: ${e.message}` })));
  }
  if (errors.length > 0) return { errors };
  const result = collect(() => compileModel(checked.descriptor, loaded).json);
  return { model: result.value, errors: result.errors };
}

/** Compile descriptor text, reading the chart files it names through `readChart`. */
export function compileDescriptorText(text: string, readChart: ChartReader): CompileResult {
  const parsed = parseJson(text, 'model descriptor');
  if (parsed.errors.length > 0) return { errors: parsed.errors };
  const checked = validateDescriptor(parsed.value);
  if (!checked.ok) return { errors: checked.errors };
  const charts: Record<string, unknown> = {};
  for (const reference of checked.descriptor.charts) {
    if (typeof reference !== 'string') continue;
    const chartText = readChart(reference);
    if (chartText === undefined) {
      return { errors: [errorAt(1, 1, `Chart file '${reference}' not found`, { code: 'MO-CONFIG' })] };
    }
    const chart = parseJson(chartText, `chart '${reference}'`);
    if (chart.errors.length > 0) {
      // Positions point into the chart file, not the descriptor.
      return { errors: chart.errors.map((e) => errorAt(1, 1, `${e.message} (${reference}:${e.line}:${e.column})`, { code: 'IN-SCHEMA' })) };
    }
    charts[reference] = chart.value;
  }
  return compileDescriptor(parsed.value, charts);
}

export interface ExpressionOptions {
  /** Rewrite macros into primitive operators. */
  expand?: boolean;
  /** Constant values the geometric macros read, as JANI expression JSON. */
  constants?: Readonly<Record<string, unknown>>;
}

/** Parse expression source and return its JANI JSON. */
export function translateExpression(source: string, options: ExpressionOptions = {}): ExpressionResult {
  const result = collect(() => {
    const expr = parseExpression(source);
    if (!options.expand) return expressionToJson(expr);
    const constants = new Map<string, Expression>(
      Object.entries(options.constants ?? {}).map(([name, value]) => [name, expressionFromJson(value, name)])
    );
    return expressionToJson(expandExpression(expr, constants));
  });
  return { expression: result.value, errors: result.errors };
}
