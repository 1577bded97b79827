import type { Diagnostic } from './types.js';

export type OutputFormat = 'text' | 'json';

const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const RESET = '\x1b[0m';

/** Schema and model diagnostics are reported at 1:1 of the document; only the rest carry a real position. */
function hasSourcePosition(d: Diagnostic): boolean {
  const code = d.code ?? '';
  return code !== 'IN-SCHEMA' && !code.startsWith('MO-');
}

/** A bare `EX-UNEXPECTED` next to a more specific expression error repeats it. */
function withoutRedundant(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return diagnostics.filter(
    (d) =>
      d.code !== 'EX-UNEXPECTED' ||
      !diagnostics.some((o) => o !== d && o.code !== 'EX-UNEXPECTED' && o.line === d.line && Math.abs(o.column - d.column) <= 2)
  );
}

function snippet(sourceLines: readonly string[], d: Diagnostic): string[] {
  const at = Math.max(0, Math.min(sourceLines.length - 1, d.line - 1));
  const text = sourceLines[at] ?? '';
  if (text.trim() === '') return [];
  const width = String(sourceLines.length).length;
  const gutter = (n: number) => `  ${String(n).padStart(width, ' ')} | `;
  const out: string[] = [];
  const before = sourceLines[at - 1];
  if (at > 0 && before !== undefined) out.push(gutter(d.line - 1) + before);
  out.push(gutter(d.line) + text);
  const caret = '^'.repeat(Math.max(1, d.length ?? 1));
  out.push(`  ${' '.repeat(width)} | ${' '.repeat(Math.max(0, d.column - 1))}${RED}${caret}${RESET}`);
  const after = sourceLines[at + 1];
  if (after !== undefined) out.push(gutter(d.line + 1) + after);
  return out;
}

function hintLines(hint: string): string[] {
  const [first = '', ...rest] = hint.split(/\r?\n/);
  return [`hint: ${first}`, ...rest.map((line) => `  ${line}`)];
}

/**
 * Human report for one input: `error[CODE]: message`, the `file:line:col`
 * location, a caret snippet for positioned diagnostics and the hint.
 */
export function textReport(filename: string, content: string, diagnostics: Diagnostic[]): string {
  const shown = withoutRedundant(diagnostics);
  if (shown.length === 0) return 'Valid';
  const sourceLines = content.split(/\r?\n/);
  const out: string[] = [];
  for (const d of shown) {
    const label = d.severity === 'error' ? `${RED}error${RESET}` : `${YELLOW}warning${RESET}`;
    out.push(`${label}${d.code ? `[${d.code}]` : ''}: ${d.message}`, `at ${filename}:${d.line}:${d.column}`);
    if (hasSourcePosition(d)) out.push(...snippet(sourceLines, d));
    if (d.hint) out.push(...hintLines(d.hint));
    out.push('');
  }
  return out.join('\n');
}

export interface DiagnosticSummary {
  valid: boolean;
  errorCount: number;
  errors: Diagnostic[];
}

export function summarizeDiagnostics(diagnostics: Diagnostic[]): DiagnosticSummary {
  const errorCount = diagnostics.filter((d) => d.severity === 'error').length;
  return { valid: errorCount === 0, errorCount, errors: diagnostics };
}

export interface JsonResult extends DiagnosticSummary {
  file: string;
}

export function toJsonResult(filename: string, diagnostics: Diagnostic[]): JsonResult {
  return { file: filename, ...summarizeDiagnostics(diagnostics) };
}
