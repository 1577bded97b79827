import type { CompileContext, Diagnostic } from './types.js';

export interface CompileErrorOptions {
  code?: string;
  hint?: string;
  context?: CompileContext;
  line?: number;
  column?: number;
  length?: number;
}

/**
 * Base class of every error the compiler raises on bad input.
 * All of them are fatal for the compilation unit they occur in.
 */
export class CompileError extends Error {
  readonly code: string;
  readonly hint?: string;
  context: CompileContext;
  readonly line?: number;
  readonly column?: number;
  readonly length?: number;

  constructor(message: string, defaultCode: string, options: CompileErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.code = options.code ?? defaultCode;
    this.hint = options.hint;
    this.context = options.context ?? {};
    this.line = options.line;
    this.column = options.column;
    this.length = options.length;
  }

  /** Message prefixed with the chart location, e.g. `robot/idle/tick: …`. */
  describe(): string {
    const where = [this.context.automaton, this.context.state, this.context.transition].filter(Boolean).join('/');
    return where ? `${where}: ${this.message}` : this.message;
  }

  /** Fill context fields not set yet from `outer`; inner fields win. */
  withContext(outer: CompileContext): this {
    this.context = { ...outer, ...this.context };
    return this;
  }

  toDiagnostic(): Diagnostic {
    return {
      line: this.line ?? 1,
      column: this.column ?? 1,
      message: this.describe(),
      severity: 'error',
      code: this.code,
      ...(this.hint ? { hint: this.hint } : {}),
      ...(this.length ? { length: this.length } : {}),
    };
  }
}

/** Malformed expression text. Always carries the offending source. */
export class ExpressionSyntaxError extends CompileError {
  readonly source: string;
  readonly diagnostics: Diagnostic[];

  constructor(source: string, diagnostics: Diagnostic[], options: CompileErrorOptions = {}) {
    const first = diagnostics[0];
    const detail = first ? first.message : 'malformed expression';
    super(`Invalid expression '${source}': ${detail}`, 'EX-SYNTAX', {
      context: options.context,
      code: options.code ?? first?.code,
      hint: options.hint ?? first?.hint,
      line: options.line ?? first?.line,
      column: options.column ?? first?.column,
      length: options.length ?? first?.length,
    });
    this.source = source;
    this.diagnostics = diagnostics;
  }
}

/** Operand or target type mismatch, e.g. an array literal that does not fit its target. */
export class CompileTypeError extends CompileError {
  constructor(message: string, options: CompileErrorOptions = {}) {
    super(message, 'EX-TYPE', options);
  }
}

export class UnknownOperatorError extends CompileError {
  readonly opcode: string;

  constructor(opcode: string, options: CompileErrorOptions = {}) {
    super(`Unknown operator '${opcode}'`, 'MO-UNKNOWN-OP', options);
    this.opcode = opcode;
  }
}

export class UnsupportedConstructError extends CompileError {
  constructor(message: string, options: CompileErrorOptions = {}) {
    super(message, 'MO-UNSUPPORTED', options);
  }
}

/** A compile-time constant or descriptor setting is missing or invalid. */
export class ConfigurationError extends CompileError {
  constructor(message: string, options: CompileErrorOptions = {}) {
    super(message, 'MO-CONFIG', options);
  }
}

/** Structural invariant violation in the produced model. */
export class ModelError extends CompileError {
  constructor(message: string, options: CompileErrorOptions = {}) {
    super(message, 'MO-MODEL', options);
  }
}

export function isCompileError(err: unknown): err is CompileError {
  return err instanceof CompileError;
}

/**
 * Run `fn`, attaching `context` to any CompileError escaping it.
 * Other errors propagate untouched.
 */
export function withErrorContext<T>(context: CompileContext, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof CompileError) throw err.withContext(context);
    throw err;
  }
}
