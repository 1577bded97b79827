import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ZodError } from 'zod';
import type { Diagnostic } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function fromLexerError(e: ILexingError): Diagnostic {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    code: 'EX-LEX',
    message: e.message,
    length: e.length,
  };
}

// Helpers
function tokenImage(t?: IToken | null) {
  const img = t?.image ?? '';
  return img === '' ? 'end of input' : img;
}

function isInRule(err: IRecognitionException, name: string) {
  return err.context.ruleStack.includes(name);
}

function expecting(err: IRecognitionException, tokenName: string) {
  // Chevrotain does not always expose expected tokens structurally; fall back to message text.
  return (err.message || '').includes(`--> ${tokenName} <--`);
}

export function mapExpressionParserError(err: IRecognitionException, text: string): Diagnostic {
  const tok = err.token;
  const posFallback = endOfTextPos(text);
  const atEnd = tok.tokenType.name === 'EOF';
  const { line, column } = atEnd
    ? posFallback
    : coercePos(tok.startLine ?? null, tok.startColumn ?? null, posFallback.line, posFallback.column);
  const found = tokenImage(tok);
  const tokType = tok.tokenType.name;
  const len = atEnd ? 1 : Math.max(1, tok.image.length);

  if (tokType === 'StrictEquality') {
    return {
      line, column, severity: 'error', code: 'EX-STRICT-EQ',
      message: `Strict equality '${found}' is not supported.`,
      hint: `Use '${found === '===' ? '==' : '!='}' instead.`,
      length: len,
    };
  }
  if (tokType === 'SingleEquals') {
    return {
      line, column, severity: 'error', code: 'EX-ASSIGN-IN-EXPR',
      message: "Assignment '=' is not allowed inside an expression.",
      hint: "Use '==' to compare values; assignments belong in an assign step.",
      length: len,
    };
  }
  if (expecting(err, 'RParen') && (atEnd || isInRule(err, 'argumentList'))) {
    return {
      line, column, severity: 'error', code: 'EX-MISSING-RPAREN',
      message: `Missing ')' before ${atEnd ? 'the end of the expression' : `'${found}'`}.`,
      hint: 'Every opening parenthesis needs a matching closing one.',
      length: len,
    };
  }
  if (expecting(err, 'RBracket')) {
    return {
      line, column, severity: 'error', code: 'EX-MISSING-RBRACKET',
      message: `Missing ']' before ${atEnd ? 'the end of the expression' : `'${found}'`}.`,
      hint: 'Close the array literal or index access with ].',
      length: len,
    };
  }
  if (expecting(err, 'Colon') && isInRule(err, 'conditional')) {
    return {
      line, column, severity: 'error', code: 'EX-TERNARY-MISSING-COLON',
      message: "Conditional expression is missing the ':' branch.",
      hint: 'Write it as cond ? whenTrue : whenFalse.',
      length: len,
    };
  }
  if (err.name === 'NotAllInputParsedException') {
    return {
      line, column, severity: 'error', code: 'EX-TRAILING',
      message: `Unexpected '${found}' after the end of the expression.`,
      hint: 'Only a single expression is allowed; combine conditions with && or ||.',
      length: len,
    };
  }
  if (atEnd) {
    return {
      line, column, severity: 'error', code: 'EX-UNEXPECTED-END',
      message: 'Unexpected end of expression.',
      length: 1,
    };
  }
  return {
    line, column, severity: 'error', code: 'EX-UNEXPECTED',
    message: `Unexpected '${found}'.`,
    length: len,
  };
}

/** One diagnostic per zod issue, with the JSON path of the offending value. */
export function fromZodError(err: ZodError, what: string): Diagnostic[] {
  return err.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return {
      line: 1,
      column: 1,
      severity: 'error' as const,
      code: 'IN-SCHEMA',
      message: `Invalid ${what} at ${where}: ${issue.message}`,
    };
  });
}
