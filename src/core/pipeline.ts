import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic } from './types.js';
import { fromLexerError } from './diagnostics.js';

export interface ParseAdapters {
  tokenize: (text: string) => { tokens: IToken[]; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode; errors: IRecognitionException[] };
  mapParserError: (err: IRecognitionException, text: string) => Diagnostic;
}

export interface ParseOutcome {
  cst: CstNode | null;
  tokens: IToken[];
  errors: Diagnostic[];
}

/**
 * Lex and parse `text`. The CST is only returned when both stages succeed,
 * so callers can run their semantic pass on it directly.
 */
export function parseWithChevrotain(text: string, adapters: ParseAdapters): ParseOutcome {
  const errors: Diagnostic[] = [];

  // Lexing
  const lex = adapters.tokenize(text);
  if (lex.errors.length > 0) {
    errors.push(...lex.errors.map(fromLexerError));
  }

  // Parsing (only if no fatal lexer errors)
  let cst: CstNode | null = null;
  if (lex.errors.length === 0) {
    const parseRes = adapters.parse(lex.tokens);
    if (parseRes.errors.length > 0) {
      errors.push(...parseRes.errors.map((e) => adapters.mapParserError(e, text)));
    } else {
      cst = parseRes.cst;
    }
  }

  return { cst: errors.length === 0 ? cst : null, tokens: lex.tokens, errors };
}
