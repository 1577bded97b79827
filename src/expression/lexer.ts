import { createToken, Lexer } from 'chevrotain';

// Categories: the parser consumes these so one operator list keeps source order.
export const EqualityOperator = createToken({ name: 'EqualityOperator', pattern: Lexer.NA });
export const RelationalOperator = createToken({ name: 'RelationalOperator', pattern: Lexer.NA });
export const AdditiveOperator = createToken({ name: 'AdditiveOperator', pattern: Lexer.NA });
export const MultiplicativeOperator = createToken({ name: 'MultiplicativeOperator', pattern: Lexer.NA });
export const UnaryOperator = createToken({ name: 'UnaryOperator', pattern: Lexer.NA });

export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_$][A-Za-z0-9_$]*/ });
export const True = createToken({ name: 'True', pattern: /true/, longer_alt: Identifier });
export const False = createToken({ name: 'False', pattern: /false/, longer_alt: Identifier });

export const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?/ });
// Allow escaped characters within quotes (e.g., \" inside "...")
export const StringLiteral = createToken({ name: 'StringLiteral', pattern: /"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*'/ });

// Multi-character operators before their prefixes
export const StrictEquality = createToken({ name: 'StrictEquality', pattern: /===|!==/ });
export const Equals = createToken({ name: 'Equals', pattern: /==/, categories: [EqualityOperator] });
export const NotEquals = createToken({ name: 'NotEquals', pattern: /!=/, categories: [EqualityOperator] });
export const LessEquals = createToken({ name: 'LessEquals', pattern: /<=/, categories: [RelationalOperator] });
export const GreaterEquals = createToken({ name: 'GreaterEquals', pattern: />=/, categories: [RelationalOperator] });
export const AndAnd = createToken({ name: 'AndAnd', pattern: /&&/ });
export const OrOr = createToken({ name: 'OrOr', pattern: /\|\|/ });
export const Less = createToken({ name: 'Less', pattern: /</, categories: [RelationalOperator] });
export const Greater = createToken({ name: 'Greater', pattern: />/, categories: [RelationalOperator] });
export const SingleEquals = createToken({ name: 'SingleEquals', pattern: /=/ });
export const Bang = createToken({ name: 'Bang', pattern: /!/, categories: [UnaryOperator] });

export const Plus = createToken({ name: 'Plus', pattern: /\+/, categories: [AdditiveOperator, UnaryOperator] });
export const Minus = createToken({ name: 'Minus', pattern: /-/, categories: [AdditiveOperator, UnaryOperator] });
export const Star = createToken({ name: 'Star', pattern: /\*/, categories: [MultiplicativeOperator] });
export const Slash = createToken({ name: 'Slash', pattern: /\//, categories: [MultiplicativeOperator] });
export const Percent = createToken({ name: 'Percent', pattern: /%/, categories: [MultiplicativeOperator] });

export const Question = createToken({ name: 'Question', pattern: /\?/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });
export const Dot = createToken({ name: 'Dot', pattern: /\./ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
export const RBracket = createToken({ name: 'RBracket', pattern: /]/ });

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED, line_breaks: true });

export const allTokens = [
  // skipped
  WhiteSpace,
  // literals; numbers before Dot so `.5` lexes as a number
  StringLiteral,
  NumberLiteral,
  // keywords before identifiers
  True,
  False,
  Identifier,
  // operators, longest first
  StrictEquality,
  Equals,
  NotEquals,
  LessEquals,
  GreaterEquals,
  AndAnd,
  OrOr,
  Less,
  Greater,
  SingleEquals,
  Bang,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  // punctuation
  Question,
  Colon,
  Dot,
  Comma,
  LParen,
  RParen,
  LBracket,
  RBracket,
  // categories (never matched by the lexer)
  EqualityOperator,
  RelationalOperator,
  AdditiveOperator,
  MultiplicativeOperator,
  UnaryOperator,
];

export const ExpressionLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return ExpressionLexer.tokenize(text);
}
