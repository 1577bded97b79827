import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class ExpressionParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.conditional);
  });

  private conditional = this.RULE('conditional', () => {
    this.SUBRULE(this.orExpr, { LABEL: 'test' });
    this.OPTION(() => {
      this.CONSUME(t.Question);
      this.SUBRULE(this.expression, { LABEL: 'whenTrue' });
      this.CONSUME(t.Colon);
      this.SUBRULE2(this.expression, { LABEL: 'whenFalse' });
    });
  });

  private orExpr = this.RULE('orExpr', () => {
    this.SUBRULE(this.andExpr, { LABEL: 'operand' });
    this.MANY(() => {
      this.CONSUME(t.OrOr, { LABEL: 'operator' });
      this.SUBRULE2(this.andExpr, { LABEL: 'operand' });
    });
  });

  private andExpr = this.RULE('andExpr', () => {
    this.SUBRULE(this.equality, { LABEL: 'operand' });
    this.MANY(() => {
      this.CONSUME(t.AndAnd, { LABEL: 'operator' });
      this.SUBRULE2(this.equality, { LABEL: 'operand' });
    });
  });

  private equality = this.RULE('equality', () => {
    this.SUBRULE(this.relational, { LABEL: 'operand' });
    this.MANY(() => {
      this.CONSUME(t.EqualityOperator, { LABEL: 'operator' });
      this.SUBRULE2(this.relational, { LABEL: 'operand' });
    });
  });

  private relational = this.RULE('relational', () => {
    this.SUBRULE(this.additive, { LABEL: 'operand' });
    this.MANY(() => {
      this.CONSUME(t.RelationalOperator, { LABEL: 'operator' });
      this.SUBRULE2(this.additive, { LABEL: 'operand' });
    });
  });

  private additive = this.RULE('additive', () => {
    this.SUBRULE(this.multiplicative, { LABEL: 'operand' });
    this.MANY(() => {
      this.CONSUME(t.AdditiveOperator, { LABEL: 'operator' });
      this.SUBRULE2(this.multiplicative, { LABEL: 'operand' });
    });
  });

  private multiplicative = this.RULE('multiplicative', () => {
    this.SUBRULE(this.unary, { LABEL: 'operand' });
    this.MANY(() => {
      this.CONSUME(t.MultiplicativeOperator, { LABEL: 'operator' });
      this.SUBRULE2(this.unary, { LABEL: 'operand' });
    });
  });

  private unary = this.RULE('unary', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(t.UnaryOperator, { LABEL: 'operator' });
          this.SUBRULE(this.unary, { LABEL: 'operand' });
        },
      },
      { ALT: () => this.SUBRULE(this.postfix) },
    ]);
  });

  private postfix = this.RULE('postfix', () => {
    this.SUBRULE(this.primary);
    this.MANY(() => this.SUBRULE(this.suffix));
  });

  private suffix = this.RULE('suffix', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(t.Dot);
          this.CONSUME(t.Identifier, { LABEL: 'member' });
        },
      },
      {
        ALT: () => {
          this.CONSUME(t.LBracket);
          this.SUBRULE(this.expression, { LABEL: 'index' });
          this.CONSUME(t.RBracket);
        },
      },
      {
        ALT: () => {
          this.CONSUME(t.LParen);
          this.OPTION(() => this.SUBRULE(this.argumentList));
          this.CONSUME(t.RParen);
        },
      },
    ]);
  });

  private argumentList = this.RULE('argumentList', () => {
    this.SUBRULE(this.expression, { LABEL: 'argument' });
    this.MANY(() => {
      this.CONSUME(t.Comma);
      this.SUBRULE2(this.expression, { LABEL: 'argument' });
    });
  });

  private primary = this.RULE('primary', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.NumberLiteral) },
      { ALT: () => this.CONSUME(t.StringLiteral) },
      { ALT: () => this.CONSUME(t.True) },
      { ALT: () => this.CONSUME(t.False) },
      { ALT: () => this.CONSUME(t.Identifier) },
      { ALT: () => this.SUBRULE(this.parenthesized) },
      { ALT: () => this.SUBRULE(this.arrayLiteral) },
    ]);
  });

  private parenthesized = this.RULE('parenthesized', () => {
    this.CONSUME(t.LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(t.RParen);
  });

  private arrayLiteral = this.RULE('arrayLiteral', () => {
    this.CONSUME(t.LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.expression, { LABEL: 'element' });
      this.MANY(() => {
        this.CONSUME(t.Comma);
        this.SUBRULE2(this.expression, { LABEL: 'element' });
      });
    });
    this.CONSUME(t.RBracket);
  });
}

export const parserInstance = new ExpressionParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.expression();
  return { cst, errors: parserInstance.errors };
}
