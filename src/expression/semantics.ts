import type { CstElement, CstNode, IToken } from 'chevrotain';
import { CompileTypeError, UnsupportedConstructError, type CompileErrorOptions } from '../core/errors.js';
import { lengthReference, accessChainOf, encodeString } from './arrays.js';
import { buildCall, CONSTANT_MEMBERS } from './calls.js';
import { conjunction, eq, ite, not } from './generators.js';
import {
  arrayAccess,
  arrayValue,
  binary,
  boolLiteral,
  constantLiteral,
  identifier,
  intLiteral,
  isNumericLiteral,
  literal,
  operandOf,
  realLiteral,
  unary,
  type ArrayElement,
  type ArrayValue,
  type BinaryOpcode,
  type Expression,
  type NumericBase,
} from './model.js';
import { parserInstance } from './parser.js';

interface ExpressionCtx {
  conditional: CstNode[];
}

interface ConditionalCtx {
  test: CstNode[];
  whenTrue?: CstNode[];
  whenFalse?: CstNode[];
}

interface ChainCtx {
  operand: CstNode[];
  operator?: IToken[];
}

interface UnaryCtx {
  operator?: IToken[];
  operand?: CstNode[];
  postfix?: CstNode[];
}

interface PostfixCtx {
  primary: CstNode[];
  suffix?: CstNode[];
}

interface PrimaryCtx {
  NumberLiteral?: IToken[];
  StringLiteral?: IToken[];
  True?: IToken[];
  False?: IToken[];
  Identifier?: IToken[];
  parenthesized?: CstNode[];
  arrayLiteral?: CstNode[];
}

interface ParenthesizedCtx {
  expression: CstNode[];
}

interface ArrayLiteralCtx {
  LBracket: IToken[];
  element?: CstNode[];
}

/** Where a literal array came from; these may only appear where arrays are allowed. */
export type LiteralArrayKind = 'string' | 'array';

const REJECTED_NAMES = new Set(['True', 'False', 'undefined', 'null']);

const BINARY_OPCODES: Readonly<Record<string, BinaryOpcode>> = {
  '||': '∨',
  '&&': '∧',
  '==': '=',
  '!=': '≠',
  '<': '<',
  '<=': '≤',
  '>': '>',
  '>=': '≥',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
};

function positionOf(tok: IToken | undefined): CompileErrorOptions {
  if (!tok) return {};
  return { line: tok.startLine, column: tok.startColumn, length: tok.image.length };
}

function isCstNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

function childNodes(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter(isCstNode);
}

function childTokens(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

/** Leftmost token below `node`, for error positions. */
function firstToken(node: CstNode): IToken | undefined {
  let best: IToken | undefined;
  for (const elements of Object.values(node.children)) {
    for (const el of elements) {
      const tok = isToken(el) ? el : firstToken(el);
      if (tok && (!best || tok.startOffset < best.startOffset)) best = tok;
    }
  }
  return best;
}

function only(nodes: CstNode[] | undefined, rule: string): CstNode {
  const [node] = nodes ?? [];
  if (!node) throw new Error(`Malformed '${rule}' node`);
  return node;
}

function unquote(image: string): string {
  const body = image.slice(1, -1);
  return body.replace(/\\(.)/g, (_, ch: string) => {
    switch (ch) {
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      default:
        return ch;
    }
  });
}

function numberLiteral(image: string): Expression {
  const value = Number(image);
  return /[.eE]/.test(image) ? realLiteral(value) : intLiteral(value);
}

function negate(expr: Expression): Expression {
  if (isNumericLiteral(expr)) {
    return expr.value.type === 'int' ? intLiteral(-expr.value.value) : realLiteral(-expr.value.value);
  }
  return binary('-', intLiteral(0), expr);
}

function withBase(value: ArrayValue, base: NumericBase): ArrayValue {
  return {
    type: 'array',
    base,
    elements: value.elements.map((el): ArrayElement => (el.type === 'array' ? withBase(el, base) : { type: base, value: el.value })),
  };
}

function hasReal(value: ArrayValue): boolean {
  return value.elements.some((el) => (el.type === 'array' ? hasReal(el) : el.type === 'real'));
}

/** The ArrayValue held by an `av` node. */
export function arrayValueOf(expr: Expression): ArrayValue | undefined {
  if (expr.kind !== 'operator' || expr.op !== 'av') return undefined;
  const elements = operandOf(expr, 'elements');
  return elements.kind === 'literal' && elements.value.type === 'array' ? elements.value : undefined;
}

/** `target == value` for every element, plus the length of each dimension. */
export function unrollArrayEquality(target: Expression, value: ArrayValue): Expression {
  const parts: Expression[] = [eq(lengthReference(target), intLiteral(value.elements.length))];
  value.elements.forEach((el, i) => {
    const element = arrayAccess(target, intLiteral(i));
    parts.push(el.type === 'array' ? unrollArrayEquality(element, el) : eq(element, literal(el)));
  });
  return conjunction(parts);
}

const BaseVisitor = parserInstance.getBaseCstVisitorConstructorWithDefaults<void, Expression>();

class ExpressionSemanticsVisitor extends BaseVisitor {
  /** Literal arrays and strings produced so far; checked wherever an operand is consumed. */
  readonly literalArrays = new WeakMap<Expression, LiteralArrayKind>();

  constructor() {
    super();
    this.validateVisitor();
  }

  /** Visit a node whose value is used as an ordinary operand. */
  private operand(node: CstNode): Expression {
    const expr = this.visit(node);
    const kind = this.literalArrays.get(expr);
    if (kind) {
      throw new CompileTypeError(
        kind === 'string'
          ? 'String literals are only allowed as assigned values or compared with == and !='
          : 'Array literals are only allowed as assigned values, array elements or compared with == and !=',
        positionOf(firstToken(node))
      );
    }
    return expr;
  }

  expression(ctx: ExpressionCtx): Expression {
    return this.visit(only(ctx.conditional, 'expression'));
  }

  conditional(ctx: ConditionalCtx): Expression {
    const test = only(ctx.test, 'conditional');
    const [whenTrue] = ctx.whenTrue ?? [];
    const [whenFalse] = ctx.whenFalse ?? [];
    if (!whenTrue || !whenFalse) return this.visit(test);
    return ite(this.operand(test), this.operand(whenTrue), this.operand(whenFalse));
  }

  private chain(ctx: ChainCtx): Expression {
    const [first = only(ctx.operand, 'chain'), ...rest] = ctx.operand;
    if (rest.length === 0) return this.visit(first);
    const operators = ctx.operator ?? [];
    return rest.reduce<Expression>((left, node, i) => {
      const tok = operators[i];
      const op = tok ? BINARY_OPCODES[tok.image] : undefined;
      if (!tok || !op) throw new UnsupportedConstructError(`Unsupported operator '${tok?.image ?? ''}'`, positionOf(tok));
      return binary(op, left, this.operand(node));
    }, this.operand(first));
  }

  orExpr(ctx: ChainCtx): Expression {
    return this.chain(ctx);
  }

  andExpr(ctx: ChainCtx): Expression {
    return this.chain(ctx);
  }

  relational(ctx: ChainCtx): Expression {
    return this.chain(ctx);
  }

  additive(ctx: ChainCtx): Expression {
    return this.chain(ctx);
  }

  multiplicative(ctx: ChainCtx): Expression {
    return this.chain(ctx);
  }

  // == and != also compare whole arrays against string or array literals
  equality(ctx: ChainCtx): Expression {
    const [first = only(ctx.operand, 'equality'), ...rest] = ctx.operand;
    const operators = ctx.operator ?? [];
    let left = this.visit(first);
    let leftNode = first;
    rest.forEach((node, i) => {
      const tok = operators[i];
      const right = this.visit(node);
      const negated = tok?.image === '!=';
      left = this.compare(left, leftNode, right, node, negated, tok);
      leftNode = node;
    });
    return left;
  }

  private compare(left: Expression, leftNode: CstNode, right: Expression, rightNode: CstNode, negated: boolean, tok?: IToken): Expression {
    const leftKind = this.literalArrays.get(left);
    const rightKind = this.literalArrays.get(right);
    if (!leftKind && !rightKind) return binary(negated ? '≠' : '=', left, right);
    if (leftKind && rightKind) {
      throw new CompileTypeError('Cannot compare two array literals', positionOf(tok));
    }
    const [target, literalExpr, targetNode] = leftKind ? [right, left, rightNode] : [left, right, leftNode];
    const value = arrayValueOf(literalExpr);
    if (!value || !accessChainOf(target)) {
      throw new CompileTypeError(
        'Array and string literals can only be compared with a variable or array element',
        positionOf(firstToken(targetNode))
      );
    }
    const unrolled = unrollArrayEquality(target, value);
    return negated ? not(unrolled) : unrolled;
  }

  unary(ctx: UnaryCtx): Expression {
    const [tok] = ctx.operator ?? [];
    const [operandNode] = ctx.operand ?? [];
    if (!tok || !operandNode) return this.visit(only(ctx.postfix, 'unary'));
    const operandExpr = this.operand(operandNode);
    switch (tok.image) {
      case '!':
        return unary('¬', operandExpr);
      case '-':
        return negate(operandExpr);
      case '+':
        return operandExpr;
      default:
        throw new UnsupportedConstructError(`Unsupported unary operator '${tok.image}'`, positionOf(tok));
    }
  }

  postfix(ctx: PostfixCtx): Expression {
    const primary = only(ctx.primary, 'postfix');
    const suffixes = ctx.suffix ?? [];
    if (suffixes.length === 0) return this.resolveName(this.visit(primary), primary);
    let current = this.operand(primary);
    for (const suffix of suffixes) {
      current = this.applySuffix(current, suffix);
    }
    return this.resolveName(current, primary);
  }

  private applySuffix(current: Expression, suffix: CstNode): Expression {
    const [member] = childTokens(suffix, 'member');
    if (member) {
      if (member.image === 'length') {
        try {
          return lengthReference(current);
        } catch (err) {
          if (err instanceof UnsupportedConstructError) {
            throw new UnsupportedConstructError(err.message, positionOf(member));
          }
          throw err;
        }
      }
      if (current.kind !== 'identifier') {
        throw new UnsupportedConstructError(`Member access '.${member.image}' is only supported on names`, positionOf(member));
      }
      return identifier(`${current.name}.${member.image}`);
    }
    const [index] = childNodes(suffix, 'index');
    if (index) {
      if (!accessChainOf(current)) {
        throw new UnsupportedConstructError('Indexing is only supported on variables and array elements', positionOf(firstToken(suffix)));
      }
      return arrayAccess(current, this.operand(index));
    }
    const [open] = childTokens(suffix, 'LParen');
    if (current.kind !== 'identifier') {
      throw new UnsupportedConstructError('Only named functions can be called', positionOf(open));
    }
    const args = childNodes(suffix, 'argumentList').flatMap((list) => childNodes(list, 'argument').map((arg) => this.operand(arg)));
    return buildCall(current.name, args, { line: open?.startLine, column: open?.startColumn, length: current.name.length });
  }

  private resolveName(expr: Expression, node: CstNode): Expression {
    if (expr.kind !== 'identifier') return expr;
    const constant = CONSTANT_MEMBERS[expr.name];
    if (constant) return constantLiteral(constant);
    if (REJECTED_NAMES.has(expr.name)) {
      throw new CompileTypeError(`'${expr.name}' is not a value; use true, false or a number`, positionOf(firstToken(node)));
    }
    return expr;
  }

  primary(ctx: PrimaryCtx): Expression {
    const [num] = ctx.NumberLiteral ?? [];
    if (num) return numberLiteral(num.image);
    const [str] = ctx.StringLiteral ?? [];
    if (str) {
      const expr = arrayValue(encodeString(unquote(str.image)));
      this.literalArrays.set(expr, 'string');
      return expr;
    }
    if (ctx.True) return boolLiteral(true);
    if (ctx.False) return boolLiteral(false);
    const [name] = ctx.Identifier ?? [];
    if (name) return identifier(name.image);
    if (ctx.parenthesized) return this.visit(only(ctx.parenthesized, 'primary'));
    return this.visit(only(ctx.arrayLiteral, 'primary'));
  }

  parenthesized(ctx: ParenthesizedCtx): Expression {
    return this.visit(only(ctx.expression, 'parenthesized'));
  }

  arrayLiteral(ctx: ArrayLiteralCtx): Expression {
    const elements = (ctx.element ?? []).map((node): ArrayElement => {
      const expr = this.visit(node);
      if (this.literalArrays.get(expr) === 'array') {
        const nested = arrayValueOf(expr);
        if (nested) return nested;
      }
      if (isNumericLiteral(expr)) return { type: expr.value.type, value: expr.value.value };
      throw new CompileTypeError('Array literal elements must be numbers or nested array literals', positionOf(firstToken(node)));
    });
    const raw: ArrayValue = { type: 'array', base: 'int', elements };
    const expr = arrayValue(withBase(raw, hasReal(raw) ? 'real' : 'int'));
    this.literalArrays.set(expr, 'array');
    return expr;
  }
}

export interface AnalyzedExpression {
  expr: Expression;
  /** Set when the whole expression is a string or array literal. */
  literalKind?: LiteralArrayKind;
}

export function analyzeExpression(cst: CstNode): AnalyzedExpression {
  const visitor = new ExpressionSemanticsVisitor();
  const expr = visitor.visit(cst);
  const literalKind = visitor.literalArrays.get(expr);
  return literalKind ? { expr, literalKind } : { expr };
}
