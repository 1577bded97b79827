import { assignment, type Assignment } from '../automaton/edge.js';
import { CompileTypeError, ModelError, UnsupportedConstructError } from '../core/errors.js';
import { accessChainOf, dimensionLength, lengthVariableName, literalLengths, type AccessChain } from '../expression/arrays.js';
import { intLiteral, arrayValue, identifier, literal, renameEventData, type Expression } from '../expression/model.js';
import { maximum, plus } from '../expression/generators.js';
import { fitLiteral, parseExpression, parseSource, type ParsedSource } from '../expression/parse.js';
import { describeType, isArrayType, type ArrayType } from '../expression/types.js';
import type { AssignStep } from '../chart/types.js';
import type { BodyContext } from './context.js';

/**
 * Store a whole array into `target` together with its length companions.
 * The companions are written at `index + 1`, after the array itself.
 */
export function arrayAssignments(target: string, type: ArrayType, parsed: ParsedSource, ctx: BodyContext, index: number): Assignment[] {
  const companion = (dimension: number) => identifier(lengthVariableName(target, dimension));
  if (parsed.literal) {
    const lengths = literalLengths(fitLiteral(parsed, type, false), type);
    return [
      assignment(identifier(target), arrayValue(fitLiteral(parsed, type)), index),
      ...lengths.map((length, i) =>
        assignment(companion(i + 1), length.type === 'array' ? arrayValue(length) : literal(length), index + 1)
      ),
    ];
  }
  const value = renameEventData(parsed.expr, ctx.dataEvent);
  if (value.kind !== 'identifier') {
    throw new CompileTypeError(`Cannot assign '${parsed.source}' to the array '${target}'`, {
      hint: 'Arrays can be assigned an array literal, a string or another array variable.',
    });
  }
  const sourceType = ctx.lookup(value.name);
  if (!sourceType || !isArrayType(sourceType) || sourceType.maxSizes.length !== type.maxSizes.length) {
    throw new CompileTypeError(
      `Cannot assign '${value.name}' (${sourceType ? describeType(sourceType) : 'unknown'}) to '${target}' (${describeType(type)})`
    );
  }
  return [
    assignment(identifier(target), value, index),
    ...type.maxSizes.map((_, i) => assignment(companion(i + 1), identifier(lengthVariableName(value.name, i + 1)), index + 1)),
  ];
}

/** `len_m(a)[i1..i(m-1)] = max(i_m + 1, len_m(a)[i1..i(m-1)])` for every indexed dimension. */
function elementLengthUpdates(chain: AccessChain, index: number): Assignment[] {
  return chain.indexes.map((position, i) => {
    const length = dimensionLength(chain.root, i + 1, chain.indexes);
    return assignment(length, maximum(plus(position, intLiteral(1)), length), index);
  });
}

function elementAssignments(target: Expression, chain: AccessChain, type: ArrayType, step: AssignStep, ctx: BodyContext, index: number): Assignment[] {
  if (chain.indexes.length > type.maxSizes.length) {
    throw new CompileTypeError(`'${step.location}' indexes ${chain.indexes.length} dimension(s) of a ${type.maxSizes.length}-dimensional array`);
  }
  if (chain.indexes.length < type.maxSizes.length) {
    throw new UnsupportedConstructError(`Assigning a whole row ('${step.location}') is not supported; assign its elements`);
  }
  const value = parseExpression(step.expr, { eventDataPrefix: ctx.dataEvent });
  return [assignment(target, value, index), ...elementLengthUpdates(chain, index + 1)];
}

/** Assignments for one assign step, starting at priority `index`. */
export function compileAssign(step: AssignStep, ctx: BodyContext, index: number): Assignment[] {
  const target = parseExpression(step.location, { eventDataPrefix: ctx.dataEvent });
  const chain = accessChainOf(target);
  if (!chain) {
    throw new CompileTypeError(`Cannot assign to '${step.location}'`, { hint: 'The target must be a variable or an array element.' });
  }
  const type = ctx.lookup(chain.root);
  if (!type) throw new ModelError(`Assignment to undeclared variable '${chain.root}'`);
  if (chain.indexes.length > 0) {
    if (!isArrayType(type)) throw new CompileTypeError(`'${chain.root}' is ${describeType(type)}, not an array`);
    return elementAssignments(target, chain, type, step, ctx, index);
  }
  if (isArrayType(type)) {
    return arrayAssignments(chain.root, type, parseSource(step.expr), ctx, index);
  }
  return [assignment(target, parseExpression(step.expr, { eventDataPrefix: ctx.dataEvent }), index)];
}
