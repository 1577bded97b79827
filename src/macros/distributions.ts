import { containsDistribution, mapOperands, realLiteral, rolesOf, operandOf, type Expression } from '../expression/model.js';

/**
 * Replace every `Uniform(lo, hi)` by `nOptions` evenly spaced constants and
 * return the Cartesian product over all distributions, in operand order.
 */
export function expandDistributions(expr: Expression, nOptions: number): Expression[] {
  switch (expr.kind) {
    case 'identifier':
    case 'literal':
      return [expr];
    case 'distribution': {
      const width = expr.upper - expr.lower;
      return Array.from({ length: nOptions }, (_, k) => realLiteral(expr.lower + (k * width) / nOptions));
    }
    case 'operator':
      if (!containsDistribution(expr)) return [expr];
      break;
  }
  let combos: Record<string, Expression>[] = [{}];
  for (const role of rolesOf(expr.op)) {
    const options = expandDistributions(operandOf(expr, role), nOptions);
    combos = combos.flatMap((combo) => options.map((option) => ({ ...combo, [role]: option })));
  }
  return combos.map((combo) => mapOperands(expr, (operand, role) => combo[role] ?? operand));
}
