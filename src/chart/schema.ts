import { z } from 'zod';
import { fromZodError } from '../core/diagnostics.js';
import type { Diagnostic } from '../core/types.js';
import type { Chart, ChartTransition, IfBranch, Step, TransitionTarget } from './types.js';

const expressionSource = z.string().min(1, 'expression must not be empty');
const numberOrSource = z.union([z.number(), expressionSource]);

export const stepSchema: z.ZodType<Step> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('assign'), location: expressionSource, expr: expressionSource }),
    z.object({
      kind: z.literal('send'),
      event: z.string().min(1),
      params: z.array(z.object({ name: z.string().min(1), expr: expressionSource })).optional(),
    }),
    z.object({ kind: z.literal('if'), branches: z.array(ifBranchSchema).min(1), else: z.array(stepSchema).optional() }),
  ])
);

const ifBranchSchema: z.ZodType<IfBranch> = z.lazy(() => z.object({ cond: expressionSource, body: z.array(stepSchema) }));

const targetSchema: z.ZodType<TransitionTarget> = z.object({
  target: z.string().min(1),
  prob: numberOrSource.optional(),
  body: z.array(stepSchema).optional(),
});

const transitionSchema: z.ZodType<ChartTransition> = z
  .object({
    event: z.string().min(1).optional(),
    cond: expressionSource.optional(),
    target: z.string().min(1).optional(),
    body: z.array(stepSchema).optional(),
    targets: z.array(targetSchema).min(1).optional(),
  })
  .refine((t) => (t.target === undefined) !== (t.targets === undefined), {
    message: "a transition needs exactly one of 'target' or 'targets'",
  })
  .refine((t) => !(t.targets && t.body), { message: "'body' belongs inside each entry of 'targets'" });

export const chartSchema: z.ZodType<Chart> = z.object({
  name: z.string().min(1),
  kind: z.enum(['default', 'bt-root']).optional(),
  initial: z.string().min(1),
  datamodel: z
    .array(
      z.object({
        id: z.string().min(1),
        type: z.string().min(1),
        expr: expressionSource.optional(),
        lowerBound: numberOrSource.optional(),
        upperBound: numberOrSource.optional(),
      })
    )
    .optional(),
  states: z
    .array(
      z.object({
        id: z.string().min(1),
        onEntry: z.array(stepSchema).optional(),
        onExit: z.array(stepSchema).optional(),
        transitions: z.array(transitionSchema).optional(),
      })
    )
    .min(1),
});

export type ChartValidation = { ok: true; chart: Chart } | { ok: false; errors: Diagnostic[] };

export function validateChart(input: unknown): ChartValidation {
  const parsed = chartSchema.safeParse(input);
  if (parsed.success) return { ok: true, chart: parsed.data };
  return { ok: false, errors: fromZodError(parsed.error, 'chart') };
}
