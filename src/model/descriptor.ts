import { z } from 'zod';
import { fromZodError } from '../core/diagnostics.js';
import { DEFAULT_MAX_ARRAY_SIZE, DEFAULT_RANDOM_OPTIONS, type Diagnostic } from '../core/types.js';
import { chartSchema } from '../chart/schema.js';
import { environmentSchema } from './environment.js';

const constantSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['bool', 'int', 'real']),
  /** A literal, or expression source over the constants declared before it. */
  value: z.union([z.number(), z.boolean(), z.string().min(1)]),
});

const eventSchema = z.object({
  name: z.string().min(1),
  /** Field name → declared type, e.g. `{ "goal": "float64[]" }`. */
  fields: z.record(z.string().min(1)).default({}),
});

const compositionSchema = z.object({
  elements: z.array(z.object({ automaton: z.string().min(1) })).min(1),
  syncs: z.array(z.object({ result: z.string().min(1), synchronise: z.array(z.string().min(1).nullable()) })),
});

/** A model: the charts to compose, its globals, and the properties to verify. */
export const descriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  maxArraySize: z.number().int().positive().default(DEFAULT_MAX_ARRAY_SIZE),
  randomOptions: z.number().int().min(1).default(DEFAULT_RANDOM_OPTIONS),
  /** Paths relative to the descriptor, or inline charts. */
  charts: z.array(z.union([z.string().min(1), chartSchema])).min(1),
  constants: z.array(constantSchema).default([]),
  events: z.array(eventSchema).default([]),
  environment: environmentSchema.optional(),
  /** Checked in full when the model is assembled. */
  properties: z.array(z.unknown()).default([]),
  composition: compositionSchema.optional(),
});

export type ModelDescriptor = z.infer<typeof descriptorSchema>;
export type DescriptorInput = z.input<typeof descriptorSchema>;
export type ConstantDeclaration = z.infer<typeof constantSchema>;

export type DescriptorValidation = { ok: true; descriptor: ModelDescriptor } | { ok: false; errors: Diagnostic[] };

export function validateDescriptor(input: unknown): DescriptorValidation {
  const parsed = descriptorSchema.safeParse(input);
  if (parsed.success) return { ok: true, descriptor: parsed.data };
  return { ok: false, errors: fromZodError(parsed.error, 'model descriptor') };
}
