/**
 * Zod schemas for evaluation options
 */

import { z } from 'zod';
import type { ChangeMethod, EvaluateOptions } from '../types/index.js';
import { EvaluationError, InvalidMethodError } from '../errors/index.js';

export const CHANGE_METHODS = ['first_last', 'mean_change', 'all_timepoints'] as const;

/** Named variants of ChangeMethod */
export const ChangeMethods = {
  FirstLast: 'first_last',
  MeanChange: 'mean_change',
  AllTimepoints: 'all_timepoints',
} as const satisfies Record<string, ChangeMethod>;

export const changeMethodSchema = z.enum(CHANGE_METHODS);

const fieldNameSchema = z.string().min(1, 'Field name must not be empty');

export const evaluateOptionsSchema = z.object({
  subjectField: fieldNameSchema,
  timeField: fieldNameSchema,
  valueField: fieldNameSchema,
  // z.number() rejects NaN; negative values are allowed
  threshold: z.number(),
  method: changeMethodSchema,
  rejectEmpty: z.boolean().optional(),
});

export type EvaluateOptionsInput = z.input<typeof evaluateOptionsSchema>;

export function isChangeMethod(value: unknown): value is ChangeMethod {
  return changeMethodSchema.safeParse(value).success;
}

function readMethod(input: unknown): unknown {
  if (typeof input !== 'object' || input === null) return undefined;
  return 'method' in input ? input.method : undefined;
}

/**
 * Validate evaluation options from an untyped source.
 * The method is checked first so an unknown method fails before anything else.
 */
export function parseEvaluateOptions(input: unknown): EvaluateOptions {
  const method = readMethod(input);
  if (!isChangeMethod(method)) {
    throw new InvalidMethodError(method, CHANGE_METHODS);
  }

  const result = evaluateOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new EvaluationError({
      code: 'INVALID_OPTIONS',
      message: `Invalid evaluation options: ${issues}`,
      suggestion: 'Provide non-empty subject, time and value field names and a numeric threshold.',
      context: { issues: result.error.issues.map((issue) => issue.message) },
    });
  }

  return result.data;
}
