/**
 * Change Evaluator
 *
 * Pure, synchronous evaluation of a long-format table. Checks run in a fixed
 * order (options, emptiness, fields, cell types) and any failure aborts the
 * whole call before a row is produced.
 */

import type { Record as DataRecord } from '@longflag/core';
import type {
  ChangeRow,
  EvaluateOptions,
  EvaluationOutcome,
  FirstLastRow,
  MeanChangeRow,
  TimepointChangeRow,
} from '../types/index.js';
import { EmptyInputError } from '../errors/index.js';
import { parseEvaluateOptions } from '../validation/index.js';
import { assertFields, groupBySubject, toObservations } from './normalize.js';
import { CHANGE_STRATEGIES } from './methods.js';

/**
 * Evaluate and also report how many distinct subjects the input held.
 */
export function runEvaluation(
  records: readonly DataRecord[],
  options: EvaluateOptions
): EvaluationOutcome {
  // Options may come from untyped callers; revalidate
  const validated = parseEvaluateOptions(options);

  if (records.length === 0) {
    if (validated.rejectEmpty) {
      throw new EmptyInputError();
    }
    return { rows: [], subjectCount: 0 };
  }

  assertFields(records, validated);
  const series = groupBySubject(toObservations(records, validated));

  const strategy = CHANGE_STRATEGIES[validated.method];
  const rows: ChangeRow[] = [];
  for (const subject of series) {
    // One push per row; a subject can have more rows than fit in an argument list
    for (const row of strategy(subject, validated.threshold)) {
      rows.push(row);
    }
  }

  return { rows, subjectCount: series.length };
}

/**
 * Measure within-subject change and flag |change| >= threshold.
 *
 * - `first_last`: one row per subject, last minus first value.
 * - `mean_change`: one row per subject with at least one defined step,
 *   the mean of its consecutive differences.
 * - `all_timepoints`: one row per consecutive pair of timepoints.
 *
 * Rows come out in ascending subject order, then ascending time.
 *
 * @throws InvalidMethodError, SchemaError, TypeCoercionError, EmptyInputError
 */
export function evaluate(
  records: readonly DataRecord[],
  options: EvaluateOptions & { method: 'first_last' }
): FirstLastRow[];
export function evaluate(
  records: readonly DataRecord[],
  options: EvaluateOptions & { method: 'mean_change' }
): MeanChangeRow[];
export function evaluate(
  records: readonly DataRecord[],
  options: EvaluateOptions & { method: 'all_timepoints' }
): TimepointChangeRow[];
export function evaluate(records: readonly DataRecord[], options: EvaluateOptions): ChangeRow[];
export function evaluate(records: readonly DataRecord[], options: EvaluateOptions): ChangeRow[] {
  return runEvaluation(records, options).rows;
}
