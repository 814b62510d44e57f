/**
 * @longflag/evaluator
 *
 * Flags meaningful within-subject change in long-format repeated-measures data.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Evaluation
import { ChangeEvaluator as _ChangeEvaluator } from './evaluation/index.js';
export {
  evaluate,
  runEvaluation,
  ChangeEvaluator,
  buildChangeReport,
  summarizeRows,
  flagChange,
  toNumeric,
  groupBySubject,
  assertColumns,
} from './evaluation/index.js';

// Validation
export {
  CHANGE_METHODS,
  ChangeMethods,
  changeMethodSchema,
  evaluateOptionsSchema,
  isChangeMethod,
  parseEvaluateOptions,
} from './validation/index.js';
export type { EvaluateOptionsInput } from './validation/index.js';

// Formatters
export {
  formatChangeReport,
  OUTPUT_COLUMNS,
  toOutputRow,
  toOutputTable,
  formatNumber,
  formatSubject,
} from './formatters/index.js';

// Errors
export {
  EvaluationError,
  SchemaError,
  MissingColumnError,
  TypeCoercionError,
  InvalidMethodError,
  EmptyInputError,
} from './errors/index.js';
export type { EvaluationErrorCode, EvaluationErrorDetails } from './errors/index.js';

/**
 * Factory function to create a ChangeEvaluator
 */
export function createChangeEvaluator(): _ChangeEvaluator {
  return new _ChangeEvaluator();
}
