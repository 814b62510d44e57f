export { evaluate, runEvaluation } from './evaluate.js';
export { ChangeEvaluator, buildChangeReport, summarizeRows } from './change-evaluator.js';
export {
  flagChange,
  firstLast,
  meanChange,
  allTimepoints,
  CHANGE_STRATEGIES,
} from './methods.js';
export type { ChangeStrategy } from './methods.js';
export {
  toNumeric,
  assertColumns,
  assertFields,
  toObservations,
  groupBySubject,
  compareSubjects,
  compareTime,
} from './normalize.js';
export type { FieldRoles } from './normalize.js';
