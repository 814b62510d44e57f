/**
 * Type exports for the evaluator
 */

export type {
  ChangeMethod,
  SubjectId,
  Flag,
  EvaluateOptions,
  FirstLastRow,
  MeanChangeRow,
  TimepointChangeRow,
  ChangeRow,
  ChangeRowsByMethod,
  Observation,
  SubjectSeries,
  EvaluationOutcome,
} from './evaluation.js';

export type { SourceInfo, ChangeSummary, ChangeReport } from './report.js';
