/**
 * Change Evaluation Types
 *
 * Types for measuring within-subject change across repeated timepoints.
 */

/** How change is measured per subject */
export type ChangeMethod = 'first_last' | 'mean_change' | 'all_timepoints';

/**
 * Opaque subject key. Primitives group by value equality, dates by the
 * instant they denote; rows carry the first value seen for the group.
 */
export type SubjectId = string | number | bigint | boolean | Date;

/**
 * Result of comparing |change| against the threshold.
 * null when the change itself is undefined (NaN).
 */
export type Flag = boolean | null;

/** Options for a single evaluation */
export interface EvaluateOptions {
  /** Field holding the subject identifier */
  subjectField: string;
  /** Field holding the timepoint */
  timeField: string;
  /** Field holding the measurement */
  valueField: string;
  /** Rows with |change| >= threshold are flagged */
  threshold: number;
  method: ChangeMethod;
  /** Throw EmptyInputError instead of returning [] for an empty table */
  rejectEmpty?: boolean;
}

/** One subject, first vs last observation */
export interface FirstLastRow {
  readonly subject: SubjectId;
  readonly firstValue: number;
  readonly lastValue: number;
  readonly change: number;
  readonly flagged: Flag;
}

/** One subject, mean of its stepwise changes */
export interface MeanChangeRow {
  readonly subject: SubjectId;
  readonly change: number;
  readonly flagged: Flag;
}

/** One pair of consecutive timepoints within a subject */
export interface TimepointChangeRow {
  readonly subject: SubjectId;
  readonly fromTime: number;
  readonly toTime: number;
  readonly change: number;
  readonly flagged: Flag;
}

export type ChangeRow = FirstLastRow | MeanChangeRow | TimepointChangeRow;

/** Row type produced by each method */
export interface ChangeRowsByMethod {
  first_last: FirstLastRow;
  mean_change: MeanChangeRow;
  all_timepoints: TimepointChangeRow;
}

/** A projected, coerced input row */
export interface Observation {
  readonly subject: SubjectId;
  readonly time: number;
  readonly value: number;
  /** Position in the input table */
  readonly index: number;
}

/** All observations of one subject, ascending by time */
export interface SubjectSeries {
  readonly subject: SubjectId;
  readonly observations: readonly Observation[];
}

/** Rows plus the number of distinct subjects seen in the input */
export interface EvaluationOutcome {
  rows: ChangeRow[];
  subjectCount: number;
}
