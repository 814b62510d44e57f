/**
 * Change Methods
 *
 * One strategy per ChangeMethod, applied to a single time-ordered subject.
 */

import type {
  ChangeMethod,
  ChangeRowsByMethod,
  Flag,
  FirstLastRow,
  MeanChangeRow,
  SubjectSeries,
  TimepointChangeRow,
} from '../types/index.js';

export type ChangeStrategy<TRow> = (series: SubjectSeries, threshold: number) => TRow[];

/**
 * |change| >= threshold, or null when the change is undefined
 */
export function flagChange(change: number, threshold: number): Flag {
  if (Number.isNaN(change)) return null;
  return Math.abs(change) >= threshold;
}

/**
 * last - first; a single observation gives 0
 */
export const firstLast: ChangeStrategy<FirstLastRow> = (series, threshold) => {
  const { observations } = series;
  const first = observations[0];
  const last = observations[observations.length - 1];
  if (!first || !last) return [];

  const change = last.value - first.value;
  return [
    {
      subject: series.subject,
      firstValue: first.value,
      lastValue: last.value,
      change,
      flagged: flagChange(change, threshold),
    },
  ];
};

/**
 * Mean of consecutive differences, summed in time order.
 * Undefined steps are left out; no defined step means no row.
 */
export const meanChange: ChangeStrategy<MeanChangeRow> = (series, threshold) => {
  const { observations } = series;
  let sum = 0;
  let steps = 0;

  for (let i = 1; i < observations.length; i++) {
    const previous = observations[i - 1];
    const current = observations[i];
    if (!previous || !current) continue;

    const step = current.value - previous.value;
    if (Number.isNaN(step)) continue;
    sum += step;
    steps += 1;
  }

  if (steps === 0) return [];

  const change = sum / steps;
  return [{ subject: series.subject, change, flagged: flagChange(change, threshold) }];
};

/**
 * One row per consecutive pair; the first timepoint has no predecessor and
 * gets no row of its own.
 */
export const allTimepoints: ChangeStrategy<TimepointChangeRow> = (series, threshold) => {
  const rows: TimepointChangeRow[] = [];
  const { observations } = series;

  for (let i = 1; i < observations.length; i++) {
    const from = observations[i - 1];
    const to = observations[i];
    if (!from || !to) continue;

    const change = to.value - from.value;
    rows.push({
      subject: series.subject,
      fromTime: from.time,
      toTime: to.time,
      change,
      flagged: flagChange(change, threshold),
    });
  }

  return rows;
};

export const CHANGE_STRATEGIES: {
  readonly [M in ChangeMethod]: ChangeStrategy<ChangeRowsByMethod[M]>;
} = {
  first_last: firstLast,
  mean_change: meanChange,
  all_timepoints: allTimepoints,
};
