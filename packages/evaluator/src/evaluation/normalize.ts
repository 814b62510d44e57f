/**
 * Normalization
 *
 * Projects input rows onto (subject, time, value), coerces time and value to
 * numbers, groups by subject and orders each group by time.
 */

import type { Record as DataRecord, Schema } from '@longflag/core';
import { hasField } from '@longflag/core';
import type { Observation, SubjectId, SubjectSeries } from '../types/index.js';
import { MissingColumnError, SchemaError, TypeCoercionError } from '../errors/index.js';

/** Cell contents read as a missing measurement rather than a bad one */
const MISSING_TOKENS = new Set(['', 'NA', 'NaN']);

export interface FieldRoles {
  subjectField: string;
  timeField: string;
  valueField: string;
}

/**
 * Coerce a cell to a number.
 * Missing cells become NaN; returns null when the cell is not numeric.
 */
export function toNumeric(raw: unknown): number | null {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'bigint') return Number(raw);
  if (typeof raw === 'boolean') return raw ? 1 : 0;
  if (raw instanceof Date) return raw.getTime();
  if (raw === null || raw === undefined) return Number.NaN;

  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (MISSING_TOKENS.has(trimmed)) return Number.NaN;
    const parsed = Number(trimmed);
    return Number.isNaN(parsed) ? null : parsed;
  }

  return null;
}

function toSubjectId(raw: unknown): SubjectId | null {
  switch (typeof raw) {
    case 'string':
    case 'bigint':
    case 'boolean':
      return raw;
    case 'number':
      return Number.isNaN(raw) ? null : raw;
    default:
      return raw instanceof Date && !Number.isNaN(raw.getTime()) ? raw : null;
  }
}

type SubjectKey = string | number | bigint | boolean;

/** Map key for a subject; dates are keyed by epoch ms in their own map */
function subjectKey(subject: SubjectId): SubjectKey {
  return subject instanceof Date ? subject.getTime() : subject;
}

/**
 * Check the role fields against a source's columns. A schema without
 * columns (an empty table) passes; rows are checked by assertFields.
 * @throws MissingColumnError for the first role that is not a column
 */
export function assertColumns(schema: Schema, roles: FieldRoles): void {
  const columns = schema.fields.map((field) => field.name);
  if (columns.length === 0) return;

  for (const field of [roles.subjectField, roles.timeField, roles.valueField]) {
    if (!columns.includes(field)) {
      throw new MissingColumnError(field, schema.name, columns);
    }
  }
}

/**
 * Check that every row owns the three role fields.
 * @throws SchemaError for the first missing field
 */
export function assertFields(records: readonly DataRecord[], roles: FieldRoles): void {
  const fields = [roles.subjectField, roles.timeField, roles.valueField];
  records.forEach((record, rowIndex) => {
    for (const field of fields) {
      if (!hasField(record, field)) {
        throw new SchemaError(field, rowIndex);
      }
    }
  });
}

/**
 * Project and coerce rows. Assumes assertFields has passed.
 * @throws TypeCoercionError naming the first offending cell
 */
export function toObservations(
  records: readonly DataRecord[],
  roles: FieldRoles
): Observation[] {
  return records.map((record, index) => {
    const rawSubject = record[roles.subjectField];
    const subject = toSubjectId(rawSubject);
    if (subject === null) {
      throw new TypeCoercionError(roles.subjectField, index, rawSubject, 'subject');
    }

    const rawTime = record[roles.timeField];
    const time = toNumeric(rawTime);
    if (time === null) {
      throw new TypeCoercionError(roles.timeField, index, rawTime, 'number');
    }

    const rawValue = record[roles.valueField];
    const value = toNumeric(rawValue);
    if (value === null) {
      throw new TypeCoercionError(roles.valueField, index, rawValue, 'number');
    }

    return { subject, time, value, index };
  });
}

/**
 * Ascending time; missing (NaN) times go last. Ties compare equal so the
 * stable sort keeps input order.
 */
export function compareTime(a: Observation, b: Observation): number {
  const aMissing = Number.isNaN(a.time);
  const bMissing = Number.isNaN(b.time);
  if (aMissing || bMissing) {
    return Number(aMissing) - Number(bMissing);
  }
  return a.time < b.time ? -1 : a.time > b.time ? 1 : 0;
}

/** booleans, then numbers and bigints, then dates, then strings */
function subjectRank(subject: SubjectId): number {
  if (typeof subject === 'boolean') return 0;
  if (typeof subject === 'number' || typeof subject === 'bigint') return 1;
  if (subject instanceof Date) return 2;
  return 3;
}

/**
 * Order subjects by kind, then by value: false before true, numbers and
 * bigints numerically, dates chronologically, strings by code unit.
 * A number sorts before an equal bigint.
 */
export function compareSubjects(a: SubjectId, b: SubjectId): number {
  const rankDiff = subjectRank(a) - subjectRank(b);
  if (rankDiff !== 0) return rankDiff;

  const left = subjectKey(a);
  const right = subjectKey(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return Number(typeof left === 'bigint') - Number(typeof right === 'bigint');
}

interface SubjectGroup {
  subject: SubjectId;
  observations: Observation[];
}

/**
 * Group observations by subject, each group sorted by time, groups sorted by subject
 */
export function groupBySubject(observations: readonly Observation[]): SubjectSeries[] {
  const groups = new Map<SubjectKey, SubjectGroup>();
  // Kept apart so a date never shares a group with the number of its epoch ms
  const dateGroups = new Map<SubjectKey, SubjectGroup>();

  for (const observation of observations) {
    const target = observation.subject instanceof Date ? dateGroups : groups;
    const key = subjectKey(observation.subject);
    const group = target.get(key);
    if (group) {
      group.observations.push(observation);
    } else {
      target.set(key, { subject: observation.subject, observations: [observation] });
    }
  }

  return [...groups.values(), ...dateGroups.values()]
    .map(({ subject, observations: group }) => ({
      subject,
      observations: group.sort(compareTime),
    }))
    .sort((a, b) => compareSubjects(a.subject, b.subject));
}
