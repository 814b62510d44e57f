/**
 * Change Report Types
 */

import type { ChangeMethod, ChangeRow } from './evaluation.js';

/** Where the evaluated table came from */
export interface SourceInfo {
  id: string;
  name: string;
  type: string;
}

/** Summary statistics for a change report */
export interface ChangeSummary {
  inputRecordCount: number;
  subjectCount: number;
  rowCount: number;
  flaggedCount: number;
  /** Rows whose change is undefined (flagged is null) */
  undeterminedCount: number;
}

/** Complete change evaluation report */
export interface ChangeReport {
  /** Unique report ID */
  id: string;
  /** Report generation timestamp */
  timestamp: Date;
  source: SourceInfo;
  method: ChangeMethod;
  threshold: number;
  fields: {
    subject: string;
    time: string;
    value: string;
  };
  summary: ChangeSummary;
  rows: ChangeRow[];
  /** Processing time in milliseconds */
  processingTimeMs: number;
}
