/**
 * Record types shared by readers and the evaluator
 */

/** Generic record type - one row of a long-format table */
export type Record = {
  [key: string]: unknown;
};

/** Result of reading a table */
export interface ReadResult {
  /** Rows in source order */
  records: Record[];
  /** Number of rows read */
  totalCount: number;
}
