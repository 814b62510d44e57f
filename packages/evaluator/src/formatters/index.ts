export { formatChangeReport } from './report-formatter.js';
export { OUTPUT_COLUMNS, toOutputRow, toOutputTable } from './table.js';
export { describeRow, formatNumber, formatSubject, isFirstLastRow, isTimepointRow } from './utils.js';
