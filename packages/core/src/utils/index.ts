export { extractFieldNames, hasField, FORBIDDEN_RECORD_KEYS, isForbiddenKey } from './records.js';
