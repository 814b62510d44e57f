export {
  EvaluationError,
  SchemaError,
  MissingColumnError,
  TypeCoercionError,
  InvalidMethodError,
  EmptyInputError,
} from './evaluation-error.js';
export type { EvaluationErrorCode, EvaluationErrorDetails } from './evaluation-error.js';
