export {
  CHANGE_METHODS,
  ChangeMethods,
  changeMethodSchema,
  evaluateOptionsSchema,
  isChangeMethod,
  parseEvaluateOptions,
} from './options.js';
export type { EvaluateOptionsInput } from './options.js';
