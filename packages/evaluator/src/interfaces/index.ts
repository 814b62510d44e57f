export type { IChangeEvaluator } from './change-evaluator.js';
