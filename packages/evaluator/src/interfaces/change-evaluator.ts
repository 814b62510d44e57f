/**
 * Change Evaluator Interface
 */

import type { IConnector } from '@longflag/core';
import type { ChangeReport, EvaluateOptions } from '../types/index.js';

export interface IChangeEvaluator {
  /**
   * Read every row of a connected source and evaluate it.
   *
   * @param connector - A connected table reader
   * @param options - Field roles, threshold and method
   * @returns Report with the change rows and summary counts
   */
  evaluateConnector(connector: IConnector, options: EvaluateOptions): Promise<ChangeReport>;
}
