/**
 * Change Evaluator facade
 *
 * Connects the evaluator to table readers and wraps the rows in a report.
 */

import { randomUUID } from 'node:crypto';
import type { IConnector, Record as DataRecord } from '@longflag/core';
import type { IChangeEvaluator } from '../interfaces/index.js';
import type {
  ChangeReport,
  ChangeRow,
  ChangeSummary,
  EvaluateOptions,
  SourceInfo,
} from '../types/index.js';
import { EvaluationError } from '../errors/index.js';
import { parseEvaluateOptions } from '../validation/index.js';
import { runEvaluation } from './evaluate.js';
import { assertColumns } from './normalize.js';

/**
 * Count result rows by flag state
 */
export function summarizeRows(
  rows: readonly ChangeRow[]
): Pick<ChangeSummary, 'rowCount' | 'flaggedCount' | 'undeterminedCount'> {
  return {
    rowCount: rows.length,
    flaggedCount: rows.filter((row) => row.flagged === true).length,
    undeterminedCount: rows.filter((row) => row.flagged === null).length,
  };
}

/**
 * Evaluate in-memory records and build a report
 */
export function buildChangeReport(
  records: readonly DataRecord[],
  options: EvaluateOptions,
  source: SourceInfo
): ChangeReport {
  const startTime = Date.now();
  const { rows, subjectCount } = runEvaluation(records, options);

  return {
    id: randomUUID(),
    timestamp: new Date(),
    source,
    method: options.method,
    threshold: options.threshold,
    fields: {
      subject: options.subjectField,
      time: options.timeField,
      value: options.valueField,
    },
    summary: {
      inputRecordCount: records.length,
      subjectCount,
      ...summarizeRows(rows),
    },
    rows,
    processingTimeMs: Date.now() - startTime,
  };
}

export class ChangeEvaluator implements IChangeEvaluator {
  async evaluateConnector(
    connector: IConnector,
    options: EvaluateOptions
  ): Promise<ChangeReport> {
    if (connector.state !== 'connected') {
      throw new EvaluationError({
        code: 'CONNECTOR_NOT_CONNECTED',
        message: `Connector '${connector.config.id}' is not connected (state: ${connector.state})`,
        suggestion: 'Call connect() on the connector before evaluating it.',
      });
    }

    const validated = parseEvaluateOptions(options);
    assertColumns(await connector.getSchema(), validated);

    const { records } = await connector.readRecords();

    return buildChangeReport(records, validated, {
      id: connector.config.id,
      name: connector.config.name,
      type: connector.config.type,
    });
  }
}
