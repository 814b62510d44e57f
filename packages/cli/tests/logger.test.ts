import { describe, expect, it } from 'vitest';
import { Logger, serializeField } from '../src/logger.js';
import { EvaluationError } from '@longflag/evaluator';

function capture(): { lines: string[]; sink: (line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (line) => lines.push(line) };
}

describe('Logger', () => {
  it('writes text lines with key=value fields', () => {
    const { lines, sink } = capture();
    new Logger({ sink }).info('Source loaded', { file: 'scores.csv', rows: 9, note: 'two words' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO Source loaded file=scores\.csv rows=9 note="two words"\n$/
    );
  });

  it('drops records below the configured level', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ level: 'warn', sink });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines.map((line) => line.split(' ')[1])).toEqual(['WARN', 'ERROR']);
  });

  it('writes JSON lines with child fields', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ format: 'json', sink }).child({ source: 'scores' });

    logger.warn('Negative threshold', { threshold: -1 });

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0] ?? '');
    expect(record).toMatchObject({
      level: 'warn',
      msg: 'Negative threshold',
      source: 'scores',
      threshold: -1,
    });
  });
});

describe('Logger.child', () => {
  it('stacks bound fields and lets call fields override them', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ level: 'debug', sink })
      .child({ source: 'scores', method: 'first_last' })
      .child({ method: 'mean_change' });

    logger.debug('Source loaded', { source: 'visits' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ DEBUG Source loaded source=visits method=mean_change\n$/);
  });

  it('keeps the parent level and format', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ level: 'error', format: 'json', sink }).child({ source: 'scores' });

    logger.warn('dropped');
    logger.error('kept');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'error', msg: 'kept', source: 'scores' });
  });
});

describe('serializeField', () => {
  it('makes values JSON-safe', () => {
    expect(serializeField(Number.NaN)).toBe('NaN');
    expect(serializeField(10n)).toBe('10');
    expect(serializeField(new Error('boom'))).toEqual({ name: 'Error', message: 'boom' });
    expect(
      serializeField(new EvaluationError({ code: 'EMPTY_INPUT', message: 'no rows' }))
    ).toEqual({
      name: 'EvaluationError',
      code: 'EMPTY_INPUT',
      message: 'no rows',
      suggestion: undefined,
      context: undefined,
    });
  });
});
