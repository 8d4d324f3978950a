import { describe, it, expect } from 'vitest';
import { textReport, toDiagramJson, toJsonResult } from './format.js';
import type { ValidationError } from './types.js';

const source = 'erDiagram\nA |{--|| B : x';

describe('textReport', () => {
  it('prints a positioned error with a snippet and hint', () => {
    const errors: ValidationError[] = [
      { line: 2, column: 3, length: 2, message: 'bad cardinality', severity: 'error', code: 'ER-X', hint: 'fix it' },
    ];
    expect(textReport('d.mmd', source, errors, false)).toBe(
      [
        'ERROR: bad cardinality',
        'at d.mmd:2:3 (ER-X)',
        '1 | erDiagram',
        '2 | A |{--|| B : x',
        '  |   ^^',
        'hint: fix it',
      ].join('\n')
    );
  });

  it('prints layout errors without a position', () => {
    const errors: ValidationError[] = [{ line: 1, column: 1, message: 'too wide', severity: 'error', code: 'TOO_WIDE' }];
    expect(textReport('d.mmd', source, errors, false)).toBe('ERROR: too wide\nin d.mmd (TOO_WIDE)');
  });

  it('lists errors before warnings', () => {
    const errors: ValidationError[] = [
      { line: 1, column: 1, message: 'later', severity: 'warning', code: 'LATE' },
      { line: 1, column: 1, message: 'first', severity: 'error', code: 'FIRST' },
    ];
    const report = textReport('d.mmd', source, errors, false).split('\n');
    expect(report[0]).toBe('ERROR: first');
    expect(report[3]).toBe('WARNING: later');
  });

  it('colours the severity when asked', () => {
    const errors: ValidationError[] = [{ line: 1, column: 1, message: 'm', severity: 'warning', code: 'W' }];
    expect(textReport('d.mmd', source, errors).split('\n')[0]).toBe('\x1b[33mWARNING\x1b[0m: m');
  });
});

describe('JSON results', () => {
  it('drops the output of a failed diagram and counts diagnostics', () => {
    const warning: ValidationError = { line: 2, column: 1, message: 'w', severity: 'warning' };
    const error: ValidationError = { line: 3, column: 1, message: 'e', severity: 'error' };
    const good = toDiagramJson('flowchart', 1, 'drawing', [warning]);
    const bad = toDiagramJson('er', 5, '', [error]);
    expect(good).toEqual({ type: 'flowchart', line: 1, ok: true, output: 'drawing', errors: [], warnings: [warning] });
    expect(bad).toEqual({ type: 'er', line: 5, ok: false, errors: [error], warnings: [] });
    expect(toJsonResult('doc.md', [good, bad])).toMatchObject({
      file: 'doc.md',
      ok: false,
      diagramCount: 2,
      errorCount: 1,
      warningCount: 1,
    });
  });
});
