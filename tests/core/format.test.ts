import { describe, expect, it } from 'vitest';
import { textReport, toJsonResult } from '../../src/core/format.js';
import type { Diagnostic } from '../../src/core/types.js';

const RED = '\x1b[31m';
const RESET = '\x1b[0m';

describe('textReport', () => {
  it('prints Valid when there is nothing to report', () => {
    expect(textReport('f', 'x', [])).toBe('Valid');
  });

  it('prints model errors without a snippet', () => {
    const errors: Diagnostic[] = [{ line: 1, column: 1, message: 'boom', severity: 'error', code: 'MO-MODEL' }];
    expect(textReport('f', '{"name": "m"}', errors)).toBe(`${RED}error${RESET}[MO-MODEL]: boom\nat f:1:1\n`);
  });

  it('points at expression errors with a caret and hint', () => {
    const errors: Diagnostic[] = [
      { line: 1, column: 3, message: 'm', severity: 'error', code: 'EX-UNEXPECTED-END', hint: 'h1\nh2' },
    ];
    expect(textReport('f', 'a +\nb', errors)).toBe(
      [
        `${RED}error${RESET}[EX-UNEXPECTED-END]: m`,
        'at f:1:3',
        '  1 | a +',
        `    |   ${RED}^${RESET}`,
        '  2 | b',
        'hint: h1',
        '  h2',
        '',
      ].join('\n')
    );
  });

  it('labels warnings and shows no snippet for schema errors', () => {
    const errors: Diagnostic[] = [
      { line: 1, column: 1, message: 'at name: Required', severity: 'error', code: 'IN-SCHEMA' },
      { line: 2, column: 1, message: 'w', severity: 'warning' },
    ];
    expect(textReport('f', '{\n}', errors)).toBe(
      [
        `${RED}error${RESET}[IN-SCHEMA]: at name: Required`,
        'at f:1:1',
        '',
        `\x1b[33mwarning${RESET}: w`,
        'at f:2:1',
        '  1 | {',
        '  2 | }',
        `    | ${RED}^${RESET}`,
        '',
      ].join('\n')
    );
  });

  it('drops a generic error next to a specific one', () => {
    const errors: Diagnostic[] = [
      { line: 1, column: 3, message: 'generic', severity: 'error', code: 'EX-UNEXPECTED' },
      { line: 1, column: 4, message: 'specific', severity: 'error', code: 'EX-MISSING-RPAREN' },
    ];
    const [first] = textReport('f', '(a +', errors).split('\n');
    expect(first).toBe(`${RED}error${RESET}[EX-MISSING-RPAREN]: specific`);
  });
});

describe('toJsonResult', () => {
  it('reports a failed compile with its diagnostics in order', () => {
    const schema: Diagnostic = { line: 1, column: 1, message: 'bad name', severity: 'error', code: 'IN-SCHEMA' };
    const model: Diagnostic = { line: 1, column: 1, message: 'dup', severity: 'error', code: 'MO-MODEL' };
    expect(toJsonResult('robot.model.json', [schema, model])).toEqual({
      file: 'robot.model.json',
      valid: false,
      errorCount: 2,
      errors: [schema, model],
    });
  });

  it('is valid without diagnostics', () => {
    expect(toJsonResult('robot.model.json', [])).toEqual({ file: 'robot.model.json', valid: true, errorCount: 0, errors: [] });
  });
});
