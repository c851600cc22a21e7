import { describe, it, expect } from 'vitest';
import { MESSAGES, Report, renderMessage, severityOf, sourceFrame } from '../src/core/diagnostics.js';
import { PhysicalLine } from '../src/core/logical-line.js';
import { defaultRegistry } from '../src/rules/index.js';

describe('renderMessage', () => {
  it('fills placeholders from the context', () => {
    expect(renderMessage('E302', { blank_lines: 1 })).toBe('expected 2 blank lines, found 1');
    expect(renderMessage('E231', { char: ',' })).toBe("missing whitespace after ','");
  });

  it('leaves placeholders without a value as written', () => {
    expect(renderMessage('E501')).toBe('line too long ({line_length} characters)');
  });

  it('renders an unknown code as itself', () => {
    expect(renderMessage('E999')).toBe('E999');
  });

  it('has a template for every code a checker can emit', () => {
    const codes = defaultRegistry.all().flatMap((c) => c.codes);
    expect(codes.filter((code) => MESSAGES[code] === undefined)).toEqual([]);
    expect(codes).toHaveLength(36);
  });
});

describe('severityOf', () => {
  it('maps W codes to warnings and everything else to errors', () => {
    expect(severityOf('W291')).toBe('warning');
    expect(severityOf('E501')).toBe('error');
  });
});

describe('Report', () => {
  it('keeps one diagnostic per code and position', () => {
    const report = new Report();
    const origin = new PhysicalLine('x = 1  \n', 2);
    expect(report.add({ code: 'W291', column: 5, origin })).toEqual({
      code: 'W291',
      message: 'trailing whitespace',
      severity: 'warning',
      row: 2,
      column: 5,
    });
    expect(report.add({ code: 'W291', column: 5, origin })).toBeUndefined();
    expect(report.size).toBe(1);
  });

  it('counts codes for statistics', () => {
    const report = new Report();
    report.add({ code: 'W291', column: 5, origin: new PhysicalLine('', 3) });
    report.add({ code: 'E225', column: 1, origin: new PhysicalLine('', 1) });
    report.add({ code: 'W291', column: 2, origin: new PhysicalLine('', 4) });
    expect(report.codes()).toEqual(['W291', 'E225']);
    expect(report.hasCode('E225')).toBe(true);
    expect(report.byCode('W291').map((d) => d.row)).toEqual([3, 4]);
    expect(report.statistics()).toEqual([
      { code: 'E225', count: 1, message: 'missing whitespace around operator' },
      { code: 'W291', count: 2, message: 'trailing whitespace' },
    ]);
  });
});

describe('sourceFrame', () => {
  it('puts a caret under the column', () => {
    expect(sourceFrame('x = x*2\n', 5)).toBe('x = x*2\n     ^');
    expect(sourceFrame('x = 1  \r\n', 0)).toBe('x = 1\n^');
  });
});
