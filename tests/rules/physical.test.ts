import { describe, it, expect } from 'vitest';
import { check, run } from './check.js';
import {
  maximumLineLength,
  missingNewline,
  tabsObsolete,
  tabsOrSpaces,
  trailingBlankLines,
  trailingWhitespace,
} from '../../src/rules/index.js';

describe('tabs_or_spaces', () => {
  it('reports the first indentation character that differs from the file', () => {
    expect(check(tabsOrSpaces, 'if a:\n  \tb = 1\n')).toEqual(['E101@2:2']);
  });

  it('accepts consistent indentation', () => {
    expect(check(tabsOrSpaces, 'if a:\n    b = 1\n')).toEqual([]);
    expect(check(tabsOrSpaces, 'if a:\n\tb = 1\n')).toEqual([]);
  });
});

describe('tabs_obsolete', () => {
  it('reports a tab in the indentation', () => {
    expect(check(tabsObsolete, 'if a:\n\tb = 1\n')).toEqual(['W191@2:0']);
  });

  it('ignores tabs after the indentation', () => {
    expect(check(tabsObsolete, 'a = 1\t# c\n')).toEqual([]);
  });
});

describe('trailing_whitespace', () => {
  it('reports trailing spaces after code at the first trailing column', () => {
    expect(check(trailingWhitespace, 'x = 1 \n')).toEqual(['W291@1:5']);
    expect(check(trailingWhitespace, 'x = 1\t\r\n')).toEqual(['W291@1:5']);
  });

  it('reports a whitespace-only line under its own code', () => {
    expect(check(trailingWhitespace, 'if a:\n    \n    b = 1\n')).toEqual(['W293@2:0']);
  });

  it('accepts clean lines', () => {
    expect(check(trailingWhitespace, 'x = 1\r\ny = 2\r\n')).toEqual([]);
  });
});

describe('trailing_blank_lines', () => {
  it('reports a blank last line', () => {
    expect(check(trailingBlankLines, 'x = 1\n\n')).toEqual(['W391@2:0']);
  });

  it('reports an unterminated whitespace-only last line', () => {
    expect(check(trailingBlankLines, 'x = 1\n    ')).toEqual(['W391@2:0']);
  });

  it('accepts blank lines before the end', () => {
    expect(check(trailingBlankLines, 'x = 1\n\ny = 2\n')).toEqual([]);
  });
});

describe('missing_newline', () => {
  it('reports a last line without terminator at its end', () => {
    expect(check(missingNewline, 'x = 1')).toEqual(['W292@1:5']);
  });

  it('accepts a terminated last line', () => {
    expect(check(missingNewline, 'x = 1\n')).toEqual([]);
  });
});

describe('maximum_line_length', () => {
  it('reports at the limit with the actual length', () => {
    const line = `x = '${'a'.repeat(74)}'\n`;
    expect(run(maximumLineLength, line).map((d) => [d.code, d.row, d.column, d.message])).toEqual([
      ['E501', 1, 79, 'line too long (80 characters)'],
    ]);
  });

  it('does not count trailing whitespace', () => {
    const line = `x = '${'a'.repeat(73)}'   \n`;
    expect(check(maximumLineLength, line)).toEqual([]);
  });

  it('counts code points rather than UTF-16 units', () => {
    const line = `s = '${'\u{1F600}'.repeat(6)}'\n`;
    expect(check(maximumLineLength, line, { maxLineLength: 12 })).toEqual([]);
    expect(run(maximumLineLength, line, { maxLineLength: 11 }).map((d) => d.message)).toEqual([
      'line too long (12 characters)',
    ]);
  });
});
