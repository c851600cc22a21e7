import { describe, it, expect } from 'vitest';
import {
  Document,
  indentationLevel,
  leadingIndentation,
  lineEnding,
  mostCommonIndentChar,
  mostCommonLineEnding,
  rstripNewlines,
  splitLines,
} from '../src/core/document.js';

describe('string helpers', () => {
  it('takes the leading run of spaces and tabs', () => {
    expect(leadingIndentation('   abc')).toBe('   ');
    expect(leadingIndentation(' abc ')).toBe(' ');
    expect(leadingIndentation('\tabc')).toBe('\t');
    expect(leadingIndentation(' \t \t abc  \t\t  def  ')).toBe(' \t \t ');
    expect(leadingIndentation('')).toBe('');
    expect(leadingIndentation('a bcdef', 'ab ')).toBe('a b');
  });

  it('strips newline, carriage return and form feed from the end', () => {
    expect(rstripNewlines('abc')).toBe('abc');
    expect(rstripNewlines('')).toBe('');
    expect(rstripNewlines('abc\n')).toBe('abc');
    expect(rstripNewlines('abc\r')).toBe('abc');
    expect(rstripNewlines('abc\f')).toBe('abc');
    expect(rstripNewlines('abc\r\f\n')).toBe('abc');
  });

  it('returns the terminator of a line', () => {
    expect(lineEnding('\n')).toBe('\n');
    expect(lineEnding('abc \n')).toBe('\n');
    expect(lineEnding('')).toBe('');
    expect(lineEnding('abc \r')).toBe('\r');
    expect(lineEnding('abc \r\n')).toBe('\r\n');
  });

  it('expands tabs to the next multiple of eight', () => {
    expect(indentationLevel('    ')).toBe(4);
    expect(indentationLevel('\t')).toBe(8);
    expect(indentationLevel('    \t')).toBe(8);
    expect(indentationLevel('       \t')).toBe(8);
    expect(indentationLevel('        \t')).toBe(16);
    expect(indentationLevel('  x  ')).toBe(2);
  });

  it('splits lines keeping every terminator', () => {
    expect(splitLines('a\nb\r\nc\rd')).toEqual(['a\n', 'b\r\n', 'c\r', 'd']);
    expect(splitLines('a\n\n')).toEqual(['a\n', '\n']);
    expect(splitLines('')).toEqual([]);
  });
});

describe('Document', () => {
  it('picks the majority indentation character', () => {
    expect(mostCommonIndentChar([' a', ' b', ' c'])).toBe(' ');
    expect(mostCommonIndentChar([' a', ' b', '\tc'])).toBe(' ');
    expect(mostCommonIndentChar([' a', '\tb', '\tc'])).toBe('\t');
  });

  it('prefers a space when indentation characters tie', () => {
    expect(mostCommonIndentChar([])).toBe(' ');
    expect(mostCommonIndentChar(['  a', '\tb', '\tc'])).toBe(' ');
  });

  it('picks the majority line ending', () => {
    expect(mostCommonLineEnding(['a\n', 'a\n', 'a\n'])).toBe('\n');
    expect(mostCommonLineEnding(['a\n', 'b\n', 'c\r\n'])).toBe('\n');
    expect(mostCommonLineEnding(['a\n', 'b\r\n', 'c\r\n'])).toBe('\r\n');
  });

  it('prefers \\n on a tie and makes no determination without terminators', () => {
    expect(mostCommonLineEnding(['a\n', 'b\r\n'])).toBe('\n');
    expect(mostCommonLineEnding([])).toBeNull();
    expect(mostCommonLineEnding(['abc'])).toBeNull();
  });

  it('is built once from text', () => {
    const doc = Document.fromText('if x:\n\ty = 1\n\tz = 2\n');
    expect(doc.lineCount).toBe(3);
    expect(doc.indentChar).toBe('\t');
    expect(doc.lineEnding).toBe('\n');
    expect(doc.line(2)).toBe('\ty = 1\n');
    expect(doc.line(9)).toBe('');
    expect(doc.text).toBe('if x:\n\ty = 1\n\tz = 2\n');
    expect(Object.isFrozen(doc.lines)).toBe(true);
  });
});
