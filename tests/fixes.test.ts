import { describe, it, expect } from 'vitest';
import { fixText } from '../src/index.js';
import { Document } from '../src/core/document.js';
import { applyEdits, insertAt, posToOffset } from '../src/core/edits.js';
import { computeFixes } from '../src/core/fixes.js';
import type { ResolvedDiagnostic } from '../src/core/types.js';

function diagnostic(code: string, row: number, column: number): ResolvedDiagnostic {
  return { code, message: '', severity: 'warning', row, column };
}

describe('posToOffset', () => {
  it('maps positions to offsets', () => {
    expect(posToOffset('ab\ncd\n', { row: 2, column: 1 })).toBe(4);
    expect(posToOffset('ab\ncd\n', { row: 1, column: 10 })).toBe(3);
    expect(posToOffset('ab\ncd\n', { row: 5, column: 0 })).toBe(6);
  });
});

describe('applyEdits', () => {
  it('applies edits from right to left', () => {
    const edits = [insertAt({ row: 1, column: 1 }, 'X'), insertAt({ row: 1, column: 3 }, 'Y')];
    expect(applyEdits('abc', edits)).toBe('aXbcY');
  });
});

describe('computeFixes', () => {
  it('removes trailing whitespace and keeps the terminator', () => {
    const document = Document.fromText('x = 1  \n');
    expect(computeFixes(document, [diagnostic('W291', 1, 5)])).toEqual([
      { start: { row: 1, column: 5 }, end: { row: 1, column: 7 }, newText: '' },
    ]);
  });

  it('drops trailing blank lines in one edit', () => {
    const document = Document.fromText('x = 1\n  \n');
    expect(computeFixes(document, [diagnostic('W293', 2, 0), diagnostic('W391', 2, 0)])).toEqual([
      { start: { row: 2, column: 0 }, end: { row: 3, column: 0 }, newText: '' },
    ]);
  });

  it('leaves codes without a fix alone', () => {
    expect(computeFixes(Document.fromText('x=1\n'), [diagnostic('E225', 1, 1)])).toEqual([]);
  });
});

describe('fixText', () => {
  it('cleans trailing whitespace and blank lines', () => {
    expect(fixText('x = 1  \ny = 2\n\n\n')).toEqual({ fixed: 'x = 1\ny = 2\n', diagnostics: [] });
  });

  it('adds the dominant line ending to the last line', () => {
    expect(fixText('x = 1').fixed).toBe('x = 1\n');
    expect(fixText('a = 1\r\nb = 2').fixed).toBe('a = 1\r\nb = 2\r\n');
  });

  it('empties whitespace-only lines', () => {
    expect(fixText('if a:\n    \n    b = 1\n').fixed).toBe('if a:\n\n    b = 1\n');
  });

  it('reports what it cannot fix', () => {
    const { fixed, diagnostics } = fixText('x=1 \n');
    expect(fixed).toBe('x=1\n');
    expect(diagnostics.map((d) => `${d.code}@${d.row}:${d.column}`)).toEqual(['E225@1:1']);
  });
});
