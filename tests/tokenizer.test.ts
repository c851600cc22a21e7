import { describe, it, expect } from 'vitest';
import { Tokenizer, tokenize } from '../src/python/tokenizer.js';
import { StructuralError } from '../src/core/errors.js';
import type { Token } from '../src/core/tokens.js';

type Row = [string, string, number, number, number, number];

function rows(tokens: Token[]): Row[] {
  return tokens.map((t) => [t.kind, t.text, t.start.row, t.start.column, t.end.row, t.end.column]);
}

function structuralErrorOf(text: string): StructuralError | undefined {
  try {
    tokenize(text);
  } catch (e) {
    if (e instanceof StructuralError) return e;
    throw e;
  }
  return undefined;
}

describe('Tokenizer', () => {
  it('emits INDENT, NEWLINE and a closing DEDENT', () => {
    expect(rows(tokenize("if x:\n    y = 'a'\n"))).toEqual([
      ['NAME', 'if', 1, 0, 1, 2],
      ['NAME', 'x', 1, 3, 1, 4],
      ['OP', ':', 1, 4, 1, 5],
      ['NEWLINE', '\n', 1, 5, 1, 6],
      ['INDENT', '    ', 2, 0, 2, 4],
      ['NAME', 'y', 2, 4, 2, 5],
      ['OP', '=', 2, 6, 2, 7],
      ['STRING', "'a'", 2, 8, 2, 11],
      ['NEWLINE', '\n', 2, 11, 2, 12],
      ['DEDENT', '', 3, 0, 3, 0],
      ['ENDMARKER', '', 3, 0, 3, 0],
    ]);
  });

  it('emits NL instead of NEWLINE inside brackets', () => {
    expect(rows(tokenize('f(a,\n  b)\n'))).toEqual([
      ['NAME', 'f', 1, 0, 1, 1],
      ['OP', '(', 1, 1, 1, 2],
      ['NAME', 'a', 1, 2, 1, 3],
      ['OP', ',', 1, 3, 1, 4],
      ['NL', '\n', 1, 4, 1, 5],
      ['NAME', 'b', 2, 2, 2, 3],
      ['OP', ')', 2, 3, 2, 4],
      ['NEWLINE', '\n', 2, 4, 2, 5],
      ['ENDMARKER', '', 3, 0, 3, 0],
    ]);
  });

  it('closes an unterminated last statement with an empty NEWLINE', () => {
    expect(rows(tokenize('x = 1'))).toEqual([
      ['NAME', 'x', 1, 0, 1, 1],
      ['OP', '=', 1, 2, 1, 3],
      ['NUMBER', '1', 1, 4, 1, 5],
      ['NEWLINE', '', 1, 5, 1, 5],
      ['ENDMARKER', '', 2, 0, 2, 0],
    ]);
  });

  it('gives comment-only and blank lines COMMENT and NL', () => {
    expect(rows(tokenize('# hi\n\nx\n'))).toEqual([
      ['COMMENT', '# hi', 1, 0, 1, 4],
      ['NL', '\n', 1, 4, 1, 5],
      ['NL', '\n', 2, 0, 2, 1],
      ['NAME', 'x', 3, 0, 3, 1],
      ['NEWLINE', '\n', 3, 1, 3, 2],
      ['ENDMARKER', '', 4, 0, 4, 0],
    ]);
  });

  it('spans a triple-quoted string across lines', () => {
    const tokens = tokenize('x = """a\nb"""\n');
    expect(rows(tokens)).toEqual([
      ['NAME', 'x', 1, 0, 1, 1],
      ['OP', '=', 1, 2, 1, 3],
      ['STRING', '"""a\nb"""', 1, 4, 2, 4],
      ['NEWLINE', '\n', 2, 4, 2, 5],
      ['ENDMARKER', '', 3, 0, 3, 0],
    ]);
    expect(tokens[2]?.sourceLine).toBe('x = """a\nb"""\n');
  });

  it('joins a backslash continuation without a token', () => {
    expect(rows(tokenize('x = 1 + \\\n    2\n')).map((r) => r[0])).toEqual([
      'NAME', 'OP', 'NUMBER', 'OP', 'NUMBER', 'NEWLINE', 'ENDMARKER',
    ]);
    expect(rows(tokenize('x = 1 + \\\n    2\n'))[4]).toEqual(['NUMBER', '2', 2, 4, 2, 5]);
  });

  it('reports backticks as ERROR tokens', () => {
    expect(rows(tokenize('y = `x`\n')).slice(2, 5)).toEqual([
      ['ERROR', '`', 1, 4, 1, 5],
      ['NAME', 'x', 1, 5, 1, 6],
      ['ERROR', '`', 1, 6, 1, 7],
    ]);
  });

  it('reads the legacy inequality as one operator', () => {
    expect(tokenize('a <> b\n')[1]?.text).toBe('<>');
    expect(tokenize('a ** b\n')[1]?.text).toBe('**');
    expect(tokenize('a //= b\n')[1]?.text).toBe('//=');
  });

  it('keeps string prefixes on the literal', () => {
    expect(tokenize("s = r'\\d'\n")[2]?.text).toBe("r'\\d'");
    expect(tokenize("rb = 1\n")[0]?.text).toBe('rb');
  });

  it('emits one DEDENT per closed level', () => {
    const kinds = tokenize('if a:\n    if b:\n        c\nd\n').map((t) => t.kind);
    expect(kinds.filter((k) => k === 'DEDENT')).toHaveLength(2);
    expect(kinds.indexOf('DEDENT')).toBe(kinds.lastIndexOf('DEDENT') - 1);
  });

  it('pulls physical lines only as tokens are needed', () => {
    const lines = ['a\n', 'b\n'];
    let reads = 0;
    const tokenizer = new Tokenizer(() => {
      const line = lines[reads];
      if (line === undefined) return null;
      reads++;
      return line;
    });
    expect(tokenizer.next().value?.text).toBe('a');
    expect(reads).toBe(1);
    expect(tokenizer.next().value?.kind).toBe('NEWLINE');
    expect(reads).toBe(1);
    expect(tokenizer.next().value?.text).toBe('b');
    expect(reads).toBe(2);
  });

  describe('structural errors', () => {
    it('rejects a dedent to an unknown level', () => {
      const err = structuralErrorOf('if a:\n    b\n  c\n');
      expect(err?.kind).toBe('inconsistent-dedent');
      expect(err?.row).toBe(3);
    });

    it('rejects end of input inside brackets', () => {
      const err = structuralErrorOf('f(a,\n');
      expect(err?.kind).toBe('unterminated-statement');
      expect(err?.row).toBe(1);
      expect(err?.message).toBe('EOF in multi-line statement');
    });

    it('rejects end of input inside a triple-quoted string', () => {
      const err = structuralErrorOf('x = """abc\n');
      expect(err?.kind).toBe('unterminated-string');
      expect(err?.row).toBe(1);
    });
  });
});
