import type { IToken, ILexingError } from 'chevrotain';
import { tokenizeLine } from './lexer.js';
import { StructuralError } from '../core/errors.js';
import { splitLines } from '../core/document.js';
import { OPEN_BRACKETS, CLOSE_BRACKETS, type Token, type TokenKind } from '../core/tokens.js';
import type { Position } from '../core/types.js';

/** Returns the next physical line including its terminator, or null at end of input. */
export type ReadLine = () => string | null;

interface OpenString {
  start: Position;
  text: string;
  sourceLines: string;
  // Matches the rest of the literal, closing delimiter included
  end: RegExp;
  // Single-quoted literal carried over by a trailing backslash
  continued: boolean;
}

const STRING_END: Record<string, RegExp> = {
  '"""': /^(?:[^"\\]|\\[\s\S]|"(?!""))*"""/,
  "'''": /^(?:[^'\\]|\\[\s\S]|'(?!''))*'''/,
  '"': /^(?:[^"\\\r\n]|\\[\s\S])*"/,
  "'": /^(?:[^'\\\r\n]|\\[\s\S])*'/,
};

const TRAILING_BACKSLASH = /\\(?:\r\n|\r|\n)$/;

const STRING_TOKENS = new Set(['TripleDoubleString', 'TripleSingleString', 'DoubleString', 'SingleString']);

interface Piece { offset: number; image: string; type: string }

function piecesOf(tokens: IToken[], errors: ILexingError[], chunk: string): Piece[] {
  const pieces: Piece[] = tokens.map((t) => ({ offset: t.startOffset, image: t.image, type: t.tokenType.name }));
  for (const e of errors) {
    pieces.push({ offset: e.offset, image: chunk.slice(e.offset, e.offset + e.length), type: 'Unknown' });
  }
  return pieces.sort((a, b) => a.offset - b.offset);
}

/**
 * Pull-based tokenizer over physical lines. Each call to `next()` reads at
 * most as many lines as it needs to produce the next token, so a caller's
 * `readLine` side effects interleave with token consumption.
 */
export class Tokenizer implements Iterator<Token>, Iterable<Token> {
  private readonly readLine: ReadLine;
  private readonly queue: Token[] = [];
  private readonly indents: number[] = [0];
  private row = 0;
  private parenDepth = 0;
  private continued = false;
  private open: OpenString | undefined;
  private statementOpen = false;
  private lastLine = '';
  private finished = false;

  constructor(readLine: ReadLine) {
    this.readLine = readLine;
  }

  [Symbol.iterator](): Iterator<Token> {
    return this;
  }

  next(): IteratorResult<Token> {
    while (this.queue.length === 0 && !this.finished) this.advance();
    const token = this.queue.shift();
    if (token === undefined) return { done: true, value: undefined };
    return { done: false, value: token };
  }

  private emit(kind: TokenKind, text: string, start: Position, end: Position, sourceLine: string) {
    if (kind === 'NEWLINE') this.statementOpen = false;
    else if (kind === 'NAME' || kind === 'NUMBER' || kind === 'OP' || kind === 'STRING' || kind === 'ERROR') this.statementOpen = true;
    this.queue.push({ kind, text, start, end, sourceLine });
  }

  private advance() {
    const line = this.readLine() ?? '';
    this.row++;
    if (line) this.lastLine = line;

    if (this.open) {
      this.continueString(line);
      return;
    }

    let pos = 0;
    if (this.parenDepth === 0 && !this.continued) {
      if (!line) {
        this.finish();
        return;
      }
      let column = 0;
      while (pos < line.length) {
        const ch = line[pos];
        if (ch === ' ') column++;
        else if (ch === '\t') column = Math.floor(column / 8) * 8 + 8;
        else if (ch === '\f') column = 0;
        else break;
        pos++;
      }
      // Unterminated whitespace-only final line
      if (pos === line.length) {
        this.finish();
        return;
      }

      const first = line[pos];
      if (first === '#' || first === '\r' || first === '\n') {
        let nlPos = pos;
        if (first === '#') {
          const comment = line.slice(pos).replace(/[\r\n]+$/, '');
          nlPos = pos + comment.length;
          this.emit('COMMENT', comment, { row: this.row, column: pos }, { row: this.row, column: nlPos }, line);
        }
        this.emit('NL', line.slice(nlPos), { row: this.row, column: nlPos }, { row: this.row, column: line.length }, line);
        return;
      }

      const top = this.indents[this.indents.length - 1] ?? 0;
      if (column > top) {
        this.indents.push(column);
        this.emit('INDENT', line.slice(0, pos), { row: this.row, column: 0 }, { row: this.row, column: pos }, line);
      } else if (column < top) {
        if (!this.indents.includes(column)) throw new StructuralError('inconsistent-dedent', this.row);
        while (column < (this.indents[this.indents.length - 1] ?? 0)) {
          this.indents.pop();
          this.emit('DEDENT', '', { row: this.row, column: pos }, { row: this.row, column: pos }, line);
        }
      }
    } else {
      if (!line) throw new StructuralError('unterminated-statement', Math.max(1, this.row - 1));
      this.continued = false;
    }

    this.scan(line, pos);
  }

  private scan(line: string, pos: number) {
    const chunk = line.slice(pos);
    const { tokens, errors } = tokenizeLine(chunk);
    for (const piece of piecesOf(tokens, errors, chunk)) {
      const column = pos + piece.offset;
      const start = { row: this.row, column };
      const end = { row: this.row, column: column + piece.image.length };
      switch (piece.type) {
        case 'Comment':
          this.emit('COMMENT', piece.image, start, end, line);
          break;
        case 'LineEnd':
          this.emit(this.parenDepth > 0 ? 'NL' : 'NEWLINE', piece.image, start, end, line);
          break;
        case 'Continuation':
          this.continued = true;
          break;
        case 'OpenTripleDouble':
        case 'OpenTripleSingle': {
          const quote = piece.type === 'OpenTripleDouble' ? '"""' : "'''";
          this.openString(line, start, quote, false);
          return;
        }
        case 'OpenDouble':
        case 'OpenSingle': {
          const quote = piece.type === 'OpenDouble' ? '"' : "'";
          this.openString(line, start, quote, true);
          return;
        }
        case 'NumberLiteral':
          this.emit('NUMBER', piece.image, start, end, line);
          break;
        case 'Name':
          this.emit('NAME', piece.image, start, end, line);
          break;
        case 'Operator':
          if (piece.image.length === 1 && OPEN_BRACKETS.includes(piece.image)) this.parenDepth++;
          else if (piece.image.length === 1 && CLOSE_BRACKETS.includes(piece.image)) this.parenDepth--;
          this.emit('OP', piece.image, start, end, line);
          break;
        default:
          if (STRING_TOKENS.has(piece.type)) this.emit('STRING', piece.image, start, end, line);
          else this.emit('ERROR', piece.image, start, end, line);
      }
    }
  }

  private openString(line: string, start: Position, quote: string, continued: boolean) {
    const end = STRING_END[quote];
    if (!end) throw new Error(`No terminator pattern for ${quote}`);
    this.open = { start, text: line.slice(start.column), sourceLines: line, end, continued };
  }

  private continueString(line: string) {
    const open = this.open;
    if (!open) return;
    if (!line) throw new StructuralError('unterminated-string', open.start.row);

    const m = open.end.exec(line);
    if (m) {
      const endColumn = m[0].length;
      this.open = undefined;
      this.emit('STRING', open.text + line.slice(0, endColumn), open.start, { row: this.row, column: endColumn }, open.sourceLines + line);
      this.scan(line, endColumn);
      return;
    }
    if (open.continued && !TRAILING_BACKSLASH.test(line)) {
      // Single-quoted literal never closed: surface it as an error token and
      // let the terminator end the line as usual.
      const body = line.replace(/[ \t\f\v]*[\r\n]*$/, '');
      this.open = undefined;
      this.emit('ERROR', open.text + body, open.start, { row: this.row, column: body.length }, open.sourceLines + line);
      this.scan(line, body.length);
      return;
    }
    open.text += line;
    open.sourceLines += line;
  }

  private finish() {
    if (this.statementOpen) {
      // Last statement had no line terminator
      const row = Math.max(1, this.row - 1);
      const at = { row, column: this.lastLine.length };
      this.emit('NEWLINE', '', at, at, this.lastLine);
    }
    const at = { row: this.row, column: 0 };
    for (let i = 1; i < this.indents.length; i++) this.emit('DEDENT', '', at, at, '');
    this.indents.length = 1;
    this.emit('ENDMARKER', '', at, at, '');
    this.finished = true;
  }
}

/** Tokenize a whole source text. */
export function tokenize(text: string): Token[] {
  const lines = splitLines(text);
  let index = 0;
  return [...new Tokenizer(() => lines[index++] ?? null)];
}
