import { leadingIndentation, indentationLevel } from './document.js';
import { contributes, OPEN_BRACKETS, CLOSE_BRACKETS, type Token } from './tokens.js';
import type { Column, Locatable, Position } from './types.js';

export class PhysicalLine implements Locatable {
  readonly text: string;
  readonly lineNumber: number;

  constructor(text: string, lineNumber = 1) {
    this.text = text;
    this.lineNumber = lineNumber;
  }

  locate(column: Column | undefined): Position {
    if (column === undefined) return { row: this.lineNumber, column: 0 };
    if (typeof column === 'number') return { row: this.lineNumber, column };
    return column;
  }
}

export interface OffsetMapping {
  // Length of the logical text before this token's contribution
  offset: number;
  token: Token;
}

/**
 * Replace string contents with 'x' so rule patterns cannot match inside
 * literals. Prefix letters, quotes and length are kept.
 *
 *   muteString('"abc"') === '"xxx"'
 *   muteString("r'''abc'''") === "r'''xxx'''"
 */
export function muteString(text: string): string {
  let start = 1;
  let end = text.length - 1;
  if (text.endsWith('"')) start += text.indexOf('"');
  else if (text.endsWith("'")) start += text.indexOf("'");
  if (text.endsWith('"""') || text.endsWith("'''")) {
    start += 2;
    end -= 2;
  }
  if (end <= start) return text;
  return text.slice(0, start) + 'x'.repeat(end - start) + text.slice(end);
}

const EDGE_WHITESPACE = /^[ \t\f\v\r\n]|[ \t\f\v\r\n]$/;

/**
 * Build the normalized text of one statement and the offset of every token
 * that contributed to it. Returns undefined when no token contributes.
 */
export function buildLogicalLine(
  tokens: readonly Token[],
  lines: readonly string[],
): { text: string; mapping: OffsetMapping[] } | undefined {
  const lineAt = (row: number) => lines[row - 1] ?? '';
  const parts: string[] = [];
  const relative: OffsetMapping[] = [];
  let length = 0;
  let previous: Token | undefined;

  for (const token of tokens) {
    if (!contributes(token)) continue;
    const text = token.kind === 'STRING' ? muteString(token.text) : token.text;
    if (previous) {
      const { row: endRow, column: endColumn } = previous.end;
      const { row: startRow, column: startColumn } = token.start;
      if (endRow !== startRow) {
        const before = lineAt(endRow)[endColumn - 1] ?? '';
        // No padding inside an empty bracket pair broken across lines; a
        // trailing comma always gets its space.
        if (before === ',' || (!OPEN_BRACKETS.includes(before) && !CLOSE_BRACKETS.includes(text))) {
          parts.push(' ');
          length += 1;
        }
      } else if (endColumn !== startColumn) {
        const fill = lineAt(endRow).slice(endColumn, startColumn);
        parts.push(fill);
        length += fill.length;
      }
    }
    relative.push({ offset: length, token });
    parts.push(text);
    length += text.length;
    previous = token;
  }

  const first = relative[0];
  if (!first) return undefined;

  const body = parts.join('');
  if (EDGE_WHITESPACE.test(body)) {
    throw new Error(`Logical line at row ${first.token.start.row} has surrounding whitespace`);
  }

  const firstLine = lineAt(first.token.start.row);
  const indent = leadingIndentation(firstLine.slice(0, first.token.start.column));
  const mapping = relative.map(({ offset, token }) => ({ offset: offset + indent.length, token }));
  return { text: indent + body, mapping };
}

export interface LogicalLineInit {
  text: string;
  lineNumber?: number;
  tokens?: readonly Token[];
  mapping?: readonly OffsetMapping[];
  blankLinesBefore?: number;
  blankLinesBeforeComment?: number;
}

/** One reconstructed statement. */
export class LogicalLine implements Locatable {
  readonly text: string;
  readonly lineNumber: number;
  readonly indentLevel: number;
  readonly dedentedText: string;
  readonly blankLinesBefore: number;
  readonly blankLinesBeforeComment: number;
  readonly mapping: readonly OffsetMapping[];
  readonly tokens: readonly Token[];

  constructor(init: LogicalLineInit) {
    const indentation = leadingIndentation(init.text);
    this.text = init.text;
    this.lineNumber = init.lineNumber ?? 1;
    this.indentLevel = indentationLevel(indentation);
    this.dedentedText = init.text.slice(indentation.length);
    this.blankLinesBefore = init.blankLinesBefore ?? 0;
    this.blankLinesBeforeComment = init.blankLinesBeforeComment ?? 0;
    this.mapping = init.mapping ?? [];
    this.tokens = init.tokens ?? [];
  }

  /**
   * Absolute position of a reported column. Offsets resolve through the last
   * mapping entry at or before them, so positions inside inserted filler land
   * relative to the preceding token.
   */
  locate(column: Column | undefined): Position {
    if (column === undefined) return { row: this.lineNumber, column: 0 };
    if (typeof column !== 'number') return column;
    let found: OffsetMapping | undefined;
    for (const entry of this.mapping) {
      if (entry.offset > column) break;
      found = entry;
    }
    if (!found) {
      const row = this.mapping[0]?.token.start.row ?? this.lineNumber;
      return { row, column };
    }
    return {
      row: found.token.start.row,
      column: found.token.start.column + column - found.offset,
    };
  }
}

// Fields of the previous statement the orchestrator carries forward
export type PreviousLogicalLine = Pick<LogicalLine, 'text' | 'dedentedText' | 'indentLevel' | 'lineNumber'>;

export function snapshot(line: LogicalLine): PreviousLogicalLine {
  return {
    text: line.text,
    dedentedText: line.dedentedText,
    indentLevel: line.indentLevel,
    lineNumber: line.lineNumber,
  };
}
