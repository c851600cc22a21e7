import { splitLines } from './document.js';
import type { Position, TextEdit } from './types.js';

/** Offset of a row/column position; rows past the end map to the end of the text. */
export function posToOffset(text: string, pos: Position): number {
  const lines = splitLines(text);
  if (pos.row > lines.length) return text.length;
  let off = 0;
  for (let i = 0; i < pos.row - 1; i++) off += lines[i]?.length ?? 0;
  const line = lines[Math.max(0, pos.row - 1)] ?? '';
  return off + Math.min(line.length, Math.max(0, pos.column));
}

export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  if (edits.length === 0) return text;
  // Right to left so earlier offsets stay valid
  type Edit = { startOff: number; endOff: number; newText: string };
  const offs: Edit[] = edits
    .map((e) => {
      const startOff = posToOffset(text, e.start);
      const endOff = e.end ? posToOffset(text, e.end) : startOff;
      return { startOff, endOff, newText: e.newText };
    })
    .sort((a, b) => b.startOff - a.startOff);

  let out = text;
  for (const e of offs) {
    out = out.slice(0, e.startOff) + e.newText + out.slice(e.endOff);
  }
  return out;
}

export function replaceRange(start: Position, length: number, newText: string): TextEdit {
  return { start, end: { row: start.row, column: start.column + Math.max(0, length) }, newText };
}

export function insertAt(start: Position, newText: string): TextEdit {
  return { start, newText };
}
