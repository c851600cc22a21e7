import { Document, rstripNewlines } from './document.js';
import { insertAt, replaceRange } from './edits.js';
import type { ResolvedDiagnostic, TextEdit } from './types.js';

// Codes with a whitespace-only fix
export const FIXABLE_CODES: readonly string[] = ['W291', 'W293', 'W292', 'W391'];

/** First row of the run of whitespace-only lines that ends the document. */
function trailingBlankStart(document: Document): number {
  let row = document.lineCount;
  while (row >= 1 && document.line(row).trim() === '') row--;
  return row + 1;
}

export function computeFixes(document: Document, diagnostics: readonly ResolvedDiagnostic[]): TextEdit[] {
  const edits: TextEdit[] = [];
  const seen = new Set<string>();
  // Rows dropped wholesale by W391 take no other edit
  const dropFrom = diagnostics.some((d) => d.code === 'W391') ? trailingBlankStart(document) : Infinity;
  if (dropFrom !== Infinity) {
    edits.push({ start: { row: dropFrom, column: 0 }, end: { row: document.lineCount + 1, column: 0 }, newText: '' });
  }

  for (const d of diagnostics) {
    const key = `${d.code}@${d.row}`;
    if (!FIXABLE_CODES.includes(d.code) || seen.has(key) || d.row >= dropFrom) continue;
    seen.add(key);
    const line = document.line(d.row);
    switch (d.code) {
      case 'W291':
      case 'W293': {
        const body = rstripNewlines(line);
        const kept = body.trimEnd().length;
        edits.push(replaceRange({ row: d.row, column: kept }, body.length - kept, ''));
        break;
      }
      case 'W292':
        edits.push(insertAt({ row: d.row, column: line.length }, document.lineEnding ?? '\n'));
        break;
      default:
        break;
    }
  }
  return edits;
}
