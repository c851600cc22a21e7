import { logical } from '../core/registry.js';
import type { Position } from '../core/types.js';

export const whitespaceAroundInlineComment = logical(
  'whitespace_around_inline_comment',
  ['E261', 'E262'],
  "Separate inline comments from the statement by at least two spaces, and start every comment, inline or block, with '#' and a single space.",
  ({ line }) => {
    let prevEnd: Position = { row: 0, column: 0 };
    for (const token of line.tokens) {
      if (token.kind === 'NL') continue;
      if (token.kind !== 'COMMENT') {
        prevEnd = token.end;
        continue;
      }
      const { text, start } = token;
      if (text.length > 1 && (text.startsWith('#  ') || !text.startsWith('# '))) {
        return { code: 'E262', column: start };
      }
      // Only a comment sharing its row with code is inline
      const inline = token.sourceLine.slice(0, start.column).trim() !== '';
      if (inline && prevEnd.row === start.row && start.column < prevEnd.column + 2) {
        return { code: 'E261', column: prevEnd };
      }
    }
    return undefined;
  },
  { commentLines: true },
);
