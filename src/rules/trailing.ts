import { lineEnding, rstripNewlines } from '../core/document.js';
import { physical } from '../core/registry.js';

export const trailingWhitespace = physical(
  'trailing_whitespace',
  ['W291', 'W293'],
  'Trailing whitespace is superfluous. A line holding nothing but whitespace is reported under its own code so indented blank lines can be allowed separately.',
  ({ line }) => {
    const withoutNewlines = rstripNewlines(line.text);
    const withoutSpaces = withoutNewlines.trimEnd();
    if (withoutNewlines === withoutSpaces) return undefined;
    if (!withoutSpaces) return { code: 'W293' };
    return { code: 'W291', column: withoutSpaces.length };
  },
);

export const trailingBlankLines = physical(
  'trailing_blank_lines',
  ['W391'],
  'Trailing blank lines are superfluous.',
  ({ line, document }) => {
    if (line.text.trim() === '' && line.lineNumber === document.lineCount) return { code: 'W391' };
    return undefined;
  },
);

export const missingNewline = physical(
  'missing_newline',
  ['W292'],
  'The last line should end with a newline.',
  ({ line }) => {
    if (lineEnding(line.text) !== '') return undefined;
    return { code: 'W292', column: line.text.length };
  },
);
