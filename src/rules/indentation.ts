import { leadingIndentation } from '../core/document.js';
import { logical, physical } from '../core/registry.js';

export const tabsOrSpaces = physical(
  'tabs_or_spaces',
  ['E101'],
  'Never mix tabs and spaces. Reports the first indentation character that differs from the one the file mostly uses.',
  ({ line, document }) => {
    const indent = leadingIndentation(line.text);
    for (let offset = 0; offset < indent.length; offset++) {
      if (indent[offset] !== document.indentChar) return { code: 'E101', column: offset };
    }
    return undefined;
  },
);

export const tabsObsolete = physical(
  'tabs_obsolete',
  ['W191'],
  'Spaces-only indentation is recommended for new code. Reports the first tab in the indentation.',
  ({ line }) => {
    const column = leadingIndentation(line.text).indexOf('\t');
    return column === -1 ? undefined : { code: 'W191', column };
  },
);

export const indentation = logical(
  'indentation',
  ['E111', 'E112', 'E113'],
  'Use 4 spaces per indentation level. A statement after a block opener must be indented; any other statement must not be.',
  ({ line, previous, document }) => {
    if (document.indentChar === ' ' && line.indentLevel % 4) return { code: 'E111' };
    if (!previous) return undefined;
    const expectIndent = previous.text.endsWith(':');
    if (expectIndent && line.indentLevel <= previous.indentLevel) return { code: 'E112' };
    if (!expectIndent && line.indentLevel > previous.indentLevel) return { code: 'E113' };
    return undefined;
  },
);
