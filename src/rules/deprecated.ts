import { logical } from '../core/registry.js';
import type { LogicalLine } from '../core/logical-line.js';
import type { Finding } from '../core/types.js';

function findText(line: LogicalLine, needle: string, code: string): Finding | undefined {
  const pos = line.text.indexOf(needle);
  return pos === -1 ? undefined : { code, column: pos };
}

export const hasKey = logical(
  'python3000_has_key',
  ['W601'],
  "dict.has_key() is gone in Python 3. Use the 'in' operator instead.",
  ({ line }) => findText(line, '.has_key(', 'W601'),
);

const RAISE_COMMA = /^raise\s+\w+\s*(,)/;

export const raiseComma = logical(
  'python3000_raise_comma',
  ['W602'],
  "Raise exceptions as \"raise ValueError('message')\" rather than the older \"raise ValueError, 'message'\", which Python 3 removes.",
  ({ line }) => {
    const m = RAISE_COMMA.exec(line.dedentedText);
    if (!m) return undefined;
    const indent = line.text.length - line.dedentedText.length;
    return { code: 'W602', column: indent + m[0].length - 1 };
  },
);

export const notEqual = logical(
  'python3000_not_equal',
  ['W603'],
  "'<>' is an obsolete spelling of '!=' and is removed in Python 3.",
  ({ line }) => findText(line, '<>', 'W603'),
);

export const backticks = logical(
  'python3000_backticks',
  ['W604'],
  "Backticks are removed in Python 3. Use repr() instead.",
  ({ line }) => findText(line, '`', 'W604'),
);
