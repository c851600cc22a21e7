import { physical } from '../core/registry.js';

export const maximumLineLength = physical(
  'maximum_line_length',
  ['E501'],
  'Limit all lines to a maximum of 79 characters. Many devices still wrap at 80 columns, and short lines let several windows sit side by side.',
  ({ line, options }) => {
    const stripped = line.text.trimEnd();
    // Count code points, not UTF-16 units
    const length = [...stripped].length;
    if (length <= options.maxLineLength) return undefined;
    return { code: 'E501', column: options.maxLineLength, context: { line_length: length } };
  },
);
