import { logical } from '../core/registry.js';

const DOCSTRING = /^u?r?["']/;

export const blankLines = logical(
  'blank_lines',
  ['E301', 'E302', 'E303', 'E304'],
  'Separate top-level function and class definitions with two blank lines and method definitions with one. Extra blank lines may separate groups of related functions, sparingly.',
  ({ line, previous }) => {
    // No blank lines are expected before the first statement
    if (line.lineNumber === 1 || !previous) return undefined;
    const blank = Math.max(line.blankLinesBefore, line.blankLinesBeforeComment);
    const text = line.dedentedText;

    if (previous.dedentedText.startsWith('@')) {
      return blank ? { code: 'E304' } : undefined;
    }
    if (blank > 2 || (line.indentLevel && blank === 2)) {
      return { code: 'E303', context: { blank_lines: blank } };
    }
    if (text.startsWith('def ') || text.startsWith('class ') || text.startsWith('@')) {
      if (line.indentLevel) {
        const firstInBlock = previous.indentLevel < line.indentLevel;
        if (!(blank || firstInBlock || DOCSTRING.test(previous.dedentedText))) return { code: 'E301' };
      } else if (blank !== 2) {
        return { code: 'E302', context: { blank_lines: blank } };
      }
    }
    return undefined;
  },
);
