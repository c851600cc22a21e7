import { logical } from '../core/registry.js';
import { CLOSE_BRACKETS, contributes, samePosition, type TokenKind } from '../core/tokens.js';
import type { Position } from '../core/types.js';
import { BINARY_OPERATORS, OPERATORS, UNARY_CONTEXT_KEYWORDS, UNARY_OPERATORS } from './keywords.js';

const WHITESPACE_AROUND_OPERATOR = /([^\w\s]*)\s*(\t|  )\s*([^\w\s]*)/dg;

export const whitespaceAroundOperator = logical(
  'whitespace_around_operator',
  ['E221', 'E222', 'E223', 'E224'],
  'Avoid more than one space, or a tab, around an assignment or other operator to align it with another.',
  ({ line }) => {
    // Indentation is not alignment
    const indent = line.text.length - line.dedentedText.length;
    for (const m of line.dedentedText.matchAll(WHITESPACE_AROUND_OPERATOR)) {
      const before = m[1] ?? '';
      const whitespace = m[2] ?? '';
      const after = m[3] ?? '';
      const offset = indent + (m.indices?.[2]?.[0] ?? m.index ?? 0);
      const tab = whitespace.includes('\t');
      if (OPERATORS.has(before)) return { code: tab ? 'E224' : 'E222', column: offset };
      if (OPERATORS.has(after)) return { code: tab ? 'E223' : 'E221', column: offset };
    }
    return undefined;
  },
);

export const missingWhitespaceAroundOperator = logical(
  'missing_whitespace_around_operator',
  ['E225'],
  "Surround binary operators with a single space on either side. Keyword arguments, defaults and unary operators such as '-1' or '*args' are exempt.",
  ({ line }) => {
    let parens = 0;
    let needSpace = false;
    let prevKind: TokenKind = 'OP';
    let prevText = '';
    let prevEnd: Position | undefined;
    for (const token of line.tokens) {
      // Backticks and other stray characters come through as ERROR
      if (!contributes(token) || token.kind === 'ERROR') continue;
      const { text, start } = token;
      if (text === '(' || text === 'lambda') parens++;
      else if (text === ')') parens--;

      if (needSpace) {
        if (!prevEnd || !samePosition(start, prevEnd)) needSpace = false;
        else if (!(text === '>' && prevText === '<')) return { code: 'E225', column: prevEnd };
      } else if (token.kind === 'OP' && prevEnd) {
        if (text === '=' && parens) {
          // keyword argument or default
        } else if (BINARY_OPERATORS.has(text)) {
          needSpace = true;
        } else if (UNARY_OPERATORS.has(text)) {
          if (prevKind === 'OP') needSpace = prevText.length === 1 && CLOSE_BRACKETS.includes(prevText);
          else if (prevKind === 'NAME') needSpace = !UNARY_CONTEXT_KEYWORDS.has(prevText);
          else needSpace = true;
        }
        if (needSpace && samePosition(start, prevEnd)) return { code: 'E225', column: prevEnd };
      }
      prevKind = token.kind;
      prevText = text;
      prevEnd = token.end;
    }
    return undefined;
  },
);
