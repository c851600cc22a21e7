import { INDENTATION_WHITESPACE, countChar } from '../core/document.js';
import { logical } from '../core/registry.js';
import { CLOSE_BRACKETS, OPEN_BRACKETS, contributes, isCloseBracket, samePosition } from '../core/tokens.js';
import { KEYWORDS } from './keywords.js';

const EXTRANEOUS_WHITESPACE = /[[({] | [\]}),;:]/g;

export const extraneousWhitespace = logical(
  'extraneous_whitespace',
  ['E201', 'E202', 'E203'],
  'Avoid whitespace immediately inside parentheses, brackets or braces, and immediately before a comma, semicolon or colon.',
  ({ line }) => {
    const text = line.text;
    for (const m of text.matchAll(EXTRANEOUS_WHITESPACE)) {
      const match = m[0];
      const char = match.trim();
      const found = m.index ?? 0;
      if (match === `${char} ` && OPEN_BRACKETS.includes(char)) {
        return { code: 'E201', column: found + 1, context: { char } };
      }
      if (match === ` ${char}` && text[found - 1] !== ',') {
        if (CLOSE_BRACKETS.includes(char)) return { code: 'E202', column: found, context: { char } };
        return { code: 'E203', column: found, context: { char } };
      }
    }
    return undefined;
  },
);

export const missingWhitespaceAfterSeparator = logical(
  'missing_whitespace',
  ['E231'],
  "Each comma, semicolon or colon should be followed by whitespace. Slices and one-element tuples such as '(3,)' are allowed.",
  ({ line }) => {
    const text = line.text;
    for (let index = 0; index < text.length - 1; index++) {
      const char = text[index] ?? '';
      const next = text[index + 1] ?? '';
      if (!',;:'.includes(char) || INDENTATION_WHITESPACE.includes(next)) continue;
      const before = text.slice(0, index);
      // Slice syntax needs no space
      if (char === ':' && countChar(before, '[') > countChar(before, ']')) continue;
      if (char === ',' && next === ')') continue;
      return { code: 'E231', column: index, context: { char } };
    }
    return undefined;
  },
);

export const whitespaceBeforeParameters = logical(
  'whitespace_before_parameters',
  ['E211'],
  "Avoid whitespace before the parenthesis of a call or the bracket of an index or slice. 'class A (B):' is tolerated, as is a keyword such as 'return (x)'.",
  ({ line }) => {
    const tokens = line.tokens.filter(contributes);
    for (let index = 1; index < tokens.length; index++) {
      const token = tokens[index];
      const prev = tokens[index - 1];
      if (!token || !prev) continue;
      if (
        token.kind === 'OP' &&
        (token.text === '(' || token.text === '[') &&
        !samePosition(token.start, prev.end) &&
        (prev.kind === 'NAME' || isCloseBracket(prev)) &&
        (index < 2 || tokens[index - 2]?.text !== 'class') &&
        !KEYWORDS.has(prev.text)
      ) {
        return { code: 'E211', column: prev.end, context: { char: token.text } };
      }
    }
    return undefined;
  },
);

export const whitespaceAroundComma = logical(
  'whitespace_around_comma',
  ['E241', 'E242'],
  'Avoid more than one space, or a tab, after a comma, semicolon or colon used to align code. Off by default.',
  ({ line }) => {
    for (const separator of [',', ';', ':']) {
      let found = line.text.indexOf(`${separator}  `);
      if (found > -1) return { code: 'E241', column: found + 1, context: { separator } };
      found = line.text.indexOf(`${separator}\t`);
      if (found > -1) return { code: 'E242', column: found + 1, context: { separator } };
    }
    return undefined;
  },
);

const NAMED_PARAMETER_EQUALS = /[()]|\s=[^=]|[^=!<>]=\s/g;

export const whitespaceAroundNamedParameterEquals = logical(
  'whitespace_around_named_parameter_equals',
  ['E251'],
  "Don't use spaces around the '=' sign of a keyword argument or a default parameter value. Comparisons such as '==' and '<=' are not affected.",
  ({ line }) => {
    let parens = 0;
    for (const m of line.text.matchAll(NAMED_PARAMETER_EQUALS)) {
      const text = m[0];
      if (parens && text.length === 3) return { code: 'E251', column: m.index ?? 0 };
      if (text === '(') parens++;
      else if (text === ')') parens--;
    }
    return undefined;
  },
);
