import { createToken, Lexer, type IToken, type ILexingError } from 'chevrotain';

// Patterns for the text of one physical line after its indentation has been
// measured. Order matters: the first pattern that matches wins.

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t\f\v]+/, group: Lexer.SKIPPED });
export const Comment = createToken({ name: 'Comment', pattern: /#[^\r\n]*/ });
// Backslash directly before the terminator joins the next physical line
export const Continuation = createToken({ name: 'Continuation', pattern: /\\(?:\r\n|\r|\n)/ });
export const LineEnd = createToken({ name: 'LineEnd', pattern: /\r\n|\r|\n/ });

// Complete triple-quoted strings on this line
export const TripleDoubleString = createToken({
  name: 'TripleDoubleString',
  pattern: /[rRbBuU]{0,2}"""(?:[^"\\]|\\[\s\S]|"(?!""))*"""/,
});
export const TripleSingleString = createToken({
  name: 'TripleSingleString',
  pattern: /[rRbBuU]{0,2}'''(?:[^'\\]|\\[\s\S]|'(?!''))*'''/,
});
// Triple quote whose closing delimiter is on a later line
export const OpenTripleDouble = createToken({ name: 'OpenTripleDouble', pattern: /[rRbBuU]{0,2}"""/ });
export const OpenTripleSingle = createToken({ name: 'OpenTripleSingle', pattern: /[rRbBuU]{0,2}'''/ });

export const DoubleString = createToken({
  name: 'DoubleString',
  pattern: /[rRbBuU]{0,2}"(?:[^"\\\r\n]|\\[^\r\n])*"/,
});
export const SingleString = createToken({
  name: 'SingleString',
  pattern: /[rRbBuU]{0,2}'(?:[^'\\\r\n]|\\[^\r\n])*'/,
});
// Single-quoted string continued with a backslash at the end of the line
export const OpenDouble = createToken({
  name: 'OpenDouble',
  pattern: /[rRbBuU]{0,2}"(?:[^"\\\r\n]|\\[^\r\n])*\\(?:\r\n|\r|\n)/,
});
export const OpenSingle = createToken({
  name: 'OpenSingle',
  pattern: /[rRbBuU]{0,2}'(?:[^'\\\r\n]|\\[^\r\n])*\\(?:\r\n|\r|\n)/,
});

export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /(?:0[xX][0-9a-fA-F]+|0[bB][01]+|0[oO][0-7]+|(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)[jJlL]?/,
});
export const Name = createToken({
  name: 'Name',
  pattern: /[A-Za-z_\u00C0-\uFFFF][A-Za-z0-9_\u00C0-\uFFFF]*/,
});
// Longest operators first; '<>' is the legacy inequality
export const Operator = createToken({
  name: 'Operator',
  pattern: /\*\*=|\/\/=|>>=|<<=|\.\.\.|<>|!=|==|<=|>=|->|:=|\*\*|\/\/|<<|>>|\+=|-=|\*=|\/=|%=|&=|\|=|\^=|@=|[-+*/%&|^~<>=.,:;@()\[\]{}]/,
});
// Anything else (backticks, '$', '?', a stray quote) is reported as an error token
export const Unknown = createToken({ name: 'Unknown', pattern: /[\s\S]/ });

export const allTokens = [
  WhiteSpace,
  Comment,
  Continuation,
  LineEnd,
  TripleDoubleString,
  TripleSingleString,
  OpenTripleDouble,
  OpenTripleSingle,
  DoubleString,
  SingleString,
  OpenDouble,
  OpenSingle,
  NumberLiteral,
  Name,
  Operator,
  Unknown,
];

export const LineLexer = new Lexer(allTokens, { positionTracking: 'onlyOffset' });

export function tokenizeLine(text: string): { tokens: IToken[]; errors: ILexingError[] } {
  const { tokens, errors } = LineLexer.tokenize(text);
  return { tokens, errors };
}
