import type { Position } from './types.js';

export type TokenKind =
  | 'NAME'
  | 'NUMBER'
  | 'OP'
  | 'STRING'
  | 'COMMENT'
  | 'NEWLINE'
  | 'NL'
  | 'INDENT'
  | 'DEDENT'
  | 'ENDMARKER'
  | 'ERROR';

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly start: Position;
  readonly end: Position;
  // Raw physical line(s) the token was lexed from
  readonly sourceLine: string;
}

export const OPEN_BRACKETS = '([{';
export const CLOSE_BRACKETS = ')]}';

// Kinds that never contribute text to a logical line
const SKIP_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'COMMENT',
  'NL',
  'INDENT',
  'DEDENT',
  'NEWLINE',
  'ENDMARKER',
]);

export function contributes(token: Token): boolean {
  return !SKIP_KINDS.has(token.kind);
}

export function isOpenBracket(token: Token): boolean {
  return token.kind === 'OP' && token.text.length === 1 && OPEN_BRACKETS.includes(token.text);
}

export function isCloseBracket(token: Token): boolean {
  return token.kind === 'OP' && token.text.length === 1 && CLOSE_BRACKETS.includes(token.text);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.column === b.column;
}
