export type IndentChar = ' ' | '\t';
export type LineEnding = '\n' | '\r\n';

export const INDENTATION_WHITESPACE = ' \t';

/**
 * Leading run of indentation characters.
 *
 *   leadingIndentation(' \t \t abc  def') === ' \t \t '
 */
export function leadingIndentation(s: string, indentChars: string = INDENTATION_WHITESPACE): string {
  let i = 0;
  while (i < s.length && indentChars.includes(s[i] ?? '')) i++;
  return s.slice(0, i);
}

// Newline, carriage return and form feed.
export function rstripNewlines(s: string): string {
  return s.replace(/[\n\r\f]+$/, '');
}

export function lineEnding(s: string): string {
  return s.slice(rstripNewlines(s).length);
}

/**
 * Expanded width of an indentation string. Tabs advance to the next multiple
 * of 8; any character other than space or tab stops the expansion.
 */
export function indentationLevel(indentation: string): number {
  let result = 0;
  for (const ch of indentation) {
    if (ch === '\t') result = Math.floor(result / 8) * 8 + 8;
    else if (ch === ' ') result += 1;
    else break;
  }
  return result;
}

export function countChar(s: string, char: string): number {
  let n = 0;
  for (const c of s) if (c === char) n++;
  return n;
}

/** Split text into lines, keeping each line's terminator. */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  const re = /[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    if (m[0] === '') break;
    lines.push(m[0]);
  }
  return lines;
}

// Ties prefer space.
export function mostCommonIndentChar(lines: readonly string[]): IndentChar {
  let spaces = 0;
  let tabs = 0;
  for (const line of lines) {
    for (const ch of leadingIndentation(line)) {
      if (ch === ' ') spaces++;
      else tabs++;
    }
  }
  return tabs > spaces ? '\t' : ' ';
}

// Ties prefer '\n'; no terminated line at all gives null.
export function mostCommonLineEnding(lines: readonly string[]): LineEnding | null {
  let lf = 0;
  let crlf = 0;
  for (const line of lines) {
    const ending = lineEnding(line);
    if (ending === '\n') lf++;
    else if (ending === '\r\n') crlf++;
  }
  if (lf === 0 && crlf === 0) return null;
  return crlf > lf ? '\r\n' : '\n';
}

export class Document {
  readonly lines: readonly string[];
  readonly lineCount: number;
  readonly indentChar: IndentChar;
  readonly lineEnding: LineEnding | null;

  constructor(lines: readonly string[]) {
    this.lines = Object.freeze([...lines]);
    this.lineCount = this.lines.length;
    this.indentChar = mostCommonIndentChar(this.lines);
    this.lineEnding = mostCommonLineEnding(this.lines);
  }

  static fromText(text: string): Document {
    return new Document(splitLines(text));
  }

  /** 1-based; empty string past the end. */
  line(row: number): string {
    return this.lines[row - 1] ?? '';
  }

  get text(): string {
    return this.lines.join('');
  }
}
