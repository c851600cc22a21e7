import type { Diagnostic, DiagnosticContext, ResolvedDiagnostic, Severity } from './types.js';

// One template per code; {name} placeholders are filled from the diagnostic context.
export const MESSAGES: Readonly<Record<string, string>> = {
  E101: 'indentation contains mixed spaces and tabs',
  E111: 'indentation is not a multiple of four',
  E112: 'expected an indented block',
  E113: 'unexpected indentation',
  E201: "whitespace after '{char}'",
  E202: "whitespace before '{char}'",
  E203: "whitespace before '{char}'",
  E211: "whitespace before '{char}'",
  E221: 'multiple spaces before operator',
  E222: 'multiple spaces after operator',
  E223: 'tab before operator',
  E224: 'tab after operator',
  E225: 'missing whitespace around operator',
  E231: "missing whitespace after '{char}'",
  E241: "multiple spaces after '{separator}'",
  E242: "tab after '{separator}'",
  E251: 'no spaces around keyword / parameter equals',
  E261: 'at least two spaces before inline comment',
  E262: "inline comment should start with '# '",
  E301: 'expected 1 blank line, found 0',
  E302: 'expected 2 blank lines, found {blank_lines}',
  E303: 'too many blank lines ({blank_lines})',
  E304: 'blank lines found after function decorator',
  E401: 'multiple imports on one line',
  E501: 'line too long ({line_length} characters)',
  E701: 'multiple statements on one line (colon)',
  E702: 'multiple statements on one line (semicolon)',
  W191: 'indentation contains tabs',
  W291: 'trailing whitespace',
  W292: 'no newline at end of file',
  W293: 'blank line contains whitespace',
  W391: 'blank line at end of file',
  W601: ".has_key() is deprecated, use 'in'",
  W602: 'deprecated form of raising exception',
  W603: "'<>' is deprecated, use '!='",
  W604: "backticks are deprecated, use 'repr()'",
};

/**
 * Fill a code's template. Unknown codes render as the bare code and
 * placeholders without a context value are left as written.
 */
export function renderMessage(code: string, context: DiagnosticContext = {}): string {
  const template = MESSAGES[code];
  if (template === undefined) return code;
  return template.replace(/\{(\w+)\}/g, (whole, name: string) => {
    const value = context[name];
    return value === undefined ? whole : String(value);
  });
}

export function severityOf(code: string): Severity {
  return code.startsWith('W') ? 'warning' : 'error';
}

export interface CheckerFailure {
  checker: string;
  row: number;
  message: string;
}

export interface CodeStatistic {
  code: string;
  count: number;
  // Message of the first occurrence
  message: string;
}

/**
 * Ordered diagnostics of one file. Resolution against the originating line
 * happens on insertion; the same code at the same position is kept once.
 */
export class Report {
  private readonly items: ResolvedDiagnostic[] = [];
  private readonly seen = new Set<string>();
  private readonly counts = new Map<string, number>();
  readonly failures: CheckerFailure[] = [];

  add(diagnostic: Diagnostic): ResolvedDiagnostic | undefined {
    const { row, column } = diagnostic.origin.locate(diagnostic.column);
    const key = `${diagnostic.code}@${row}:${column}`;
    if (this.seen.has(key)) return undefined;
    this.seen.add(key);
    const resolved: ResolvedDiagnostic = {
      code: diagnostic.code,
      message: renderMessage(diagnostic.code, diagnostic.context),
      severity: severityOf(diagnostic.code),
      row,
      column,
    };
    this.items.push(resolved);
    this.counts.set(resolved.code, (this.counts.get(resolved.code) ?? 0) + 1);
    return resolved;
  }

  recordFailure(failure: CheckerFailure) {
    this.failures.push(failure);
  }

  get diagnostics(): readonly ResolvedDiagnostic[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  hasCode(code: string): boolean {
    return this.counts.has(code);
  }

  byCode(code: string): ResolvedDiagnostic[] {
    return this.items.filter((d) => d.code === code);
  }

  /** Distinct codes in order of first appearance. */
  codes(): string[] {
    return [...this.counts.keys()];
  }

  statistics(): CodeStatistic[] {
    return [...this.counts.entries()]
      .map(([code, count]) => ({ code, count, message: this.items.find((d) => d.code === code)?.message ?? code }))
      .sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
  }
}

/**
 * The offending physical line followed by a caret under the reported column.
 *
 *   sourceFrame('x = x*2\n', 5) === 'x = x*2\n     ^'
 */
export function sourceFrame(lineText: string, column: number): string {
  const text = lineText.replace(/[\r\n]+$/, '').trimEnd();
  return `${text}\n${' '.repeat(Math.max(0, column))}^`;
}
