export type StructuralErrorKind =
  | 'unterminated-statement'
  | 'unterminated-string'
  | 'unbalanced-brackets'
  | 'inconsistent-dedent';

const DEFAULT_MESSAGES: Record<StructuralErrorKind, string> = {
  'unterminated-statement': 'EOF in multi-line statement',
  'unterminated-string': 'EOF in multi-line string',
  'unbalanced-brackets': 'closing bracket does not match any opening bracket',
  'inconsistent-dedent': 'unindent does not match any outer indentation level',
};

/**
 * The token stream cannot be segmented into statements. This is not a style
 * diagnostic: the input is malformed or truncated.
 */
export class StructuralError extends Error {
  readonly kind: StructuralErrorKind;
  readonly row: number;

  constructor(kind: StructuralErrorKind, row: number, message: string = DEFAULT_MESSAGES[kind]) {
    super(message);
    this.name = 'StructuralError';
    this.kind = kind;
    this.row = row;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
