// Rows are 1-based, columns 0-based throughout the engine.
export interface Position { row: number; column: number }

export type Severity = 'error' | 'warning';

// A checker reports either an offset into the text it inspected, or a position
// it already resolved against token coordinates.
export type Column = number | Position;

export type DiagnosticContext = Record<string, string | number>;

export interface Finding {
  code: string;
  column?: Column;
  context?: DiagnosticContext;
}

export interface Locatable {
  locate(column: Column | undefined): Position;
}

export interface Diagnostic extends Finding {
  origin: Locatable;
}

export interface ResolvedDiagnostic {
  code: string;
  message: string;
  severity: Severity;
  row: number;
  column: number;
}

// Text edits for autofix
export interface TextEdit {
  // Inclusive start; if end is omitted, this is an insertion
  start: Position;
  end?: Position; // exclusive end; if provided, replaced with newText
  newText: string;
}
