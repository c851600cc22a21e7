import type { Document } from './document.js';
import { sourceFrame, type CheckerFailure, type CodeStatistic } from './diagnostics.js';
import type { ResolvedDiagnostic } from './types.js';

export type OutputFormat = 'text' | 'json';

export interface TextReportOptions {
  // Print the offending line and a caret under each diagnostic
  showSource?: boolean;
  describe?: (code: string) => string | undefined;
}

export function groupDiagnostics(diagnostics: readonly ResolvedDiagnostic[]) {
  const errs = diagnostics.filter((d) => d.severity === 'error');
  const warns = diagnostics.filter((d) => d.severity === 'warning');
  return { errs, warns };
}

/** One diagnostic per line as `path:row:col: CODE message`, with a 1-based column. */
export function formatDiagnostic(filename: string, d: ResolvedDiagnostic): string {
  return `${filename}:${d.row}:${d.column + 1}: ${d.code} ${d.message}`;
}

export function textReport(
  filename: string,
  document: Document,
  diagnostics: readonly ResolvedDiagnostic[],
  options: TextReportOptions = {},
): string {
  const lines: string[] = [];
  for (const d of diagnostics) {
    lines.push(formatDiagnostic(filename, d));
    if (options.showSource) lines.push(sourceFrame(document.line(d.row), d.column));
    const doc = options.describe?.(d.code);
    if (doc) lines.push(...doc.split('\n').map((l) => `    ${l}`));
  }
  return lines.join('\n');
}

export interface StructuralErrorInfo {
  row: number;
  kind: string;
  message: string;
}

export interface JsonFileResult {
  file: string;
  valid: boolean;
  errorCount: number;
  warningCount: number;
  errors: ResolvedDiagnostic[];
  warnings: ResolvedDiagnostic[];
  failures?: CheckerFailure[];
  structuralError?: StructuralErrorInfo;
}

export function toJsonResult(
  filename: string,
  diagnostics: readonly ResolvedDiagnostic[],
  failures: readonly CheckerFailure[] = [],
  structuralError?: StructuralErrorInfo,
): JsonFileResult {
  const { errs, warns } = groupDiagnostics(diagnostics);
  const result: JsonFileResult = {
    file: filename,
    valid: !structuralError && errs.length === 0 && warns.length === 0,
    errorCount: errs.length + (structuralError ? 1 : 0),
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
  if (failures.length) result.failures = [...failures];
  if (structuralError) result.structuralError = structuralError;
  return result;
}

/** `count CODE message` per code, as produced by Report.statistics(). */
export function statisticsReport(stats: readonly CodeStatistic[]): string {
  return stats.map((s) => `${String(s.count).padEnd(7)} ${s.code} ${s.message}`).join('\n');
}

export function mergeStatistics(all: readonly (readonly CodeStatistic[])[]): CodeStatistic[] {
  const merged = new Map<string, CodeStatistic>();
  for (const stats of all) {
    for (const s of stats) {
      const existing = merged.get(s.code);
      if (existing) existing.count += s.count;
      else merged.set(s.code, { ...s });
    }
  }
  return [...merged.values()].sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}
