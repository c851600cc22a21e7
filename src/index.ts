// Public SDK surface for programmatic use
export type {
  Position,
  Severity,
  Column,
  Finding,
  Diagnostic,
  DiagnosticContext,
  ResolvedDiagnostic,
  TextEdit,
  Locatable,
} from './core/types.js';
export type { Token, TokenKind } from './core/tokens.js';
export type { CheckOptions, CheckOptionsInput } from './core/config.js';
export type {
  CheckerContext,
  CheckerDescriptor,
  PhysicalChecker,
  LogicalChecker,
} from './core/registry.js';
export type { CheckerFailure, CodeStatistic } from './core/diagnostics.js';
export type { OutputFormat, JsonFileResult } from './core/format.js';

// Engine
export { Document, splitLines, leadingIndentation, indentationLevel, lineEnding, rstripNewlines } from './core/document.js';
export { Tokenizer, tokenize } from './python/tokenizer.js';
export { LogicalLine, PhysicalLine, buildLogicalLine, muteString } from './core/logical-line.js';
export { CheckerRegistry, CheckerRegistryBuilder, physical, logical } from './core/registry.js';
export { StyleChecker } from './core/checker.js';
export { Report, MESSAGES, renderMessage, severityOf } from './core/diagnostics.js';
export { StructuralError, ConfigError } from './core/errors.js';
export { CheckOptionsSchema, DEFAULT_IGNORE, DEFAULT_OPTIONS, isSuppressed, resolveOptions } from './core/config.js';
export { defaultRegistry } from './rules/index.js';

// Formatting and edits
export { textReport, toJsonResult, statisticsReport } from './core/format.js';
export { applyEdits, posToOffset } from './core/edits.js';
export { computeFixes, FIXABLE_CODES } from './core/fixes.js';
export { decodeSource } from './core/source.js';

import { Document } from './core/document.js';
import { StyleChecker } from './core/checker.js';
import { resolveOptions, type CheckOptionsInput } from './core/config.js';
import type { Report } from './core/diagnostics.js';
import type { CheckerRegistry } from './core/registry.js';
import type { ResolvedDiagnostic } from './core/types.js';
import { computeFixes } from './core/fixes.js';
import { applyEdits } from './core/edits.js';
import { defaultRegistry } from './rules/index.js';

/**
 * Check one source text. Throws StructuralError when the text cannot be
 * split into statements and ConfigError for invalid options.
 */
export function checkSource(text: string, options: CheckOptionsInput = {}, registry: CheckerRegistry = defaultRegistry): Report {
  return new StyleChecker(Document.fromText(text), registry, resolveOptions(options)).run();
}

/**
 * Run checks and apply whitespace fixes until stable (max 5 passes).
 * Returns the final text and the diagnostics that remain.
 */
export function fixText(
  text: string,
  options: CheckOptionsInput = {},
  registry: CheckerRegistry = defaultRegistry,
): { fixed: string; diagnostics: readonly ResolvedDiagnostic[] } {
  const resolved = resolveOptions(options);
  let current = text;
  for (let i = 0; i < 5; i++) {
    const document = Document.fromText(current);
    const report = new StyleChecker(document, registry, resolved).run();
    const edits = computeFixes(document, report.diagnostics);
    if (edits.length === 0) return { fixed: current, diagnostics: report.diagnostics };
    const next = applyEdits(current, edits);
    if (next === current) return { fixed: current, diagnostics: report.diagnostics };
    current = next;
  }
  const finalReport = new StyleChecker(Document.fromText(current), registry, resolved).run();
  return { fixed: current, diagnostics: finalReport.diagnostics };
}
