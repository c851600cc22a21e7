import type { Document } from './document.js';
import { DEFAULT_OPTIONS, isSuppressed, type CheckOptions } from './config.js';
import { Report } from './diagnostics.js';
import { StructuralError } from './errors.js';
import { LogicalLine, PhysicalLine, buildLogicalLine, snapshot, type PreviousLogicalLine } from './logical-line.js';
import type { CheckerRegistry, CheckerContext, LogicalChecker, PhysicalChecker } from './registry.js';
import { contributes, isCloseBracket, isOpenBracket, type Token } from './tokens.js';
import type { Finding } from './types.js';
import { Tokenizer } from '../python/tokenizer.js';

function isCommentLine(tokens: readonly Token[]): boolean {
  return tokens.some((t) => t.kind === 'COMMENT') && !tokens.some(contributes);
}

/**
 * Single pass over one document. Physical checks run as the tokenizer pulls
 * each line; logical checks run at every statement boundary.
 */
export class StyleChecker {
  readonly document: Document;
  readonly options: CheckOptions;
  private readonly physicalCheckers: readonly PhysicalChecker[];
  private readonly logicalCheckers: readonly LogicalChecker[];
  private readonly commentCheckers: readonly LogicalChecker[];

  constructor(document: Document, registry: CheckerRegistry, options: CheckOptions = DEFAULT_OPTIONS) {
    this.document = document;
    this.options = options;
    // A checker whose every code is suppressed is never evaluated
    const active = (codes: readonly string[]) => codes.some((code) => !isSuppressed(code, options));
    this.physicalCheckers = registry.physical.filter((c) => active(c.codes));
    this.logicalCheckers = registry.logical.filter((c) => active(c.codes));
    this.commentCheckers = this.logicalCheckers.filter((c) => c.commentLines);
  }

  run(): Report {
    const report = new Report();
    const { document } = this;

    let cursor = 0;
    const readLine = (): string | null => {
      const text = document.lines[cursor];
      if (text === undefined) return null;
      cursor++;
      const line = new PhysicalLine(text, cursor);
      for (const checker of this.physicalCheckers) {
        this.evaluate(report, checker.name, line, () => checker.evaluate({ line, document, options: this.options }));
      }
      return text;
    };

    let buffer: Token[] = [];
    let depth = 0;
    let blankLines = 0;
    let blankLinesBeforeComment = 0;
    let previous: PreviousLogicalLine | undefined;

    for (const token of new Tokenizer(readLine)) {
      buffer.push(token);
      if (isOpenBracket(token)) depth++;
      else if (isCloseBracket(token)) {
        depth--;
        if (depth < 0) throw new StructuralError('unbalanced-brackets', token.start.row);
      }

      switch (token.kind) {
        case 'NEWLINE':
          if (depth === 0) {
            previous = this.checkLogical(report, buffer, token.start.row, blankLines, blankLinesBeforeComment, previous);
            buffer = [];
            blankLines = 0;
            blankLinesBeforeComment = 0;
          }
          break;
        case 'NL':
          if (depth === 0) {
            if (buffer.length <= 1) blankLines++;
            else if (isCommentLine(buffer)) this.checkCommentLine(report, buffer, token.start.row, previous);
            buffer = [];
          }
          break;
        case 'COMMENT':
          if (token.sourceLine.slice(0, token.start.column).trim() === '') {
            // A standalone comment does not break the blank-line run
            blankLinesBeforeComment = Math.max(blankLines, blankLinesBeforeComment);
            blankLines = 0;
          }
          if (/[\r\n]$/.test(token.text) && depth === 0) buffer = [];
          break;
        case 'ENDMARKER':
          if (depth !== 0 || buffer.some(contributes)) {
            throw new StructuralError('unterminated-statement', token.start.row);
          }
          break;
        default:
          break;
      }
    }
    return report;
  }

  private checkLogical(
    report: Report,
    tokens: Token[],
    lineNumber: number,
    blankLinesBefore: number,
    blankLinesBeforeComment: number,
    previous: PreviousLogicalLine | undefined,
  ): PreviousLogicalLine | undefined {
    const built = buildLogicalLine(tokens, this.document.lines);
    if (!built) return previous;
    const line = new LogicalLine({
      text: built.text,
      mapping: built.mapping,
      tokens,
      lineNumber,
      blankLinesBefore,
      blankLinesBeforeComment,
    });
    const context: CheckerContext<LogicalLine> = { line, document: this.document, options: this.options, previous };
    for (const checker of this.logicalCheckers) {
      this.evaluate(report, checker.name, line, () => checker.evaluate(context));
    }
    return snapshot(line);
  }

  // A comment-only line is not a statement: only checkers that opt in see it
  private checkCommentLine(report: Report, tokens: Token[], lineNumber: number, previous: PreviousLogicalLine | undefined) {
    const line = new LogicalLine({ text: '', tokens, lineNumber });
    const context: CheckerContext<LogicalLine> = { line, document: this.document, options: this.options, previous };
    for (const checker of this.commentCheckers) {
      this.evaluate(report, checker.name, line, () => checker.evaluate(context));
    }
  }

  private evaluate(report: Report, name: string, origin: PhysicalLine | LogicalLine, run: () => Finding | undefined) {
    let finding: Finding | undefined;
    try {
      finding = run();
    } catch (e) {
      report.recordFailure({ checker: name, row: origin.lineNumber, message: e instanceof Error ? e.message : String(e) });
      return;
    }
    if (!finding || isSuppressed(finding.code, this.options)) return;
    report.add({ ...finding, origin });
  }
}
