import { CheckerRegistry } from '../core/registry.js';
import { blankLines } from './blank-lines.js';
import { whitespaceAroundInlineComment } from './comments.js';
import { backticks, hasKey, notEqual, raiseComma } from './deprecated.js';
import { indentation, tabsObsolete, tabsOrSpaces } from './indentation.js';
import { maximumLineLength } from './line-length.js';
import { missingWhitespaceAroundOperator, whitespaceAroundOperator } from './operators.js';
import { compoundStatements, importsOnSeparateLines } from './statements.js';
import { missingNewline, trailingBlankLines, trailingWhitespace } from './trailing.js';
import {
  extraneousWhitespace,
  missingWhitespaceAfterSeparator,
  whitespaceAroundComma,
  whitespaceAroundNamedParameterEquals,
  whitespaceBeforeParameters,
} from './whitespace.js';

export const defaultRegistry: CheckerRegistry = CheckerRegistry.builder()
  // physical
  .add(tabsOrSpaces, tabsObsolete, trailingWhitespace, trailingBlankLines, missingNewline, maximumLineLength)
  // logical, in code order
  .add(
    indentation,
    extraneousWhitespace,
    whitespaceBeforeParameters,
    whitespaceAroundOperator,
    missingWhitespaceAroundOperator,
    missingWhitespaceAfterSeparator,
    whitespaceAroundComma,
    whitespaceAroundNamedParameterEquals,
    whitespaceAroundInlineComment,
    blankLines,
    importsOnSeparateLines,
    compoundStatements,
    hasKey,
    raiseComma,
    notEqual,
    backticks,
  )
  .build();

export {
  blankLines,
  whitespaceAroundInlineComment,
  backticks,
  hasKey,
  notEqual,
  raiseComma,
  indentation,
  tabsObsolete,
  tabsOrSpaces,
  maximumLineLength,
  missingWhitespaceAroundOperator,
  whitespaceAroundOperator,
  compoundStatements,
  importsOnSeparateLines,
  missingNewline,
  trailingBlankLines,
  trailingWhitespace,
  extraneousWhitespace,
  missingWhitespaceAfterSeparator,
  whitespaceAroundComma,
  whitespaceAroundNamedParameterEquals,
  whitespaceBeforeParameters,
};
