import { countChar } from '../core/document.js';
import { logical } from '../core/registry.js';

export const importsOnSeparateLines = logical(
  'imports_on_separate_lines',
  ['E401'],
  "Put imports on separate lines. 'from module import a, b' is fine.",
  ({ line }) => {
    if (!line.dedentedText.startsWith('import ')) return undefined;
    const found = line.dedentedText.indexOf(',');
    if (found === -1) return undefined;
    return { code: 'E401', column: line.text.length - line.dedentedText.length + found };
  },
);

export const compoundStatements = logical(
  'compound_statements',
  ['E701', 'E702'],
  'Avoid several statements on one line, whether a block body after its colon or statements joined by semicolons.',
  ({ line }) => {
    const text = line.text;
    // Only a top-level colon with code after it
    for (let colon = text.indexOf(':'); colon > -1 && colon < text.length - 1; colon = text.indexOf(':', colon + 1)) {
      const before = text.slice(0, colon);
      if (
        countChar(before, '{') <= countChar(before, '}') && // dict literal
        countChar(before, '[') <= countChar(before, ']') && // slice
        countChar(before, '(') <= countChar(before, ')') && // annotation or call
        !/\blambda\b/.test(before)
      ) {
        return { code: 'E701', column: colon };
      }
    }
    const semicolon = text.indexOf(';');
    if (semicolon > -1) return { code: 'E702', column: semicolon };
    return undefined;
  },
);
