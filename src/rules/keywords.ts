// Reserved words of Python 2 and 3 combined; 'print' and 'exec' were statements in 2.
export const KEYWORDS: ReadonlySet<string> = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'exec',
  'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda',
  'nonlocal', 'not', 'or', 'pass', 'print', 'raise', 'return', 'try', 'while',
  'with', 'yield',
]);

// Keywords after which a '+', '-', '*' or '**' is unary
export const UNARY_CONTEXT_KEYWORDS: ReadonlySet<string> = new Set(
  [...KEYWORDS].filter((k) => k !== 'False' && k !== 'None' && k !== 'True'),
);

export const BINARY_OPERATORS: ReadonlySet<string> = new Set([
  '**=', '*=', '+=', '-=', '!=', '<>', '%=', '^=', '&=', '|=', '==', '/=',
  '//=', '<=', '>=', '<<=', '>>=', '%', '^', '&', '|', '=', '/', '//', '<',
  '>', '<<',
]);

export const UNARY_OPERATORS: ReadonlySet<string> = new Set(['>>', '**', '*', '+', '-']);

export const OPERATORS: ReadonlySet<string> = new Set([...BINARY_OPERATORS, ...UNARY_OPERATORS]);
