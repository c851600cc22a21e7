import type { OutputFormat } from './core/format.js';

export interface CliOptions {
  paths: string[];
  format: OutputFormat;
  maxLineLength?: number;
  ignore?: string[];
  select?: string[];
  config?: string;
  include: string[];
  exclude: string[];
  useGitignore: boolean;
  showSource: boolean;
  showRuleDocs: boolean;
  statistics: boolean;
  count: boolean;
  fix: boolean;
  dryRun: boolean;
  printFixed: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export type CliParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export const USAGE = [
  'Usage: pystyle [options] <path...>',
  '       cat file.py | pystyle -',
  '  - Checks Python source files against the style rules',
  '  - Directories are scanned recursively for **/*.py',
  'Options:',
  '  --max-line-length N  Maximum allowed line length (default: 79)',
  '  --ignore A,B         Skip codes starting with these prefixes (default: E24,W191)',
  '  --select A,B         Report these prefixes even when ignored',
  '  --config FILE        Read options from a JSON file (default: ./pystyle.json if present)',
  '  --format, -f         Output format: text|json (default: text)',
  '  --show-source        Show the source line and a caret under each diagnostic',
  '  --show-rule-docs     Show the rule description under each diagnostic',
  '  --statistics         Count diagnostics per code',
  '  --count              Print the total number of diagnostics to stderr',
  '  --include, -I        Glob(s) to include in directories (repeatable or comma-separated)',
  '  --exclude, -E        Glob(s) to exclude (repeatable or comma-separated)',
  '  --no-gitignore       Do not respect .gitignore when scanning directories',
  '  --fix                Fix trailing whitespace and blank lines at end of file',
  '  --dry-run, -n        Do not write files (useful with --fix)',
  '  --print-fixed        With --fix, print fixed content to stdout',
  '  --verbose, -v        Report files as they are checked and checker failures',
  '  --help, -h           Show this help',
  '  --version            Show the version',
].join('\n');

function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

export function defaultCliOptions(): CliOptions {
  return {
    paths: [],
    format: 'text',
    include: [],
    exclude: [],
    useGitignore: true,
    showSource: false,
    showRuleDocs: false,
    statistics: false,
    count: false,
    fix: false,
    dryRun: false,
    printFixed: false,
    verbose: false,
    help: false,
    version: false,
  };
}

const VALUE_FLAGS = new Set([
  '--max-line-length',
  '--ignore',
  '--select',
  '--config',
  '--format',
  '-f',
  '--include',
  '-I',
  '--exclude',
  '-E',
]);

/** Parse command line arguments (without the node and script entries). */
export function parseCliArgs(args: readonly string[]): CliParseResult {
  const options = defaultCliOptions();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    let flag = arg;
    let value: string | undefined;
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq > 0) {
      flag = arg.slice(0, eq);
      value = arg.slice(eq + 1);
    }
    if (VALUE_FLAGS.has(flag) && value === undefined) {
      value = args[i + 1];
      if (value === undefined) return { ok: false, error: `Missing value for ${flag}` };
      i++;
    }

    switch (flag) {
      case '--max-line-length': {
        const n = Number(value);
        if (!Number.isInteger(n) || n <= 0) return { ok: false, error: `Invalid --max-line-length: ${value}` };
        options.maxLineLength = n;
        break;
      }
      case '--ignore':
        options.ignore = splitList(value ?? '');
        break;
      case '--select':
        options.select = splitList(value ?? '');
        break;
      case '--config':
        options.config = value;
        break;
      case '--format':
      case '-f': {
        const v = (value ?? '').toLowerCase();
        if (v !== 'text' && v !== 'json') return { ok: false, error: `Unknown format: ${value}` };
        options.format = v;
        break;
      }
      case '--include':
      case '-I':
        options.include.push(...splitList(value ?? ''));
        break;
      case '--exclude':
      case '-E':
        options.exclude.push(...splitList(value ?? ''));
        break;
      case '--no-gitignore':
        options.useGitignore = false;
        break;
      case '--gitignore':
        options.useGitignore = true;
        break;
      case '--show-source':
        options.showSource = true;
        break;
      case '--show-rule-docs':
        options.showRuleDocs = true;
        break;
      case '--statistics':
        options.statistics = true;
        break;
      case '--count':
        options.count = true;
        break;
      case '--fix':
        options.fix = true;
        break;
      case '--dry-run':
      case '-n':
        options.dryRun = true;
        break;
      case '--print-fixed':
        options.printFixed = true;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--version':
        options.version = true;
        break;
      default:
        if (arg === '-' || !arg.startsWith('-')) options.paths.push(arg);
        else return { ok: false, error: `Unknown option: ${arg}` };
    }
  }
  return { ok: true, options };
}
