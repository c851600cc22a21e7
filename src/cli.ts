#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { parseCliArgs, USAGE, type CliOptions } from './cli-options.js';
import { findConfigFile, loadConfigFile, resolveOptions, type CheckOptions } from './core/config.js';
import { Document } from './core/document.js';
import { ConfigError, StructuralError } from './core/errors.js';
import type { CheckerFailure, CodeStatistic } from './core/diagnostics.js';
import { mergeStatistics, statisticsReport, textReport, toJsonResult, type JsonFileResult } from './core/format.js';
import { readSource } from './core/source.js';
import { StyleChecker } from './core/checker.js';
import type { ResolvedDiagnostic } from './core/types.js';
import { defaultRegistry } from './rules/index.js';
import { fixText } from './index.js';

const DEFAULT_INCLUDE_GLOBS = ['**/*.py'];

const DEFAULT_IGNORE_DIRS = [
  '**/.svn/**',
  '**/CVS/**',
  '**/.bzr/**',
  '**/.hg/**',
  '**/.git/**',
  '**/node_modules/**',
];

function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  return 'unknown';
}

function isDirectory(p: string) {
  try {
    return fs.statSync(p).isDirectory();
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false;
    throw e;
  }
}

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
  const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
  const cwdAbs = path.resolve(root);
  const files = await globby(patterns, {
    cwd: cwdAbs,
    absolute: true,
    dot: true,
    gitignore: useGitignore,
    ignore: [...excludes, ...DEFAULT_IGNORE_DIRS],
    followSymbolicLinks: false,
  });
  return files.sort();
}

async function expandTargets(cli: CliOptions): Promise<{ files: string[]; missing: string[] }> {
  const files: string[] = [];
  const missing: string[] = [];
  for (const target of cli.paths) {
    if (target === '-') files.push('-');
    else if (isDirectory(target)) files.push(...(await listCandidateFiles(target, cli.include, cli.exclude, cli.useGitignore)));
    else if (fs.existsSync(target)) files.push(target);
    else missing.push(target);
  }
  return { files, missing };
}

function resolveRunOptions(cli: CliOptions): CheckOptions {
  const configFile = findConfigFile(cli.config, process.cwd());
  const fromFile = configFile ? loadConfigFile(configFile) : {};
  return resolveOptions(
    {
      ...fromFile,
      ...(cli.maxLineLength !== undefined ? { maxLineLength: cli.maxLineLength } : {}),
      ...(cli.ignore !== undefined ? { ignore: cli.ignore } : {}),
      ...(cli.select !== undefined ? { select: cli.select } : {}),
    },
    configFile ?? 'command line',
  );
}

interface FileOutcome {
  file: string;
  document: Document;
  diagnostics: readonly ResolvedDiagnostic[];
  failures: readonly CheckerFailure[];
  statistics: CodeStatistic[];
}

function checkFile(file: string, cli: CliOptions, options: CheckOptions): FileOutcome {
  const { text } = readSource(file);
  const filename = file === '-' ? '<stdin>' : file;
  if (cli.fix) {
    const { fixed } = fixText(text, options);
    if (fixed !== text && !cli.dryRun && file !== '-') fs.writeFileSync(file, fixed, 'utf8');
    if (cli.printFixed || file === '-') process.stdout.write(fixed);
    return runChecks(filename, fixed, options);
  }
  return runChecks(filename, text, options);
}

function runChecks(file: string, text: string, options: CheckOptions): FileOutcome {
  const document = Document.fromText(text);
  const report = new StyleChecker(document, defaultRegistry, options).run();
  return { file, document, diagnostics: report.diagnostics, failures: report.failures, statistics: report.statistics() };
}

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    return 2;
  }
  const cli = parsed.options;
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }
  if (cli.version) {
    console.log(readVersion());
    return 0;
  }
  if (cli.paths.length === 0) {
    console.error(USAGE);
    return 2;
  }

  let options: CheckOptions;
  try {
    options = resolveRunOptions(cli);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      return 2;
    }
    throw e;
  }

  const { files, missing } = await expandTargets(cli);
  for (const m of missing) console.error(`File not found: ${m}`);
  let failed = missing.length > 0;

  // Fixed content goes to stdout, so the report moves to stderr
  const emit = cli.fix && (cli.printFixed || files.includes('-')) ? console.error : console.log;
  const jsonFiles: JsonFileResult[] = [];
  const allStatistics: CodeStatistic[][] = [];
  let total = 0;

  for (const file of files) {
    if (cli.verbose) console.error(`checking ${file}`);
    let outcome: FileOutcome;
    try {
      outcome = checkFile(file, cli, options);
    } catch (e) {
      if (!(e instanceof StructuralError)) throw e;
      failed = true;
      const filename = file === '-' ? '<stdin>' : file;
      if (cli.format === 'json') {
        jsonFiles.push(toJsonResult(filename, [], [], { row: e.row, kind: e.kind, message: e.message }));
      } else {
        emit(`${filename}:${e.row}:1: E902 ${e.message}`);
      }
      continue;
    }

    total += outcome.diagnostics.length;
    if (outcome.diagnostics.length > 0) failed = true;
    allStatistics.push(outcome.statistics);
    if (cli.verbose) {
      for (const f of outcome.failures) console.error(`${outcome.file}:${f.row}: checker ${f.checker} failed: ${f.message}`);
    }
    if (cli.format === 'json') {
      jsonFiles.push(toJsonResult(outcome.file, outcome.diagnostics, outcome.failures));
    } else if (outcome.diagnostics.length > 0) {
      emit(
        textReport(outcome.file, outcome.document, outcome.diagnostics, {
          showSource: cli.showSource,
          describe: cli.showRuleDocs ? (code) => defaultRegistry.findByCode(code)?.description : undefined,
        }),
      );
    }
  }

  if (cli.format === 'json') {
    const errorCount = jsonFiles.reduce((n, jf) => n + jf.errorCount, 0);
    const warningCount = jsonFiles.reduce((n, jf) => n + jf.warningCount, 0);
    emit(JSON.stringify({ valid: !failed, files: jsonFiles, errorCount, warningCount }, null, 2));
  } else if (cli.statistics && total > 0) {
    emit(statisticsReport(mergeStatistics(allStatistics)));
  }
  if (cli.count) console.error(String(total));
  return failed ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = 2;
  },
);
