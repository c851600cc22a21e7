import { describe, it, expect } from 'vitest';
import { defaultCliOptions, parseCliArgs } from '../src/cli-options.js';

describe('parseCliArgs', () => {
  it('collects paths with defaults for everything else', () => {
    expect(parseCliArgs(['a.py', 'src'])).toEqual({ ok: true, options: { ...defaultCliOptions(), paths: ['a.py', 'src'] } });
  });

  it('accepts values after the flag or after an equals sign', () => {
    const parsed = parseCliArgs(['--max-line-length', '100', '--ignore=E2,W6', '--select', 'E225', '-']);
    expect(parsed.ok && parsed.options).toMatchObject({
      maxLineLength: 100,
      ignore: ['E2', 'W6'],
      select: ['E225'],
      paths: ['-'],
    });
  });

  it('collects repeated include and exclude globs', () => {
    const parsed = parseCliArgs(['-I', 'a/**/*.py', '--include=b/*.py,c/*.py', '-E', 'build/**', 'src']);
    expect(parsed.ok && parsed.options.include).toEqual(['a/**/*.py', 'b/*.py', 'c/*.py']);
    expect(parsed.ok && parsed.options.exclude).toEqual(['build/**']);
  });

  it('sets boolean switches', () => {
    const parsed = parseCliArgs(['--fix', '-n', '--statistics', '--count', '--show-source', '--no-gitignore', '-v', 'x.py']);
    expect(parsed.ok && parsed.options).toMatchObject({
      fix: true,
      dryRun: true,
      statistics: true,
      count: true,
      showSource: true,
      useGitignore: false,
      verbose: true,
    });
  });

  it('parses the output format case-insensitively', () => {
    const parsed = parseCliArgs(['-f', 'JSON', 'x.py']);
    expect(parsed.ok && parsed.options.format).toBe('json');
  });

  it('rejects bad values and unknown options', () => {
    expect(parseCliArgs(['--max-line-length', '0'])).toEqual({ ok: false, error: 'Invalid --max-line-length: 0' });
    expect(parseCliArgs(['--format', 'xml'])).toEqual({ ok: false, error: 'Unknown format: xml' });
    expect(parseCliArgs(['--ignore'])).toEqual({ ok: false, error: 'Missing value for --ignore' });
    expect(parseCliArgs(['--frobnicate'])).toEqual({ ok: false, error: 'Unknown option: --frobnicate' });
  });
});
