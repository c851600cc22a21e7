import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_MAX_LINE_LENGTH = 79;
// E24 covers E241/E242; W191 is the tabs-obsolete warning
export const DEFAULT_IGNORE: readonly string[] = ['E24', 'W191'];
export const CONFIG_FILE_NAME = 'pystyle.json';

const CodePrefix = z.string().regex(/^[EW]\d{0,3}$/, 'Expected a code prefix such as E2 or W291');

export const CheckOptionsSchema = z
  .object({
    maxLineLength: z.number().int().positive().default(DEFAULT_MAX_LINE_LENGTH),
    ignore: z.array(CodePrefix).default([...DEFAULT_IGNORE]),
    select: z.array(CodePrefix).default([]),
  })
  .strict();

export type CheckOptions = z.output<typeof CheckOptionsSchema>;
export type CheckOptionsInput = z.input<typeof CheckOptionsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`);
}

export const DEFAULT_OPTIONS: CheckOptions = CheckOptionsSchema.parse({});

export function resolveOptions(input: CheckOptionsInput = {}, source = 'options'): CheckOptions {
  const parsed = CheckOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

/** A code is suppressed when it starts with an ignored prefix and no selected prefix. */
export function isSuppressed(code: string, options: Pick<CheckOptions, 'ignore' | 'select'>): boolean {
  if (!options.ignore.some((prefix) => code.startsWith(prefix))) return false;
  return !options.select.some((prefix) => code.startsWith(prefix));
}

/** Read and validate a JSON configuration file. */
export function loadConfigFile(file: string): CheckOptionsInput {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(file, [e instanceof Error ? e.message : String(e)]);
  }
  const parsed = CheckOptionsSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(file, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Locate the configuration for a run: an explicit file wins, otherwise
 * `pystyle.json` in `cwd` when it exists.
 */
export function findConfigFile(explicit: string | undefined, cwd: string): string | undefined {
  if (explicit) return path.resolve(cwd, explicit);
  const candidate = path.join(cwd, CONFIG_FILE_NAME);
  return fs.existsSync(candidate) ? candidate : undefined;
}
