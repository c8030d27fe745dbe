/**
 * Runtime options: the entry point, the call depth limit and where output
 * and trace lines go.
 */

import { z } from 'zod';

export type LineSink = (line: string) => void;

export interface RuntimeOptions {
  /** Class holding the entry point (default: Test) */
  entryClass: string;
  /** Method invoked with no arguments and no self (default: main) */
  entryMethod: string;
  /** Calls nested deeper than this fail with StackOverflow */
  maxCallDepth: number;
  /** Receives one line per `print` */
  output: LineSink;
  /** Receives call/return trace lines when set */
  trace?: LineSink;
}

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier');

const settingsSchema = z.object({
  entryClass: identifier,
  entryMethod: identifier,
  maxCallDepth: z.number().int().min(1).max(100_000),
});

export type RuntimeSettings = z.infer<typeof settingsSchema>;

export const DEFAULT_SETTINGS: RuntimeSettings = {
  entryClass: 'Test',
  entryMethod: 'main',
  maxCallDepth: 400,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function writeStdout(line: string): void {
  process.stdout.write(line + '\n');
}

/**
 * Merge partial options over the defaults and validate the result.
 */
export function resolveOptions(options?: Partial<RuntimeOptions>): RuntimeOptions {
  const merged = { ...DEFAULT_SETTINGS, ...options };
  const parsed = settingsSchema.safeParse({
    entryClass: merged.entryClass,
    entryMethod: merged.entryMethod,
    maxCallDepth: merged.maxCallDepth,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid runtime options: ${issues.join('; ')}`);
  }
  return {
    ...parsed.data,
    output: options?.output ?? writeStdout,
    trace: options?.trace,
  };
}

/**
 * Parse an entry point written as `Class.method`.
 */
export function parseEntry(text: string): Pick<RuntimeSettings, 'entryClass' | 'entryMethod'> {
  const parts = text.split('.');
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    throw new ConfigError(`Entry point must be written as Class.method, got '${text}'`);
  }
  return { entryClass: parts[0], entryMethod: parts[1] };
}

/**
 * Read overrides from TINYSCRIPT_ENTRY and TINYSCRIPT_MAX_DEPTH.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv): Partial<RuntimeSettings> {
  const overrides: Partial<RuntimeSettings> = {};
  const entry = env.TINYSCRIPT_ENTRY;
  if (entry !== undefined && entry !== '') {
    Object.assign(overrides, parseEntry(entry));
  }
  const depth = env.TINYSCRIPT_MAX_DEPTH;
  if (depth !== undefined && depth !== '') {
    const n = Number(depth);
    if (!Number.isInteger(n)) {
      throw new ConfigError(`TINYSCRIPT_MAX_DEPTH must be an integer, got '${depth}'`);
    }
    overrides.maxCallDepth = n;
  }
  return overrides;
}
