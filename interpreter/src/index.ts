#!/usr/bin/env node
/**
 * tinyscript CLI entry point.
 *
 * Usage: tinyscript <program.json>
 *        tinyscript run <program.json> [--entry Class.method] [--max-depth n] [--trace]
 *        tinyscript check <program.json> [...]
 *        tinyscript print <program.json> [--indent n]
 */

import * as fs from 'fs';
import * as path from 'path';
import { readProgramFile, ProgramLoadError } from './loader';
import { ClassRegistry } from './classes';
import { formatProgram } from './printer';
import { runProgram, formatFailure, exitCodeFor, EXIT_CODES } from './outcome';
import { RuntimeOptions, ConfigError, parseEntry, optionsFromEnv } from './config';
import { TinyError } from './errors';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultIO: CliIO = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  env: process.env,
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Run the CLI with the given arguments and return the process exit code.
 */
export function runCli(args: string[], io: CliIO = defaultIO): number {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage(io);
    return args.length === 0 ? EXIT_CODES.usage : EXIT_CODES.ok;
  }

  try {
    switch (args[0]) {
      case 'check':
        return runCheck(args.slice(1), io);
      case 'print':
        return runPrint(args.slice(1), io);
      case 'run':
        return runFile(args.slice(1), io);
      default:
        // `tinyscript <program.json>` (shorthand)
        return runFile(args, io);
    }
  } catch (e) {
    if (e instanceof UsageError || e instanceof ConfigError || e instanceof ProgramLoadError) {
      io.stderr(`Error: ${e.message}`);
      return EXIT_CODES.usage;
    }
    throw e;
  }
}

/**
 * Load, then invoke the entry point. Flags win over environment variables.
 */
function runFile(args: string[], io: CliIO): number {
  const overrides: Partial<RuntimeOptions> = { ...optionsFromEnv(io.env) };
  let file: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--entry') {
      Object.assign(overrides, parseEntry(flagValue(args, ++i, arg)));
    } else if (arg === '--max-depth') {
      overrides.maxCallDepth = integerFlag(flagValue(args, ++i, arg), arg);
    } else if (arg === '--trace') {
      overrides.trace = line => io.stderr(`[trace] ${line}`);
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new UsageError('run requires a program file');
  }

  const program = readProgramFile(requireFile(file));
  const outcome = runProgram(program, { ...overrides, output: io.stdout });
  if (!outcome.ok) {
    io.stderr(formatFailure(outcome.failure));
  }
  return exitCodeFor(outcome);
}

/**
 * Validate one or more program files without running them.
 * Returns 0 if all files are clean, 3 if any fail to load.
 */
function runCheck(files: string[], io: CliIO): number {
  if (files.length === 0) {
    throw new UsageError('check requires at least one file argument');
  }

  let failed = 0;
  for (const file of files) {
    try {
      const program = readProgramFile(requireFile(file));
      const registry = ClassRegistry.fromDeclarations(program.classes);
      io.stdout(`${file}: OK (${registry.all().length} class${registry.all().length === 1 ? '' : 'es'})`);
    } catch (e) {
      if (e instanceof ProgramLoadError || e instanceof TinyError || e instanceof UsageError) {
        io.stderr(`${file}: ${e.message}`);
        failed++;
        continue;
      }
      throw e;
    }
  }

  if (failed > 0) {
    io.stderr(`${failed} of ${files.length} file${files.length === 1 ? '' : 's'} failed to load.`);
    return EXIT_CODES.usage;
  }
  return EXIT_CODES.ok;
}

function runPrint(args: string[], io: CliIO): number {
  let indentSize = 4;
  let file: string | undefined;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--indent') {
      indentSize = integerFlag(flagValue(args, ++i, '--indent'), '--indent');
    } else if (file === undefined) {
      file = args[i];
    } else {
      throw new UsageError(`Unexpected argument: ${args[i]}`);
    }
  }
  if (file === undefined) {
    throw new UsageError('print requires a program file');
  }

  const program = readProgramFile(requireFile(file));
  io.stdout(formatProgram(program, { indentSize }).trimEnd());
  return EXIT_CODES.ok;
}

function requireFile(file: string): string {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) {
    throw new UsageError(`File not found: ${resolved}`);
  }
  return resolved;
}

function flagValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function integerFlag(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new UsageError(`${flag} must be an integer, got '${value}'`);
  }
  return n;
}

function printUsage(io: CliIO): void {
  io.stdout('tinyscript v0.1.0');
  io.stdout('');
  io.stdout('Usage:');
  io.stdout('  tinyscript <program.json>                  Run a program');
  io.stdout('  tinyscript run <program.json> [options]    Run a program');
  io.stdout('  tinyscript check <program.json> [...]      Validate program files');
  io.stdout('  tinyscript print <program.json> [--indent n] Print a program as source');
  io.stdout('  tinyscript --help                          Show this help');
  io.stdout('');
  io.stdout('Options:');
  io.stdout('  --entry Class.method    Entry point (default Test.main, env TINYSCRIPT_ENTRY)');
  io.stdout('  --max-depth n           Call depth limit (default 400, env TINYSCRIPT_MAX_DEPTH)');
  io.stdout('  --trace                 Trace calls and returns to stderr');
}

if (require.main === module) {
  process.exit(runCli(process.argv.slice(2)));
}
