/**
 * Result of running a program to completion, as seen by a host.
 */

import { Program, SourceLocation } from './ast';
import { Interpreter } from './interpreter';
import { TinyValue } from './values';
import { TinyError, AssertionFailure, ErrorKind } from './errors';
import { RuntimeOptions } from './config';

export interface RunFailure {
  kind: ErrorKind;
  /** Full message, including the location when known */
  message: string;
  detail: string;
  location?: SourceLocation;
  /** Frame names, outermost first */
  callStack: string[];
  /** Set for AssertionFailure only */
  sourceText?: string;
  actual?: string;
}

export type RunOutcome =
  | { ok: true; value: TinyValue }
  | { ok: false; failure: RunFailure };

export const EXIT_CODES = {
  ok: 0,
  assertion: 1,
  runtime: 2,
  usage: 3,
} as const;

const MAX_REPORTED_FRAMES = 10;

export function toFailure(error: TinyError): RunFailure {
  const failure: RunFailure = {
    kind: error.kind,
    message: error.message,
    detail: error.detail,
    location: error.location,
    callStack: error.callStack,
  };
  if (error instanceof AssertionFailure) {
    failure.sourceText = error.sourceText;
    failure.actual = error.actual;
  }
  return failure;
}

/**
 * Load a program and invoke its entry point. Script-level failures come
 * back as a failed outcome; anything else is a host bug and is rethrown.
 */
export function runProgram(program: Program, options?: Partial<RuntimeOptions>): RunOutcome {
  try {
    const interpreter = new Interpreter(program, options);
    return { ok: true, value: interpreter.run() };
  } catch (e) {
    if (e instanceof TinyError) {
      return { ok: false, failure: toFailure(e) };
    }
    throw e;
  }
}

/**
 * Multi-line report: the message, then the innermost frames.
 */
export function formatFailure(failure: RunFailure): string {
  const lines = [failure.message];
  const frames = [...failure.callStack].reverse();
  for (const name of frames.slice(0, MAX_REPORTED_FRAMES)) {
    lines.push(`  at ${name}`);
  }
  if (frames.length > MAX_REPORTED_FRAMES) {
    lines.push(`  ... ${frames.length - MAX_REPORTED_FRAMES} more`);
  }
  return lines.join('\n');
}

export function exitCodeFor(outcome: RunOutcome): number {
  if (outcome.ok) return EXIT_CODES.ok;
  return outcome.failure.kind === 'AssertionFailure' ? EXIT_CODES.assertion : EXIT_CODES.runtime;
}
