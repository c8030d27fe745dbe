/**
 * Public API of the tinyscript runtime.
 */

export * from './ast';
export * from './values';
export * from './errors';
export { Environment } from './environment';
export { ClassRegistry } from './classes';
export { getMember, setMember, readPath, writePath, getIndex, setIndex } from './paths';
export { checkAssertion, assertionSource } from './assertions';
export { registerBuiltins } from './builtins';
export {
  RuntimeOptions,
  RuntimeSettings,
  LineSink,
  DEFAULT_SETTINGS,
  ConfigError,
  resolveOptions,
  parseEntry,
  optionsFromEnv,
} from './config';
export { Interpreter } from './interpreter';
export { RunOutcome, RunFailure, EXIT_CODES, runProgram, toFailure, formatFailure, exitCodeFor } from './outcome';
export { loadProgram, readProgramFile, ProgramLoadError, programSchema } from './loader';
export { formatExpression, formatProgram, PrintOptions } from './printer';
