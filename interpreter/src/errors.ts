/**
 * Runtime error types for the tinyscript interpreter.
 *
 * Every failure a script run can end with is a TinyError subclass carrying
 * its kind. Errors are usually thrown without a location; the evaluator
 * stamps the innermost located node and the call stack as they pass outward.
 */

import { SourceLocation, formatLocation } from './ast';
import type { TinyValue } from './values';

export type ErrorKind =
  | 'AssertionFailure'
  | 'UnboundNameError'
  | 'KeyNotFoundError'
  | 'MemberNotFoundError'
  | 'ArityError'
  | 'RedefinitionError'
  | 'StackOverflow'
  | 'TypeMismatch'
  | 'IndexOutOfBounds'
  | 'ArithmeticError'
  | 'LimitExceeded';

export class TinyError extends Error {
  public readonly kind: ErrorKind;
  public readonly detail: string;
  private loc: SourceLocation | undefined;
  private frames: string[] | undefined;

  constructor(kind: ErrorKind, detail: string, location?: SourceLocation) {
    super(`${kind}${formatLocation(location)}: ${detail}`);
    this.name = kind;
    this.kind = kind;
    this.detail = detail;
    this.loc = location;
  }

  get location(): SourceLocation | undefined {
    return this.loc;
  }

  /** Frame names from outermost to innermost, once the error has left a call. */
  get callStack(): string[] {
    return this.frames ?? [];
  }

  /**
   * Attach a location unless one is already known. The first (innermost)
   * location wins.
   */
  locate(location: SourceLocation | undefined): this {
    if (this.loc === undefined && location !== undefined) {
      this.loc = location;
      this.message = `${this.kind}${formatLocation(location)}: ${this.detail}`;
    }
    return this;
  }

  captureCallStack(frames: string[]): void {
    if (this.frames === undefined) {
      this.frames = [...frames];
    }
  }
}

export class AssertionFailure extends TinyError {
  /** Source text of the asserted expression */
  public readonly sourceText: string;
  /** Snapshot of the falsy value the expression produced */
  public readonly actual: string;

  constructor(sourceText: string, actual: string, location?: SourceLocation) {
    super('AssertionFailure', `assertion failed: ${sourceText} (got ${actual})`, location);
    this.sourceText = sourceText;
    this.actual = actual;
  }
}

export class UnboundNameError extends TinyError {
  public readonly identifier: string;

  constructor(name: string, location?: SourceLocation) {
    super('UnboundNameError', `undefined variable '${name}'`, location);
    this.identifier = name;
  }
}

export class RedefinitionError extends TinyError {
  public readonly identifier: string;

  constructor(name: string, location?: SourceLocation) {
    super('RedefinitionError', `'${name}' is already defined in this scope`, location);
    this.identifier = name;
  }
}

export class KeyNotFoundError extends TinyError {
  public readonly key: string;

  constructor(key: string, location?: SourceLocation) {
    super('KeyNotFoundError', `no key '${key}' in dict`, location);
    this.key = key;
  }
}

export class MemberNotFoundError extends TinyError {
  public readonly member: string;

  constructor(member: string, owner: string, location?: SourceLocation) {
    super('MemberNotFoundError', `no member '${member}' on ${owner}`, location);
    this.member = member;
  }
}

export class ArityError extends TinyError {
  constructor(callee: string, expected: number, received: number, location?: SourceLocation) {
    const noun = expected === 1 ? 'argument' : 'arguments';
    super('ArityError', `'${callee}' takes ${expected} ${noun} but was called with ${received}`, location);
  }
}

export class StackOverflow extends TinyError {
  public readonly depth: number;

  constructor(depth: number, detail = `maximum call depth of ${depth} exceeded`, location?: SourceLocation) {
    super('StackOverflow', detail, location);
    this.depth = depth;
  }
}

export class TinyTypeError extends TinyError {
  constructor(message: string, location?: SourceLocation) {
    super('TypeMismatch', message, location);
  }
}

export class IndexOutOfBoundsError extends TinyError {
  constructor(index: number, size: number, location?: SourceLocation) {
    super('IndexOutOfBounds', `index ${index} out of bounds for list of size ${size}`, location);
  }
}

export class TinyArithmeticError extends TinyError {
  constructor(message: string, location?: SourceLocation) {
    super('ArithmeticError', message, location);
  }
}

/** A string or list would outgrow what the host can hold. */
export class LimitExceededError extends TinyError {
  constructor(message: string, location?: SourceLocation) {
    super('LimitExceeded', message, location);
  }
}

/**
 * Signal thrown to implement return statements.
 * This is NOT an error -- it unwinds to the nearest call frame.
 */
export class ReturnSignal {
  public readonly value: TinyValue;

  constructor(value: TinyValue) {
    this.value = value;
  }
}
