/**
 * Lexical scoping environment for the tinyscript interpreter.
 *
 * Each environment holds a map of variable slots and a reference to its
 * parent scope. The global scope has no parent; call scopes hang off the
 * global scope and block scopes off the scope they run in.
 */

import { TinyValue } from './values';
import { UnboundNameError, RedefinitionError } from './errors';

export class Environment {
  private vars: Map<string, TinyValue>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string): TinyValue {
    const value = this.vars.get(name);
    if (value !== undefined) {
      return value;
    }
    if (this.parent !== null) {
      return this.parent.get(name);
    }
    throw new UnboundNameError(name);
  }

  /**
   * Check if a variable is defined in this environment or any parent.
   */
  has(name: string): boolean {
    if (this.vars.has(name)) return true;
    if (this.parent !== null) return this.parent.has(name);
    return false;
  }

  /**
   * Reassign a variable in the nearest scope that owns it. Never creates
   * a binding.
   */
  set(name: string, value: TinyValue): void {
    if (this.vars.has(name)) {
      this.vars.set(name, value);
      return;
    }
    if (this.parent !== null) {
      this.parent.set(name, value);
      return;
    }
    throw new UnboundNameError(name);
  }

  /**
   * Define a new variable in the current scope.
   */
  define(name: string, value: TinyValue): void {
    if (this.vars.has(name)) {
      throw new RedefinitionError(name);
    }
    this.vars.set(name, value);
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }
}
