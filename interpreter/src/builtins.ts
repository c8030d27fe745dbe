/**
 * Built-in functions for the tinyscript interpreter.
 */

import { Environment } from './environment';
import {
  TinyValue,
  mkBuiltin,
  mkInt,
  mkList,
  mkString,
  kindName,
} from './values';
import { TinyTypeError } from './errors';

/**
 * Register all built-in functions into the given environment.
 */
export function registerBuiltins(env: Environment): void {
  // ---- len(x) ----

  env.define('len', mkBuiltin('len', 1, (args: TinyValue[]): TinyValue => {
    const v = args[0];
    switch (v.kind) {
      case 'list': return mkInt(v.elements.length);
      case 'dict': return mkInt(v.entries.size);
      case 'string': return mkInt(Array.from(v.value).length);
      default:
        throw new TinyTypeError(`len() expects a list, dict or string, got ${kindName(v)}`);
    }
  }));

  // ---- push(list, value) ----

  env.define('push', mkBuiltin('push', 2, (args: TinyValue[]): TinyValue => {
    const list = args[0];
    if (list.kind !== 'list') {
      throw new TinyTypeError(`push() expects a list, got ${kindName(list)}`);
    }
    list.elements.push(args[1]);
    return list;
  }));

  // ---- keys(dict) ----

  env.define('keys', mkBuiltin('keys', 1, (args: TinyValue[]): TinyValue => {
    const dict = args[0];
    if (dict.kind !== 'dict') {
      throw new TinyTypeError(`keys() expects a dict, got ${kindName(dict)}`);
    }
    return mkList(Array.from(dict.entries.keys(), mkString));
  }));
}
