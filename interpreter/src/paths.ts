/**
 * Member and index access: the protocol behind `a.b.c` and `a.b.c = v`.
 *
 * A path is walked left to right. Every segment but the last must already
 * exist as a container; nothing is created on the way. Because dicts and
 * instances are shared by reference, a write through one path is visible
 * through every alias of the containers it passes.
 */

import {
  TinyValue,
  mkBoundMethod,
  mkString,
  kindName,
  valueToString,
} from './values';
import { findMethod } from './classes';
import {
  KeyNotFoundError,
  MemberNotFoundError,
  TinyTypeError,
  IndexOutOfBoundsError,
} from './errors';

/**
 * Read `obj.name`. Dicts yield the entry; instances yield a field, or else
 * a method bound to the instance; classes yield the unbound method.
 */
export function getMember(obj: TinyValue, name: string): TinyValue {
  switch (obj.kind) {
    case 'dict': {
      const value = obj.entries.get(name);
      if (value === undefined) throw new KeyNotFoundError(name);
      return value;
    }
    case 'instance': {
      const field = obj.fields.get(name);
      if (field !== undefined) return field;
      const method = findMethod(obj.cls, name);
      if (method !== undefined) return mkBoundMethod(method, obj);
      throw new MemberNotFoundError(name, obj.cls.name);
    }
    case 'class': {
      const method = findMethod(obj.cls, name);
      if (method !== undefined) return method;
      throw new MemberNotFoundError(name, `class ${obj.cls.name}`);
    }
    default:
      throw new TinyTypeError(`cannot read member '${name}' of ${kindName(obj)}`);
  }
}

/**
 * Write `obj.name = value`, creating the key or field if it is absent.
 */
export function setMember(obj: TinyValue, name: string, value: TinyValue): void {
  switch (obj.kind) {
    case 'dict':
      obj.entries.set(name, value);
      return;
    case 'instance':
      obj.fields.set(name, value);
      return;
    default:
      throw new TinyTypeError(`cannot assign member '${name}' of ${kindName(obj)}`);
  }
}

/**
 * Read `root.k1.k2...kn`. An empty path yields the root.
 */
export function readPath(root: TinyValue, keys: readonly string[]): TinyValue {
  let current = root;
  for (const key of keys) {
    current = getMember(current, key);
  }
  return current;
}

/**
 * Write `root.k1...kn = value`. Intermediate segments are read with the
 * same rules as readPath; only the last key is created.
 */
export function writePath(root: TinyValue, keys: readonly string[], value: TinyValue): void {
  if (keys.length === 0) {
    throw new TinyTypeError('cannot write an empty path');
  }
  const container = readPath(root, keys.slice(0, -1));
  setMember(container, keys[keys.length - 1], value);
}

function listIndex(index: TinyValue, size: number): number {
  if (index.kind !== 'int') {
    throw new TinyTypeError(`list index must be int, got ${kindName(index)}`);
  }
  if (index.value < 0 || index.value >= size) {
    throw new IndexOutOfBoundsError(index.value, size);
  }
  return index.value;
}

function dictKey(index: TinyValue): string {
  if (index.kind !== 'string') {
    throw new TinyTypeError(`dict key must be string, got ${kindName(index)}`);
  }
  return index.value;
}

/**
 * Read `obj[index]`.
 */
export function getIndex(obj: TinyValue, index: TinyValue): TinyValue {
  switch (obj.kind) {
    case 'list':
      return obj.elements[listIndex(index, obj.elements.length)];
    case 'dict':
      return getMember(obj, dictKey(index));
    case 'string': {
      const chars = Array.from(obj.value);
      return mkString(chars[listIndex(index, chars.length)]);
    }
    default:
      throw new TinyTypeError(`cannot index into ${kindName(obj)} with ${valueToString(index)}`);
  }
}

/**
 * Write `obj[index] = value`. List indexes must be in bounds; dict keys
 * are created when absent.
 */
export function setIndex(obj: TinyValue, index: TinyValue, value: TinyValue): void {
  switch (obj.kind) {
    case 'list':
      obj.elements[listIndex(index, obj.elements.length)] = value;
      return;
    case 'dict':
      obj.entries.set(dictKey(index), value);
      return;
    default:
      throw new TinyTypeError(`cannot assign by index into ${kindName(obj)}`);
  }
}
