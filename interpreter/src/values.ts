/**
 * Runtime value representations for the tinyscript interpreter.
 *
 * Lists, dicts and instances are reference types: the same object is shared
 * by every variable and container that holds it. Everything else is a plain
 * immutable record and behaves as a copy.
 */

import type { FunctionDeclaration, FieldDeclaration } from './ast';

export type TinyValue =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | ListValue
  | DictValue
  | InstanceValue
  | FunctionValue
  | BoundMethodValue
  | ClassValue
  | BuiltinValue;

export interface ListValue { kind: 'list'; elements: TinyValue[] }
export interface DictValue { kind: 'dict'; entries: Map<string, TinyValue> }

export interface InstanceValue {
  kind: 'instance';
  cls: TinyClass;
  fields: Map<string, TinyValue>;
}

export interface FunctionValue {
  kind: 'function';
  decl: FunctionDeclaration;
  /** Class the function was declared in; null for free and anonymous functions */
  owner: TinyClass | null;
}

export interface BoundMethodValue {
  kind: 'bound_method';
  method: FunctionValue;
  self: InstanceValue;
}

export interface ClassValue { kind: 'class'; cls: TinyClass }

export type BuiltinFn = (args: TinyValue[]) => TinyValue;

export interface BuiltinValue {
  kind: 'builtin';
  name: string;
  arity: number;
  fn: BuiltinFn;
}

/**
 * A declared class. Built once per declaration when the program loads and
 * never changed afterwards.
 */
export interface TinyClass {
  readonly name: string;
  readonly methods: ReadonlyMap<string, FunctionValue>;
  readonly fields: readonly FieldDeclaration[];
}

export type NumberValue = Extract<TinyValue, { kind: 'int' | 'float' }>;

// ---- Value constructors ----

const NULL: TinyValue = { kind: 'null' };
const TRUE: TinyValue = { kind: 'bool', value: true };
const FALSE: TinyValue = { kind: 'bool', value: false };

export function mkNull(): TinyValue {
  return NULL;
}

export function mkBool(value: boolean): TinyValue {
  return value ? TRUE : FALSE;
}

export function mkInt(value: number): TinyValue {
  return { kind: 'int', value };
}

export function mkFloat(value: number): TinyValue {
  return { kind: 'float', value };
}

export function mkString(value: string): TinyValue {
  return { kind: 'string', value };
}

export function mkList(elements: TinyValue[]): ListValue {
  return { kind: 'list', elements };
}

export function mkDict(entries: Map<string, TinyValue> = new Map()): DictValue {
  return { kind: 'dict', entries };
}

export function mkInstance(cls: TinyClass): InstanceValue {
  return { kind: 'instance', cls, fields: new Map() };
}

export function mkFunction(decl: FunctionDeclaration, owner: TinyClass | null): FunctionValue {
  return { kind: 'function', decl, owner };
}

export function mkBoundMethod(method: FunctionValue, self: InstanceValue): BoundMethodValue {
  return { kind: 'bound_method', method, self };
}

export function mkClass(cls: TinyClass): ClassValue {
  return { kind: 'class', cls };
}

export function mkBuiltin(name: string, arity: number, fn: BuiltinFn): BuiltinValue {
  return { kind: 'builtin', name, arity, fn };
}

// ---- Value utilities ----

export function isNumber(v: TinyValue): v is NumberValue {
  return v.kind === 'int' || v.kind === 'float';
}

/** Only `false` and `null` are falsy. */
export function isTruthy(v: TinyValue): boolean {
  switch (v.kind) {
    case 'null': return false;
    case 'bool': return v.value;
    default: return true;
  }
}

/** Name used for a value's kind in diagnostics. */
export function kindName(v: TinyValue): string {
  switch (v.kind) {
    case 'instance': return v.cls.name;
    case 'class': return `class ${v.cls.name}`;
    case 'bound_method': return 'method';
    default: return v.kind;
  }
}

/** Qualified name of a function, e.g. `Fibonacci.fib`. */
export function functionName(fn: FunctionValue): string {
  return fn.owner !== null ? `${fn.owner.name}.${fn.decl.name}` : fn.decl.name;
}

function formatFloat(n: number): string {
  const s = String(n);
  return Number.isFinite(n) && Number.isInteger(n) ? s + '.0' : s;
}

function render(v: TinyValue, quote: boolean, seen: Set<object>): string {
  switch (v.kind) {
    case 'null': return 'null';
    case 'bool': return String(v.value);
    case 'int': return String(v.value);
    case 'float': return formatFloat(v.value);
    case 'string': return quote ? JSON.stringify(v.value) : v.value;
    case 'list': {
      if (seen.has(v)) return '<cycle>';
      seen.add(v);
      const out = `[${v.elements.map(e => render(e, quote, seen)).join(', ')}]`;
      seen.delete(v);
      return out;
    }
    case 'dict': {
      if (seen.has(v)) return '<cycle>';
      seen.add(v);
      const pairs: string[] = [];
      v.entries.forEach((val, key) => {
        pairs.push(`${quote ? JSON.stringify(key) : key}: ${render(val, quote, seen)}`);
      });
      seen.delete(v);
      return `{${pairs.join(', ')}}`;
    }
    case 'instance': {
      if (seen.has(v)) return '<cycle>';
      seen.add(v);
      const fields: string[] = [];
      v.fields.forEach((val, key) => {
        fields.push(`${key}=${render(val, quote, seen)}`);
      });
      seen.delete(v);
      return `${v.cls.name}(${fields.join(', ')})`;
    }
    case 'function': return `<function ${functionName(v)}>`;
    case 'bound_method': return `<method ${functionName(v.method)}>`;
    case 'class': return `<class ${v.cls.name}>`;
    case 'builtin': return `<builtin ${v.name}>`;
  }
}

/** Print form: strings are written raw. */
export function valueToString(v: TinyValue): string {
  return render(v, false, new Set());
}

/** Diagnostic form: strings are quoted, at any depth. */
export function inspectValue(v: TinyValue): string {
  return render(v, true, new Set());
}

/**
 * `==` semantics: numbers, strings, bools and null compare by value (an int
 * equals a float of the same magnitude); containers, instances, functions
 * and classes compare by identity.
 */
export function valuesEqual(a: TinyValue, b: TinyValue): boolean {
  if (isNumber(a) && isNumber(b)) {
    return a.value === b.value;
  }
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'bound_method':
      return b.kind === 'bound_method' && a.method.decl === b.method.decl && a.self === b.self;
    case 'class':
      return b.kind === 'class' && a.cls === b.cls;
    default:
      return a === b;
  }
}
