/**
 * Tree-walking interpreter for tinyscript.
 *
 * Executes a parsed Program by recursively visiting statements and
 * expressions. Calls are dispatched in one of three modes, decided when the
 * call frame is built:
 *
 *   - bare `m(...)` inside a method: the enclosing class's method, called
 *     with the current frame's `self` (if any), before any scope lookup;
 *   - `instance.m(...)`: the instance's method with `self` bound;
 *   - `ClassName.m(...)`: the class's method with no `self` at all.
 *
 * Every call scope's parent is the global scope.
 */

import {
  Program,
  Statement,
  Expression,
  AssignStatement,
  CallExpression,
  NewExpression,
  BinaryExpression,
  UnaryExpression,
  ForInStatement,
  ForRangeStatement,
  FunctionDeclaration,
  SourceLocation,
  CONSTRUCTOR_NAME,
  SELF_NAME,
} from './ast';
import { Environment } from './environment';
import {
  TinyValue,
  FunctionValue,
  InstanceValue,
  mkNull,
  mkBool,
  mkInt,
  mkFloat,
  mkString,
  mkList,
  mkDict,
  mkFunction,
  mkClass,
  isNumber,
  isTruthy,
  kindName,
  functionName,
  valueToString,
  valuesEqual,
  inspectValue,
} from './values';
import {
  TinyError,
  TinyTypeError,
  TinyArithmeticError,
  LimitExceededError,
  ArityError,
  StackOverflow,
  MemberNotFoundError,
  ReturnSignal,
} from './errors';
import { ClassRegistry } from './classes';
import { getMember, setMember, getIndex, setIndex } from './paths';
import { checkAssertion } from './assertions';
import { registerBuiltins } from './builtins';
import { RuntimeOptions, resolveOptions } from './config';

interface CallFrame {
  name: string;
  fn: FunctionValue;
  /** Bound instance; null for class-qualified and free calls */
  self: InstanceValue | null;
}

const HOST_STACK_EXHAUSTED = 'Maximum call stack size exceeded';

type ComparisonOperator = '<' | '<=' | '>' | '>=';

function ordered<T extends number | string>(op: ComparisonOperator, a: T, b: T): boolean {
  switch (op) {
    case '<': return a < b;
    case '<=': return a <= b;
    case '>': return a > b;
    case '>=': return a >= b;
  }
}

export class Interpreter {
  private globalEnv: Environment;
  private registry: ClassRegistry;
  private frames: CallFrame[] = [];
  private options: RuntimeOptions;

  constructor(program: Program, options?: Partial<RuntimeOptions>) {
    this.options = resolveOptions(options);
    this.globalEnv = new Environment();
    registerBuiltins(this.globalEnv);

    this.registry = ClassRegistry.fromDeclarations(program.classes);
    for (const cls of this.registry.all()) {
      this.globalEnv.define(cls.name, mkClass(cls));
    }
    for (const decl of program.functions ?? []) {
      this.globalEnv.define(decl.name, mkFunction(decl, null));
    }
  }

  /**
   * Invoke the configured entry point (`Test.main` by default) with no
   * arguments and no `self`.
   */
  run(): TinyValue {
    return this.invokeStatic(this.options.entryClass, this.options.entryMethod, []);
  }

  /**
   * Call `ClassName.method(args)` the way a class-qualified call in a
   * script does.
   */
  invokeStatic(className: string, methodName: string, args: TinyValue[]): TinyValue {
    const cls = this.registry.get(className);
    const method = cls.methods.get(methodName);
    if (method === undefined) {
      throw new MemberNotFoundError(methodName, `class ${cls.name}`);
    }
    const base = this.frames.length;
    try {
      return this.invoke(method, null, args);
    } catch (e) {
      if (e instanceof RangeError) {
        // invoke leaves its frames in place when the host stack runs out
        const names = this.frames.map(f => f.name);
        this.frames.length = base;
        if (e.message === HOST_STACK_EXHAUSTED) {
          const overflow = new StackOverflow(this.options.maxCallDepth, 'host call stack exhausted');
          overflow.captureCallStack(names);
          throw overflow;
        }
      }
      throw e;
    }
  }

  /** Number of active call frames. */
  get depth(): number {
    return this.frames.length;
  }

  // ==================================================================
  // Calls
  // ==================================================================

  private invoke(
    fn: FunctionValue,
    self: InstanceValue | null,
    args: TinyValue[],
    callSite?: SourceLocation,
  ): TinyValue {
    const name = functionName(fn);
    const params = fn.decl.params;
    if (args.length !== params.length) {
      throw new ArityError(name, params.length, args.length, callSite);
    }
    if (this.frames.length >= this.options.maxCallDepth) {
      throw new StackOverflow(this.options.maxCallDepth, undefined, callSite);
    }

    const callEnv = this.globalEnv.child();
    if (self !== null) {
      callEnv.define(SELF_NAME, self);
    }
    params.forEach((param, i) => callEnv.define(param, args[i]));

    this.frames.push({ name, fn, self });
    let result: TinyValue;
    try {
      this.trace(() => `call ${name}(${args.map(inspectValue).join(', ')})`);
      result = this.runBody(fn, callEnv);
      this.trace(() => `return ${name} -> ${inspectValue(result)}`);
    } catch (e) {
      // Near the host stack limit nothing more can run here; invokeStatic
      // reports the overflow and unwinds the frames.
      if (e instanceof RangeError) throw e;
      if (e instanceof TinyError) {
        e.captureCallStack(this.frames.map(f => f.name));
      }
      this.frames.pop();
      throw e;
    }
    this.frames.pop();
    return result;
  }

  private runBody(fn: FunctionValue, callEnv: Environment): TinyValue {
    try {
      this.execBlock(fn.decl.body, callEnv);
      return mkNull();
    } catch (e) {
      if (e instanceof ReturnSignal) return e.value;
      throw e;
    }
  }

  private callValue(callee: TinyValue, args: TinyValue[], callSite?: SourceLocation): TinyValue {
    switch (callee.kind) {
      case 'function':
        return this.invoke(callee, null, args, callSite);
      case 'bound_method':
        return this.invoke(callee.method, callee.self, args, callSite);
      case 'builtin':
        if (args.length !== callee.arity) {
          throw new ArityError(callee.name, callee.arity, args.length, callSite);
        }
        return callee.fn(args);
      case 'class':
        throw new TinyTypeError(`class ${callee.cls.name} is not callable; use new ${callee.cls.name}()`);
      default:
        throw new TinyTypeError(`${kindName(callee)} value ${inspectValue(callee)} is not callable`);
    }
  }

  private evalCall(expr: CallExpression, env: Environment): TinyValue {
    const callee = expr.callee;

    // Bare call inside a method: sibling methods of the enclosing class win
    if (callee.kind === 'identifier') {
      const frame = this.frames[this.frames.length - 1];
      const sibling = frame?.fn.owner?.methods.get(callee.name);
      if (frame !== undefined && sibling !== undefined) {
        const args = this.evalArgs(expr.args, env);
        return this.invoke(sibling, frame.self, args, expr.loc);
      }
    }

    const target = this.evalExpression(callee, env);
    const args = this.evalArgs(expr.args, env);
    return this.callValue(target, args, expr.loc);
  }

  private evalArgs(args: Expression[], env: Environment): TinyValue[] {
    return args.map(arg => this.evalExpression(arg, env));
  }

  private evalNew(expr: NewExpression, env: Environment): TinyValue {
    const cls = this.registry.get(expr.className);
    const args = this.evalArgs(expr.args, env);

    const fieldEnv = this.globalEnv.child();
    const instance = this.registry.construct(cls.name, field => this.evalExpression(field.init, fieldEnv));

    const ctor = cls.methods.get(CONSTRUCTOR_NAME);
    if (ctor !== undefined) {
      this.invoke(ctor, instance, args, expr.loc);
    } else if (args.length > 0) {
      throw new ArityError(`${cls.name}.${CONSTRUCTOR_NAME}`, 0, args.length, expr.loc);
    }
    return instance;
  }

  private trace(line: () => string): void {
    if (this.options.trace !== undefined) {
      const indent = '  '.repeat(Math.max(0, this.frames.length - 1));
      this.options.trace(indent + line());
    }
  }

  // ==================================================================
  // Statements
  // ==================================================================

  execBlock(body: Statement[], env: Environment): void {
    for (const stmt of body) {
      this.execStatement(stmt, env);
    }
  }

  private execStatement(stmt: Statement, env: Environment): void {
    try {
      this.execStatementInner(stmt, env);
    } catch (e) {
      if (e instanceof TinyError) e.locate(stmt.loc);
      throw e;
    }
  }

  private execStatementInner(stmt: Statement, env: Environment): void {
    switch (stmt.kind) {
      case 'var':
        env.define(stmt.name, this.evalExpression(stmt.init, env));
        return;
      case 'assign':
        this.execAssign(stmt, env);
        return;
      case 'expression':
        this.evalExpression(stmt.expression, env);
        return;
      case 'assert':
        checkAssertion(stmt, this.evalExpression(stmt.expression, env));
        return;
      case 'print':
        this.options.output(valueToString(this.evalExpression(stmt.expression, env)));
        return;
      case 'if':
        if (isTruthy(this.evalExpression(stmt.condition, env))) {
          this.execBlock(stmt.then, env.child());
        } else if (stmt.else !== undefined) {
          this.execBlock(stmt.else, env.child());
        }
        return;
      case 'while':
        while (isTruthy(this.evalExpression(stmt.condition, env))) {
          this.execBlock(stmt.body, env.child());
        }
        return;
      case 'for_in':
        this.execForIn(stmt, env);
        return;
      case 'for_range':
        this.execForRange(stmt, env);
        return;
      case 'return': {
        const value = stmt.value !== undefined ? this.evalExpression(stmt.value, env) : mkNull();
        throw new ReturnSignal(value);
      }
    }
  }

  private execAssign(stmt: AssignStatement, env: Environment): void {
    const target = stmt.target;
    switch (target.kind) {
      case 'identifier':
        env.set(target.name, this.evalExpression(stmt.value, env));
        return;
      case 'member': {
        // Every segment before the last is read; only the last is written
        const container = this.evalExpression(target.object, env);
        setMember(container, target.property, this.evalExpression(stmt.value, env));
        return;
      }
      case 'index': {
        const container = this.evalExpression(target.object, env);
        const index = this.evalExpression(target.index, env);
        setIndex(container, index, this.evalExpression(stmt.value, env));
        return;
      }
    }
  }

  private execForIn(stmt: ForInStatement, env: Environment): void {
    const iterable = this.evalExpression(stmt.iterable, env);

    // Iterate over a snapshot so the body may mutate the container
    let items: TinyValue[];
    if (iterable.kind === 'list') {
      items = [...iterable.elements];
    } else if (iterable.kind === 'dict') {
      items = Array.from(iterable.entries.keys(), mkString);
    } else {
      throw new TinyTypeError(`cannot iterate over ${kindName(iterable)}`);
    }

    for (const item of items) {
      const loopEnv = env.child();
      loopEnv.define(stmt.variable, item);
      this.execBlock(stmt.body, loopEnv);
    }
  }

  private execForRange(stmt: ForRangeStatement, env: Environment): void {
    const from = this.evalExpression(stmt.from, env);
    const to = this.evalExpression(stmt.to, env);
    const step = stmt.step !== undefined ? this.evalExpression(stmt.step, env) : mkInt(1);
    if (!isNumber(from) || !isNumber(to) || !isNumber(step)) {
      throw new TinyTypeError(
        `for range bounds must be numbers, got ${kindName(from)}, ${kindName(to)} and step ${kindName(step)}`,
      );
    }
    if (step.value === 0) {
      throw new TinyArithmeticError('for range step must not be zero');
    }

    const integral = from.kind === 'int' && to.kind === 'int' && step.kind === 'int';
    const ascending = step.value > 0;
    for (let i = from.value; ascending ? i <= to.value : i >= to.value; i += step.value) {
      const loopEnv = env.child();
      loopEnv.define(stmt.variable, integral ? this.exactInt(i) : mkFloat(i));
      this.execBlock(stmt.body, loopEnv);
    }
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  evalExpression(expr: Expression, env: Environment): TinyValue {
    try {
      return this.evalExpressionInner(expr, env);
    } catch (e) {
      if (e instanceof TinyError) e.locate(expr.loc);
      throw e;
    }
  }

  private evalExpressionInner(expr: Expression, env: Environment): TinyValue {
    switch (expr.kind) {
      case 'null': return mkNull();
      case 'bool': return mkBool(expr.value);
      case 'int': return this.exactInt(expr.value);
      case 'float': return mkFloat(expr.value);
      case 'string': return mkString(expr.value);
      case 'list': return mkList(this.evalArgs(expr.elements, env));
      case 'dict': {
        const entries = new Map<string, TinyValue>();
        for (const entry of expr.entries) {
          entries.set(entry.key, this.evalExpression(entry.value, env));
        }
        return mkDict(entries);
      }
      case 'identifier': return env.get(expr.name);
      case 'member': return getMember(this.evalExpression(expr.object, env), expr.property);
      case 'index': {
        const obj = this.evalExpression(expr.object, env);
        return getIndex(obj, this.evalExpression(expr.index, env));
      }
      case 'call': return this.evalCall(expr, env);
      case 'new': return this.evalNew(expr, env);
      case 'unary': return this.evalUnary(expr, env);
      case 'binary': return this.evalBinary(expr, env);
      case 'function': {
        const decl: FunctionDeclaration = {
          name: '<anonymous>',
          params: expr.params,
          body: expr.body,
          loc: expr.loc,
        };
        return mkFunction(decl, null);
      }
    }
  }

  private evalUnary(expr: UnaryExpression, env: Environment): TinyValue {
    const operand = this.evalExpression(expr.operand, env);
    switch (expr.operator) {
      case '-':
        if (operand.kind === 'int') return mkInt(-operand.value);
        if (operand.kind === 'float') return mkFloat(-operand.value);
        throw new TinyTypeError(`cannot negate ${kindName(operand)}`);
      case '!':
        return mkBool(!isTruthy(operand));
    }
  }

  private evalBinary(expr: BinaryExpression, env: Environment): TinyValue {
    const op = expr.operator;

    // Short-circuit for logical operators
    if (op === '&&') {
      const left = this.evalExpression(expr.left, env);
      if (!isTruthy(left)) return mkBool(false);
      return mkBool(isTruthy(this.evalExpression(expr.right, env)));
    }
    if (op === '||') {
      const left = this.evalExpression(expr.left, env);
      if (isTruthy(left)) return mkBool(true);
      return mkBool(isTruthy(this.evalExpression(expr.right, env)));
    }

    const left = this.evalExpression(expr.left, env);
    const right = this.evalExpression(expr.right, env);

    switch (op) {
      case '+': return this.evalAdd(left, right);
      case '-': return this.evalArith(op, left, right, (a, b) => a - b);
      case '*': return this.evalArith(op, left, right, (a, b) => a * b);
      case '/': return this.evalDiv(left, right);
      case '^': return this.evalPow(left, right);
      case '==': return mkBool(valuesEqual(left, right));
      case '!=': return mkBool(!valuesEqual(left, right));
      case '<': return mkBool(this.compareValues(op, left, right));
      case '<=': return mkBool(this.compareValues(op, left, right));
      case '>': return mkBool(this.compareValues(op, left, right));
      case '>=': return mkBool(this.compareValues(op, left, right));
    }
  }

  private evalAdd(left: TinyValue, right: TinyValue): TinyValue {
    // String concatenation
    if (left.kind === 'string' || right.kind === 'string') {
      const a = valueToString(left);
      const b = valueToString(right);
      try {
        return mkString(a + b);
      } catch (e) {
        if (e instanceof RangeError) {
          throw new LimitExceededError(`string of ${a.length + b.length} characters is too long`);
        }
        throw e;
      }
    }
    if (left.kind === 'list' && right.kind === 'list') {
      const size = left.elements.length + right.elements.length;
      try {
        return mkList([...left.elements, ...right.elements]);
      } catch (e) {
        if (e instanceof RangeError) {
          throw new LimitExceededError(`list of ${size} elements is too long`);
        }
        throw e;
      }
    }
    return this.evalArith('+', left, right, (a, b) => a + b);
  }

  private evalArith(
    op: string,
    left: TinyValue,
    right: TinyValue,
    apply: (a: number, b: number) => number,
  ): TinyValue {
    if (!isNumber(left) || !isNumber(right)) {
      throw new TinyTypeError(`cannot apply '${op}' to ${kindName(left)} and ${kindName(right)}`);
    }
    const result = apply(left.value, right.value);
    // If either operand is float, result is float
    if (left.kind === 'float' || right.kind === 'float') {
      return mkFloat(result);
    }
    return this.exactInt(result);
  }

  private evalDiv(left: TinyValue, right: TinyValue): TinyValue {
    if (!isNumber(left) || !isNumber(right)) {
      throw new TinyTypeError(`cannot divide ${kindName(left)} by ${kindName(right)}`);
    }
    if (right.value === 0) {
      throw new TinyArithmeticError('division by zero');
    }
    const quotient = left.value / right.value;
    if (left.kind === 'int' && right.kind === 'int' && Number.isInteger(quotient)) {
      return mkInt(quotient);
    }
    return mkFloat(quotient);
  }

  private evalPow(left: TinyValue, right: TinyValue): TinyValue {
    if (!isNumber(left) || !isNumber(right)) {
      throw new TinyTypeError(`cannot apply '^' to ${kindName(left)} and ${kindName(right)}`);
    }
    if (left.kind === 'int' && right.kind === 'int' && right.value >= 0) {
      return this.exactInt(left.value ** right.value);
    }
    return mkFloat(left.value ** right.value);
  }

  /** Integer results stay exact or fail; they never round. */
  private exactInt(n: number): TinyValue {
    if (!Number.isSafeInteger(n)) {
      throw new TinyArithmeticError(`integer result ${n} is outside the exact integer range`);
    }
    return mkInt(n);
  }

  private compareValues(op: ComparisonOperator, left: TinyValue, right: TinyValue): boolean {
    if (isNumber(left) && isNumber(right)) {
      return ordered(op, left.value, right.value);
    }
    if (left.kind === 'string' && right.kind === 'string') {
      return ordered(op, left.value, right.value);
    }
    throw new TinyTypeError(`cannot compare ${kindName(left)} and ${kindName(right)} with '${op}'`);
  }
}
