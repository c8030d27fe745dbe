/**
 * Node builders for assembling program trees in code.
 */

import {
  Expression,
  Statement,
  AssignmentTarget,
  BinaryOperator,
  UnaryOperator,
  FunctionDeclaration,
  FieldDeclaration,
  ClassDeclaration,
  Program,
  Identifier,
  MemberExpression,
  IndexExpression,
} from './ast';

// ---- Expressions ----

export const nil = (): Expression => ({ kind: 'null' });
export const bool = (value: boolean): Expression => ({ kind: 'bool', value });

export function int(value: number): Expression {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`int literal ${value} is outside the exact integer range`);
  }
  return { kind: 'int', value };
}

export const float = (value: number): Expression => ({ kind: 'float', value });
export const str = (value: string): Expression => ({ kind: 'string', value });
export const list = (...elements: Expression[]): Expression => ({ kind: 'list', elements });

export function dict(entries: Record<string, Expression> = {}): Expression {
  return {
    kind: 'dict',
    entries: Object.entries(entries).map(([key, value]) => ({ key, value })),
  };
}

export const ident = (name: string): Identifier => ({ kind: 'identifier', name });

export const member = (object: Expression, property: string): MemberExpression => ({
  kind: 'member',
  object,
  property,
});

/**
 * `path('a', 'b', 'c')` is `a.b.c`.
 */
export function path(root: string, ...properties: string[]): Identifier | MemberExpression {
  let expr: Identifier | MemberExpression = ident(root);
  for (const property of properties) {
    expr = member(expr, property);
  }
  return expr;
}

export const index = (object: Expression, at: Expression): IndexExpression => ({
  kind: 'index',
  object,
  index: at,
});

export const call = (callee: Expression, ...args: Expression[]): Expression => ({
  kind: 'call',
  callee,
  args,
});

export const newInstance = (className: string, ...args: Expression[]): Expression => ({
  kind: 'new',
  className,
  args,
});

export const unary = (operator: UnaryOperator, operand: Expression): Expression => ({
  kind: 'unary',
  operator,
  operand,
});

export const binary = (left: Expression, operator: BinaryOperator, right: Expression): Expression => ({
  kind: 'binary',
  operator,
  left,
  right,
});

export const lambda = (params: string[], ...body: Statement[]): Expression => ({
  kind: 'function',
  params,
  body,
});

// ---- Statements ----

export const varDecl = (name: string, init: Expression): Statement => ({ kind: 'var', name, init });

export const assign = (target: AssignmentTarget, value: Expression): Statement => ({
  kind: 'assign',
  target,
  value,
});

export const expr = (expression: Expression): Statement => ({ kind: 'expression', expression });

export const assert = (expression: Expression, source?: string): Statement =>
  source !== undefined ? { kind: 'assert', expression, source } : { kind: 'assert', expression };

export const print = (expression: Expression): Statement => ({ kind: 'print', expression });

export const ifThen = (condition: Expression, then: Statement[], otherwise?: Statement[]): Statement =>
  otherwise !== undefined
    ? { kind: 'if', condition, then, else: otherwise }
    : { kind: 'if', condition, then };

export const whileLoop = (condition: Expression, ...body: Statement[]): Statement => ({
  kind: 'while',
  condition,
  body,
});

export const forIn = (variable: string, iterable: Expression, ...body: Statement[]): Statement => ({
  kind: 'for_in',
  variable,
  iterable,
  body,
});

export function forRange(
  variable: string,
  bounds: { from: Expression; to: Expression; step?: Expression },
  ...body: Statement[]
): Statement {
  const { from, to, step } = bounds;
  return step !== undefined
    ? { kind: 'for_range', variable, from, to, step, body }
    : { kind: 'for_range', variable, from, to, body };
}

export const ret = (value?: Expression): Statement =>
  value !== undefined ? { kind: 'return', value } : { kind: 'return' };

// ---- Declarations ----

export const fn = (name: string, params: string[], ...body: Statement[]): FunctionDeclaration => ({
  name,
  params,
  body,
});

export const field = (name: string, init: Expression): FieldDeclaration => ({ name, init });

export function cls(
  name: string,
  members: { fields?: FieldDeclaration[]; methods?: FunctionDeclaration[] },
): ClassDeclaration {
  return { name, fields: members.fields ?? [], methods: members.methods ?? [] };
}

export function program(classes: ClassDeclaration[], functions?: FunctionDeclaration[]): Program {
  return functions !== undefined ? { classes, functions } : { classes };
}

/**
 * The usual test harness: a `Test` class whose `main` runs the given body.
 */
export function testProgram(body: Statement[], classes: ClassDeclaration[] = []): Program {
  return program([...classes, cls('Test', { methods: [fn('main', [], ...body)] })]);
}
