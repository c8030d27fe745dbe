/**
 * Program tree for tinyscript.
 *
 * This is the shape an external parser hands to the runtime: ordered class
 * declarations (fields and methods), optional free functions, and statement
 * lists made of the node types below. Every node may carry a source location.
 */

export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column */
  column: number;
  file?: string;
}

interface Node {
  loc?: SourceLocation;
}

// ---- Expressions ----

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '^'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '&&' | '||';

export type UnaryOperator = '-' | '!';

export interface NullLiteral extends Node { kind: 'null' }
export interface BoolLiteral extends Node { kind: 'bool'; value: boolean }
export interface IntLiteral extends Node { kind: 'int'; value: number }
export interface FloatLiteral extends Node { kind: 'float'; value: number }
export interface StringLiteral extends Node { kind: 'string'; value: string }
export interface ListLiteral extends Node { kind: 'list'; elements: Expression[] }

export interface DictEntry {
  key: string;
  value: Expression;
}

export interface DictLiteral extends Node { kind: 'dict'; entries: DictEntry[] }
export interface Identifier extends Node { kind: 'identifier'; name: string }

/** `object.property` */
export interface MemberExpression extends Node {
  kind: 'member';
  object: Expression;
  property: string;
}

/** `object[index]` */
export interface IndexExpression extends Node {
  kind: 'index';
  object: Expression;
  index: Expression;
}

export interface CallExpression extends Node {
  kind: 'call';
  callee: Expression;
  args: Expression[];
}

/** `new ClassName(args)` */
export interface NewExpression extends Node {
  kind: 'new';
  className: string;
  args: Expression[];
}

export interface UnaryExpression extends Node {
  kind: 'unary';
  operator: UnaryOperator;
  operand: Expression;
}

export interface BinaryExpression extends Node {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

/** Anonymous `function(params) ... end` */
export interface FunctionExpression extends Node {
  kind: 'function';
  params: string[];
  body: Statement[];
}

export type Expression =
  | NullLiteral
  | BoolLiteral
  | IntLiteral
  | FloatLiteral
  | StringLiteral
  | ListLiteral
  | DictLiteral
  | Identifier
  | MemberExpression
  | IndexExpression
  | CallExpression
  | NewExpression
  | UnaryExpression
  | BinaryExpression
  | FunctionExpression;

export type AssignmentTarget = Identifier | MemberExpression | IndexExpression;

// ---- Statements ----

/** `var name = init` */
export interface VarStatement extends Node {
  kind: 'var';
  name: string;
  init: Expression;
}

export interface AssignStatement extends Node {
  kind: 'assign';
  target: AssignmentTarget;
  value: Expression;
}

export interface ExpressionStatement extends Node {
  kind: 'expression';
  expression: Expression;
}

export interface AssertStatement extends Node {
  kind: 'assert';
  expression: Expression;
  /** Literal source text of the asserted expression, when the parser kept it */
  source?: string;
}

export interface PrintStatement extends Node {
  kind: 'print';
  expression: Expression;
}

export interface IfStatement extends Node {
  kind: 'if';
  condition: Expression;
  then: Statement[];
  else?: Statement[];
}

export interface WhileStatement extends Node {
  kind: 'while';
  condition: Expression;
  body: Statement[];
}

/** `for variable in iterable` */
export interface ForInStatement extends Node {
  kind: 'for_in';
  variable: string;
  iterable: Expression;
  body: Statement[];
}

/** `for variable = from to to [step step]`, inclusive */
export interface ForRangeStatement extends Node {
  kind: 'for_range';
  variable: string;
  from: Expression;
  to: Expression;
  step?: Expression;
  body: Statement[];
}

export interface ReturnStatement extends Node {
  kind: 'return';
  value?: Expression;
}

export type Statement =
  | VarStatement
  | AssignStatement
  | ExpressionStatement
  | AssertStatement
  | PrintStatement
  | IfStatement
  | WhileStatement
  | ForInStatement
  | ForRangeStatement
  | ReturnStatement;

// ---- Declarations ----

export interface FunctionDeclaration extends Node {
  name: string;
  params: string[];
  body: Statement[];
}

export interface FieldDeclaration extends Node {
  name: string;
  init: Expression;
}

export interface ClassDeclaration extends Node {
  name: string;
  fields: FieldDeclaration[];
  methods: FunctionDeclaration[];
}

export interface Program {
  classes: ClassDeclaration[];
  functions?: FunctionDeclaration[];
}

/** Name of the method called on construction, when a class declares one. */
export const CONSTRUCTOR_NAME = 'constructor';

/** Name under which the bound instance is visible inside a method. */
export const SELF_NAME = 'self';

/**
 * Render a location as ` [line N, col M]` (with the file when known), or
 * an empty string when there is none.
 */
export function formatLocation(loc: SourceLocation | undefined): string {
  if (loc === undefined) return '';
  const file = loc.file !== undefined ? `${loc.file}, ` : '';
  return ` [${file}line ${loc.line}, col ${loc.column}]`;
}
