/**
 * Renders program trees back to tinyscript source text.
 *
 * Used for assertion messages when the parser did not keep the literal
 * source of an asserted expression, and for dumping whole programs.
 * Parentheses are emitted only where operator precedence needs them.
 */

import {
  Expression,
  Statement,
  BinaryOperator,
  FunctionDeclaration,
  ClassDeclaration,
  Program,
} from './ast';

export interface PrintOptions {
  /** Number of spaces per indentation level (default: 4) */
  indentSize: number;
}

const DEFAULT_OPTIONS: PrintOptions = {
  indentSize: 4,
};

const PRECEDENCE: Record<BinaryOperator, number> = {
  '||': 1,
  '&&': 2,
  '==': 3, '!=': 3,
  '<': 4, '<=': 4, '>': 4, '>=': 4,
  '+': 5, '-': 5,
  '*': 6, '/': 6,
  '^': 7,
};

const UNARY_PRECEDENCE = 8;
const POSTFIX_PRECEDENCE = 9;

function precedenceOf(expr: Expression): number {
  switch (expr.kind) {
    case 'binary': return PRECEDENCE[expr.operator];
    case 'unary': return UNARY_PRECEDENCE;
    case 'function': return 0;
    default: return POSTFIX_PRECEDENCE;
  }
}

function wrap(expr: Expression, minPrecedence: number): string {
  const text = formatExpression(expr);
  return precedenceOf(expr) < minPrecedence ? `(${text})` : text;
}

function formatFloat(value: number): string {
  const s = String(value);
  return Number.isInteger(value) ? s + '.0' : s;
}

/**
 * Render an expression as source text.
 */
export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'null': return 'null';
    case 'bool': return String(expr.value);
    case 'int': return String(expr.value);
    case 'float': return formatFloat(expr.value);
    case 'string': return JSON.stringify(expr.value);
    case 'list': return `[${expr.elements.map(formatExpression).join(', ')}]`;
    case 'dict': {
      const pairs = expr.entries.map(e => `${JSON.stringify(e.key)}: ${formatExpression(e.value)}`);
      return `{${pairs.join(', ')}}`;
    }
    case 'identifier': return expr.name;
    case 'member': return `${wrap(expr.object, POSTFIX_PRECEDENCE)}.${expr.property}`;
    case 'index': return `${wrap(expr.object, POSTFIX_PRECEDENCE)}[${formatExpression(expr.index)}]`;
    case 'call':
      return `${wrap(expr.callee, POSTFIX_PRECEDENCE)}(${expr.args.map(formatExpression).join(', ')})`;
    case 'new': return `new ${expr.className}(${expr.args.map(formatExpression).join(', ')})`;
    case 'unary': return `${expr.operator}${wrap(expr.operand, UNARY_PRECEDENCE)}`;
    case 'binary': {
      const p = PRECEDENCE[expr.operator];
      // `^` groups to the right, everything else to the left
      const rightAssoc = expr.operator === '^';
      const left = wrap(expr.left, rightAssoc ? p + 1 : p);
      const right = wrap(expr.right, rightAssoc ? p : p + 1);
      return `${left} ${expr.operator} ${right}`;
    }
    case 'function':
      return `function(${expr.params.join(', ')}) ... end`;
  }
}

class ProgramPrinter {
  private opts: PrintOptions;
  private lines: string[] = [];

  constructor(opts: PrintOptions) {
    this.opts = opts;
  }

  private emit(indent: number, text: string): void {
    this.lines.push(' '.repeat(indent * this.opts.indentSize) + text);
  }

  printProgram(program: Program): string {
    const blocks: Array<() => void> = [
      ...(program.functions ?? []).map(fn => () => this.printFunction(fn, 0)),
      ...program.classes.map(cls => () => this.printClass(cls)),
    ];
    blocks.forEach((print, i) => {
      if (i > 0) this.lines.push('');
      print();
    });
    return this.lines.join('\n') + '\n';
  }

  private printClass(cls: ClassDeclaration): void {
    this.emit(0, `class ${cls.name}`);
    for (const field of cls.fields) {
      this.emit(1, `var ${field.name} = ${formatExpression(field.init)}`);
    }
    for (const method of cls.methods) {
      this.printFunction(method, 1);
    }
    this.emit(0, 'end');
  }

  private printFunction(fn: FunctionDeclaration, indent: number): void {
    this.emit(indent, `function ${fn.name}(${fn.params.join(', ')})`);
    this.printBlock(fn.body, indent + 1);
    this.emit(indent, 'end');
  }

  private printBlock(body: Statement[], indent: number): void {
    for (const stmt of body) {
      this.printStatement(stmt, indent);
    }
  }

  private printStatement(stmt: Statement, indent: number): void {
    switch (stmt.kind) {
      case 'var':
        this.emit(indent, `var ${stmt.name} = ${formatExpression(stmt.init)}`);
        break;
      case 'assign':
        this.emit(indent, `${formatExpression(stmt.target)} = ${formatExpression(stmt.value)}`);
        break;
      case 'expression':
        this.emit(indent, formatExpression(stmt.expression));
        break;
      case 'assert':
        this.emit(indent, `assert ${stmt.source ?? formatExpression(stmt.expression)}`);
        break;
      case 'print':
        this.emit(indent, `print ${formatExpression(stmt.expression)}`);
        break;
      case 'return':
        this.emit(indent, stmt.value !== undefined ? `return ${formatExpression(stmt.value)}` : 'return');
        break;
      case 'if':
        this.emit(indent, `if ${formatExpression(stmt.condition)} {`);
        this.printBlock(stmt.then, indent + 1);
        if (stmt.else !== undefined) {
          this.emit(indent, '} else {');
          this.printBlock(stmt.else, indent + 1);
        }
        this.emit(indent, '}');
        break;
      case 'while':
        this.emit(indent, `while ${formatExpression(stmt.condition)} do`);
        this.printBlock(stmt.body, indent + 1);
        this.emit(indent, 'end');
        break;
      case 'for_in':
        this.emit(indent, `for ${stmt.variable} in ${formatExpression(stmt.iterable)} do`);
        this.printBlock(stmt.body, indent + 1);
        this.emit(indent, 'end');
        break;
      case 'for_range': {
        const step = stmt.step !== undefined ? ` step ${formatExpression(stmt.step)}` : '';
        this.emit(
          indent,
          `for ${stmt.variable} = ${formatExpression(stmt.from)} to ${formatExpression(stmt.to)}${step} do`,
        );
        this.printBlock(stmt.body, indent + 1);
        this.emit(indent, 'end');
        break;
      }
    }
  }
}

/**
 * Render a whole program as source text.
 */
export function formatProgram(program: Program, options?: Partial<PrintOptions>): string {
  const opts: PrintOptions = { ...DEFAULT_OPTIONS, ...options };
  return new ProgramPrinter(opts).printProgram(program);
}
