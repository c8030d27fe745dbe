/**
 * Program loader: validates a JSON program tree against the node schemas
 * and hands back a typed Program.
 */

import { z } from 'zod';
import * as fs from 'fs';
import {
  Program,
  Expression,
  Statement,
  AssignmentTarget,
  FunctionDeclaration,
  ClassDeclaration,
} from './ast';

export class ProgramLoadError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message);
    this.name = 'ProgramLoadError';
    this.issues = issues;
  }
}

// ---- Schemas ----

const name = z.string().min(1);

const location = z.object({
  line: z.number().int().min(1),
  column: z.number().int().min(1),
  file: z.string().optional(),
});

const loc = location.optional();

const binaryOperator = z.enum([
  '+', '-', '*', '/', '^',
  '==', '!=', '<', '<=', '>', '>=',
  '&&', '||',
]);

const unaryOperator = z.enum(['-', '!']);

export const expressionSchema: z.ZodType<Expression> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('null'), loc }),
    z.object({ kind: z.literal('bool'), value: z.boolean(), loc }),
    z.object({ kind: z.literal('int'), value: z.number().int().safe(), loc }),
    z.object({ kind: z.literal('float'), value: z.number(), loc }),
    z.object({ kind: z.literal('string'), value: z.string(), loc }),
    z.object({ kind: z.literal('list'), elements: z.array(expressionSchema), loc }),
    z.object({
      kind: z.literal('dict'),
      entries: z.array(z.object({ key: z.string(), value: expressionSchema })),
      loc,
    }),
    z.object({ kind: z.literal('identifier'), name, loc }),
    z.object({ kind: z.literal('member'), object: expressionSchema, property: name, loc }),
    z.object({ kind: z.literal('index'), object: expressionSchema, index: expressionSchema, loc }),
    z.object({ kind: z.literal('call'), callee: expressionSchema, args: z.array(expressionSchema), loc }),
    z.object({ kind: z.literal('new'), className: name, args: z.array(expressionSchema), loc }),
    z.object({ kind: z.literal('unary'), operator: unaryOperator, operand: expressionSchema, loc }),
    z.object({
      kind: z.literal('binary'),
      operator: binaryOperator,
      left: expressionSchema,
      right: expressionSchema,
      loc,
    }),
    z.object({
      kind: z.literal('function'),
      params: z.array(name),
      body: z.array(statementSchema),
      loc,
    }),
  ]),
);

const assignmentTarget: z.ZodType<AssignmentTarget> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('identifier'), name, loc }),
    z.object({ kind: z.literal('member'), object: expressionSchema, property: name, loc }),
    z.object({ kind: z.literal('index'), object: expressionSchema, index: expressionSchema, loc }),
  ]),
);

export const statementSchema: z.ZodType<Statement> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('var'), name, init: expressionSchema, loc }),
    z.object({ kind: z.literal('assign'), target: assignmentTarget, value: expressionSchema, loc }),
    z.object({ kind: z.literal('expression'), expression: expressionSchema, loc }),
    z.object({ kind: z.literal('assert'), expression: expressionSchema, source: z.string().optional(), loc }),
    z.object({ kind: z.literal('print'), expression: expressionSchema, loc }),
    z.object({
      kind: z.literal('if'),
      condition: expressionSchema,
      then: z.array(statementSchema),
      else: z.array(statementSchema).optional(),
      loc,
    }),
    z.object({ kind: z.literal('while'), condition: expressionSchema, body: z.array(statementSchema), loc }),
    z.object({
      kind: z.literal('for_in'),
      variable: name,
      iterable: expressionSchema,
      body: z.array(statementSchema),
      loc,
    }),
    z.object({
      kind: z.literal('for_range'),
      variable: name,
      from: expressionSchema,
      to: expressionSchema,
      step: expressionSchema.optional(),
      body: z.array(statementSchema),
      loc,
    }),
    z.object({ kind: z.literal('return'), value: expressionSchema.optional(), loc }),
  ]),
);

const functionDeclaration: z.ZodType<FunctionDeclaration> = z.object({
  name,
  params: z.array(name),
  body: z.array(statementSchema),
  loc,
});

// Fields and methods may be omitted, so the input type is wider than the output
const classDeclaration: z.ZodType<ClassDeclaration, z.ZodTypeDef, unknown> = z.object({
  name,
  fields: z.array(z.object({ name, init: expressionSchema, loc })).default([]),
  methods: z.array(functionDeclaration).default([]),
  loc,
});

export const programSchema: z.ZodType<Program, z.ZodTypeDef, unknown> = z.object({
  classes: z.array(classDeclaration),
  functions: z.array(functionDeclaration).optional(),
});

// ---- Loading ----

function describeIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

/**
 * Validate an already-parsed JSON value as a program tree.
 */
export function loadProgram(json: unknown): Program {
  const result = programSchema.safeParse(json);
  if (!result.success) {
    throw new ProgramLoadError('Invalid program tree', result.error.issues.map(describeIssue));
  }
  return result.data;
}

/**
 * Read a program tree from a JSON file.
 */
export function readProgramFile(filePath: string): Program {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ProgramLoadError(`Cannot read ${filePath}: ${reason}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ProgramLoadError(`${filePath} is not valid JSON: ${reason}`);
  }
  return loadProgram(json);
}
