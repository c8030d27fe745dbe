/**
 * The `assert` statement.
 *
 * A truthy value lets execution continue untouched. A falsy one raises an
 * AssertionFailure that carries the asserted source text and a snapshot of
 * the value; nothing in the language catches it.
 */

import { AssertStatement } from './ast';
import { TinyValue, isTruthy, inspectValue } from './values';
import { AssertionFailure } from './errors';
import { formatExpression } from './printer';

/**
 * Source text shown for an assertion: the parser's literal text when it
 * kept one, otherwise the expression rendered back to source.
 */
export function assertionSource(stmt: AssertStatement): string {
  return stmt.source ?? formatExpression(stmt.expression);
}

export function checkAssertion(stmt: AssertStatement, value: TinyValue): void {
  if (isTruthy(value)) return;
  throw new AssertionFailure(assertionSource(stmt), inspectValue(value), stmt.loc);
}
