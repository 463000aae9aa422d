/**
 * Eager precondition checks shared by the recursive operators. Each reads
 * only the coefficient it tests and reports a debug diagnostic before
 * throwing.
 */

import { DiagnosticCategory, debugDiagnostic } from "@powser/core";
import {
  DegenerateInverseError,
  NoPrincipalRootError,
  NonzeroConstantRequiredError,
  ZeroConstantRequiredError,
  type SeriesError,
} from "./errors.js";
import type { Series } from "./series.js";

function reject(error: SeriesError, operand: string): never {
  debugDiagnostic({
    severity: "error",
    category: DiagnosticCategory.Precondition,
    message: error.message,
    notes: [`operand: ${operand}`],
  });
  throw error;
}

/**
 * Returns the constant term, which must be exactly zero.
 */
export function requireZeroConstant<A>(series: Series<A>, operation: string): A {
  const c0 = series.head();
  if (!series.field.isZero(c0)) {
    reject(new ZeroConstantRequiredError(operation, series.field.display(c0)), series.label);
  }
  return c0;
}

/**
 * Returns the constant term, which must not be zero.
 */
export function requireNonzeroConstant<A>(series: Series<A>, operation: string): A {
  const c0 = series.head();
  if (series.field.isZero(c0)) {
    reject(new NonzeroConstantRequiredError(operation), series.label);
  }
  return c0;
}

/**
 * Returns the first-order coefficient, which must not be zero.
 */
export function requireNonzeroLinear<A>(series: Series<A>, operation: string): A {
  const c1 = series.coefficient(1);
  if (series.field.isZero(c1)) {
    reject(new DegenerateInverseError(operation), series.label);
  }
  return c1;
}

/**
 * Returns the principal square root of the (nonzero) constant term.
 */
export function requirePrincipalRoot<A>(series: Series<A>, operation: string): A {
  const c0 = requireNonzeroConstant(series, operation);
  const root = series.field.sqrt(c0);
  if (root === undefined) {
    return reject(new NoPrincipalRootError(operation, series.field.display(c0)), series.label);
  }
  return root;
}
