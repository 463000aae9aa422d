/**
 * Series Error Types
 *
 * One class per violated precondition, all sharing the SeriesError base so
 * callers can catch the family or switch on `kind`.
 */

export type SeriesErrorKind =
  | "zero-constant-required"
  | "nonzero-constant-required"
  | "no-principal-root"
  | "degenerate-inverse"
  | "evaluation-cycle";

/**
 * Base class for all series failures.
 */
export class SeriesError extends Error {
  constructor(
    message: string,
    readonly kind: SeriesErrorKind,
    readonly operation: string
  ) {
    super(message);
    this.name = "SeriesError";
  }
}

/**
 * Thrown by compose (on its inner argument), exp, inverse and log1p when
 * the constant term is not exactly zero.
 */
export class ZeroConstantRequiredError extends SeriesError {
  constructor(operation: string, constant: string) {
    super(
      `${operation} requires a series with zero constant term, got ${constant}`,
      "zero-constant-required",
      operation
    );
    this.name = "ZeroConstantRequiredError";
  }
}

/**
 * Thrown by reciprocal, divide and sqrt when the constant term is exactly zero.
 */
export class NonzeroConstantRequiredError extends SeriesError {
  constructor(operation: string) {
    super(
      `${operation} requires a series with nonzero constant term`,
      "nonzero-constant-required",
      operation
    );
    this.name = "NonzeroConstantRequiredError";
  }
}

/**
 * Thrown by sqrt when the constant term has no square root in the scalar domain.
 */
export class NoPrincipalRootError extends SeriesError {
  constructor(operation: string, constant: string) {
    super(
      `${operation}: constant term ${constant} has no principal square root in this field`,
      "no-principal-root",
      operation
    );
    this.name = "NoPrincipalRootError";
  }
}

/**
 * Thrown by inverse when the first-order coefficient is zero.
 */
export class DegenerateInverseError extends SeriesError {
  constructor(operation: string) {
    super(
      `${operation} requires a nonzero first-order coefficient`,
      "degenerate-inverse",
      operation
    );
    this.name = "DegenerateInverseError";
  }
}

/**
 * Thrown when computing a coefficient requires that same coefficient (or a
 * later one) of the same series before it has been cached. Always a defect
 * in a series definition.
 */
export class EvaluationCycleError extends SeriesError {
  constructor(
    readonly label: string,
    readonly index: number,
    readonly evaluating: number
  ) {
    super(
      `evaluation cycle: ${label}[${index}] was requested while ${label}[${evaluating}] was being computed`,
      "evaluation-cycle",
      label
    );
    this.name = "EvaluationCycleError";
  }
}
