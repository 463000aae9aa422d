/**
 * Series Container
 *
 * A formal power series over a scalar field, evaluated lazily. Coefficients
 * are produced by a rule and cached in an append-only memo table. Index n is
 * never computed before index n - 1 is cached, so a rule may read any lower
 * coefficient of its own series (or of its operands) and nothing else.
 *
 * Re-entering an index that is still under evaluation is a definition defect
 * and raises EvaluationCycleError instead of recursing forever.
 *
 * @example
 * ```typescript
 * import { fieldRational } from "@powser/math";
 *
 * const geometric = Series.fromRule(fieldRational, () => fieldRational.one());
 * geometric.coefficient(5);  // { num: 1n, den: 1n }
 * geometric.tail().head();   // { num: 1n, den: 1n }
 * ```
 */

import { DiagnosticCategory, debugDiagnostic, traceDiagnostic, invariant } from "@powser/core";
import type { Field } from "@powser/std";
import { EvaluationCycleError } from "./errors.js";

/**
 * Computes coefficient n. Called at most once per index, in index order.
 */
export type CoefficientRule<A> = (n: number) => A;

export interface SeriesOptions {
  /** Name shown in trace lines and evaluation cycle errors (default: "series") */
  label?: string;
}

// ============================================================================
// Memo Store
// ============================================================================

/**
 * Rule plus memo table. Shared between a series and its tail views.
 */
class CoefficientStore<A> {
  private readonly memo: A[] = [];
  private evaluating: number | undefined;

  constructor(
    readonly field: Field<A>,
    private readonly rule: CoefficientRule<A>,
    readonly label: string
  ) {}

  get size(): number {
    return this.memo.length;
  }

  get(n: number): A {
    if (n < this.memo.length) {
      return this.memo[n];
    }

    if (this.evaluating !== undefined) {
      const error = new EvaluationCycleError(this.label, n, this.evaluating);
      debugDiagnostic({
        severity: "error",
        category: DiagnosticCategory.Evaluation,
        message: error.message,
        notes: [`${this.memo.length} coefficient(s) of ${this.label} are cached`],
      });
      throw error;
    }

    while (this.memo.length <= n) {
      const k = this.memo.length;
      this.evaluating = k;
      try {
        this.memo.push(this.rule(k));
      } finally {
        this.evaluating = undefined;
      }
      traceDiagnostic(() => `${this.label}[${k}] = ${this.field.display(this.memo[k])}`);
    }

    return this.memo[n];
  }
}

function assertIndex(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Coefficient index must be a non-negative integer, got ${n}`);
  }
}

// ============================================================================
// Series
// ============================================================================

export class Series<A> implements Iterable<A> {
  private tailView: Series<A> | undefined;

  private constructor(
    private readonly store: CoefficientStore<A>,
    private readonly offset: number
  ) {}

  get field(): Field<A> {
    return this.store.field;
  }

  get label(): string {
    return this.offset === 0 ? this.store.label : `${this.store.label}[${this.offset}:]`;
  }

  /**
   * Number of coefficients of this series already memoized.
   */
  get cached(): number {
    return Math.max(0, this.store.size - this.offset);
  }

  coefficient(n: number): A {
    assertIndex(n);
    return this.store.get(n + this.offset);
  }

  head(): A {
    return this.coefficient(0);
  }

  /**
   * The series with coefficient(k) = this.coefficient(k + 1). Shares this
   * series' memo table; repeated calls return the same object.
   */
  tail(): Series<A> {
    this.tailView ??= new Series(this.store, this.offset + 1);
    return this.tailView;
  }

  *[Symbol.iterator](): Iterator<A> {
    for (let n = 0; ; n++) {
      yield this.coefficient(n);
    }
  }

  toString(): string {
    const shown = Array.from({ length: this.cached }, (_, n) => this.field.display(this.coefficient(n)));
    return `${this.label}[${shown.join(", ")}${shown.length > 0 ? ", " : ""}...]`;
  }

  // ==========================================================================
  // Constructors
  // ==========================================================================

  /**
   * A polynomial: the given coefficients followed by zeros.
   */
  static fromArray<A>(field: Field<A>, coefficients: readonly A[], options: SeriesOptions = {}): Series<A> {
    const values = [...coefficients];
    return Series.fromRule(field, (n) => (n < values.length ? values[n] : field.zero()), options);
  }

  static fromRule<A>(field: Field<A>, rule: CoefficientRule<A>, options: SeriesOptions = {}): Series<A> {
    return new Series(new CoefficientStore(field, rule, options.label ?? "series"), 0);
  }

  /**
   * Pulls one element per coefficient, in order. Zero once the iterable is exhausted.
   */
  static fromIterable<A>(field: Field<A>, iterable: Iterable<A>, options: SeriesOptions = {}): Series<A> {
    const iterator = iterable[Symbol.iterator]();
    let pulled = 0;
    let exhausted = false;
    return Series.fromRule(
      field,
      (n) => {
        invariant(n === pulled, `fromIterable: expected index ${pulled}, got ${n}`);
        if (exhausted) {
          pulled++;
          return field.zero();
        }
        // A throwing source leaves `pulled` unchanged so the index can be retried
        const next = iterator.next();
        pulled++;
        if (next.done) {
          exhausted = true;
          return field.zero();
        }
        return next.value;
      },
      options
    );
  }

  /**
   * A series whose coefficients come from a body built on first demand.
   */
  static deferred<A>(field: Field<A>, build: () => Series<A>, options: SeriesOptions = {}): Series<A> {
    let body: Series<A> | undefined;
    return Series.fromRule(
      field,
      (n) => {
        body ??= build();
        return body.coefficient(n);
      },
      options
    );
  }

  /**
   * A self-referential series. `build` receives the series being defined and
   * returns its body; the body is built when coefficient 0 is first requested.
   * Reading an index of `self` that is still under evaluation raises
   * EvaluationCycleError.
   *
   * @example
   * ```typescript
   * // E = 1 + ∫E
   * const exp = Series.recursive(field, (self) => integrate(self, field.one()), { label: "exp" });
   * ```
   */
  static recursive<A>(
    field: Field<A>,
    build: (self: Series<A>) => Series<A>,
    options: SeriesOptions = {}
  ): Series<A> {
    const self: Series<A> = Series.deferred(field, () => build(self), options);
    return self;
  }
}
