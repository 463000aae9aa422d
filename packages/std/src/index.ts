/**
 * @powser/std — Scalar Typeclasses
 *
 * Eq, Numeric, Fractional, Printable and the combined Field contract
 * the series engine is generic over, with instances for `number` and
 * generic numeric helpers.
 *
 * @example
 * ```ts
 * import { fieldNumber, pow } from "@powser/std";
 *
 * pow(3, 4, fieldNumber); // 81
 * fieldNumber.isZero(0);  // true
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";

// Generic operations
export * from "./typeclasses/numeric-ops.js";
