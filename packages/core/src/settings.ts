/**
 * Typed accessors for configuration values the engine reads at run time.
 * An unusable value is reported as a config diagnostic (when `debug` is on)
 * and then thrown as ConfigError.
 */

import { config, ConfigError, DEFAULT_EQUALITY_TERMS } from "./config.js";
import { DiagnosticCategory, debugDiagnostic } from "./diagnostics.js";

function reject(path: string, message: string, value: unknown): never {
  debugDiagnostic({
    severity: "error",
    category: DiagnosticCategory.Configuration,
    message,
    notes: [`${path} is ${typeof value === "string" ? JSON.stringify(value) : String(value)}`],
  });
  throw new ConfigError(path, message);
}

/**
 * Number of leading coefficients compared when no explicit count is given.
 *
 * @throws ConfigError if `equality.terms` is not a positive integer
 */
export function equalityTerms(): number {
  const value = config.get("equality.terms");
  if (value === undefined) {
    return DEFAULT_EQUALITY_TERMS;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    return reject("equality.terms", `equality.terms must be a positive integer, got ${String(value)}`, value);
  }
  return value;
}
