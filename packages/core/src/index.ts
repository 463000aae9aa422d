/**
 * Core module exports for @powser/core
 *
 * This package provides:
 * - Layered configuration (environment, programmatic, defaults)
 * - Console diagnostics with an injectable writer
 * - Runtime invariant checks
 */

// Configuration System
export {
  config,
  ConfigError,
  DEFAULT_EQUALITY_TERMS,
  type PowserConfig,
  type EqualityConfig,
} from "./config.js";

export { equalityTerms } from "./settings.js";

// Diagnostics
export {
  DiagnosticCategory,
  renderDiagnostic,
  printDiagnostic,
  debugDiagnostic,
  traceDiagnostic,
  setDiagnosticWriter,
  type Diagnostic,
  type DiagnosticWriter,
  type PrintOptions,
  type Severity,
} from "./diagnostics.js";

// Runtime Safety
export { invariant } from "./safety.js";
