/**
 * Diagnostics
 *
 * Structured, console-rendered messages emitted by the series engine.
 * Output goes through a writer function (default: console.error) that
 * can be swapped process-wide or per call.
 *
 * @example
 * ```typescript
 * printDiagnostic({
 *   severity: "error",
 *   category: DiagnosticCategory.Evaluation,
 *   message: "evaluation cycle in exp[3]",
 *   notes: ["coefficient 3 was requested while it was being computed"],
 * });
 * // error[evaluation]: evaluation cycle in exp[3]
 * //    = note: coefficient 3 was requested while it was being computed
 * ```
 */

import { config } from "./config.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Trace = "trace",
  Evaluation = "evaluation",
  Precondition = "precondition",
  Configuration = "config",
}

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  readonly severity: Severity;
  readonly category: DiagnosticCategory;
  readonly message: string;
  readonly notes?: readonly string[];
}

export type DiagnosticWriter = (line: string) => void;

export interface PrintOptions {
  /** Custom writer function (default: the process-wide writer) */
  writer?: DiagnosticWriter;
}

// ============================================================================
// Writer
// ============================================================================

const consoleWriter: DiagnosticWriter = (line) => console.error(line);

let activeWriter: DiagnosticWriter = consoleWriter;

/**
 * Replace the process-wide writer. Passing undefined restores console.error.
 */
export function setDiagnosticWriter(writer: DiagnosticWriter | undefined): void {
  activeWriter = writer ?? consoleWriter;
}

// ============================================================================
// Rendering
// ============================================================================

export function renderDiagnostic(diagnostic: Diagnostic): string {
  const lines = [`${diagnostic.severity}[${diagnostic.category}]: ${diagnostic.message}`];
  for (const note of diagnostic.notes ?? []) {
    lines.push(`   = note: ${note}`);
  }
  return lines.join("\n");
}

export function printDiagnostic(diagnostic: Diagnostic, options: PrintOptions = {}): void {
  const writer = options.writer ?? activeWriter;
  writer(renderDiagnostic(diagnostic));
}

/**
 * Report a diagnostic only when `debug` is enabled.
 */
export function debugDiagnostic(diagnostic: Diagnostic, options: PrintOptions = {}): void {
  if (config.has("debug")) {
    printDiagnostic(diagnostic, options);
  }
}

/**
 * Report a trace line only when `trace` is enabled. The message is built
 * lazily so disabled tracing costs one config lookup.
 */
export function traceDiagnostic(message: () => string, options: PrintOptions = {}): void {
  if (config.has("trace")) {
    printDiagnostic(
      { severity: "info", category: DiagnosticCategory.Trace, message: message() },
      options
    );
  }
}
