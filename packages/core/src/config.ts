/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the series engine.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: POWSER_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@powser/core";
 *
 * config.get("debug")            // → boolean
 * config.get("equality.terms")   // → number
 *
 * config.set({ trace: true });
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Options for termwise series comparison.
 */
export interface EqualityConfig {
  /** Number of leading coefficients compared by equalsUpTo() */
  terms?: number;
}

/**
 * Full configuration schema.
 */
export interface PowserConfig {
  /** Emit diagnostics for precondition failures and evaluation cycles */
  debug?: boolean;
  /** Emit a diagnostic line for every computed coefficient */
  trace?: boolean;
  /** Series comparison configuration */
  equality?: EqualityConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Thrown when a configuration value is present but unusable.
 */
export class ConfigError extends Error {
  constructor(
    readonly path: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Global State
// ============================================================================

export const DEFAULT_EQUALITY_TERMS = 10;

let configStore: Record<string, unknown> = {};
let configLoaded = false;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with POWSER_ are parsed into the config object.
 *
 * Examples:
 *   POWSER_DEBUG=1              → { debug: true }
 *   POWSER_EQUALITY_TERMS=20    → { equality: { terms: 20 } }
 */
function loadConfigFromEnv(): PowserConfig {
  const envConfig: PowserConfig = {};
  const PREFIX = "POWSER_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: PowserConfig = {
    debug: false,
    trace: false,
    equality: {
      terms: DEFAULT_EQUALITY_TERMS,
    },
  };

  // Merge: defaults < envConfig
  configStore = deepMerge(defaults, loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<PowserConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Reset configuration to defaults (mainly for testing).
 * Environment variables are re-read on the next access.
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
}

/**
 * The configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  reset,
};
