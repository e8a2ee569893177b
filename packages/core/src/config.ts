/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: ZIPMAP_*
 * 3. Config files: package.json#zipmap, .zipmaprc, zipmap.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@zipmap/core";
 *
 * config.get("debug")                    // → boolean
 * config.get("binding.mode")             // → "auto" | "positional"
 *
 * config.set({ binding: { mode: "positional" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * How tuple fields are matched to a callable's parameters.
 *
 * - `auto` matches named fields to declared parameter names, the rest by position
 * - `positional` ignores field names entirely
 */
export type BindingMode = "auto" | "positional";

export interface BindingConfig {
  mode?: BindingMode;
}

export interface ErrorsConfig {
  /** Maximum characters of a value preview inside an error message */
  preview?: number;
}

/**
 * Full zipmap configuration schema.
 */
export interface ZipmapConfig {
  /** Enable debug logging */
  debug?: boolean;
  binding?: BindingConfig;
  errors?: ErrorsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Errors
// ============================================================================

/**
 * A config file was found but could not be loaded. The loader's own error is
 * kept as `cause`.
 */
export class ConfigError extends Error {
  constructor(
    readonly searchFrom: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid zipmap config file (searched from ${searchFrom}): ${detail}`, { cause });
    this.name = "ConfigError";
  }
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   ZIPMAP_DEBUG=1                  → { debug: true }
 *   ZIPMAP_BINDING_MODE=positional  → { binding: { mode: "positional" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "ZIPMAP_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
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

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
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
// Config File Loading
// ============================================================================

const MODULE_NAME = "zipmap";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const from = searchFrom ?? process.cwd();
  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search(from);
  } catch (error) {
    throw new ConfigError(from, error);
  }
  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: ZipmapConfig = {
  debug: false,
  binding: {
    mode: "auto",
  },
  errors: {
    preview: 60,
  },
};

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
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
function set(values: Partial<ZipmapConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing). The next read
 * searches for a config file from `searchFrom`, or the working directory.
 */
function reset(options: { searchFrom?: string } = {}): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

/**
 * The active binding mode. Unknown values fall back to `auto`.
 */
function getBindingMode(): BindingMode {
  return get("binding.mode") === "positional" ? "positional" : "auto";
}

function getPreviewLength(): number {
  const value = get("errors.preview");
  return typeof value === "number" && value > 0 ? value : 60;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  getBindingMode,
  getPreviewLength,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: ZipmapConfig): ZipmapConfig {
  return cfg;
}
