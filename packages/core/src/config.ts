/**
 * Configuration
 *
 * Tunables shared by the coordmap packages. Configuration is loaded lazily
 * from (in priority order):
 *
 * 1. Environment variables: COORDMAP_* (highest priority, for CI overrides)
 * 2. Config files: .coordmaprc, .coordmaprc.json, coordmap.config.cjs, the
 *    "coordmap" key of package.json (found by cosmiconfig)
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@coordmap/core";
 *
 * config.get("probeRows");            // → 10
 * config.get("linearize").step;       // → 1
 * config.set({ logLevel: "debug" });
 * ```
 *
 * @example Environment variables
 * ```bash
 * COORDMAP_LOG_LEVEL=debug            # → { logLevel: "debug" }
 * COORDMAP_LINEARIZE__STEP=0.5        # → { linearize: { step: 0.5 } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LinearizeConfig {
  /** Default finite-difference step */
  step: number;
  /** Default precision of the linearized matrix */
  dtype: "float32" | "float64";
}

export interface CoordmapConfig {
  /** Threshold of every logger created by createLogger */
  logLevel: LogLevel;
  /** Rows of the zero batch a coordinate map evaluates when it is built */
  probeRows: number;
  /** Relative pivot size under which a matrix counts as singular */
  singularTolerance: number;
  linearize: LinearizeConfig;
}

export type CoordmapConfigInput = Partial<Omit<CoordmapConfig, "linearize">> & {
  linearize?: Partial<LinearizeConfig>;
};

export interface ResetOptions {
  /** Directory cosmiconfig searches on the next load (defaults to the working directory) */
  searchFrom?: string;
}

const DEFAULTS: CoordmapConfig = {
  logLevel: "warn",
  probeRows: 10,
  singularTolerance: 1e-12,
  linearize: { step: 1, dtype: "float64" },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: CoordmapConfig = DEFAULTS;
let programmatic: CoordmapConfigInput = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "COORDMAP_";

function camelCase(word: string): string {
  return word.toLowerCase().replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Load configuration from environment variables.
 * Single underscores separate words of a key, double underscores nest.
 *
 * Examples:
 *   COORDMAP_PROBE_ROWS=4          → { probeRows: 4 }
 *   COORDMAP_LINEARIZE__DTYPE=float32 → { linearize: { dtype: "float32" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).split("__").map(camelCase).join(".");

    let parsedValue: unknown;
    if (value === "true") {
      parsedValue = true;
    } else if (value === "false") {
      parsedValue = false;
    } else if (value.trim() !== "" && !Number.isNaN(Number(value))) {
      parsedValue = Number(value);
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
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function warnInvalid(source: string, key: string, value: unknown): void {
  console.warn(`[coordmap/config] Ignoring invalid ${key} from ${source}: ${JSON.stringify(value)}`);
}

/**
 * Keep the well-formed entries of an untyped config object.
 */
function pickValid(raw: Record<string, unknown>, source: string): CoordmapConfigInput {
  const picked: CoordmapConfigInput = {};

  if ("logLevel" in raw) {
    const level = LOG_LEVELS.find((l) => l === raw.logLevel);
    if (level !== undefined) picked.logLevel = level;
    else warnInvalid(source, "logLevel", raw.logLevel);
  }

  if ("probeRows" in raw) {
    const rows = raw.probeRows;
    if (typeof rows === "number" && Number.isInteger(rows) && rows > 0) picked.probeRows = rows;
    else warnInvalid(source, "probeRows", rows);
  }

  if ("singularTolerance" in raw) {
    const tol = raw.singularTolerance;
    if (typeof tol === "number" && Number.isFinite(tol) && tol >= 0) picked.singularTolerance = tol;
    else warnInvalid(source, "singularTolerance", tol);
  }

  if ("linearize" in raw) {
    const lin = raw.linearize;
    if (isRecord(lin)) {
      const linearize: Partial<LinearizeConfig> = {};
      if ("step" in lin) {
        if (typeof lin.step === "number" && Number.isFinite(lin.step) && lin.step !== 0) {
          linearize.step = lin.step;
        } else {
          warnInvalid(source, "linearize.step", lin.step);
        }
      }
      if ("dtype" in lin) {
        if (lin.dtype === "float32" || lin.dtype === "float64") linearize.dtype = lin.dtype;
        else warnInvalid(source, "linearize.dtype", lin.dtype);
      }
      picked.linearize = linearize;
    } else {
      warnInvalid(source, "linearize", lin);
    }
  }

  return picked;
}

/**
 * Merge config layers (right takes precedence).
 */
function merge(base: CoordmapConfig, ...layers: CoordmapConfigInput[]): CoordmapConfig {
  let result = base;
  for (const layer of layers) {
    result = {
      ...result,
      ...layer,
      linearize: { ...result.linearize, ...layer.linearize },
    };
  }
  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "coordmap";

/**
 * Load configuration synchronously from files.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      if (isRecord(loaded)) return loaded;
      console.warn(`[coordmap/config] ${result.filepath} does not contain an object, ignoring it`);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[coordmap/config] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > programmatic > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = pickValid(loadConfigFromFiles(), configFilePath ?? "config file");
  const envConfig = pickValid(loadConfigFromEnv(), "environment");

  configStore = merge(DEFAULTS, programmatic, fileConfig, envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value.
 *
 * @example
 * config.get("logLevel")    // → "warn"
 */
function get<K extends keyof CoordmapConfig>(key: K): CoordmapConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 * Environment variables and config files still take precedence.
 */
function set(values: CoordmapConfigInput): void {
  programmatic = merge(DEFAULTS, programmatic, pickValid({ ...values }, "config.set()"));
  configLoaded = false;
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<CoordmapConfig> {
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
 * Reset configuration to defaults (mainly for testing).
 * Sources are read again on next access.
 */
function reset(options: ResetOptions = {}): void {
  configStore = DEFAULTS;
  programmatic = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Configuration API.
 */
export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: CoordmapConfigInput): CoordmapConfigInput {
  return cfg;
}
