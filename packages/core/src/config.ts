/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the lineshape packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: LINESHAPE_* (for CI overrides)
 * 3. Config files: .lineshaperc, lineshape.config.cjs,
 *    package.json#lineshape, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@lineshape/core";
 *
 * config.get("debug")          // → boolean
 * config.get("excerptLength")  // → number
 *
 * config.set({ excerptLength: 40 });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Full lineshape configuration schema.
 */
export interface LineshapeConfig {
  /** Emit `[lineshape]` debug lines on the console */
  debug: boolean;
  /** Maximum number of input characters quoted in decode errors */
  excerptLength: number;
}

const DEFAULTS: LineshapeConfig = {
  debug: false,
  excerptLength: 80,
};

// ============================================================================
// Global State
// ============================================================================

let configStore: LineshapeConfig = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Keep only the recognised keys whose values have the right shape.
 */
function normalize(raw: unknown): Partial<LineshapeConfig> {
  const result: Partial<LineshapeConfig> = {};
  if (typeof raw !== "object" || raw === null) return result;

  const debug: unknown = Reflect.get(raw, "debug");
  if (typeof debug === "boolean") {
    result.debug = debug;
  }

  const excerptLength: unknown = Reflect.get(raw, "excerptLength");
  if (
    typeof excerptLength === "number" &&
    Number.isInteger(excerptLength) &&
    excerptLength > 0
  ) {
    result.excerptLength = excerptLength;
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "LINESHAPE_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   LINESHAPE_DEBUG=1               → { debug: true }
 *   LINESHAPE_EXCERPT_LENGTH=40     → { excerptLength: 40 }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Partial<LineshapeConfig> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // LINESHAPE_EXCERPT_LENGTH → excerptLength
    const configKey = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/_+([a-z0-9])/g, (_, ch: string) => ch.toUpperCase());

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

    envConfig[configKey] = parsedValue;
  }

  return normalize(envConfig);
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "lineshape";

function loadConfigFromFiles(): Partial<LineshapeConfig> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });
    const result = explorer.search();
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      return normalize(loaded);
    }
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.warn(`[lineshape] Ignoring unreadable config file: ${reason}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  // Merge: defaults < fileConfig < envConfig
  configStore = { ...DEFAULTS, ...fileConfig, ...envConfig };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value.
 */
function get<K extends keyof LineshapeConfig>(key: K): LineshapeConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically. Invalid values are ignored.
 */
function set(values: Partial<LineshapeConfig>): void {
  initializeConfig();
  configStore = { ...configStore, ...normalize(values) };
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<LineshapeConfig> {
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
 * Reset configuration to the unloaded state (mainly for testing).
 */
function reset(): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
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
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(
  cfg: Partial<LineshapeConfig>
): Partial<LineshapeConfig> {
  return cfg;
}
