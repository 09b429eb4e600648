/**
 * Core module exports for @lineshape/core
 *
 * This package provides:
 * - Configuration loading (defaults, config files, LINESHAPE_* variables)
 * - Debug logging gated on that configuration
 * - Exhaustiveness checks (unreachable)
 */

export { config, defineConfig, type LineshapeConfig } from "./config.js";
export { debugLog } from "./log.js";
export { unreachable } from "./safety.js";
