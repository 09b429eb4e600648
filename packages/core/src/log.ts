import { config } from "./config.js";

/**
 * Print a `[lineshape]` line when debug output is enabled.
 *
 * The message is built lazily so callers can pass a closure for anything
 * more expensive than a template string.
 */
export function debugLog(message: string | (() => string)): void {
  if (!config.get("debug")) return;
  const text = typeof message === "function" ? message() : message;
  console.log(`[lineshape] ${text}`);
}
