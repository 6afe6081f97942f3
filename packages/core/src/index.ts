/**
 * Core module exports for @symcalc/core
 *
 * This package provides:
 * - The error taxonomy raised by every engine layer
 * - Engine settings resolved from defaults, config files and the environment
 * - Prefixed debug logging
 */

export * from "./errors.js";
export * from "./config.js";
export * from "./logger.js";
