/**
 * Engine Configuration
 *
 * Settings are resolved from (in priority order):
 *
 * 1. Programmatic overrides passed to `loadSettings()` (highest priority)
 * 2. Environment variables: SYMCALC_* (for CI overrides)
 * 3. Config files found by cosmiconfig: .symcalcrc, symcalc.config.js, package.json#symcalc
 * 4. Defaults (lowest priority)
 *
 * The result is a frozen `EngineSettings` object. Evaluation code never
 * reads configuration directly; it receives settings as a parameter.
 *
 * @example
 * ```typescript
 * import { loadSettings } from "@symcalc/core";
 *
 * const settings = loadSettings({ precision: 20 });
 * settings.angleMode; // "radians"
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

export type AngleMode = "radians" | "degrees";

/**
 * Request-scoped evaluation settings.
 */
export interface EngineSettings {
  /** Significant digits kept by division and numeric rendering */
  readonly precision: number;
  /** Unit of trigonometric inputs and inverse-trigonometric outputs */
  readonly angleMode: AngleMode;
  /** Magnitude at or below which a numeric term counts as zero */
  readonly zeroEpsilon: number;
  /** Magnitude below which a matrix entry counts as zero during elimination */
  readonly matrixEpsilon: number;
  /** Residual and step tolerance of Newton iteration */
  readonly newtonTolerance: number;
  /** Iteration ceiling for Newton iteration and bracket search */
  readonly maxIterations: number;
  /** Term ceiling for series summation */
  readonly seriesMaxTerms: number;
  /** Decimal places used when displaying matrices */
  readonly displayPlaces: number;
  /** Replace `e` and `pi` by their values before evaluation */
  readonly substituteConstants: boolean;
  /** Emit `[symcalc:*]` debug logging */
  readonly debug: boolean;
}

/**
 * Shape of a config file or the `symcalc` key of package.json.
 */
export interface SymcalcConfig {
  precision?: number;
  angleMode?: AngleMode;
  zeroEpsilon?: number;
  matrixEpsilon?: number;
  newtonTolerance?: number;
  maxIterations?: number;
  seriesMaxTerms?: number;
  displayPlaces?: number;
  substituteConstants?: boolean;
  debug?: boolean;
}

export const DEFAULT_SETTINGS: EngineSettings = Object.freeze({
  precision: 10,
  angleMode: "radians",
  zeroEpsilon: 1e-7,
  matrixEpsilon: 1e-5,
  newtonTolerance: 1e-6,
  maxIterations: 100,
  seriesMaxTerms: 10000,
  displayPlaces: 5,
  substituteConstants: true,
  debug: false,
});

// ============================================================================
// Global State
// ============================================================================

let sourcesCache: Record<string, unknown> | undefined;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "SYMCALC_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   SYMCALC_DEBUG=1             → { debug: 1 }
 *   SYMCALC_ANGLE_MODE=degrees  → { angleMode: "degrees" }
 *   SYMCALC_ZERO_EPSILON=1e-9   → { zeroEpsilon: 1e-9 }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // SYMCALC_MATRIX_EPSILON → matrixEpsilon
    const name = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/_+([a-z])/g, (_match, letter: string) => letter.toUpperCase());

    let parsedValue: unknown;
    if (value === "true") {
      parsedValue = true;
    } else if (value === "false" || value === "") {
      parsedValue = false;
    } else if (value.trim() !== "" && Number.isFinite(Number(value))) {
      parsedValue = Number(value);
    } else {
      parsedValue = value;
    }

    envConfig[name] = parsedValue;
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "symcalc";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

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
  const result = explorer.search();
  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Validation
// ============================================================================

type Validator = (value: unknown) => boolean;

const isPositiveInteger: Validator = (v) => typeof v === "number" && Number.isInteger(v) && v > 0;
const isNonNegativeInteger: Validator = (v) =>
  typeof v === "number" && Number.isInteger(v) && v >= 0;
const isEpsilon: Validator = (v) => typeof v === "number" && v > 0 && v < 1;
const isFlag: Validator = (v) => typeof v === "boolean" || v === 0 || v === 1;
const isAngleMode: Validator = (v) => v === "radians" || v === "degrees";

const VALIDATORS: Record<keyof EngineSettings, Validator> = {
  precision: isPositiveInteger,
  angleMode: isAngleMode,
  zeroEpsilon: isEpsilon,
  matrixEpsilon: isEpsilon,
  newtonTolerance: isEpsilon,
  maxIterations: isPositiveInteger,
  seriesMaxTerms: isPositiveInteger,
  displayPlaces: isNonNegativeInteger,
  substituteConstants: isFlag,
  debug: isFlag,
};

function pickNumber(source: Record<string, unknown>, key: keyof EngineSettings, fallback: number) {
  const value = source[key];
  return typeof value === "number" ? value : fallback;
}

function pickFlag(source: Record<string, unknown>, key: keyof EngineSettings, fallback: boolean) {
  const value = source[key];
  return typeof value === "boolean" ? value : typeof value === "number" ? value === 1 : fallback;
}

/**
 * Validate a raw, merged configuration record. Invalid or unknown entries
 * are dropped in favour of the defaults and reported through `onInvalid`.
 */
export function resolveSettings(
  raw: Record<string, unknown>,
  onInvalid: (key: string, value: unknown) => void = () => {}
): EngineSettings {
  const valid: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const validator = isSettingKey(key) ? VALIDATORS[key] : undefined;
    if (validator && validator(value)) {
      valid[key] = value;
    } else {
      onInvalid(key, value);
    }
  }

  const angle = valid.angleMode;
  return Object.freeze({
    precision: pickNumber(valid, "precision", DEFAULT_SETTINGS.precision),
    angleMode: angle === "degrees" || angle === "radians" ? angle : DEFAULT_SETTINGS.angleMode,
    zeroEpsilon: pickNumber(valid, "zeroEpsilon", DEFAULT_SETTINGS.zeroEpsilon),
    matrixEpsilon: pickNumber(valid, "matrixEpsilon", DEFAULT_SETTINGS.matrixEpsilon),
    newtonTolerance: pickNumber(valid, "newtonTolerance", DEFAULT_SETTINGS.newtonTolerance),
    maxIterations: pickNumber(valid, "maxIterations", DEFAULT_SETTINGS.maxIterations),
    seriesMaxTerms: pickNumber(valid, "seriesMaxTerms", DEFAULT_SETTINGS.seriesMaxTerms),
    displayPlaces: pickNumber(valid, "displayPlaces", DEFAULT_SETTINGS.displayPlaces),
    substituteConstants: pickFlag(
      valid,
      "substituteConstants",
      DEFAULT_SETTINGS.substituteConstants
    ),
    debug: pickFlag(valid, "debug", DEFAULT_SETTINGS.debug),
  });
}

function isSettingKey(key: string): key is keyof EngineSettings {
  return Object.prototype.hasOwnProperty.call(VALIDATORS, key);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Merge config file and environment sources once and cache the result.
 */
function loadSources(): Record<string, unknown> {
  if (sourcesCache === undefined) {
    // Merge: fileConfig < envConfig
    sourcesCache = { ...loadConfigFromFiles(), ...loadConfigFromEnv(process.env) };
  }
  return sourcesCache;
}

/**
 * Resolve engine settings: defaults < config file < environment < overrides.
 */
export function loadSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  const invalid: Array<[string, unknown]> = [];
  const settings = resolveSettings({ ...loadSources(), ...overrides }, (key, value) =>
    invalid.push([key, value])
  );

  const log = createLogger("config", settings.debug);
  if (configFilePath) {
    log.debug(`loaded ${configFilePath}`);
  }
  for (const [key, value] of invalid) {
    log.warn(`ignoring invalid setting ${key}=${JSON.stringify(value)}`);
  }
  return settings;
}

/**
 * Derive new settings from existing ones, validating the changed entries.
 */
export function withSettings(
  base: EngineSettings,
  changes: Partial<EngineSettings>
): EngineSettings {
  return resolveSettings({ ...base, ...changes }, (key, value) => {
    throw new RangeError(`Invalid setting ${key}=${JSON.stringify(value)}`);
  });
}

/**
 * Forget cached file and environment sources (mainly for testing).
 */
export function resetConfig(): void {
  sourcesCache = undefined;
  configFilePath = undefined;
}

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: SymcalcConfig): SymcalcConfig {
  return cfg;
}
