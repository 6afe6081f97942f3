/**
 * Tests for engine settings resolution
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  DEFAULT_SETTINGS,
  loadSettings,
  resolveSettings,
  withSettings,
  resetConfig,
  defineConfig,
} from "../src/index.js";

describe("resolveSettings", () => {
  it("returns the defaults for an empty record", () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it("keeps valid entries", () => {
    const settings = resolveSettings({ precision: 20, angleMode: "degrees" });
    expect(settings.precision).toBe(20);
    expect(settings.angleMode).toBe("degrees");
    expect(settings.matrixEpsilon).toBe(1e-5);
  });

  it("drops invalid entries and reports them", () => {
    const reported: string[] = [];
    const settings = resolveSettings(
      { precision: -3, angleMode: "gradians", zeroEpsilon: 2, colour: "blue" },
      (key) => reported.push(key)
    );
    expect(settings.precision).toBe(10);
    expect(settings.angleMode).toBe("radians");
    expect(settings.zeroEpsilon).toBe(1e-7);
    expect(reported).toEqual(["precision", "angleMode", "zeroEpsilon", "colour"]);
  });

  it("accepts 0 and 1 as flags", () => {
    expect(resolveSettings({ debug: 1 }).debug).toBe(true);
    expect(resolveSettings({ substituteConstants: 0 }).substituteConstants).toBe(false);
  });

  it("freezes the result", () => {
    expect(Object.isFrozen(resolveSettings({}))).toBe(true);
  });
});

describe("withSettings", () => {
  it("derives a copy without touching the base", () => {
    const next = withSettings(DEFAULT_SETTINGS, { precision: 4 });
    expect(next.precision).toBe(4);
    expect(DEFAULT_SETTINGS.precision).toBe(10);
  });

  it("rejects invalid changes", () => {
    expect(() => withSettings(DEFAULT_SETTINGS, { precision: 0 })).toThrow(RangeError);
  });
});

describe("loadSettings", () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    resetConfig();
  });

  it("reads SYMCALC_* environment variables", () => {
    vi.stubEnv("SYMCALC_PRECISION", "25");
    vi.stubEnv("SYMCALC_ANGLE_MODE", "degrees");
    vi.stubEnv("SYMCALC_MATRIX_EPSILON", "1e-9");
    const settings = loadSettings();
    expect(settings.precision).toBe(25);
    expect(settings.angleMode).toBe("degrees");
    expect(settings.matrixEpsilon).toBe(1e-9);
  });

  it("lets programmatic overrides win over the environment", () => {
    vi.stubEnv("SYMCALC_PRECISION", "25");
    expect(loadSettings({ precision: 12 }).precision).toBe(12);
  });

  it("warns about invalid values only in debug mode", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubEnv("SYMCALC_MAX_ITERATIONS", "lots");

    expect(loadSettings().maxIterations).toBe(100);
    expect(warn).not.toHaveBeenCalled();

    expect(loadSettings({ debug: true }).maxIterations).toBe(100);
    expect(warn).toHaveBeenCalledWith('[symcalc:config] ignoring invalid setting maxIterations="lots"');
  });
});

describe("defineConfig", () => {
  it("returns its argument", () => {
    const cfg = { precision: 15 };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
