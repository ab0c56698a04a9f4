import { describe, expect, it } from "vitest";
import { flagEnabled, readRayConfigEnv, resolveRayConfig } from "../server/config/env";
import { RayFileError } from "../server/services/rays/errors";

describe("ray toolkit configuration", () => {
  it("falls back to defaults with an empty environment", () => {
    expect(resolveRayConfig({}, {})).toEqual({
      theta_bins: 90,
      phi_bins: 180,
      flux_floor: 1e-30,
      progress_interval: 10_000,
      atomic_writes: false,
      binary_extensions: [".dat"],
    });
  });

  it("reads and coerces environment values", () => {
    const config = resolveRayConfig(
      {},
      {
        RAY_THETA_BINS: "45",
        RAY_PHI_BINS: " 90 ",
        RAY_FLUX_FLOOR: "1e-12",
        RAY_PROGRESS_INTERVAL: "500",
        RAY_ATOMIC_WRITES: "yes",
        RAY_BINARY_EXTENSIONS: "DAT, .bin",
        RAY_SAMPLE_SEED: "test-seed",
      },
    );
    expect(config).toEqual({
      theta_bins: 45,
      phi_bins: 90,
      flux_floor: 1e-12,
      progress_interval: 500,
      atomic_writes: true,
      binary_extensions: [".dat", ".bin"],
      sample_seed: "test-seed",
    });
  });

  it("treats blank environment values as unset", () => {
    expect(readRayConfigEnv({ RAY_THETA_BINS: "   " }).theta_bins).toBeUndefined();
    expect(resolveRayConfig({}, { RAY_THETA_BINS: "" }).theta_bins).toBe(90);
  });

  it("lets per-call overrides win", () => {
    const config = resolveRayConfig(
      { progress_interval: 7, atomic_writes: false, sample_seed: undefined },
      { RAY_PROGRESS_INTERVAL: "500", RAY_ATOMIC_WRITES: "1", RAY_SAMPLE_SEED: "env-seed" },
    );
    expect(config.progress_interval).toBe(7);
    expect(config.atomic_writes).toBe(false);
    expect(config.sample_seed).toBe("env-seed");
  });

  it("rejects invalid values as an invalid request", () => {
    expect(() => resolveRayConfig({}, { RAY_THETA_BINS: "0" })).toThrow(RayFileError);
    expect(() => resolveRayConfig({}, { RAY_PROGRESS_INTERVAL: "ten" })).toThrow(/progress_interval/);
    expect(() => resolveRayConfig({}, { RAY_ATOMIC_WRITES: "maybe" })).toThrow(/unrecognized flag value "maybe"/);
    try {
      resolveRayConfig({ flux_floor: -1 }, {});
    } catch (err) {
      expect(err).toBeInstanceOf(RayFileError);
      if (err instanceof RayFileError) expect(err.code).toBe("InvalidRequest");
    }
  });

  it("parses flag spellings", () => {
    expect(flagEnabled("on", false)).toBe(true);
    expect(flagEnabled(" FALSE ", true)).toBe(false);
    expect(flagEnabled("maybe", true)).toBe(true);
    expect(flagEnabled(undefined, false)).toBe(false);
  });
});
