import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { fluxScaleFactor, sanitizeFlux, scaleFlux, scaleSelectedFlux } from "../server/services/rays/flux-scaler";
import { RaySet } from "../server/services/rays/ray-set";

const ray = (flux: number) => ({ x: 0, y: 0, z: 0, l: 0, m: 0, n: 1, flux });

describe("flux scaling", () => {
  it("scales by declared count over target", () => {
    expect(fluxScaleFactor(100000, 1000)).toBe(100);
    expect(fluxScaleFactor(3, 4)).toBe(0.75);
  });

  it("replaces non-finite and non-positive flux with the floor", () => {
    expect(sanitizeFlux(NaN)).toBe(1e-30);
    expect(sanitizeFlux(Infinity)).toBe(1e-30);
    expect(sanitizeFlux(-1)).toBe(1e-30);
    expect(sanitizeFlux(0)).toBe(1e-30);
    expect(sanitizeFlux(2)).toBe(2);
    expect(sanitizeFlux(0, 1e-12)).toBe(1e-12);
  });

  it("sanitizes after scaling", () => {
    expect(scaleFlux(0.5, 100)).toBe(50);
    expect(scaleFlux(NaN, 100)).toBe(1e-30);
    expect(scaleFlux(2, 0.25)).toBe(0.5);
    expect(scaleFlux(1e308, 10)).toBe(1e-30);
  });

  it("never yields a non-finite or non-positive flux", () => {
    fc.assert(
      fc.property(fc.double(), fc.double({ min: 1e-3, max: 1e3, noNaN: true }), (flux, scale) => {
        const scaled = scaleFlux(flux, scale);
        expect(Number.isFinite(scaled)).toBe(true);
        expect(scaled).toBeGreaterThan(0);
      }),
    );
  });

  it("scales only the selected rays, in selection order", () => {
    const rays = RaySet.fromRecords([ray(1), ray(NaN), ray(-2), ray(3)]);
    const done: number[] = [];
    const scaled = scaleSelectedFlux(rays, [3, 1, 0], 2, { onScaled: (i) => done.push(i) });
    expect(Array.from(scaled)).toEqual([6, 1e-30, 2]);
    expect(done).toEqual([0, 1, 2]);
  });
});
