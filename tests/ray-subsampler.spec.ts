import { describe, expect, it } from "vitest";
import type { RayRecord } from "@shared/ray-file";
import { RayFileError } from "../server/services/rays/errors";
import {
  createRandomSource,
  mulberry32,
  rangeIndices,
  sampleWithoutReplacement,
  seedFromString,
} from "../server/services/rays/random";
import { RaySet } from "../server/services/rays/ray-set";
import {
  angularStratifiedSubsample,
  randomSubsample,
  SUBSAMPLE_STRATEGIES,
} from "../server/services/rays/subsampler";

const sphereRays = (count: number, seed: number): RaySet => {
  const random = mulberry32(seed);
  const records: RayRecord[] = [];
  for (let i = 0; i < count; i += 1) {
    const theta = Math.acos(2 * random() - 1);
    const phi = 2 * Math.PI * random();
    records.push({
      x: i,
      y: 0,
      z: 0,
      l: Math.sin(theta) * Math.cos(phi),
      m: Math.sin(theta) * Math.sin(phi),
      n: Math.cos(theta),
      flux: 0.5 + random(),
    });
  }
  return RaySet.fromRecords(records);
};

const distinct = (indices: Uint32Array) => new Set(indices).size;

describe("random sources", () => {
  it("repeats a sequence for the same seed", () => {
    const a = createRandomSource("test-seed");
    const b = createRandomSource("test-seed");
    const c = createRandomSource("other-seed");
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect([c(), c(), c()]).not.toEqual(first);
    expect(seedFromString("test-seed")).toBe(seedFromString("test-seed"));
  });

  it("draws values in [0, 1)", () => {
    const random = mulberry32(1);
    for (let i = 0; i < 1000; i += 1) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("samples distinct pool entries without touching the pool", () => {
    const pool = rangeIndices(50);
    const picked = sampleWithoutReplacement(pool, 20, mulberry32(3));
    expect(picked.length).toBe(20);
    expect(distinct(picked)).toBe(20);
    expect(Array.from(pool)).toEqual(Array.from({ length: 50 }, (_, i) => i));
    expect(sampleWithoutReplacement([4, 5], 10, mulberry32(3)).length).toBe(2);
    expect(sampleWithoutReplacement([4, 5], 0, mulberry32(3)).length).toBe(0);
  });
});

describe("randomSubsample", () => {
  it("returns exactly the target number of distinct indices", () => {
    const rays = sphereRays(300, 11);
    const picked = randomSubsample(rays, 120, { random: mulberry32(5) });
    expect(picked.length).toBe(120);
    expect(distinct(picked)).toBe(120);
    expect(Math.max(...picked)).toBeLessThan(300);
  });

  it("keeps every ray when the target equals the pool", () => {
    const picked = randomSubsample(sphereRays(40, 2), 40, { random: mulberry32(5) });
    expect(Array.from(picked).sort((a, b) => a - b)).toEqual(Array.from({ length: 40 }, (_, i) => i));
  });

  it("refuses a target larger than the pool", () => {
    expect(() => randomSubsample(sphereRays(10, 1), 11, { random: mulberry32(1) })).toThrow(
      new RayFileError("InsufficientRays", "File has only 10 rays, 11 requested"),
    );
  });
});

describe("angularStratifiedSubsample", () => {
  it("returns exactly the target for a spread of targets", () => {
    const rays = sphereRays(2000, 17);
    for (const target of [1, 13, 150, 999, 2000]) {
      const picked = angularStratifiedSubsample(rays, target, {
        random: mulberry32(target),
        grid: { theta_bins: 18, phi_bins: 36 },
      });
      expect(picked.length).toBe(target);
      expect(distinct(picked)).toBe(target);
    }
  });

  it("follows the flux of each direction", () => {
    const up = (i: number): RayRecord => ({ x: i, y: 0, z: 0, l: 0, m: 0, n: 1, flux: 1 });
    const side = (i: number): RayRecord => ({ x: i, y: 0, z: 0, l: 1, m: 0, n: 0, flux: 3 });
    const rays = RaySet.fromRecords([
      ...Array.from({ length: 100 }, (_, i) => up(i)),
      ...Array.from({ length: 100 }, (_, i) => side(100 + i)),
    ]);
    const picked = angularStratifiedSubsample(rays, 40, { random: mulberry32(9) });
    const fromUp = Array.from(picked).filter((index) => index < 100).length;
    expect(fromUp).toBe(10);
    expect(picked.length - fromUp).toBe(30);
  });

  it("is deterministic for a fixed random source", () => {
    const rays = sphereRays(500, 4);
    const a = angularStratifiedSubsample(rays, 64, { random: mulberry32(21) });
    const b = angularStratifiedSubsample(rays, 64, { random: mulberry32(21) });
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it("is registered beside the random strategy", () => {
    expect(Object.keys(SUBSAMPLE_STRATEGIES).sort()).toEqual(["angular_stratified", "random"]);
    expect(SUBSAMPLE_STRATEGIES.angular_stratified).toBe(angularStratifiedSubsample);
  });
});
