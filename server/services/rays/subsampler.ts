import type { TRaySamplingMethod } from "@shared/ray-file";
import {
  allocateBinQuotas,
  binMembers,
  binRaysByDirection,
  DEFAULT_ANGULAR_GRID,
  type AngularGrid,
} from "./angular-bins";
import { RayFileError } from "./errors";
import { rangeIndices, sampleWithoutReplacement, type RandomSource } from "./random";
import type { RaySet } from "./ray-set";

export type SubsampleContext = {
  random: RandomSource;
  grid?: AngularGrid;
};

/** Picks exactly `target` distinct ray indices from `rays`. */
export type SubsampleStrategy = (rays: RaySet, target: number, context: SubsampleContext) => Uint32Array;

const assertEnoughRays = (rays: RaySet, target: number) => {
  if (rays.size < target) {
    throw new RayFileError("InsufficientRays", `File has only ${rays.size} rays, ${target} requested`);
  }
};

export const randomSubsample: SubsampleStrategy = (rays, target, { random }) => {
  assertEnoughRays(rays, target);
  return sampleWithoutReplacement(rangeIndices(rays.size), target, random);
};

/**
 * Samples bin by bin over a theta/phi grid of directions so that the kept rays follow
 * the source's angular flux distribution, then trims or pads to the exact target.
 */
export const angularStratifiedSubsample: SubsampleStrategy = (rays, target, { random, grid }) => {
  assertEnoughRays(rays, target);
  const binning = binRaysByDirection(rays, grid ?? DEFAULT_ANGULAR_GRID);
  if (binning.bins.length === 0) {
    return randomSubsample(rays, target, { random });
  }

  const quotas = allocateBinQuotas(binning, target);
  const picked: number[] = [];
  binning.bins.forEach((bin, index) => {
    const quota = quotas[index];
    if (quota <= 0) return;
    const members = binMembers(binning, bin);
    if (quota >= members.length) {
      for (const member of members) picked.push(member);
    } else {
      for (const member of sampleWithoutReplacement(members, quota, random)) picked.push(member);
    }
  });

  if (picked.length > target) {
    picked.length = target;
  } else if (picked.length < target) {
    const chosen = new Uint8Array(rays.size);
    for (const index of picked) chosen[index] = 1;
    const remaining: number[] = [];
    for (let i = 0; i < rays.size; i += 1) {
      if (!chosen[i]) remaining.push(i);
    }
    for (const index of sampleWithoutReplacement(remaining, target - picked.length, random)) picked.push(index);
  }
  return Uint32Array.from(picked);
};

export const SUBSAMPLE_STRATEGIES: Record<TRaySamplingMethod, SubsampleStrategy> = {
  random: randomSubsample,
  angular_stratified: angularStratifiedSubsample,
};
