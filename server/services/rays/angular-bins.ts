import { RayFileError } from "./errors";
import type { RaySet } from "./ray-set";

export type AngularGrid = {
  theta_bins: number;
  phi_bins: number;
};

export const DEFAULT_ANGULAR_GRID: AngularGrid = { theta_bins: 90, phi_bins: 180 };

/** Length floor for direction normalization; a zero vector lands in the theta = pi/2 row. */
export const DIRECTION_LENGTH_FLOOR = 1e-12;

export type AngularBin = {
  theta_index: number;
  phi_index: number;
  /** Offset of this bin's first member in {@link AngularBinning.members}. */
  start: number;
  population: number;
  /** Sum of finite, positive member flux. */
  flux: number;
};

export type AngularBinning = {
  grid: AngularGrid;
  /** Populated bins in order of first appearance. */
  bins: AngularBin[];
  /** Ray indices grouped contiguously by bin. */
  members: Uint32Array;
  total_flux: number;
  total_count: number;
};

/** Nearest integer, exact halves to the even neighbour. */
export const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

const clampIndex = (value: number, size: number) => Math.min(size - 1, Math.max(0, Math.floor(value)));

/** (theta_index, phi_index) of a direction; the direction need not be normalized. */
export function angularBinIndex(l: number, m: number, n: number, grid: AngularGrid): [number, number] {
  const length = Math.max(DIRECTION_LENGTH_FLOOR, Math.sqrt(l * l + m * m + n * n));
  const nl = l / length;
  const nm = m / length;
  const nn = Math.min(1, Math.max(-1, n / length));
  const theta = Math.acos(nn);
  const phi = Math.atan2(nm, nl);
  const thetaIndex = clampIndex((theta / Math.PI) * grid.theta_bins, grid.theta_bins);
  const phiNorm = (phi + Math.PI) / (2 * Math.PI);
  const phiIndex = clampIndex(phiNorm * grid.phi_bins, grid.phi_bins);
  return [thetaIndex, phiIndex];
}

export function binRaysByDirection(rays: RaySet, grid: AngularGrid = DEFAULT_ANGULAR_GRID): AngularBinning {
  const cellOf = new Int32Array(rays.size);
  const binOfCell = new Map<number, number>();
  const bins: AngularBin[] = [];
  let totalFlux = 0;

  for (let i = 0; i < rays.size; i += 1) {
    const [l, m, n] = rays.direction(i);
    if (!Number.isFinite(l) || !Number.isFinite(m) || !Number.isFinite(n)) {
      throw new RayFileError("InvalidNumericField", `ray ${i} has a non-finite direction (${l}, ${m}, ${n})`);
    }
    const [thetaIndex, phiIndex] = angularBinIndex(l, m, n, grid);
    const cell = thetaIndex * grid.phi_bins + phiIndex;
    let binIndex = binOfCell.get(cell);
    if (binIndex === undefined) {
      binIndex = bins.length;
      binOfCell.set(cell, binIndex);
      bins.push({ theta_index: thetaIndex, phi_index: phiIndex, start: 0, population: 0, flux: 0 });
    }
    const bin = bins[binIndex];
    const flux = rays.flux(i);
    // NaN, infinite and negative flux carry no weight
    const weight = Number.isFinite(flux) && flux > 0 ? flux : 0;
    bin.population += 1;
    bin.flux += weight;
    totalFlux += weight;
    cellOf[i] = binIndex;
  }

  let offset = 0;
  for (const bin of bins) {
    bin.start = offset;
    offset += bin.population;
  }
  const cursor = bins.map((bin) => bin.start);
  const members = new Uint32Array(rays.size);
  for (let i = 0; i < rays.size; i += 1) {
    members[cursor[cellOf[i]]++] = i;
  }

  return { grid, bins, members, total_flux: totalFlux, total_count: rays.size };
}

export const binMembers = (binning: AngularBinning, bin: AngularBin): Uint32Array =>
  binning.members.subarray(bin.start, bin.start + bin.population);

/**
 * Repeatedly lowers the currently largest value by one (ties: lowest index first),
 * never below `floor`, until `amount` units are removed or nothing is above the floor.
 * Returns the number of units removed. Works level by level instead of one unit at a time.
 */
export function levelDown(values: Int32Array, amount: number, floor: number): number {
  const order = Array.from(values.keys())
    .filter((index) => values[index] > floor)
    .sort((a, b) => values[b] - values[a] || a - b);
  if (order.length === 0 || amount <= 0) return 0;

  let remaining = amount;
  let level = values[order[0]];
  let top = 1;
  for (;;) {
    while (top < order.length && values[order[top]] === level) top += 1;
    const next = top < order.length ? values[order[top]] : floor;
    const capacity = (level - next) * top;
    if (capacity >= remaining) {
      const whole = Math.floor(remaining / top);
      level -= whole;
      remaining -= whole * top;
      break;
    }
    remaining -= capacity;
    level = next;
    if (top === order.length) break;
  }

  const leveled = order.slice(0, top).sort((a, b) => a - b);
  for (const index of leveled) values[index] = level;
  if (level > floor) {
    for (let i = 0; i < remaining && i < leveled.length; i += 1) {
      values[leveled[i]] -= 1;
    }
    remaining -= Math.min(remaining, leveled.length);
  }
  return amount - remaining;
}

/**
 * Per-bin sample quotas summing to exactly `target` whenever the bins hold at least
 * `target` rays. Quotas follow bin flux (bin counts when there is no flux), every
 * populated bin keeps at least one sample while that is possible, and no quota exceeds
 * its bin's population.
 */
export function allocateBinQuotas(binning: AngularBinning, target: number): Int32Array {
  const { bins } = binning;
  const quotas = new Int32Array(bins.length);
  if (bins.length === 0 || target <= 0) return quotas;

  const byFlux = binning.total_flux > 0;
  bins.forEach((bin, index) => {
    const share = byFlux ? bin.flux / binning.total_flux : bin.population / Math.max(1, binning.total_count);
    const proportional = roundHalfEven(target * share);
    quotas[index] = Math.min(bin.population, Math.max(1, proportional));
  });

  let total = quotas.reduce((sum, quota) => sum + quota, 0);
  if (total > target) {
    total -= levelDown(quotas, total - target, 1);
  } else if (total < target) {
    const spare = new Int32Array(bins.length);
    bins.forEach((bin, index) => {
      spare[index] = bin.population - quotas[index];
    });
    const added = levelDown(spare, target - total, 0);
    bins.forEach((bin, index) => {
      quotas[index] = bin.population - spare[index];
    });
    total += added;
  }

  if (total > target) {
    // more populated bins than samples: the weakest bins give up their single sample
    const weakest = Array.from(quotas.keys())
      .filter((index) => quotas[index] > 0)
      .sort((a, b) => bins[a].flux - bins[b].flux || bins[a].population - bins[b].population || b - a);
    for (const index of weakest) {
      if (total <= target) break;
      quotas[index] -= 1;
      total -= 1;
    }
  }
  return quotas;
}
