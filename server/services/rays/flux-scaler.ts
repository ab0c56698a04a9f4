import type { RaySet } from "./ray-set";

export const DEFAULT_FLUX_FLOOR = 1e-30;

/** Ratio that keeps total flux constant when `originalRayCount` rays become `targetRayCount`. */
export function fluxScaleFactor(originalRayCount: number, targetRayCount: number): number {
  return originalRayCount / targetRayCount;
}

/** Downstream tools reject non-finite or non-positive flux, so those become the floor. */
export function sanitizeFlux(value: number, floor = DEFAULT_FLUX_FLOOR): number {
  return Number.isFinite(value) && value > 0 ? value : floor;
}

export function scaleFlux(flux: number, scale: number, floor = DEFAULT_FLUX_FLOOR): number {
  return sanitizeFlux(flux * scale, floor);
}

export type ScaleSelectionOptions = {
  floor?: number;
  onScaled?: (done: number) => void;
};

/** Scaled, sanitized flux for each selected ray, aligned with `indices`. */
export function scaleSelectedFlux(
  rays: RaySet,
  indices: ArrayLike<number>,
  scale: number,
  options: ScaleSelectionOptions = {},
): Float64Array {
  const floor = options.floor ?? DEFAULT_FLUX_FLOOR;
  const out = new Float64Array(indices.length);
  for (let i = 0; i < indices.length; i += 1) {
    options.onScaled?.(i);
    out[i] = scaleFlux(rays.flux(indices[i]), scale, floor);
  }
  return out;
}
