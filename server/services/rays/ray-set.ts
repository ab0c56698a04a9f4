import type { RayRecord } from "@shared/ray-file";

export const RAY_STRIDE = 7;

const FLUX = 6;

/**
 * Contiguous ray arena: ray i occupies data[i*7 .. i*7+6] as x y z l m n flux.
 * Sampling passes indices around instead of copying records.
 */
export class RaySet {
  readonly data: Float64Array;
  readonly size: number;

  constructor(data: Float64Array, size: number) {
    this.data = data;
    this.size = size;
  }

  static fromRecords(records: readonly RayRecord[]): RaySet {
    const builder = new RaySetBuilder(records.length);
    for (const record of records) builder.push(record);
    return builder.build();
  }

  record(index: number): RayRecord {
    const base = index * RAY_STRIDE;
    const d = this.data;
    return { x: d[base], y: d[base + 1], z: d[base + 2], l: d[base + 3], m: d[base + 4], n: d[base + 5], flux: d[base + FLUX] };
  }

  flux(index: number): number {
    return this.data[index * RAY_STRIDE + FLUX];
  }

  direction(index: number): [number, number, number] {
    const base = index * RAY_STRIDE + 3;
    return [this.data[base], this.data[base + 1], this.data[base + 2]];
  }
}

export class RaySetBuilder {
  private data: Float64Array;
  private count = 0;

  constructor(initialCapacity = 1024) {
    this.data = new Float64Array(Math.max(1, initialCapacity) * RAY_STRIDE);
  }

  get size(): number {
    return this.count;
  }

  push(record: RayRecord): void {
    if ((this.count + 1) * RAY_STRIDE > this.data.length) {
      const grown = new Float64Array(this.data.length * 2);
      grown.set(this.data);
      this.data = grown;
    }
    const base = this.count * RAY_STRIDE;
    this.data[base] = record.x;
    this.data[base + 1] = record.y;
    this.data[base + 2] = record.z;
    this.data[base + 3] = record.l;
    this.data[base + 4] = record.m;
    this.data[base + 5] = record.n;
    this.data[base + FLUX] = record.flux;
    this.count += 1;
  }

  build(): RaySet {
    return new RaySet(this.data.slice(0, this.count * RAY_STRIDE), this.count);
  }
}
