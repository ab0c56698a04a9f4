import { describe, expect, it } from "vitest";
import type { RayFileHeader } from "@shared/ray-file";
import { RayFileError } from "../server/services/rays/errors";
import {
  decodeRayFileHeader,
  encodeRayFileHeader,
  rayFloatsPerRecord,
  readRayFileHeader,
} from "../server/services/rays/header-codec";
import { buildHeaderBytes } from "./helpers/ray-fixtures";

const codeOf = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (err) {
    return err instanceof RayFileError ? err.code : "not-a-ray-file-error";
  }
  return undefined;
};

const sampleHeader = () =>
  buildHeaderBytes({
    identifier: 1010,
    rayCount: 250,
    description: "LED source",
    floats7: [12.5, 12.5, 0.5, 0, 360, 0, 90],
    dimensionUnits: 3,
    location: [1, -2, 0.25],
    rotation: [0, 90, 0],
    scale: [1, 1, 2],
    unused: [0, 0, 0, 0],
    rayFormatType: 0,
    fluxType: 1,
    reserved1: 7,
    reserved2: -1,
  });

describe("ray file header codec", () => {
  it("decodes every field at its fixed offset", () => {
    const header = decodeRayFileHeader(sampleHeader());
    expect(header).toEqual<RayFileHeader>({
      identifier: 1010,
      ray_count: 250,
      description: "LED source",
      source_flux: 12.5,
      ray_set_flux: 12.5,
      wavelength: 0.5,
      azimuth_beg: 0,
      azimuth_end: 360,
      polar_beg: 0,
      polar_end: 90,
      dimension_units: 3,
      location: [1, -2, 0.25],
      rotation: [0, 90, 0],
      scale: [1, 1, 2],
      unused: [0, 0, 0, 0],
      ray_format_type: 0,
      flux_type: 1,
      reserved1: 7,
      reserved2: -1,
    });
  });

  it("re-encodes to the same 208 bytes", () => {
    const bytes = sampleHeader();
    const encoded = encodeRayFileHeader(decodeRayFileHeader(bytes));
    expect(encoded.byteLength).toBe(208);
    expect(Buffer.from(encoded).equals(Buffer.from(bytes))).toBe(true);
  });

  it("reads a header that sits inside a larger buffer", () => {
    const framed = new Uint8Array(208 + 16);
    framed.set(sampleHeader(), 8);
    expect(decodeRayFileHeader(framed.subarray(8)).ray_count).toBe(250);
  });

  it("rejects fewer than 208 bytes", () => {
    expect(() => decodeRayFileHeader(new Uint8Array(100))).toThrow(
      "File too small to contain valid header: 100 of 208 bytes",
    );
    expect(codeOf(() => decodeRayFileHeader(new Uint8Array(0)))).toBe("TruncatedHeader");
  });

  it("rejects an unknown identifier and names it", () => {
    const bytes = buildHeaderBytes({ identifier: 9999, rayCount: 2 });
    expect(codeOf(() => decodeRayFileHeader(bytes))).toBe("UnknownIdentifier");
    expect(() => decodeRayFileHeader(bytes)).toThrow("Incorrect file identifier: 9999");
  });

  it("accepts both known identifiers", () => {
    expect(decodeRayFileHeader(buildHeaderBytes({ identifier: 1010 })).identifier).toBe(1010);
    expect(decodeRayFileHeader(buildHeaderBytes({ identifier: 8675309 })).identifier).toBe(8675309);
  });

  it("rejects unknown record layouts", () => {
    expect(codeOf(() => decodeRayFileHeader(buildHeaderBytes({ rayFormatType: 1 })))).toBe("UnknownFormatType");
    expect(() => decodeRayFileHeader(buildHeaderBytes({ rayFormatType: 3 }))).toThrow(
      "Incorrect file format identifier: 3",
    );
  });

  it("checks the flux type against the record layout", () => {
    expect(decodeRayFileHeader(buildHeaderBytes({ rayFormatType: 0, fluxType: 1 })).flux_type).toBe(1);
    expect(decodeRayFileHeader(buildHeaderBytes({ rayFormatType: 2, fluxType: 0 })).ray_format_type).toBe(2);
    expect(codeOf(() => decodeRayFileHeader(buildHeaderBytes({ rayFormatType: 2, fluxType: 1 })))).toBe(
      "UnknownFluxType",
    );
    expect(() => decodeRayFileHeader(buildHeaderBytes({ rayFormatType: 0, fluxType: 2 }))).toThrow(
      "Incorrect flux type identifier: 2 (ray format type 0)",
    );
  });

  it("rejects a negative ray count", () => {
    expect(codeOf(() => decodeRayFileHeader(buildHeaderBytes({ rayCount: -5 })))).toBe("InvalidNumericField");
  });

  it("reads without validating when asked", () => {
    expect(readRayFileHeader(buildHeaderBytes({ identifier: 9999 })).identifier).toBe(9999);
  });

  it("refuses to encode an oversized description or non-int32 fields", () => {
    const header = decodeRayFileHeader(sampleHeader());
    expect(codeOf(() => encodeRayFileHeader({ ...header, description: "x".repeat(101) }))).toBe(
      "InvalidNumericField",
    );
    expect(encodeRayFileHeader({ ...header, description: "x".repeat(100) }).byteLength).toBe(208);
    expect(codeOf(() => encodeRayFileHeader({ ...header, dimension_units: 2 ** 31 }))).toBe("InvalidNumericField");
    expect(codeOf(() => encodeRayFileHeader({ ...header, source_flux: 1e40 }))).toBe("InvalidNumericField");
  });

  it("sizes records by format type", () => {
    expect(rayFloatsPerRecord(0)).toBe(7);
    expect(rayFloatsPerRecord(2)).toBe(8);
  });
});
