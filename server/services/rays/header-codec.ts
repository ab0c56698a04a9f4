/**
 * Fixed 208-byte little-endian ray file header.
 *
 * Layout (no padding):
 *   0   int32      identifier
 *   4   int32      ray_count
 *   8   byte[100]  description
 *   108 float32x7  source_flux, ray_set_flux, wavelength,
 *                  azimuth_beg, azimuth_end, polar_beg, polar_end
 *   136 int32      dimension_units
 *   140 float32x3  location
 *   152 float32x3  rotation
 *   164 float32x3  scale
 *   176 float32x4  unused
 *   192 int32      ray_format_type
 *   196 int32      flux_type
 *   200 int32      reserved1
 *   204 int32      reserved2
 */
import {
  RAY_DESCRIPTION_BYTES,
  RAY_FILE_IDENTIFIERS,
  RAY_HEADER_BYTES,
  type RayFileHeader,
  type Vec3,
} from "@shared/ray-file";
import { RayFileError } from "./errors";
import { toFloat32 } from "./number-format";

const OFFSET = {
  identifier: 0,
  ray_count: 4,
  description: 8,
  source_flux: 108,
  ray_set_flux: 112,
  wavelength: 116,
  azimuth_beg: 120,
  azimuth_end: 124,
  polar_beg: 128,
  polar_end: 132,
  dimension_units: 136,
  location: 140,
  rotation: 152,
  scale: 164,
  unused: 176,
  ray_format_type: 192,
  flux_type: 196,
  reserved1: 200,
  reserved2: 204,
} as const;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const isKnownIdentifier = (value: number): boolean =>
  RAY_FILE_IDENTIFIERS.some((identifier) => identifier === value);

/** Record width in float32 values for a header's ray_format_type. */
export function rayFloatsPerRecord(rayFormatType: number): 7 | 8 {
  return rayFormatType === 0 ? 7 : 8;
}

export function validateRayFileHeader(header: RayFileHeader): void {
  if (!isKnownIdentifier(header.identifier)) {
    throw new RayFileError("UnknownIdentifier", `Incorrect file identifier: ${header.identifier}`);
  }
  if (header.ray_format_type !== 0 && header.ray_format_type !== 2) {
    throw new RayFileError("UnknownFormatType", `Incorrect file format identifier: ${header.ray_format_type}`);
  }
  const fluxTypeOk =
    header.ray_format_type === 0 ? header.flux_type === 0 || header.flux_type === 1 : header.flux_type === 0;
  if (!fluxTypeOk) {
    throw new RayFileError(
      "UnknownFluxType",
      `Incorrect flux type identifier: ${header.flux_type} (ray format type ${header.ray_format_type})`,
    );
  }
  if (header.ray_count < 0) {
    throw new RayFileError("InvalidNumericField", `ray_count must be non-negative, got ${header.ray_count}`);
  }
}

const readVec3 = (view: DataView, offset: number): Vec3 => [
  view.getFloat32(offset, true),
  view.getFloat32(offset + 4, true),
  view.getFloat32(offset + 8, true),
];

const decodeDescription = (bytes: Uint8Array): string => {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end -= 1;
  return Buffer.from(bytes.buffer, bytes.byteOffset, end).toString("latin1");
};

/** Parses without validating; see {@link decodeRayFileHeader}. */
export function readRayFileHeader(bytes: Uint8Array): RayFileHeader {
  if (bytes.byteLength < RAY_HEADER_BYTES) {
    throw new RayFileError(
      "TruncatedHeader",
      `File too small to contain valid header: ${bytes.byteLength} of ${RAY_HEADER_BYTES} bytes`,
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, RAY_HEADER_BYTES);
  const f32 = (offset: number) => view.getFloat32(offset, true);
  const i32 = (offset: number) => view.getInt32(offset, true);
  return {
    identifier: i32(OFFSET.identifier),
    ray_count: i32(OFFSET.ray_count),
    description: decodeDescription(bytes.subarray(OFFSET.description, OFFSET.description + RAY_DESCRIPTION_BYTES)),
    source_flux: f32(OFFSET.source_flux),
    ray_set_flux: f32(OFFSET.ray_set_flux),
    wavelength: f32(OFFSET.wavelength),
    azimuth_beg: f32(OFFSET.azimuth_beg),
    azimuth_end: f32(OFFSET.azimuth_end),
    polar_beg: f32(OFFSET.polar_beg),
    polar_end: f32(OFFSET.polar_end),
    dimension_units: i32(OFFSET.dimension_units),
    location: readVec3(view, OFFSET.location),
    rotation: readVec3(view, OFFSET.rotation),
    scale: readVec3(view, OFFSET.scale),
    unused: [
      f32(OFFSET.unused),
      f32(OFFSET.unused + 4),
      f32(OFFSET.unused + 8),
      f32(OFFSET.unused + 12),
    ],
    ray_format_type: i32(OFFSET.ray_format_type),
    flux_type: i32(OFFSET.flux_type),
    reserved1: i32(OFFSET.reserved1),
    reserved2: i32(OFFSET.reserved2),
  };
}

export function decodeRayFileHeader(bytes: Uint8Array): RayFileHeader {
  const header = readRayFileHeader(bytes);
  validateRayFileHeader(header);
  return header;
}

export function encodeRayFileHeader(header: RayFileHeader): Uint8Array {
  validateRayFileHeader(header);
  const out = new Uint8Array(RAY_HEADER_BYTES);
  const view = new DataView(out.buffer);
  const f32 = (offset: number, value: number, field: string) => view.setFloat32(offset, toFloat32(value, field), true);
  const i32 = (offset: number, value: number, field: string) => {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new RayFileError("InvalidNumericField", `${field}: ${value} is not a 32-bit integer`);
    }
    view.setInt32(offset, value, true);
  };
  const vec = (offset: number, values: readonly number[], field: string) =>
    values.forEach((value, index) => f32(offset + index * 4, value, `${field}[${index}]`));

  const description = Buffer.from(header.description, "latin1");
  if (description.byteLength > RAY_DESCRIPTION_BYTES) {
    throw new RayFileError(
      "InvalidNumericField",
      `description is ${description.byteLength} bytes, limit is ${RAY_DESCRIPTION_BYTES}`,
    );
  }

  i32(OFFSET.identifier, header.identifier, "identifier");
  i32(OFFSET.ray_count, header.ray_count, "ray_count");
  out.set(description, OFFSET.description);
  f32(OFFSET.source_flux, header.source_flux, "source_flux");
  f32(OFFSET.ray_set_flux, header.ray_set_flux, "ray_set_flux");
  f32(OFFSET.wavelength, header.wavelength, "wavelength");
  f32(OFFSET.azimuth_beg, header.azimuth_beg, "azimuth_beg");
  f32(OFFSET.azimuth_end, header.azimuth_end, "azimuth_end");
  f32(OFFSET.polar_beg, header.polar_beg, "polar_beg");
  f32(OFFSET.polar_end, header.polar_end, "polar_end");
  i32(OFFSET.dimension_units, header.dimension_units, "dimension_units");
  vec(OFFSET.location, header.location, "location");
  vec(OFFSET.rotation, header.rotation, "rotation");
  vec(OFFSET.scale, header.scale, "scale");
  vec(OFFSET.unused, header.unused, "unused");
  i32(OFFSET.ray_format_type, header.ray_format_type, "ray_format_type");
  i32(OFFSET.flux_type, header.flux_type, "flux_type");
  i32(OFFSET.reserved1, header.reserved1, "reserved1");
  i32(OFFSET.reserved2, header.reserved2, "reserved2");
  return out;
}
