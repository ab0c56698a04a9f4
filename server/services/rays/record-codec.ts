import type { RayRecord } from "@shared/ray-file";
import { RayFileError } from "./errors";
import { formatFixed, formatScientific, parseFloatToken, toFloat32 } from "./number-format";

export const ASCII_RAY_FIELDS = 7;
export const ASCII_SPECTRAL_RAY_FIELDS = 8;

const FIELD_NAMES = ["x", "y", "z", "l", "m", "n", "flux", "wavelength"] as const;

export const rayRecordBytes = (floatsPerRecord: 7 | 8): number => floatsPerRecord * 4;

export const tokenizeLine = (line: string): string[] => {
  const trimmed = line.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
};

/** Reads one record at `offset`; the caller has already checked that enough bytes remain. */
export function decodeRayRecord(view: DataView, offset: number, floatsPerRecord: 7 | 8): RayRecord {
  const at = (index: number) => view.getFloat32(offset + index * 4, true);
  const record: RayRecord = {
    x: at(0),
    y: at(1),
    z: at(2),
    l: at(3),
    m: at(4),
    n: at(5),
    flux: at(6),
  };
  if (floatsPerRecord === 8) record.wavelength = at(7);
  return record;
}

/**
 * Decodes `count` consecutive records from a block, throwing UnexpectedEndOfRays at the
 * first record the block does not fully contain. `firstIndex` numbers the rays in
 * error messages.
 */
export function decodeRayBlock(
  block: Uint8Array,
  count: number,
  floatsPerRecord: 7 | 8,
  firstIndex: number,
  visit: (record: RayRecord, index: number) => void,
): void {
  const size = rayRecordBytes(floatsPerRecord);
  const view = new DataView(block.buffer, block.byteOffset, block.byteLength);
  for (let i = 0; i < count; i += 1) {
    const offset = i * size;
    if (offset + size > block.byteLength) {
      throw new RayFileError("UnexpectedEndOfRays", `Unexpected EOF at ray ${firstIndex + i}`);
    }
    visit(decodeRayRecord(view, offset, floatsPerRecord), firstIndex + i);
  }
}

export function encodeRayRecord(record: RayRecord, floatsPerRecord: 7 | 8, view: DataView, offset: number): void {
  const values = [record.x, record.y, record.z, record.l, record.m, record.n, record.flux];
  if (floatsPerRecord === 8) {
    if (record.wavelength === undefined) {
      throw new RayFileError("InvalidNumericField", "wavelength is required for spectral ray records");
    }
    values.push(record.wavelength);
  }
  values.forEach((value, index) => {
    view.setFloat32(offset + index * 4, toFloat32(value, FIELD_NAMES[index]), true);
  });
}

/** Native ASCII ray line without a terminator: six fixed-point fields, flux, optional wavelength. */
export function formatAsciiRayLine(record: RayRecord): string {
  const fields = [record.x, record.y, record.z, record.l, record.m, record.n].map((value) => formatFixed(value));
  fields.push(formatScientific(record.flux));
  if (record.wavelength !== undefined) fields.push(formatFixed(record.wavelength));
  return fields.join(" ");
}

/** Foreign-tool line: all seven fields in %.6E, trailing space included. */
export function formatForeignRayLine(record: RayRecord): string {
  const fields = [record.x, record.y, record.z, record.l, record.m, record.n, record.flux].map((value) =>
    formatScientific(value, 6, true),
  );
  return `${fields.join(" ")} `;
}

export function parseAsciiRayTokens(tokens: readonly string[], lineNumber: number): RayRecord {
  if (tokens.length !== ASCII_RAY_FIELDS && tokens.length !== ASCII_SPECTRAL_RAY_FIELDS) {
    throw new RayFileError(
      "InvalidNumericField",
      `line ${lineNumber}: expected ${ASCII_RAY_FIELDS} or ${ASCII_SPECTRAL_RAY_FIELDS} fields, got ${tokens.length}`,
    );
  }
  const values = tokens.map((token, index) => parseFloatToken(token, `line ${lineNumber} ${FIELD_NAMES[index]}`));
  const record: RayRecord = {
    x: values[0],
    y: values[1],
    z: values[2],
    l: values[3],
    m: values[4],
    n: values[5],
    flux: values[6],
  };
  if (values.length === ASCII_SPECTRAL_RAY_FIELDS) record.wavelength = values[7];
  return record;
}
