import {
  NATIVE_RAY_FILE_DESCRIPTION,
  NATIVE_RAY_FILE_IDENTIFIER,
  type RayFileHeader,
  type RayRecord,
  type TRayOutputFormat,
} from "@shared/ray-file";
import { RayFileError } from "./errors";
import { sanitizeFlux } from "./flux-scaler";
import { encodeRayFileHeader } from "./header-codec";
import { parseIntegerToken } from "./number-format";
import type { RayOutputSink } from "./output-file";
import { encodeRayRecord, formatAsciiRayLine, formatForeignRayLine, rayRecordBytes } from "./record-codec";
import type { RaySet } from "./ray-set";

export type SubsampledRays = {
  rays: RaySet;
  /** Selected ray indices, in output order. */
  indices: Uint32Array;
  /** Scaled flux aligned with `indices`. */
  scaled_flux: Float64Array;
};

export type RayOutputContext = {
  /** Tokens of the source ASCII header line. */
  header_tokens: readonly string[];
  target_rays: number;
  /** Ray count declared by the source header. */
  original_ray_count: number;
  source_path: string;
  flux_floor: number;
  progress_interval: number;
  /** Called with the number of rays written so far, before each ray. */
  onWritten?: (done: number) => void;
};

export type RayOutputWriter = (sink: RayOutputSink, sample: SubsampledRays, context: RayOutputContext) => Promise<void>;

const outputRecord = (sample: SubsampledRays, position: number, floor: number): RayRecord => {
  const record = sample.rays.record(sample.indices[position]);
  record.flux = sanitizeFlux(sample.scaled_flux[position], floor);
  return record;
};

const writeLines = async (
  sink: RayOutputSink,
  sample: SubsampledRays,
  context: RayOutputContext,
  render: (record: RayRecord) => string,
) => {
  let pending: string[] = [];
  for (let i = 0; i < sample.indices.length; i += 1) {
    context.onWritten?.(i);
    pending.push(`${render(outputRecord(sample, i, context.flux_floor))}\n`);
    if (pending.length >= context.progress_interval) {
      await sink.write(pending.join(""));
      pending = [];
    }
  }
  if (pending.length) await sink.write(pending.join(""));
};

export const asciiHeaderLine = (headerTokens: readonly string[], targetRays: number): string =>
  [String(targetRays), ...headerTokens.slice(1)].join(" ");

export const writeAsciiOutput: RayOutputWriter = async (sink, sample, context) => {
  await sink.write(`${asciiHeaderLine(context.header_tokens, context.target_rays)}\n`);
  await writeLines(sink, sample, context, formatAsciiRayLine);
};

export const foreignAsciiPreamble = (sourcePath: string, requested: number, generated: number): string =>
  [
    `!! Source file: ${sourcePath}`,
    `# NbrRays Requested: ${requested},  NbrRays Generated: ${generated}`,
    "Angular Range PolarBeg:   0.0000, PolarEnd: 180.0000, AzimuthBeg:   0.0000, AzimuthEnd: 360.0000",
    "Rotation AboutX   0.0000, AboutY   0.0000, AboutZ   0.0000",
    "Translation X   0.0000, Y   0.0000, Z   0.0000",
    "Scale X   1.0000, Y   1.0000, Z   1.0000",
    "Conversion Factor From Meters   1.0000",
    "X Pos Y Pos Z Pos X Vec Y Vec Z Vec Inc Flux",
    "",
  ].join("\n");

export const writeForeignAsciiOutput: RayOutputWriter = async (sink, sample, context) => {
  await sink.write(foreignAsciiPreamble(context.source_path, context.original_ray_count, context.target_rays));
  await writeLines(sink, sample, context, formatForeignRayLine);
};

/**
 * Header for native binary output. Identifier and description are fixed; units and
 * record/flux types come from the source ASCII header.
 */
export function buildNativeBinaryHeader(headerTokens: readonly string[], targetRays: number, totalFlux: number): RayFileHeader {
  return {
    identifier: NATIVE_RAY_FILE_IDENTIFIER,
    ray_count: targetRays,
    description: NATIVE_RAY_FILE_DESCRIPTION,
    source_flux: totalFlux,
    ray_set_flux: totalFlux,
    wavelength: 0,
    azimuth_beg: 0,
    azimuth_end: 0,
    polar_beg: 0,
    polar_end: 0,
    dimension_units: parseIntegerToken(headerTokens[1], "header dimension units"),
    location: [0, 0, 0],
    rotation: [0, 0, 0],
    scale: [1, 1, 1],
    unused: [0, 0, 0, 0],
    ray_format_type: parseIntegerToken(headerTokens[2], "header ray format type"),
    flux_type: parseIntegerToken(headerTokens[3], "header flux type"),
    reserved1: 0,
    reserved2: 0,
  };
}

export const writeNativeBinaryOutput: RayOutputWriter = async (sink, sample, context) => {
  let totalFlux = 0;
  for (let i = 0; i < sample.scaled_flux.length; i += 1) {
    totalFlux += sanitizeFlux(sample.scaled_flux[i], context.flux_floor);
  }
  const header = buildNativeBinaryHeader(context.header_tokens, context.target_rays, totalFlux);
  if (header.ray_format_type !== 0) {
    throw new RayFileError(
      "UnsupportedInputForOperation",
      `native binary output writes 7-float records; source header declares ray format type ${header.ray_format_type}`,
    );
  }
  const floats = 7;
  await sink.write(encodeRayFileHeader(header));

  const recordSize = rayRecordBytes(floats);
  const blockRays = Math.max(1, Math.min(context.progress_interval, sample.indices.length));
  let block = new Uint8Array(blockRays * recordSize);
  let view = new DataView(block.buffer);
  let filled = 0;
  for (let i = 0; i < sample.indices.length; i += 1) {
    context.onWritten?.(i);
    encodeRayRecord(outputRecord(sample, i, context.flux_floor), floats, view, filled * recordSize);
    filled += 1;
    if (filled === blockRays) {
      await sink.write(block);
      block = new Uint8Array(blockRays * recordSize);
      view = new DataView(block.buffer);
      filled = 0;
    }
  }
  if (filled > 0) await sink.write(block.subarray(0, filled * recordSize));
};

export const RAY_OUTPUT_WRITERS: Record<TRayOutputFormat, RayOutputWriter> = {
  ascii: writeAsciiOutput,
  foreign_ascii: writeForeignAsciiOutput,
  native_binary: writeNativeBinaryOutput,
};

export const defaultExtensionFor = (format: TRayOutputFormat): string => (format === "ascii" ? ".txt" : ".dat");
