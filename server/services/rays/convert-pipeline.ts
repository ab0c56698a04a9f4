import type { FileHandle } from "node:fs/promises";
import { RAY_HEADER_BYTES, type RayFileHeader } from "@shared/ray-file";
import { decodeRayFileHeader, rayFloatsPerRecord } from "./header-codec";
import type { RayOutputSink } from "./output-file";
import type { ProgressReporter } from "./progress";
import { decodeRayBlock, formatAsciiRayLine, rayRecordBytes } from "./record-codec";

/** Reads until `length` bytes arrive or the file ends; returns the bytes actually read. */
export async function readFully(handle: FileHandle, length: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, null);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return buffer.subarray(0, filled);
}

export const asciiConversionHeaderLine = (header: RayFileHeader): string =>
  `${header.ray_count} ${header.dimension_units} ${header.ray_format_type} ${header.flux_type} `;

export type ConversionOptions = {
  progressInterval: number;
  reporter: ProgressReporter;
};

/** Reads and validates the binary header; nothing is written before this succeeds. */
export async function readConvertibleHeader(input: FileHandle, reporter: ProgressReporter): Promise<RayFileHeader> {
  reporter.status("Reading binary header...");
  return decodeRayFileHeader(await readFully(input, RAY_HEADER_BYTES));
}

/**
 * Streams the records following `header` into the ASCII layout, one block of at most
 * `progressInterval` records at a time.
 */
export async function streamBinaryToAscii(
  header: RayFileHeader,
  input: FileHandle,
  sink: RayOutputSink,
  { progressInterval, reporter }: ConversionOptions,
): Promise<void> {
  const floats = rayFloatsPerRecord(header.ray_format_type);
  const recordSize = rayRecordBytes(floats);

  reporter.status("Writing ASCII header...");
  await sink.write(`${asciiConversionHeaderLine(header)}\n`);

  reporter.status("Converting rays...");
  for (let first = 0; first < header.ray_count; first += progressInterval) {
    const count = Math.min(progressInterval, header.ray_count - first);
    reporter.tick(first, header.ray_count, progressInterval, 0, 100);
    const block = await readFully(input, count * recordSize);
    const lines: string[] = [];
    try {
      decodeRayBlock(block, count, floats, first, (record) => {
        lines.push(`${formatAsciiRayLine(record)} \n`);
      });
    } finally {
      // records before a short read still reach the output
      if (lines.length) await sink.write(lines.join(""));
    }
  }
  reporter.progress(100);
}
