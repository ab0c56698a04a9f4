import fs from "node:fs/promises";
import { RayFileError } from "./errors";
import { parseIntegerToken } from "./number-format";
import { ASCII_RAY_FIELDS, ASCII_SPECTRAL_RAY_FIELDS, parseAsciiRayTokens, tokenizeLine } from "./record-codec";
import { RaySetBuilder, type RaySet } from "./ray-set";

const HEADER_FIELDS = 4;
const NON_NEGATIVE_INTEGER = /^\d+$/;
const NO_HEADER_MESSAGE = "No ray file header line found (expected: <ray_count> <units> <format> <flux_type>)";

export type AsciiHeaderScan =
  | { found: true; index: number; tokens: string[] }
  | { found: false };

export type AsciiRayFile = {
  header_index: number;
  /** Header tokens as written, e.g. ["100000", "1", "0", "0"]. */
  header_tokens: string[];
  /** First header token: the ray count the file claims. */
  declared_ray_count: number;
  rays: RaySet;
  /** 8-field (spectral) lines seen after the header. */
  spectral_lines: number;
};

export type AsciiReadOptions = {
  /** Fail with InsufficientRays when fewer ray lines than this are found. */
  minRays?: number;
  /** Fail with UnsupportedInputForOperation on spectral content instead of counting it. */
  rejectSpectral?: boolean;
  progressInterval?: number;
  /** Receives loading progress as a fraction in [0, 1). */
  onProgress?: (fraction: number) => void;
};

export const isAsciiHeaderTokens = (tokens: readonly string[]): boolean =>
  tokens.length === HEADER_FIELDS && NON_NEGATIVE_INTEGER.test(tokens[0]);

/** First line with exactly four tokens led by a non-negative integer; leading comments are skipped. */
export function findAsciiHeaderLine(lines: readonly string[]): AsciiHeaderScan {
  for (let index = 0; index < lines.length; index += 1) {
    const tokens = tokenizeLine(lines[index]);
    if (isAsciiHeaderTokens(tokens)) {
      return { found: true, index, tokens };
    }
  }
  return { found: false };
}

export const splitLines = (text: string): string[] => {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
};

export function parseAsciiRayFile(text: string, options: AsciiReadOptions = {}): AsciiRayFile {
  const lines = splitLines(text);
  const header = findAsciiHeaderLine(lines);
  if (!header.found) {
    throw new RayFileError("NoHeaderFound", NO_HEADER_MESSAGE);
  }

  if (options.rejectSpectral && parseIntegerToken(header.tokens[2], "header ray format type") === 2) {
    throw new RayFileError(
      "UnsupportedInputForOperation",
      "Spectral ray files (ray format type 2) are not supported for subsampling",
    );
  }

  const interval = options.progressInterval ?? 10_000;
  const first = header.index + 1;
  const total = Math.max(1, lines.length - first);
  const builder = new RaySetBuilder(Math.min(total, 1 << 20));
  let spectralLines = 0;

  for (let i = 0; first + i < lines.length; i += 1) {
    if (options.onProgress && i % interval === 0) options.onProgress(i / total);
    const tokens = tokenizeLine(lines[first + i]);
    if (tokens.length === ASCII_RAY_FIELDS) {
      builder.push(parseAsciiRayTokens(tokens, first + i + 1));
    } else if (tokens.length === ASCII_SPECTRAL_RAY_FIELDS) {
      if (options.rejectSpectral) {
        throw new RayFileError(
          "UnsupportedInputForOperation",
          `line ${first + i + 1}: spectral (8-field) ray lines are not supported for subsampling`,
        );
      }
      spectralLines += 1;
    }
  }

  if (options.minRays !== undefined && builder.size < options.minRays) {
    throw new RayFileError("InsufficientRays", `File has only ${builder.size} rays, ${options.minRays} requested`);
  }

  return {
    header_index: header.index,
    header_tokens: header.tokens,
    declared_ray_count: parseIntegerToken(header.tokens[0], "header ray count"),
    rays: builder.build(),
    spectral_lines: spectralLines,
  };
}

export async function readAsciiRayFile(inputPath: string, options: AsciiReadOptions = {}): Promise<AsciiRayFile> {
  const text = await fs.readFile(inputPath, "utf8");
  return parseAsciiRayFile(text, options);
}

export type AsciiRayFileScan = {
  header_index: number;
  header_line: string;
  declared_ray_count: number;
  ray_lines: number;
  spectral_lines: number;
};

/** Counts ray lines by shape only; field values are not parsed. */
export function scanAsciiRayFile(text: string): AsciiRayFileScan {
  const lines = splitLines(text);
  const header = findAsciiHeaderLine(lines);
  if (!header.found) {
    throw new RayFileError("NoHeaderFound", NO_HEADER_MESSAGE);
  }
  let rayLines = 0;
  let spectralLines = 0;
  for (let i = header.index + 1; i < lines.length; i += 1) {
    const fields = tokenizeLine(lines[i]).length;
    if (fields === ASCII_RAY_FIELDS) rayLines += 1;
    else if (fields === ASCII_SPECTRAL_RAY_FIELDS) spectralLines += 1;
  }
  return {
    header_index: header.index,
    header_line: header.tokens.join(" "),
    declared_ray_count: parseIntegerToken(header.tokens[0], "header ray count"),
    ray_lines: rayLines,
    spectral_lines: spectralLines,
  };
}
