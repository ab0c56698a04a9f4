import fs from "node:fs/promises";
import {
  ConvertRayFileRequest,
  InspectRayFileRequest,
  RAY_HEADER_BYTES,
  SubsampleRayFileRequest,
  type RayFileSummary,
  type RayInspectResult,
  type RayJobResult,
  type TConvertRayFileRequest,
  type TInspectRayFileRequest,
  type TRayToolkitConfigInput,
  type TSubsampleRayFileRequest,
} from "@shared/ray-file";
import type { z } from "zod";
import { resolveRayConfig } from "../server/config/env";
import { appendRayJobLog, hashJobParams, type RayJobOperation } from "../server/services/observability/ray-job-log";
import { scanAsciiRayFile } from "../server/services/rays/ascii-reader";
import { readConvertibleHeader, readFully, streamBinaryToAscii } from "../server/services/rays/convert-pipeline";
import { RayFileError, toRayFileError } from "../server/services/rays/errors";
import { decodeRayFileHeader } from "../server/services/rays/header-codec";
import { openRayOutputFile } from "../server/services/rays/output-file";
import { ProgressReporter, type RayJobObserver } from "../server/services/rays/progress";
import { isBinaryInputPath, SubsampleJob } from "../server/services/rays/subsample-job";
import { log } from "../server/utils/log";

export type RayOperationOptions = {
  observer?: RayJobObserver;
  config?: Partial<TRayToolkitConfigInput>;
};

const parseRequest = <T extends z.ZodTypeAny>(schema: T, request: unknown): z.infer<T> => {
  const parsed = schema.safeParse(request);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`).join("; ");
    throw new RayFileError("InvalidRequest", `invalid request: ${detail}`);
  }
  return parsed.data;
};

/**
 * Runs one operation body and turns its outcome into the terminal result: success or
 * failure is reported exactly once, followed by a progress/status reset.
 */
async function runRayJob(
  operation: RayJobOperation,
  request: unknown,
  reporter: ProgressReporter,
  body: () => Promise<string>,
): Promise<RayJobResult> {
  const startedAt = Date.now();
  const paramsHash = hashJobParams(request);
  try {
    const outputPath = await body();
    appendRayJobLog({ operation, paramsHash, durationMs: Date.now() - startedAt, ok: true, outputPath });
    reporter.finished(outputPath);
    return { ok: true, output_path: outputPath };
  } catch (err) {
    const failure = toRayFileError(err);
    log(`${failure.code}: ${failure.message}`, operation);
    appendRayJobLog({
      operation,
      paramsHash,
      durationMs: Date.now() - startedAt,
      ok: false,
      error: failure.message,
      code: failure.code,
    });
    reporter.failed(failure.message);
    return { ok: false, code: failure.code, error: failure.message };
  } finally {
    reporter.reset();
  }
}

/** Binary ray file → ASCII ray file. */
export function convertRayFile(
  request: TConvertRayFileRequest,
  options: RayOperationOptions = {},
): Promise<RayJobResult> {
  const reporter = new ProgressReporter(options.observer, "rays.convert");
  return runRayJob("rays.convert", request, reporter, async () => {
    const params = parseRequest(ConvertRayFileRequest, request);
    const config = resolveRayConfig(options.config);
    reporter.progress(0);
    const input = await fs.open(params.input_path, "r");
    try {
      const header = await readConvertibleHeader(input, reporter);
      const output = await openRayOutputFile(params.output_path, { atomic: config.atomic_writes });
      try {
        await streamBinaryToAscii(header, input, output, {
          progressInterval: config.progress_interval,
          reporter,
        });
        await output.commit();
        log(`converted ${header.ray_count} rays to ${params.output_path}`, "rays.convert");
      } catch (err) {
        await output.abort();
        throw err;
      }
    } finally {
      await input.close();
    }
    reporter.status("Conversion complete");
    return params.output_path;
  });
}

/** ASCII ray file → smaller ray file in one of three encodings. */
export function subsampleRayFile(
  request: TSubsampleRayFileRequest,
  options: RayOperationOptions = {},
): Promise<RayJobResult> {
  const reporter = new ProgressReporter(options.observer, "rays.subsample");
  return runRayJob("rays.subsample", request, reporter, async () => {
    const params = parseRequest(SubsampleRayFileRequest, request);
    const config = resolveRayConfig(options.config);
    return new SubsampleJob(params, config, reporter).run();
  });
}

async function summarize(inputPath: string, binaryExtensions: readonly string[]): Promise<RayFileSummary> {
  if (isBinaryInputPath(inputPath, binaryExtensions)) {
    const input = await fs.open(inputPath, "r");
    try {
      const header = decodeRayFileHeader(await readFully(input, RAY_HEADER_BYTES));
      return {
        kind: "binary",
        input_path: inputPath,
        identifier: header.identifier,
        ray_count: header.ray_count,
        description: header.description,
        dimension_units: header.dimension_units,
        ray_format_type: header.ray_format_type,
        flux_type: header.flux_type,
        source_flux: header.source_flux,
        ray_set_flux: header.ray_set_flux,
      };
    } finally {
      await input.close();
    }
  }
  const scan = scanAsciiRayFile(await fs.readFile(inputPath, "utf8"));
  return {
    kind: "ascii",
    input_path: inputPath,
    header_line: scan.header_line,
    header_line_index: scan.header_index,
    declared_ray_count: scan.declared_ray_count,
    ray_lines: scan.ray_lines,
    spectral_lines: scan.spectral_lines,
  };
}

/** Header summary and ray count of either file kind, without converting anything. */
export async function inspectRayFile(
  request: TInspectRayFileRequest,
  options: Pick<RayOperationOptions, "config"> = {},
): Promise<RayInspectResult> {
  const startedAt = Date.now();
  const paramsHash = hashJobParams(request);
  try {
    const params = parseRequest(InspectRayFileRequest, request);
    const config = resolveRayConfig(options.config);
    const summary = await summarize(params.input_path, config.binary_extensions);
    appendRayJobLog({ operation: "rays.inspect", paramsHash, durationMs: Date.now() - startedAt, ok: true });
    return { ok: true, summary };
  } catch (err) {
    const failure = toRayFileError(err);
    appendRayJobLog({
      operation: "rays.inspect",
      paramsHash,
      durationMs: Date.now() - startedAt,
      ok: false,
      error: failure.message,
      code: failure.code,
    });
    return { ok: false, code: failure.code, error: failure.message };
  }
}
