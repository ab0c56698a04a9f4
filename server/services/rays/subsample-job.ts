import path from "node:path";
import type { TRayToolkitConfig, TSubsampleJobState, TSubsampleRayFileParams } from "@shared/ray-file";
import { log } from "../../utils/log";
import { readAsciiRayFile, type AsciiRayFile } from "./ascii-reader";
import { RayFileError } from "./errors";
import { fluxScaleFactor, scaleSelectedFlux } from "./flux-scaler";
import { openRayOutputFile } from "./output-file";
import { RAY_OUTPUT_WRITERS, type SubsampledRays } from "./output-writer";
import type { ProgressReporter } from "./progress";
import { createRandomSource } from "./random";
import { SUBSAMPLE_STRATEGIES } from "./subsampler";

const NEXT_STATE: Record<TSubsampleJobState, TSubsampleJobState | null> = {
  idle: "loaded",
  loaded: "sampled",
  sampled: "scaled",
  scaled: "written",
  written: "done",
  done: null,
  failed: null,
};

export const isBinaryInputPath = (inputPath: string, binaryExtensions: readonly string[]): boolean =>
  binaryExtensions.includes(path.extname(inputPath).toLowerCase());

/**
 * One subsample run: load → sample → scale → write. Each stage advances the state
 * by exactly one step; any failure moves the job to `failed` and rethrows.
 */
export class SubsampleJob {
  private current: TSubsampleJobState = "idle";
  private readonly params: TSubsampleRayFileParams;
  private readonly config: TRayToolkitConfig;
  private readonly reporter: ProgressReporter;

  constructor(params: TSubsampleRayFileParams, config: TRayToolkitConfig, reporter: ProgressReporter) {
    this.params = params;
    this.config = config;
    this.reporter = reporter;
  }

  get state(): TSubsampleJobState {
    return this.current;
  }

  async run(): Promise<string> {
    if (this.current !== "idle") {
      throw new Error(`subsample job already ran (state ${this.current})`);
    }
    try {
      const source = await this.load();
      const indices = this.sample(source);
      const sample = this.scale(source, indices);
      await this.write(source, sample);
      this.reporter.progress(100);
      this.reporter.status("Done!");
      this.advance("done");
      return this.params.output_path;
    } catch (err) {
      this.current = "failed";
      this.reporter.state("failed");
      throw err;
    }
  }

  private advance(next: TSubsampleJobState): void {
    if (NEXT_STATE[this.current] !== next) {
      throw new Error(`illegal subsample transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.reporter.state(next);
  }

  private async load(): Promise<AsciiRayFile> {
    const { input_path, target_rays } = this.params;
    this.reporter.progress(0);
    this.reporter.status("Loading file...");
    if (isBinaryInputPath(input_path, this.config.binary_extensions)) {
      throw new RayFileError(
        "UnsupportedInputForOperation",
        `Binary ${path.extname(input_path)} not supported for subsampling. Convert to ASCII .txt first.`,
      );
    }
    const source = await readAsciiRayFile(input_path, {
      minRays: target_rays,
      rejectSpectral: true,
      progressInterval: this.config.progress_interval,
      onProgress: (fraction) => this.reporter.progress(fraction * 50),
    });
    log(`loaded ${source.rays.size} rays from ${input_path}`, "rays.subsample");
    this.advance("loaded");
    return source;
  }

  private sample(source: AsciiRayFile): Uint32Array {
    this.reporter.status("Subsampling...");
    this.reporter.progress(50);
    const strategy = SUBSAMPLE_STRATEGIES[this.params.method];
    const indices = strategy(source.rays, this.params.target_rays, {
      random: createRandomSource(this.params.seed ?? this.config.sample_seed),
      grid: { theta_bins: this.config.theta_bins, phi_bins: this.config.phi_bins },
    });
    log(`${this.params.method} kept ${indices.length} of ${source.rays.size} rays`, "rays.subsample");
    this.advance("sampled");
    return indices;
  }

  private scale(source: AsciiRayFile, indices: Uint32Array): SubsampledRays {
    this.reporter.status("Scaling fluxes...");
    const { target_rays } = this.params;
    const interval = this.config.progress_interval;
    const scale = fluxScaleFactor(source.declared_ray_count, target_rays);
    const scaledFlux = scaleSelectedFlux(source.rays, indices, scale, {
      floor: this.config.flux_floor,
      onScaled: (done) => this.reporter.tick(done, target_rays, interval, 50, 10),
    });
    this.advance("scaled");
    return { rays: source.rays, indices, scaled_flux: scaledFlux };
  }

  private async write(source: AsciiRayFile, sample: SubsampledRays): Promise<void> {
    const { output_path, output_format, target_rays, input_path } = this.params;
    const interval = this.config.progress_interval;
    this.reporter.status("Saving file...");
    this.reporter.progress(60);
    const output = await openRayOutputFile(output_path, { atomic: this.config.atomic_writes });
    try {
      await RAY_OUTPUT_WRITERS[output_format](output, sample, {
        header_tokens: source.header_tokens,
        target_rays,
        original_ray_count: source.declared_ray_count,
        source_path: input_path,
        flux_floor: this.config.flux_floor,
        progress_interval: interval,
        onWritten: (done) => this.reporter.tick(done, target_rays, interval, 60, 40),
      });
    } catch (err) {
      await output.abort();
      throw err;
    }
    await output.commit();
    log(`wrote ${output_format} output to ${output_path}`, "rays.subsample");
    this.advance("written");
  }
}
