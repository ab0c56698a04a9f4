import { z } from "zod";

export const RAY_FILE_IDENTIFIERS = [1010, 8675309] as const;
export const NATIVE_RAY_FILE_IDENTIFIER = 8675309;
export const NATIVE_RAY_FILE_DESCRIPTION = "Subsampled ray file";

export const RAY_HEADER_BYTES = 208;
export const RAY_DESCRIPTION_BYTES = 100;

export type Vec3 = [number, number, number];

export const RayFileErrorCode = z.enum([
  "TruncatedHeader",
  "UnknownIdentifier",
  "UnknownFormatType",
  "UnknownFluxType",
  "UnexpectedEndOfRays",
  "NoHeaderFound",
  "InsufficientRays",
  "InvalidNumericField",
  "UnsupportedInputForOperation",
  "IOFailure",
  "InvalidRequest",
]);

export type TRayFileErrorCode = z.infer<typeof RayFileErrorCode>;

export type RayFileHeader = {
  identifier: number;
  ray_count: number;
  description: string;
  source_flux: number;
  ray_set_flux: number;
  wavelength: number;
  azimuth_beg: number;
  azimuth_end: number;
  polar_beg: number;
  polar_end: number;
  dimension_units: number;
  location: Vec3;
  rotation: Vec3;
  scale: Vec3;
  unused: [number, number, number, number];
  /** 0 = 7-float records, 2 = spectral records carrying a wavelength. */
  ray_format_type: number;
  flux_type: number;
  reserved1: number;
  reserved2: number;
};

export type RayRecord = {
  x: number;
  y: number;
  z: number;
  l: number;
  m: number;
  n: number;
  flux: number;
  wavelength?: number;
};

export const RayOutputFormat = z.enum(["ascii", "foreign_ascii", "native_binary"]);
export type TRayOutputFormat = z.infer<typeof RayOutputFormat>;

export const RaySamplingMethod = z.enum(["random", "angular_stratified"]);
export type TRaySamplingMethod = z.infer<typeof RaySamplingMethod>;

export const ConvertRayFileRequest = z.object({
  input_path: z.string().min(1),
  output_path: z.string().min(1),
});

export type TConvertRayFileRequest = z.infer<typeof ConvertRayFileRequest>;

export const SubsampleRayFileRequest = z.object({
  input_path: z.string().min(1),
  target_rays: z.number().int().positive(),
  output_path: z.string().min(1),
  output_format: RayOutputFormat.default("ascii"),
  method: RaySamplingMethod.default("random"),
  seed: z.string().min(1).optional(),
});

export type TSubsampleRayFileRequest = z.input<typeof SubsampleRayFileRequest>;
export type TSubsampleRayFileParams = z.infer<typeof SubsampleRayFileRequest>;

export const InspectRayFileRequest = z.object({
  input_path: z.string().min(1),
});

export type TInspectRayFileRequest = z.infer<typeof InspectRayFileRequest>;

export type RayJobResult =
  | { ok: true; output_path: string }
  | { ok: false; code: TRayFileErrorCode; error: string };

export type RayFileSummary =
  | {
      kind: "binary";
      input_path: string;
      identifier: number;
      ray_count: number;
      description: string;
      dimension_units: number;
      ray_format_type: number;
      flux_type: number;
      source_flux: number;
      ray_set_flux: number;
    }
  | {
      kind: "ascii";
      input_path: string;
      header_line: string;
      header_line_index: number;
      declared_ray_count: number;
      ray_lines: number;
      spectral_lines: number;
    };

export type RayInspectResult =
  | { ok: true; summary: RayFileSummary }
  | { ok: false; code: TRayFileErrorCode; error: string };

export const SubsampleJobState = z.enum(["idle", "loaded", "sampled", "scaled", "written", "done", "failed"]);
export type TSubsampleJobState = z.infer<typeof SubsampleJobState>;

const flagValue = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === "boolean") return value;
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) return true;
    if (["0", "false", "no", "off", ""].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unrecognized flag value "${value}"` });
    return z.NEVER;
  });

export const RayToolkitConfig = z.object({
  theta_bins: z.coerce.number().int().positive().default(90),
  phi_bins: z.coerce.number().int().positive().default(180),
  flux_floor: z.coerce.number().positive().finite().default(1e-30),
  progress_interval: z.coerce.number().int().positive().default(10_000),
  atomic_writes: flagValue.default(false),
  binary_extensions: z
    .union([z.array(z.string()), z.string()])
    .transform((value) =>
      (Array.isArray(value) ? value : value.split(","))
        .map((ext) => ext.trim().toLowerCase())
        .filter(Boolean)
        .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`)),
    )
    .default([".dat"]),
  sample_seed: z.string().min(1).optional(),
});

export type TRayToolkitConfig = z.infer<typeof RayToolkitConfig>;
export type TRayToolkitConfigInput = z.input<typeof RayToolkitConfig>;
