// Centralized environment switches for the ray file toolkit
import { RayToolkitConfig, type TRayToolkitConfig, type TRayToolkitConfigInput } from "@shared/ray-file";
import { RayFileError } from "../services/rays/errors";

type Env = Record<string, string | undefined>;

const envValue = (env: Env, key: string): string | undefined => {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

export const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

/** Raw environment values per config field; zod coerces them in {@link resolveRayConfig}. */
export type RayConfigEnv = Record<keyof TRayToolkitConfigInput, string | undefined>;

export const readRayConfigEnv = (env: Env = process.env): RayConfigEnv => ({
  theta_bins: envValue(env, "RAY_THETA_BINS"),
  phi_bins: envValue(env, "RAY_PHI_BINS"),
  flux_floor: envValue(env, "RAY_FLUX_FLOOR"),
  progress_interval: envValue(env, "RAY_PROGRESS_INTERVAL"),
  atomic_writes: envValue(env, "RAY_ATOMIC_WRITES"),
  binary_extensions: envValue(env, "RAY_BINARY_EXTENSIONS"),
  sample_seed: envValue(env, "RAY_SAMPLE_SEED"),
});

/**
 * Environment defaults merged with per-call overrides. Overrides win field by field;
 * an override explicitly set to undefined falls back to the environment.
 */
export const resolveRayConfig = (
  overrides: Partial<TRayToolkitConfigInput> = {},
  env: Env = process.env,
): TRayToolkitConfig => {
  const merged: Record<string, unknown> = { ...readRayConfigEnv(env) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  const parsed = RayToolkitConfig.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new RayFileError("InvalidRequest", `invalid ray toolkit configuration: ${detail}`);
  }
  return parsed.data;
};

export const RAY_LOG_STDOUT = (): boolean => flagEnabled(process.env.RAY_LOG_STDOUT, true);
export const RAY_JOB_LOG_STDOUT = (): boolean => flagEnabled(process.env.RAY_JOB_LOG_STDOUT, true);
