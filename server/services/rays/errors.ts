import type { TRayFileErrorCode } from "@shared/ray-file";

export class RayFileError extends Error {
  code: TRayFileErrorCode;
  constructor(code: TRayFileErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "RayFileError";
  }
}

const isErrnoException = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && "code" in err && typeof err.code === "string";

/**
 * Normalizes anything thrown inside an operation. Node's filesystem errors already
 * name the errno and path in their message, so only the code changes.
 */
export const toRayFileError = (err: unknown): RayFileError => {
  if (err instanceof RayFileError) return err;
  if (isErrnoException(err)) {
    return new RayFileError("IOFailure", err.message);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RayFileError("IOFailure", message);
};
