import path from "node:path";
import type { RayJobObserver } from "../server/services/rays/progress";

/** Appends `extension` unless the path already ends with it (case-insensitive). */
export const ensureExtension = (filePath: string, extension: string): string =>
  filePath.toLowerCase().endsWith(extension.toLowerCase()) ? filePath : `${filePath}${extension}`;

/** Sibling path with a different extension: rays/source.dat → rays/source.txt. */
export const siblingWithExtension = (filePath: string, extension: string): string => {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
};

/** Progress and status on stderr so stdout carries only the result. */
export function createCliObserver(stream: NodeJS.WritableStream = process.stderr): RayJobObserver {
  let lastPercent = -1;
  return {
    progress(percent) {
      if (percent === lastPercent || percent === 0) return;
      lastPercent = percent;
      stream.write(`[${String(percent).padStart(3, " ")}%]\n`);
    },
    status(message) {
      if (message) stream.write(`${message}\n`);
    },
  };
}
