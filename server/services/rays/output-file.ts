import fs from "node:fs/promises";
import path from "node:path";

export interface RayOutputSink {
  write(chunk: string | Uint8Array): Promise<void>;
}

export type RayOutputFile = RayOutputSink & {
  /** Path the bytes are going to right now (a temporary sibling in atomic mode). */
  readonly writePath: string;
  /** Closes the handle and, in atomic mode, renames the temporary file into place. */
  commit(): Promise<void>;
  /** Closes the handle; in atomic mode the temporary file is removed, otherwise the partial output stays. */
  abort(): Promise<void>;
};

let tempSequence = 0;

export async function openRayOutputFile(outputPath: string, options: { atomic: boolean }): Promise<RayOutputFile> {
  const writePath = options.atomic
    ? path.join(path.dirname(outputPath), `${path.basename(outputPath)}.${process.pid}.${++tempSequence}.tmp`)
    : outputPath;
  const handle = await fs.open(writePath, "w");
  let closed = false;

  const close = async () => {
    if (closed) return;
    closed = true;
    await handle.close();
  };

  return {
    writePath,
    async write(chunk) {
      // writeFile on an open handle continues from the current position and loops until every byte is out
      await handle.writeFile(chunk);
    },
    async commit() {
      await close();
      if (options.atomic) {
        await fs.rename(writePath, outputPath);
      }
    },
    async abort() {
      try {
        await close();
      } finally {
        if (options.atomic) {
          await fs.rm(writePath, { force: true });
        }
      }
    },
  };
}

/** Collects written chunks so writers can be exercised without touching disk. */
export class MemoryRayOutputSink implements RayOutputSink {
  readonly chunks: Uint8Array[] = [];

  async write(chunk: string | Uint8Array): Promise<void> {
    this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return this.bytes().toString("utf8");
  }
}
