import crypto from "node:crypto";
import { RAY_JOB_LOG_STDOUT } from "../../config/env";

export type RayJobOperation = "rays.convert" | "rays.subsample" | "rays.inspect";

export type RayJobLogRecord = {
  id: string;
  seq: number;
  ts: string;
  operation: RayJobOperation;
  paramsHash: string;
  durationMs: number;
  ok: boolean;
  error?: string;
  code?: string;
  outputPath?: string;
};

type RayJobLogListener = (entry: RayJobLogRecord) => void;

const parseBufferSize = (): number => {
  const requested = Number(process.env.RAY_JOB_LOG_BUFFER_SIZE ?? 200);
  if (!Number.isFinite(requested) || requested < 1) {
    return 200;
  }
  return Math.min(Math.max(10, Math.floor(requested)), 1000);
};

const MAX_BUFFER_SIZE = parseBufferSize();
const jobLogBuffer: RayJobLogRecord[] = [];
const listeners = new Set<RayJobLogListener>();
let logSequence = 0;

const stableValue = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(stableValue);
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([k, v]) => [k, stableValue(v)]),
    );
  }
  if (typeof value === "number" && !Number.isFinite(value)) return null;
  return value;
};

/** sha256 of the key-sorted JSON form, so equal parameters hash equally regardless of key order. */
export const hashJobParams = (params: unknown): string =>
  `sha256:${crypto.createHash("sha256").update(JSON.stringify(stableValue(params))).digest("hex")}`;

type AppendEvent = Omit<RayJobLogRecord, "id" | "seq" | "ts"> & Partial<Pick<RayJobLogRecord, "ts">>;

export function appendRayJobLog(event: AppendEvent): RayJobLogRecord {
  const seq = ++logSequence;
  const record: RayJobLogRecord = {
    id: String(seq),
    seq,
    ts: event.ts ?? new Date().toISOString(),
    operation: event.operation,
    paramsHash: event.paramsHash,
    durationMs: event.durationMs,
    ok: event.ok,
    error: event.error,
    code: event.code,
    outputPath: event.outputPath,
  };
  jobLogBuffer.push(record);
  if (jobLogBuffer.length > MAX_BUFFER_SIZE) {
    jobLogBuffer.splice(0, jobLogBuffer.length - MAX_BUFFER_SIZE);
  }
  if (RAY_JOB_LOG_STDOUT()) {
    console.info(JSON.stringify({ type: "ray_job", ...record }));
  }
  for (const listener of Array.from(listeners)) {
    try {
      listener(record);
    } catch (err) {
      console.warn("[ray-job-log] listener error", err);
    }
  }
  return record;
}

export function getRayJobLogs(options?: { limit?: number; operation?: RayJobOperation }): RayJobLogRecord[] {
  const limit = Math.min(Math.max(1, Math.floor(options?.limit ?? 50)), MAX_BUFFER_SIZE);
  const haystack = options?.operation
    ? jobLogBuffer.filter((entry) => entry.operation === options.operation)
    : [...jobLogBuffer];
  return haystack.slice(Math.max(0, haystack.length - limit)).reverse();
}

export function subscribeRayJobLogs(listener: RayJobLogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function __resetRayJobLogStore(): void {
  jobLogBuffer.length = 0;
  listeners.clear();
}
