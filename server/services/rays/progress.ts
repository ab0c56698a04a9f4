import type { TSubsampleJobState } from "@shared/ray-file";

export type RayJobObserver = {
  progress?: (percent: number) => void;
  status?: (message: string) => void;
  state?: (state: TSubsampleJobState) => void;
  finished?: (outputPath: string) => void;
  failed?: (message: string) => void;
};

/**
 * Forwards notifications to an optional observer. Observer failures are logged and
 * swallowed: status and progress are advisory and never change an operation's outcome.
 */
export class ProgressReporter {
  private readonly observer: RayJobObserver;
  private readonly source: string;

  constructor(observer: RayJobObserver | undefined, source: string) {
    this.observer = observer ?? {};
    this.source = source;
  }

  progress(percent: number): void {
    this.notify("progress", () => this.observer.progress?.(Math.max(0, Math.min(100, Math.floor(percent)))));
  }

  status(message: string): void {
    this.notify("status", () => this.observer.status?.(message));
  }

  state(state: TSubsampleJobState): void {
    this.notify("state", () => this.observer.state?.(state));
  }

  finished(outputPath: string): void {
    this.notify("finished", () => this.observer.finished?.(outputPath));
  }

  failed(message: string): void {
    this.notify("failed", () => this.observer.failed?.(message));
  }

  /** Emits `base + floor(done / max(1, total) * span)` whenever `done` is on an interval boundary. */
  tick(done: number, total: number, interval: number, base: number, span: number): void {
    if (done % interval !== 0) return;
    this.progress(base + Math.floor((done / Math.max(1, total)) * span));
  }

  /** Clears the caller's progress display once an operation has ended. */
  reset(): void {
    this.progress(0);
    this.status("");
  }

  private notify(channel: string, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      console.warn(`[${this.source}] ${channel} observer failed`, err);
    }
  }
}
