export interface PollSchedulerOptions {
  intervalMs: number;
  task: () => Promise<void>;
  onError: (error: unknown) => void;
}

/**
 * Runs a task, then again `intervalMs` after each run completes, until stopped.
 * A run in flight when `stop()` is called finishes; no further run is scheduled.
 */
export class PollScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly options: PollSchedulerOptions) {}

  get isRunning(): boolean {
    return this.running;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.running) return;
    if (signal?.aborted) return;
    this.running = true;
    signal?.addEventListener("abort", () => this.stop(), { once: true });
    await this.tick();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Resolves once the run in flight, if any, has finished. */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  private scheduleNext(): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, Math.max(10, this.options.intervalMs));
  }

  private async tick(): Promise<void> {
    const run = this.runTask();
    this.inFlight = run;
    try {
      await run;
    } finally {
      this.inFlight = null;
      this.scheduleNext();
    }
  }

  private async runTask(): Promise<void> {
    try {
      await this.options.task();
    } catch (error) {
      this.options.onError(error);
    }
  }
}
