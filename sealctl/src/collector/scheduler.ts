import { SealctlError, errorMessage } from "../core/errors.js";
import type { Logger } from "../log/logger.js";

/** Source of periodic firings. Returns a cancel function. */
export type Trigger = {
  every(intervalMs: number, fire: () => void): () => void;
};

export const intervalTrigger: Trigger = {
  every(intervalMs, fire) {
    const handle = setInterval(fire, intervalMs);
    return () => clearInterval(handle);
  },
};

export type ScheduledJob = {
  name: string;
  run: () => Promise<unknown>;
};

export type JobOutcome =
  | { job: string; status: "ok" }
  | { job: string; status: "deferred" | "failed"; code: string; message: string };

export type TickReport = { skipped: true } | { skipped: false; outcomes: JobOutcome[] };

/**
 * Runs a fixed list of jobs on every trigger firing. Ticks never overlap:
 * a firing that arrives while the previous tick is still running is skipped.
 * Non-fatal job errors (CollectionInProgress, TooEarly) are reported as deferred.
 */
export class CollectionScheduler {
  private running: Promise<JobOutcome[]> | null = null;
  private lastFiring: Promise<TickReport> | null = null;
  private cancel: (() => void) | null = null;

  constructor(
    private readonly jobs: ScheduledJob[],
    private readonly logger: Logger,
    private readonly trigger: Trigger = intervalTrigger,
  ) {}

  start(intervalMs: number): void {
    if (this.cancel) throw new Error("Scheduler already started");
    this.logger.info("SCHEDULER_START", `Running ${this.jobs.map((j) => j.name).join(", ")} every ${intervalMs}ms`);
    this.cancel = this.trigger.every(intervalMs, () => {
      this.lastFiring = this.tick();
    });
  }

  /** Stop firing and wait for the tick in flight, if any. */
  async stop(): Promise<void> {
    this.cancel?.();
    this.cancel = null;
    if (this.lastFiring) await this.lastFiring;
    if (this.running) await this.running;
  }

  /** Run every job once, in order. Returns `{skipped: true}` while another tick is running. */
  async tick(): Promise<TickReport> {
    if (this.running) {
      this.logger.debug("TICK_SKIPPED", "Previous tick still running");
      return { skipped: true };
    }
    this.running = this.runAll();
    try {
      return { skipped: false, outcomes: await this.running };
    } finally {
      this.running = null;
    }
  }

  private async runAll(): Promise<JobOutcome[]> {
    const outcomes: JobOutcome[] = [];
    for (const job of this.jobs) {
      outcomes.push(await this.runJob(job));
    }
    return outcomes;
  }

  private async runJob(job: ScheduledJob): Promise<JobOutcome> {
    try {
      await job.run();
      return { job: job.name, status: "ok" };
    } catch (e: unknown) {
      if (e instanceof SealctlError && !e.fatal) {
        this.logger.info("JOB_DEFERRED", `${job.name}: ${e.message}`, { code: e.code });
        return { job: job.name, status: "deferred", code: e.code, message: e.message };
      }
      const code = e instanceof SealctlError ? e.code : "ERROR";
      this.logger.error("JOB_FAILED", `${job.name}: ${errorMessage(e)}`, { code });
      return { job: job.name, status: "failed", code, message: errorMessage(e) };
    }
  }
}
