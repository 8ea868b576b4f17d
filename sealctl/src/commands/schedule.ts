import { CollectionScheduler, intervalTrigger, type ScheduledJob, type TickReport, type Trigger } from "../collector/scheduler.js";
import { CollectionClosedError } from "../core/errors.js";
import type { Workspace } from "../core/workspace.js";
import { runCommand, type CommandResult } from "./exit-codes.js";

/**
 * Collect while the window is open, then try to lift the seal. Once the
 * seal is lifted both jobs become no-ops.
 */
export function scheduledJobs(ws: Workspace): ScheduledJob[] {
  return [
    {
      name: "collect",
      run: async () => {
        try {
          await ws.collector.collect();
        } catch (e: unknown) {
          if (!(e instanceof CollectionClosedError)) throw e;
          ws.logger.debug("COLLECTION_CLOSED", e.message);
        }
      },
    },
    {
      name: "unlock",
      run: async () => {
        if ((await ws.ledger.status()) !== "SEALED") return;
        await ws.seal.attemptUnlock();
      },
    },
  ];
}

export type ScheduleOptions = {
  /** Run a single tick and return. */
  once?: boolean;
  intervalMs?: number;
  trigger?: Trigger;
  /** Stops the scheduler when aborted. */
  signal?: AbortSignal;
};

export type ScheduleResult = CommandResult<{ ticks: TickReport[] }>;

export function schedule(ws: Workspace, opts: ScheduleOptions = {}): Promise<ScheduleResult> {
  return runCommand(async () => {
    const scheduler = new CollectionScheduler(scheduledJobs(ws), ws.logger, opts.trigger ?? intervalTrigger);
    if (opts.once) return { ticks: [await scheduler.tick()] };

    scheduler.start(opts.intervalMs ?? ws.config.schedule.interval_ms);
    await untilAborted(opts.signal);
    await scheduler.stop();
    ws.logger.info("SCHEDULER_STOP", "Scheduler stopped");
    return { ticks: [] };
  });
}

function untilAborted(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal) return;
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
