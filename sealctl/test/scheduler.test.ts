import { describe, expect, it } from "vitest";
import { CollectionScheduler, type Trigger } from "../src/collector/scheduler.js";
import { CollectionInProgressError, IntegrityViolationError, TooEarlyError } from "../src/core/errors.js";
import { createMemoryLogger } from "../src/log/logger.js";

type ManualTrigger = Trigger & { fire(): void; cancelled: boolean; intervalMs: number | null };

/** Trigger that fires only when the test says so. */
function manualTrigger(): ManualTrigger {
  let fire: (() => void) | null = null;
  const trigger: ManualTrigger = {
    cancelled: false,
    intervalMs: null,
    every(intervalMs, f) {
      trigger.intervalMs = intervalMs;
      fire = f;
      return () => {
        trigger.cancelled = true;
      };
    },
    fire() {
      fire?.();
    },
  };
  return trigger;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("CollectionScheduler", () => {
  it("runs every job in order on a tick", async () => {
    const { logger } = createMemoryLogger();
    const order: string[] = [];
    const scheduler = new CollectionScheduler(
      [
        { name: "collect", run: async () => void order.push("collect") },
        { name: "unlock", run: async () => void order.push("unlock") },
      ],
      logger,
    );

    expect(await scheduler.tick()).toEqual({
      skipped: false,
      outcomes: [
        { job: "collect", status: "ok" },
        { job: "unlock", status: "ok" },
      ],
    });
    expect(order).toEqual(["collect", "unlock"]);
  });

  it("reports non-fatal errors as deferred and keeps going", async () => {
    const { logger, records } = createMemoryLogger();
    const scheduler = new CollectionScheduler(
      [
        {
          name: "collect",
          run: async () => {
            throw new CollectionInProgressError("pid 1");
          },
        },
        {
          name: "unlock",
          run: async () => {
            throw new TooEarlyError(1000, "2026-03-31T00:00:00.000Z");
          },
        },
      ],
      logger,
    );

    const report = await scheduler.tick();
    expect(report.skipped).toBe(false);
    if (!report.skipped) {
      expect(report.outcomes.map((o) => o.status)).toEqual(["deferred", "deferred"]);
    }
    expect(records.filter((r) => r.code === "JOB_DEFERRED")).toHaveLength(2);
  });

  it("reports fatal errors as failed", async () => {
    const { logger, records } = createMemoryLogger();
    const scheduler = new CollectionScheduler(
      [
        {
          name: "unlock",
          run: async () => {
            throw new IntegrityViolationError("chain mismatch");
          },
        },
      ],
      logger,
    );

    const report = await scheduler.tick();
    expect(report).toEqual({
      skipped: false,
      outcomes: [{ job: "unlock", status: "failed", code: "INTEGRITY_VIOLATION", message: "chain mismatch" }],
    });
    expect(records.find((r) => r.code === "JOB_FAILED")?.level).toBe("error");
  });

  it("skips a tick while the previous one is still running", async () => {
    const { logger } = createMemoryLogger();
    const gate = deferred();
    let runs = 0;
    const scheduler = new CollectionScheduler(
      [
        {
          name: "collect",
          run: async () => {
            runs++;
            await gate.promise;
          },
        },
      ],
      logger,
    );

    const first = scheduler.tick();
    expect(await scheduler.tick()).toEqual({ skipped: true });
    gate.resolve();
    expect((await first).skipped).toBe(false);
    expect(runs).toBe(1);
  });

  it("fires on the trigger and waits for the tick in flight on stop", async () => {
    const { logger } = createMemoryLogger();
    const trigger = manualTrigger();
    const gate = deferred();
    let finished = 0;
    const scheduler = new CollectionScheduler(
      [
        {
          name: "collect",
          run: async () => {
            await gate.promise;
            finished++;
          },
        },
      ],
      logger,
      trigger,
    );

    scheduler.start(5000);
    expect(trigger.intervalMs).toBe(5000);
    trigger.fire();

    const stopped = scheduler.stop();
    gate.resolve();
    await stopped;

    expect(trigger.cancelled).toBe(true);
    expect(finished).toBe(1);
  });

  it("cannot be started twice", () => {
    const { logger } = createMemoryLogger();
    const scheduler = new CollectionScheduler([], logger, manualTrigger());
    scheduler.start(1000);
    expect(() => scheduler.start(1000)).toThrow("already started");
  });
});
