import type { Clock } from "../core/clock.js";
import { CollectionClosedError, errorMessage } from "../core/errors.js";
import type { Logger } from "../log/logger.js";
import type { SealLedger } from "../seal/ledger.js";
import type { DataSource, SoftFailure } from "../source/data-source.js";
import type { SnapshotStore } from "../store/snapshot-store.js";
import type { Comment, Task } from "../types/discourse.js";
import type { SnapshotMeta } from "../types/snapshot.js";

export type CollectionReport = {
  snapshot: SnapshotMeta;
  listed: number;
  stored_tasks: number;
  stored_comments: number;
  soft_failures: SoftFailure[];
  /** True when the snapshot extends the chain past the sealed prefix. */
  post_seal: boolean;
};

/**
 * One collection pass: list tasks, fetch each detail and its comments, append
 * a snapshot. Per-item failures are logged as SOFT_FAILURE and skipped.
 * The whole pass runs under the store's single-writer lock.
 */
export class Collector {
  constructor(
    private readonly source: DataSource,
    private readonly store: SnapshotStore,
    private readonly ledger: SealLedger,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  async collect(): Promise<CollectionReport> {
    await this.assertOpen();

    return this.store.withWriteLock(async (writer) => {
      const summaries = await this.source.listTasks();
      this.logger.info("COLLECT_START", `Fetching details for ${summaries.length} tasks`);

      const tasks: Task[] = [];
      const comments: Comment[] = [];
      const softFailures: SoftFailure[] = [];
      const seen = new Set<string>();

      for (const summary of summaries) {
        if (seen.has(summary.id)) continue;
        seen.add(summary.id);

        const failure = await this.collectOne(summary.id, tasks, comments);
        if (failure) {
          softFailures.push(failure);
          this.logger.warn("SOFT_FAILURE", `Skipped task ${failure.task_id} (${failure.stage}): ${failure.reason}`, {
            task_id: failure.task_id,
            stage: failure.stage,
          });
        }
      }

      // Re-check under the lock: the seal may have been lifted while fetching.
      await this.assertOpen();
      const state = await this.ledger.read();
      const snapshot = await writer.append({ tasks, comments }, this.clock.now());

      this.logger.info("SNAPSHOT_STORED", `Snapshot ${snapshot.sequence_number} stored`, {
        content_hash: snapshot.content_hash,
        tasks: tasks.length,
        comments: comments.length,
        soft_failures: softFailures.length,
      });

      return {
        snapshot,
        listed: summaries.length,
        stored_tasks: tasks.length,
        stored_comments: comments.length,
        soft_failures: softFailures,
        post_seal: state.status === "SEALED",
      };
    });
  }

  private async collectOne(taskId: string, tasks: Task[], comments: Comment[]): Promise<SoftFailure | null> {
    let task: Task | null;
    try {
      task = await this.source.getTaskDetail(taskId);
    } catch (e: unknown) {
      return { task_id: taskId, stage: "detail", reason: errorMessage(e) };
    }
    if (!task) return { task_id: taskId, stage: "detail", reason: "no detail returned" };

    let taskComments: Comment[];
    try {
      taskComments = await this.source.listComments(taskId);
    } catch (e: unknown) {
      return { task_id: taskId, stage: "comments", reason: errorMessage(e) };
    }

    const id = task.id;
    tasks.push(task);
    comments.push(...taskComments.filter((c) => c.task_id === id));
    return null;
  }

  /** Collection stops once the unlock time is reached. */
  private async assertOpen(): Promise<void> {
    const state = await this.ledger.read();
    if (state.status === "UNLOCKED") {
      throw new CollectionClosedError("the seal has been lifted");
    }
    if (state.record && this.clock.now().getTime() >= new Date(state.record.target_unlock_at).getTime()) {
      throw new CollectionClosedError(`the unlock time ${state.record.target_unlock_at} has passed`);
    }
  }
}
