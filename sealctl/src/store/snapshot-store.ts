import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  CollectionInProgressError,
  IntegrityViolationError,
  InvalidArgumentError,
  NotFoundError,
  errorMessage,
} from "../core/errors.js";
import type { ChainIndex, ChainInspection, Snapshot, SnapshotMeta, SnapshotPayload } from "../types/snapshot.js";
import { atomicWriteJson, readJsonFile, tryAcquireLock } from "./fs-json.js";
import { GENESIS_HASH, canonicalJson, hashCanonical } from "./hash.js";

/** Sequence number or content hash. */
export type SnapshotRef = number | string;

/** Anything that can say whether semantic content may be read. */
export type ContentGate = {
  assertUnlocked(what: string): Promise<void>;
};

/** Handed to the callback of `withWriteLock`; only valid while the lock is held. */
export type SnapshotWriter = {
  append(payload: SnapshotPayload, collectedAt: Date): Promise<SnapshotMeta>;
};

const EMPTY_INDEX: ChainIndex = { schema_version: 1, snapshots: [] };

export function computeContentHash(header: {
  sequence_number: number;
  collected_at: string;
  previous_hash: string;
  payload: SnapshotPayload;
}): string {
  return hashCanonical({
    sequence_number: header.sequence_number,
    collected_at: header.collected_at,
    previous_hash: header.previous_hash,
    payload: header.payload,
  });
}

/** Index entry for a snapshot: hashes and counts, no text. */
export function deriveMeta(snapshot: Snapshot): SnapshotMeta {
  const { tasks, comments } = snapshot.payload;
  return {
    sequence_number: snapshot.sequence_number,
    collected_at: snapshot.collected_at,
    content_hash: snapshot.content_hash,
    previous_hash: snapshot.previous_hash,
    task_count: tasks.length,
    comment_count: comments.length,
    task_stats: tasks.map((t) => ({
      id: t.id,
      comment_count: t.comment_count,
      upvote_count: t.upvote_count,
      deliverable_count: t.deliverable_count ?? 0,
      completed_deliverable_count: t.completed_deliverable_count ?? 0,
      created_at: t.created_at,
    })),
  };
}

/**
 * Append-only, hash-chained snapshot log.
 *
 * Layout under `dataDir`:
 *   snapshots/<content_hash>.json   full snapshot, content-addressed
 *   chain.json                      ordered index of SnapshotMeta (replaced atomically)
 *   collect.lock                    single-writer lock
 *
 * Metadata is always readable. Snapshot content goes through the gate.
 */
export class SnapshotStore {
  private readonly indexPath: string;
  private readonly snapshotsDir: string;
  readonly lockPath: string;

  constructor(
    dataDir: string,
    private readonly gate: ContentGate,
  ) {
    this.indexPath = path.join(dataDir, "chain.json");
    this.snapshotsDir = path.join(dataDir, "snapshots");
    this.lockPath = path.join(dataDir, "collect.lock");
  }

  async metas(): Promise<SnapshotMeta[]> {
    const index = (await readJsonFile<ChainIndex>(this.indexPath)) ?? EMPTY_INDEX;
    return index.snapshots;
  }

  async length(): Promise<number> {
    return (await this.metas()).length;
  }

  async head(): Promise<SnapshotMeta | null> {
    const metas = await this.metas();
    return metas[metas.length - 1] ?? null;
  }

  async meta(ref: SnapshotRef): Promise<SnapshotMeta> {
    const metas = await this.metas();
    const found =
      typeof ref === "number" ? metas[ref] : metas.find((m) => m.content_hash === ref);
    if (!found) throw new NotFoundError(`snapshot ${String(ref)}`);
    return found;
  }

  /**
   * Run `fn` holding the single-writer lock. A second writer is rejected
   * immediately with CollectionInProgress rather than queued. A collection pass
   * can outlive any fixed age, so the lock is only cleared once its owner is gone.
   */
  async withWriteLock<T>(fn: (writer: SnapshotWriter) => Promise<T>): Promise<T> {
    const attempt = await tryAcquireLock(this.lockPath, { staleAfterMs: null });
    if (!attempt.acquired) throw new CollectionInProgressError(attempt.owner);

    let held = true;
    const writer: SnapshotWriter = {
      append: async (payload, collectedAt) => {
        if (!held) throw new Error("Snapshot writer used after its lock was released");
        return this.appendLocked(payload, collectedAt);
      },
    };

    try {
      return await fn(writer);
    } finally {
      held = false;
      await attempt.release();
    }
  }

  async append(payload: SnapshotPayload, collectedAt: Date): Promise<SnapshotMeta> {
    return this.withWriteLock((writer) => writer.append(payload, collectedAt));
  }

  async get(ref: SnapshotRef): Promise<Snapshot> {
    const meta = await this.meta(ref);
    await this.gate.assertUnlocked(`snapshot ${meta.sequence_number}`);
    return this.readSnapshotFile(meta.content_hash);
  }

  /** Snapshots in [from, to). */
  async contentRange(from: number, to: number): Promise<Snapshot[]> {
    await this.gate.assertUnlocked(`snapshots ${from}..${to}`);
    const metas = await this.metas();
    checkRange(from, to, metas.length);
    const out: Snapshot[] = [];
    for (const meta of metas.slice(from, to)) {
      out.push(await this.readSnapshotFile(meta.content_hash));
    }
    return out;
  }

  async verifyChain(from: number, to: number): Promise<boolean> {
    return (await this.inspectChain(from, to)).ok;
  }

  /**
   * Re-derive every link in [from, to) from the stored files and compare with the index.
   * Reports the first broken sequence number.
   */
  async inspectChain(from = 0, to?: number): Promise<ChainInspection> {
    const metas = await this.metas();
    const end = to ?? metas.length;
    if (from < 0 || end < from) throw new InvalidArgumentError(`Invalid chain range [${from}, ${end})`);

    for (let seq = from; seq < end; seq++) {
      const meta = metas[seq];
      if (!meta) return { ok: false, broken_at: seq, reason: "missing index entry" };
      if (meta.sequence_number !== seq) {
        return { ok: false, broken_at: seq, reason: `index entry carries sequence ${meta.sequence_number}` };
      }

      const expectedPrevious = seq === 0 ? GENESIS_HASH : metas[seq - 1].content_hash;
      if (meta.previous_hash !== expectedPrevious) {
        return { ok: false, broken_at: seq, reason: "previous_hash does not link to prior snapshot" };
      }

      let snapshot: Snapshot;
      try {
        snapshot = await this.readSnapshotFile(meta.content_hash);
      } catch (e: unknown) {
        return { ok: false, broken_at: seq, reason: `snapshot file unreadable: ${errorMessage(e)}` };
      }

      if (computeContentHash(snapshot) !== meta.content_hash) {
        return { ok: false, broken_at: seq, reason: "content hash mismatch" };
      }
      if (canonicalJson(deriveMeta(snapshot)) !== canonicalJson(meta)) {
        return { ok: false, broken_at: seq, reason: "index entry does not match snapshot file" };
      }
    }

    const last = end > 0 ? metas[end - 1] : undefined;
    return { ok: true, checked: end - from, head: last ? last.content_hash : GENESIS_HASH };
  }

  /**
   * Rebuild the chain over the first `length` snapshots from their payloads alone,
   * ignoring stored hashes, and return the resulting head hash.
   */
  async recomputeHead(length: number): Promise<string> {
    const metas = await this.metas();
    if (metas.length < length) {
      throw new IntegrityViolationError(`Chain has ${metas.length} snapshots, sealed prefix had ${length}`);
    }

    let previous = GENESIS_HASH;
    for (const meta of metas.slice(0, length)) {
      let snapshot: Snapshot;
      try {
        snapshot = await this.readSnapshotFile(meta.content_hash);
      } catch {
        throw new IntegrityViolationError(`Snapshot ${meta.sequence_number} is missing or unreadable`);
      }
      previous = computeContentHash({
        sequence_number: meta.sequence_number,
        collected_at: snapshot.collected_at,
        previous_hash: previous,
        payload: snapshot.payload,
      });
    }
    return previous;
  }

  private async appendLocked(payload: SnapshotPayload, collectedAt: Date): Promise<SnapshotMeta> {
    const metas = await this.metas();
    const prior = metas[metas.length - 1];

    const header = {
      sequence_number: metas.length,
      collected_at: collectedAt.toISOString(),
      previous_hash: prior ? prior.content_hash : GENESIS_HASH,
      payload,
    };
    const snapshot: Snapshot = { ...header, content_hash: computeContentHash(header) };
    const meta = deriveMeta(snapshot);

    // Content first, index second: a crash in between leaves an unreferenced file, never a dangling entry.
    await atomicWriteJson(this.snapshotPath(snapshot.content_hash), snapshot);
    await atomicWriteJson(this.indexPath, { schema_version: 1, snapshots: [...metas, meta] } satisfies ChainIndex);
    return meta;
  }

  private snapshotPath(contentHash: string): string {
    if (!/^[0-9a-f]{64}$/.test(contentHash)) throw new InvalidArgumentError(`Not a content hash: ${contentHash}`);
    return path.join(this.snapshotsDir, `${contentHash}.json`);
  }

  private async readSnapshotFile(contentHash: string): Promise<Snapshot> {
    const raw = await readFile(this.snapshotPath(contentHash), "utf8");
    return JSON.parse(raw) as Snapshot;
  }
}

function checkRange(from: number, to: number, length: number): void {
  if (from < 0 || to < from || to > length) {
    throw new InvalidArgumentError(`Invalid snapshot range [${from}, ${to}) for a chain of ${length}`);
  }
}
