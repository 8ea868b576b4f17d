import type { Clock } from "../core/clock.js";
import {
  AlreadySealedError,
  IntegrityViolationError,
  InvalidArgumentError,
  NotSealedError,
  TooEarlyError,
} from "../core/errors.js";
import type { Logger } from "../log/logger.js";
import type { ProtocolRegistry } from "../protocol/registry.js";
import { acquireLock } from "../store/fs-json.js";
import type { SnapshotStore } from "../store/snapshot-store.js";
import type { IntegrityViolationRecord, SealLedgerState, SealRecord, SealStatus, UnlockResult } from "../types/seal.js";
import type { SealLedger } from "./ledger.js";

export type SealStatusReport = {
  status: SealStatus;
  record: SealRecord | null;
  /** Milliseconds until the target time; null when not sealed, 0 when due. */
  remaining_ms: number | null;
  unlock: UnlockResult | null;
  integrity_violation: IntegrityViolationRecord | null;
  snapshot_count: number;
  /** Snapshots appended after the seal (not part of the sealed prefix). */
  tail_count: number;
};

export type SealManagerOptions = {
  lockTimeoutMs?: number;
};

/**
 * Time-lock state machine: COLLECTING → SEALED → UNLOCKED.
 *
 * `seal` freezes the protocol registry and records the chain head. `attemptUnlock`
 * is side-effect free before the target time; afterwards it re-derives the sealed
 * prefix and either unlocks (once) or records a permanent integrity violation.
 */
export class SealManager {
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly store: SnapshotStore,
    private readonly registry: ProtocolRegistry,
    private readonly ledger: SealLedger,
    private readonly clock: Clock,
    private readonly logger: Logger,
    opts: SealManagerOptions = {},
  ) {
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 10000;
  }

  async seal(targetUnlockAt: Date): Promise<SealRecord> {
    const release = await acquireLock(this.ledger.lockPath, this.lockTimeoutMs);
    try {
      const state = await this.ledger.read();
      if (state.record) throw new AlreadySealedError(state.record.created_at);

      const now = this.clock.now();
      if (Number.isNaN(targetUnlockAt.getTime()) || targetUnlockAt.getTime() <= now.getTime()) {
        throw new InvalidArgumentError(`Unlock target must be a time after now (${now.toISOString()})`);
      }

      const protocols = await this.registry.list();
      if (protocols.length === 0) {
        throw new InvalidArgumentError("Cannot seal with an empty protocol registry; register the analysis protocol first");
      }

      const chain = await this.store.inspectChain();
      if (!chain.ok) {
        throw new IntegrityViolationError(`Refusing to seal a broken chain: snapshot ${chain.broken_at}: ${chain.reason}`);
      }

      const freezeHash = await this.registry.freeze(now);
      const record: SealRecord = {
        created_at: now.toISOString(),
        target_unlock_at: targetUnlockAt.toISOString(),
        chain_hash_at_seal: chain.head,
        sealed_length: chain.checked,
        protocol_freeze_hash: freezeHash,
      };

      await this.ledger.write({ ...state, status: "SEALED", record });
      this.logger.info("SEALED", `Sealed ${record.sealed_length} snapshots until ${record.target_unlock_at}`, {
        chain_hash_at_seal: record.chain_hash_at_seal,
        protocol_freeze_hash: freezeHash,
        protocols: protocols.length,
      });
      return record;
    } finally {
      await release();
    }
  }

  async attemptUnlock(now: Date = this.clock.now()): Promise<UnlockResult> {
    // Early checks need no lock: they never write.
    const early = await this.ledger.read();
    const pending = this.preconditions(early, now);
    if (pending.done) return pending.result;

    const release = await acquireLock(this.ledger.lockPath, this.lockTimeoutMs);
    try {
      const state = await this.ledger.read();
      const again = this.preconditions(state, now);
      if (again.done) return again.result;

      const result = await this.verifySealedPrefix(state, again.record, now);
      await this.ledger.write({ ...state, status: "UNLOCKED", unlock: result });
      this.logger.info("UNLOCKED", `Seal lifted; ${result.verified_length} snapshots verified`, {
        verified_chain_hash: result.verified_chain_hash,
      });
      return result;
    } finally {
      await release();
    }
  }

  async status(now: Date = this.clock.now()): Promise<SealStatusReport> {
    const state = await this.ledger.read();
    const count = await this.store.length();
    const record = state.record;
    return {
      status: state.status,
      record,
      remaining_ms: record ? Math.max(0, new Date(record.target_unlock_at).getTime() - now.getTime()) : null,
      unlock: state.unlock,
      integrity_violation: state.integrity_violation,
      snapshot_count: count,
      tail_count: record ? Math.max(0, count - record.sealed_length) : 0,
    };
  }

  private preconditions(
    state: SealLedgerState,
    now: Date,
  ): { done: true; result: UnlockResult } | { done: false; record: SealRecord } {
    if (state.status === "UNLOCKED" && state.unlock) return { done: true, result: state.unlock };
    if (!state.record) throw new NotSealedError();
    if (state.integrity_violation) {
      throw new IntegrityViolationError(
        `Unlock permanently blocked: integrity violation detected at ${state.integrity_violation.detected_at}: ${state.integrity_violation.reason}`,
      );
    }
    const remaining = new Date(state.record.target_unlock_at).getTime() - now.getTime();
    if (remaining > 0) throw new TooEarlyError(remaining, state.record.target_unlock_at);
    return { done: false, record: state.record };
  }

  private async verifySealedPrefix(state: SealLedgerState, record: SealRecord, now: Date): Promise<UnlockResult> {
    let reason: string | null = null;
    let head = "";

    try {
      head = await this.store.recomputeHead(record.sealed_length);
      if (head !== record.chain_hash_at_seal) {
        reason = `chain hash over the sealed prefix is ${head}, expected ${record.chain_hash_at_seal}`;
      }
    } catch (e: unknown) {
      if (!(e instanceof IntegrityViolationError)) throw e;
      reason = e.message;
    }

    if (!reason && !(await this.registry.verifyFreeze(record.protocol_freeze_hash))) {
      reason = `protocol registry no longer matches freeze hash ${record.protocol_freeze_hash}`;
    }

    if (reason) {
      const violation: IntegrityViolationRecord = { detected_at: now.toISOString(), reason };
      await this.ledger.write({ ...state, status: "SEALED", integrity_violation: violation });
      this.logger.error("INTEGRITY_VIOLATION", reason, { sealed_length: record.sealed_length });
      throw new IntegrityViolationError(`Integrity violation: ${reason}`);
    }

    return {
      unlocked_at: now.toISOString(),
      target_unlock_at: record.target_unlock_at,
      verified_chain_hash: head,
      verified_length: record.sealed_length,
      protocol_freeze_hash: record.protocol_freeze_hash,
    };
  }
}
