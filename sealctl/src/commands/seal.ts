import { parseTimestamp } from "../core/clock.js";
import { InvalidArgumentError, errorMessage } from "../core/errors.js";
import type { Workspace } from "../core/workspace.js";
import type { SealRecord, UnlockResult } from "../types/seal.js";
import type { ChainInspection } from "../types/snapshot.js";
import { runCommand, type CommandResult } from "./exit-codes.js";

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

/**
 * Resolve a seal target: an ISO-8601 timestamp, or a duration from now such
 * as `30d`, `+12h` or `2w`.
 */
export function parseTarget(value: string, now: Date): Date {
  const relative = /^\+?(\d+)([mhdw])$/.exec(value.trim());
  if (relative) {
    return new Date(now.getTime() + Number(relative[1]) * UNIT_MS[relative[2]]);
  }
  const at = parseTimestamp(value);
  if (!at) throw new InvalidArgumentError(`Not a timestamp or duration: ${JSON.stringify(value)}`);
  return at;
}

export type SealResult = CommandResult<{ record: SealRecord }>;

export function seal(ws: Workspace, target: string): Promise<SealResult> {
  return runCommand(async () => ({
    record: await ws.seal.seal(parseTarget(target, ws.clock.now())),
  }));
}

export type UnlockCommandResult = CommandResult<{ unlock: UnlockResult }>;

/** TooEarly exits 2 with the remaining time; nothing changes on disk. */
export function unlock(ws: Workspace): Promise<UnlockCommandResult> {
  return runCommand(async () => ({ unlock: await ws.seal.attemptUnlock() }));
}

export type VerifyResult = CommandResult<{
  /** False when the chain or the sealed prefix fails verification. */
  intact: boolean;
  chain: ChainInspection;
  /** Null while nothing is sealed. */
  sealed_prefix: { length: number; expected: string; actual: string; matches: boolean } | null;
}>;

/**
 * Re-verify the whole chain and, once sealed, the sealed prefix against the
 * recorded head. Touches hashes only; no content leaves the store.
 */
export function verify(ws: Workspace): Promise<VerifyResult> {
  return runCommand(async () => {
    const chain = await ws.store.inspectChain();
    const { record } = await ws.ledger.read();
    if (!record) return { intact: chain.ok, chain, sealed_prefix: null };

    let actual: string;
    try {
      actual = await ws.store.recomputeHead(record.sealed_length);
    } catch (e: unknown) {
      ws.logger.warn("VERIFY_FAILED", "Sealed prefix could not be recomputed", {
        reason: errorMessage(e),
      });
      actual = "";
    }
    const matches = actual === record.chain_hash_at_seal;
    return {
      intact: chain.ok && matches,
      chain,
      sealed_prefix: {
        length: record.sealed_length,
        expected: record.chain_hash_at_seal,
        actual,
        matches,
      },
    };
  });
}
