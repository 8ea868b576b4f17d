import type { Workspace } from "../core/workspace.js";
import type { ProtocolSummary } from "../protocol/registry.js";
import type { SealStatusReport } from "../seal/seal-manager.js";
import type { SnapshotMeta } from "../types/snapshot.js";
import { runCommand, type CommandResult } from "./exit-codes.js";

export type StatusResult = CommandResult<{
  seal: SealStatusReport;
  head: Pick<SnapshotMeta, "sequence_number" | "content_hash" | "collected_at"> | null;
  protocols: ProtocolSummary[];
  frozen: boolean;
}>;

/**
 * Seal state, time remaining, chain head and registered protocols.
 * Reads metadata only, so it works in every state.
 */
export function status(ws: Workspace): Promise<StatusResult> {
  return runCommand(async () => {
    const seal = await ws.seal.status();
    const head = await ws.store.head();
    const registry = await ws.registry.read();
    return {
      seal,
      head: head ? { sequence_number: head.sequence_number, content_hash: head.content_hash, collected_at: head.collected_at } : null,
      protocols: await ws.registry.list(),
      frozen: registry.frozen,
    };
  });
}
