import path from "node:path";
import { SealedAccessDeniedError } from "../core/errors.js";
import { atomicWriteJson, readJsonFile } from "../store/fs-json.js";
import type { SealLedgerState, SealStatus } from "../types/seal.js";

export const INITIAL_LEDGER: SealLedgerState = {
  schema_version: 1,
  status: "COLLECTING",
  record: null,
  unlock: null,
  integrity_violation: null,
};

/**
 * Persistent seal state (seal.json). Every content read path asks the ledger
 * before touching semantic data.
 */
export class SealLedger {
  readonly statePath: string;
  readonly lockPath: string;

  constructor(dataDir: string) {
    this.statePath = path.join(dataDir, "seal.json");
    this.lockPath = path.join(dataDir, "seal.lock");
  }

  async read(): Promise<SealLedgerState> {
    const state = await readJsonFile<SealLedgerState>(this.statePath);
    if (!state) return { ...INITIAL_LEDGER };
    if (state.schema_version !== 1) {
      throw new Error(`Unsupported seal schema_version: ${String(state.schema_version)}`);
    }
    return state;
  }

  async write(state: SealLedgerState): Promise<void> {
    await atomicWriteJson(this.statePath, state);
  }

  async status(): Promise<SealStatus> {
    return (await this.read()).status;
  }

  /** Throws SealedAccessDenied unless the seal has been lifted. */
  async assertUnlocked(what: string): Promise<void> {
    const status = await this.status();
    if (status !== "UNLOCKED") {
      throw new SealedAccessDeniedError(what, status);
    }
  }
}
