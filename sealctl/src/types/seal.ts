/** Seal state machine status. UNLOCKED is terminal. */
export type SealStatus = "COLLECTING" | "SEALED" | "UNLOCKED";

export type SealRecord = {
  created_at: string;
  target_unlock_at: string;
  chain_hash_at_seal: string;
  /** Number of snapshots in the sealed prefix. */
  sealed_length: number;
  protocol_freeze_hash: string;
};

export type UnlockResult = {
  unlocked_at: string;
  target_unlock_at: string;
  verified_chain_hash: string;
  verified_length: number;
  protocol_freeze_hash: string;
};

export type IntegrityViolationRecord = {
  detected_at: string;
  reason: string;
};

/** seal.json */
export type SealLedgerState = {
  schema_version: 1;
  status: SealStatus;
  record: SealRecord | null;
  unlock: UnlockResult | null;
  integrity_violation: IntegrityViolationRecord | null;
};
