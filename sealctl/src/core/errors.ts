/**
 * Error kinds raised by the store, the seal and the pipeline.
 * `fatal` decides how the CLI reports the condition (see commands/exit-codes.ts).
 */
export type ErrorCode =
  | "NOT_FOUND"
  | "SEALED_ACCESS_DENIED"
  | "TOO_EARLY"
  | "INTEGRITY_VIOLATION"
  | "ALREADY_SEALED"
  | "NOT_SEALED"
  | "PROTOCOL_LOCKED"
  | "REGISTRY_MISMATCH"
  | "COLLECTION_IN_PROGRESS"
  | "COLLECTION_CLOSED"
  | "NETWORK_ERROR"
  | "INVALID_ARGUMENT"
  | "CONFIG_ERROR";

export class SealctlError extends Error {
  readonly code: ErrorCode;
  readonly fatal: boolean;

  constructor(code: ErrorCode, message: string, fatal = true) {
    super(message);
    this.name = "SealctlError";
    this.code = code;
    this.fatal = fatal;
  }
}

export class NotFoundError extends SealctlError {
  constructor(what: string) {
    super("NOT_FOUND", `Not found: ${what}`);
    this.name = "NotFoundError";
  }
}

export class SealedAccessDeniedError extends SealctlError {
  constructor(what: string, status: string) {
    super("SEALED_ACCESS_DENIED", `Access to ${what} denied: seal status is ${status}, content is readable only once UNLOCKED`, false);
    this.name = "SealedAccessDeniedError";
  }
}

export class TooEarlyError extends SealctlError {
  readonly remainingMs: number;
  readonly targetUnlockAt: string;

  constructor(remainingMs: number, targetUnlockAt: string) {
    super("TOO_EARLY", `Too early to unlock: ${formatRemaining(remainingMs)} remaining until ${targetUnlockAt}`, false);
    this.name = "TooEarlyError";
    this.remainingMs = remainingMs;
    this.targetUnlockAt = targetUnlockAt;
  }
}

export class IntegrityViolationError extends SealctlError {
  constructor(message: string) {
    super("INTEGRITY_VIOLATION", message);
    this.name = "IntegrityViolationError";
  }
}

export class AlreadySealedError extends SealctlError {
  constructor(createdAt: string) {
    super("ALREADY_SEALED", `A seal record already exists (created ${createdAt})`);
    this.name = "AlreadySealedError";
  }
}

export class NotSealedError extends SealctlError {
  constructor() {
    super("NOT_SEALED", "No seal record exists; run `seal` first");
    this.name = "NotSealedError";
  }
}

export class ProtocolLockedError extends SealctlError {
  constructor(reason: string) {
    super("PROTOCOL_LOCKED", `Protocol registry is locked: ${reason}`);
    this.name = "ProtocolLockedError";
  }
}

export class RegistryMismatchError extends SealctlError {
  constructor(expected: string, actual: string) {
    super("REGISTRY_MISMATCH", `Protocol registry content does not match its freeze hash (expected ${expected}, got ${actual})`);
    this.name = "RegistryMismatchError";
  }
}

export class CollectionInProgressError extends SealctlError {
  constructor(owner: string) {
    super("COLLECTION_IN_PROGRESS", `Another collection is in progress (${owner}); retry later`, false);
    this.name = "CollectionInProgressError";
  }
}

export class CollectionClosedError extends SealctlError {
  constructor(reason: string) {
    super("COLLECTION_CLOSED", `Collection period is over: ${reason}`);
    this.name = "CollectionClosedError";
  }
}

export class NetworkError extends SealctlError {
  readonly attempts: number;
  readonly status: number | null;

  constructor(message: string, attempts: number, status: number | null = null) {
    super("NETWORK_ERROR", message);
    this.name = "NetworkError";
    this.attempts = attempts;
    this.status = status;
  }
}

export class InvalidArgumentError extends SealctlError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class ConfigError extends SealctlError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

const DAY_MS = 86_400_000;

/** "29d 23h 59m 0s" style rendering of a non-negative duration. */
export function formatRemaining(ms: number): string {
  const clamped = Math.max(0, ms);
  const days = Math.floor(clamped / DAY_MS);
  const hours = Math.floor((clamped % DAY_MS) / 3_600_000);
  const minutes = Math.floor((clamped % 3_600_000) / 60_000);
  const seconds = Math.floor((clamped % 60_000) / 1000);
  return `${days}d ${hours}h ${minutes}m ${seconds}s`;
}
