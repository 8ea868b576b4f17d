import { SealctlError, TooEarlyError, errorMessage } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FATAL: 1,
  TOO_EARLY: 2,
  CONCURRENT_CONFLICT: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export type CommandError = {
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type CommandFailure = { ok: false; error: CommandError; exitCode: ExitCode };

export type CommandResult<T extends object> = ({ ok: true } & T) | CommandFailure;

export function isFailure<T extends object>(res: CommandResult<T>): res is CommandFailure {
  return !res.ok;
}

export function exitCodeFor(e: unknown): ExitCode {
  if (e instanceof SealctlError) {
    if (e.code === "TOO_EARLY") return EXIT.TOO_EARLY;
    if (e.code === "COLLECTION_IN_PROGRESS") return EXIT.CONCURRENT_CONFLICT;
  }
  return EXIT.FATAL;
}

export function toFailure(e: unknown): CommandFailure {
  const error: CommandError = {
    code: e instanceof SealctlError ? e.code : "ERROR",
    message: errorMessage(e),
  };
  if (e instanceof TooEarlyError) {
    error.details = { remaining_ms: e.remainingMs, target_unlock_at: e.targetUnlockAt };
  }
  return { ok: false, error, exitCode: exitCodeFor(e) };
}

/** Run a command body, turning any thrown error into a CommandFailure. */
export async function runCommand<T extends object>(fn: () => Promise<T>): Promise<CommandResult<T>> {
  try {
    const value = await fn();
    return { ok: true as const, ...value };
  } catch (e: unknown) {
    return toFailure(e);
  }
}
