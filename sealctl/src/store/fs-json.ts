import { mkdir, open, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";

export const STALE_LOCK_AGE_MS = 300000; // 5 minutes

export async function readJsonFile<T>(path: string): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e: unknown) {
    if (isErrnoCode(e, "ENOENT")) return null;
    throw e;
  }
  return JSON.parse(raw) as T;
}

export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 8)}`;
  const payload = JSON.stringify(data, null, 2) + "\n";

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    // Clean up temporary file on error
    try {
      if (fh) await fh.close();
      await unlink(tmp);
    } catch {
      // the original error is the one worth reporting
    }
    throw e;
  }
}

export type LockRelease = () => Promise<void>;

export type LockAttempt =
  | { acquired: true; release: LockRelease }
  | { acquired: false; owner: string };

export type LockOptions = {
  /**
   * Age after which a lock is removed even if its owner is alive. `null` keeps
   * a lock for as long as its owning pid exists.
   */
  staleAfterMs?: number | null;
};

/**
 * Try once to create `lockPath` exclusively. Stale locks (older than
 * `staleAfterMs`, or owned by a pid that no longer exists) are removed first.
 */
export async function tryAcquireLock(lockPath: string, opts: LockOptions = {}): Promise<LockAttempt> {
  await mkdir(dirname(lockPath), { recursive: true });
  const pid = process.pid;

  await clearStaleLock(lockPath, pid, opts.staleAfterMs === undefined ? STALE_LOCK_AGE_MS : opts.staleAfterMs);

  let fh: FileHandle;
  try {
    fh = await open(lockPath, "wx");
  } catch (e: unknown) {
    if (!isErrnoCode(e, "EEXIST")) throw e;
    const content = await readFile(lockPath, "utf8").catch(() => "");
    const [lockPid, since] = content.split("\n");
    return { acquired: false, owner: `pid ${lockPid || "?"} since ${since ? new Date(Number(since)).toISOString() : "?"}` };
  }

  try {
    await fh.writeFile(`${pid}\n${Date.now()}\n`, "utf8");
    await fh.sync();
  } finally {
    await fh.close();
  }

  return {
    acquired: true,
    release: async () => {
      const content = await readFile(lockPath, "utf8");
      const [lockPid] = content.split("\n");
      if (lockPid === String(pid)) {
        await unlink(lockPath);
      } else {
        console.warn(`[sealctl] Lock was taken by another process (current: ${lockPid}, ours: ${pid}): ${lockPath}`);
      }
    },
  };
}

/** Wait for the lock with exponential backoff and jitter, up to `timeoutMs`. */
export async function acquireLock(lockPath: string, timeoutMs: number): Promise<LockRelease> {
  const started = Date.now();
  let retries = 0;

  for (;;) {
    const attempt = await tryAcquireLock(lockPath);
    if (attempt.acquired) return attempt.release;

    retries++;
    if (Date.now() - started > timeoutMs) {
      throw new Error(`Timed out acquiring lock after ${retries} retries (held by ${attempt.owner}): ${lockPath}`);
    }

    const backoff = Math.min(10 * Math.pow(1.5, retries), 500);
    const jitter = Math.random() * backoff * 0.1;
    await new Promise((r) => setTimeout(r, backoff + jitter));
  }
}

async function clearStaleLock(lockPath: string, pid: number, staleAfterMs: number | null): Promise<void> {
  let age: number;
  try {
    const stats = await stat(lockPath);
    age = Date.now() - stats.mtimeMs;
  } catch {
    return; // no lock file
  }

  const content = await readFile(lockPath, "utf8").catch(() => "");
  const [lockPid] = content.split("\n");
  // Without an owner pid, age is the only signal.
  const maxAge = lockPid ? staleAfterMs : STALE_LOCK_AGE_MS;
  if (maxAge !== null && age > maxAge) {
    console.warn(`[sealctl] Removing stale lock (age: ${Math.round(age / 1000)}s): ${lockPath}`);
    await unlink(lockPath).catch(() => undefined);
    return;
  }

  if (!lockPid || lockPid === String(pid)) return;
  try {
    process.kill(Number(lockPid), 0); // Signal 0 checks existence
  } catch {
    console.warn(`[sealctl] Removing orphaned lock (pid: ${lockPid}): ${lockPath}`);
    await unlink(lockPath).catch(() => undefined);
  }
}

function isErrnoCode(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}
