import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { NotFoundError } from "../core/errors.js";
import type { SealLedger } from "../seal/ledger.js";
import { acquireLock } from "../store/fs-json.js";
import type { AnalysisRun } from "../types/analysis.js";

/** Append-only log of analysis runs (runs.jsonl). Existing lines are never rewritten. */
export class AnalysisLog {
  readonly filePath: string;
  private readonly lockPath: string;

  constructor(
    dataDir: string,
    private readonly ledger: SealLedger,
  ) {
    this.filePath = path.join(dataDir, "runs.jsonl");
    this.lockPath = path.join(dataDir, "runs.lock");
  }

  async append(run: AnalysisRun): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const release = await acquireLock(this.lockPath, 10000);
    try {
      await appendFile(this.filePath, JSON.stringify(run) + "\n", "utf8");
    } finally {
      await release();
    }
  }

  async list(): Promise<AnalysisRun[]> {
    await this.ledger.assertUnlocked("analysis runs");
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (e: unknown) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
      throw e;
    }
    return raw
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => JSON.parse(line) as AnalysisRun);
  }

  async get(runId: string): Promise<AnalysisRun> {
    const run = (await this.list()).find((r) => r.run_id === runId);
    if (!run) throw new NotFoundError(`analysis run ${runId}`);
    return run;
  }
}
