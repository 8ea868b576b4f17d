import type { Workspace } from "../core/workspace.js";
import type { AnalysisRun } from "../types/analysis.js";
import { runCommand, type CommandResult } from "./exit-codes.js";

export type AnalyzeResult = CommandResult<{ run: AnalysisRun }>;

/** Run the frozen protocol once. Denied until the seal is lifted. */
export function analyze(ws: Workspace): Promise<AnalyzeResult> {
  return runCommand(async () => ({ run: await ws.pipeline.run() }));
}

export type RunsResult = CommandResult<{ runs: AnalysisRun[] }>;

/** Previous analysis runs, oldest first, or the single run `runId`. */
export function listRuns(ws: Workspace, runId?: string): Promise<RunsResult> {
  return runCommand(async () => ({
    runs: runId ? [await ws.runLog.get(runId)] : await ws.runLog.list(),
  }));
}
