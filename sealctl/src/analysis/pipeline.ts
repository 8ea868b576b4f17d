import { randomUUID } from "node:crypto";
import type { Clock } from "../core/clock.js";
import { IntegrityViolationError, SealedAccessDeniedError, errorMessage } from "../core/errors.js";
import type { Logger } from "../log/logger.js";
import type { ProtocolRegistry } from "../protocol/registry.js";
import type { SealLedger } from "../seal/ledger.js";
import type { SnapshotStore } from "../store/snapshot-store.js";
import type { AnalysisRun, AnalysisScope, MetricResult } from "../types/analysis.js";
import type { ProtocolDefinition } from "../types/protocol.js";
import type { SealRecord } from "../types/seal.js";
import { buildCorpus, type Corpus } from "./corpus.js";
import { METRICS } from "./metrics/index.js";
import type { AnalysisLog } from "./run-log.js";
import type { SemanticScorer } from "./scorer.js";

export type PipelineDeps = {
  store: SnapshotStore;
  registry: ProtocolRegistry;
  ledger: SealLedger;
  runLog: AnalysisLog;
  scorer: SemanticScorer;
  clock: Clock;
  logger: Logger;
};

type Range = { from: number; to: number; head_hash: string };

/**
 * Runs every frozen protocol over the unlocked snapshots and appends one
 * AnalysisRun. Re-running never touches earlier runs.
 */
export class AnalysisPipeline {
  constructor(
    private readonly deps: PipelineDeps,
    private readonly scope: AnalysisScope = "sealed_prefix",
  ) {}

  async run(): Promise<AnalysisRun> {
    const { ledger, registry, store, runLog, clock, logger } = this.deps;

    const state = await ledger.read();
    if (state.status !== "UNLOCKED" || !state.record) {
      throw new SealedAccessDeniedError("semantic analysis", state.status);
    }

    const { freeze_hash, definitions } = await registry.getFrozenDefinitions();
    if (freeze_hash !== state.record.protocol_freeze_hash || !(await registry.verifyFreeze(freeze_hash))) {
      throw new IntegrityViolationError(`Protocol registry does not match the sealed freeze hash ${state.record.protocol_freeze_hash}`);
    }

    const range = await this.resolveRange(state.record);
    const corpus = buildCorpus(await store.contentRange(range.from, range.to));
    logger.info("ANALYSIS_START", `Running ${definitions.length} protocols over snapshots ${range.from}..${range.to}`, {
      comments: corpus.comments.length,
      tasks: corpus.tasks.length,
    });

    const results = await Promise.all(definitions.map((d) => this.compute(d, corpus, freeze_hash)));

    const run: AnalysisRun = {
      run_id: randomUUID(),
      executed_at: clock.now().toISOString(),
      protocol_definition_hash: freeze_hash,
      scope: this.scope,
      scorer: this.deps.scorer.id,
      snapshot_range: range,
      results,
    };
    await runLog.append(run);
    logger.info("ANALYSIS_DONE", `Analysis run ${run.run_id} recorded`, {
      ok: results.filter((r) => r.status === "ok").length,
      failed: results.filter((r) => r.status === "failed").length,
    });
    return run;
  }

  /** The sealed prefix is re-derived here as well as at unlock. */
  private async resolveRange(record: SealRecord): Promise<Range> {
    const { store } = this.deps;
    const head = await store.recomputeHead(record.sealed_length);
    if (head !== record.chain_hash_at_seal) {
      throw new IntegrityViolationError(`Sealed prefix no longer hashes to ${record.chain_hash_at_seal}`);
    }
    if (this.scope === "sealed_prefix") {
      return { from: 0, to: record.sealed_length, head_hash: head };
    }

    const chain = await store.inspectChain();
    if (!chain.ok) {
      throw new IntegrityViolationError(`Chain broken at snapshot ${chain.broken_at}: ${chain.reason}`);
    }
    return { from: 0, to: chain.checked, head_hash: chain.head };
  }

  private async compute(definition: ProtocolDefinition, corpus: Corpus, freezeHash: string): Promise<MetricResult> {
    const base = {
      name: definition.name,
      metric_kind: definition.metric_kind,
      definition_hash: definition.definition_hash,
      protocol_definition_hash: freezeHash,
    };
    try {
      const output = await METRICS[definition.metric_kind]({
        corpus,
        scorer: this.deps.scorer,
        parameters: definition.parameters,
        logger: this.deps.logger,
      });
      return { ...base, status: "ok", value: output.value, skipped_items: output.skipped_items };
    } catch (e: unknown) {
      this.deps.logger.error("METRIC_FAILED", `${definition.name}: ${errorMessage(e)}`);
      return { ...base, status: "failed", error: errorMessage(e) };
    }
  }
}
