import { AnalysisPipeline } from "../analysis/pipeline.js";
import { AnalysisLog } from "../analysis/run-log.js";
import { LocalScorer, type SemanticScorer } from "../analysis/scorer.js";
import { Collector } from "../collector/collector.js";
import type { Logger } from "../log/logger.js";
import { ProtocolRegistry } from "../protocol/registry.js";
import { SealLedger } from "../seal/ledger.js";
import { SealManager } from "../seal/seal-manager.js";
import type { DataSource } from "../source/data-source.js";
import { HttpDataSource } from "../source/http-source.js";
import { SnapshotStore } from "../store/snapshot-store.js";
import type { SealctlConfig } from "../types/config.js";
import { systemClock, type Clock } from "./clock.js";

export type WorkspaceOptions = {
  config: SealctlConfig;
  logger: Logger;
  clock?: Clock;
  /** Defaults to the HTTP client built from `config.source`. */
  source?: DataSource;
  scorer?: SemanticScorer;
};

/** Every component of one data directory, wired together. */
export type Workspace = {
  config: SealctlConfig;
  logger: Logger;
  clock: Clock;
  ledger: SealLedger;
  store: SnapshotStore;
  registry: ProtocolRegistry;
  seal: SealManager;
  runLog: AnalysisLog;
  pipeline: AnalysisPipeline;
  collector: Collector;
};

export function openWorkspace(opts: WorkspaceOptions): Workspace {
  const { config, logger } = opts;
  const clock = opts.clock ?? systemClock;
  const dataDir = config.data_dir;

  const ledger = new SealLedger(dataDir);
  const store = new SnapshotStore(dataDir, ledger);
  const registry = new ProtocolRegistry(dataDir, ledger);
  const runLog = new AnalysisLog(dataDir, ledger);
  const source = opts.source ?? new HttpDataSource(config.source, logger);

  return {
    config,
    logger,
    clock,
    ledger,
    store,
    registry,
    seal: new SealManager(store, registry, ledger, clock, logger),
    runLog,
    pipeline: new AnalysisPipeline(
      { store, registry, ledger, runLog, scorer: opts.scorer ?? new LocalScorer(), clock, logger },
      config.analysis.scope,
    ),
    collector: new Collector(source, store, ledger, clock, logger),
  };
}
