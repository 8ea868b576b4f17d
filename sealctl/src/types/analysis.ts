import type { MetricKind } from "./protocol.js";

export type AnalysisScope = "sealed_prefix" | "full_chain";

export type MetricResult =
  | {
      name: string;
      metric_kind: MetricKind;
      definition_hash: string;
      protocol_definition_hash: string;
      status: "ok";
      value: Record<string, unknown>;
      skipped_items: number;
    }
  | {
      name: string;
      metric_kind: MetricKind;
      definition_hash: string;
      protocol_definition_hash: string;
      status: "failed";
      error: string;
    };

/** One immutable execution of every frozen protocol. */
export type AnalysisRun = {
  run_id: string;
  executed_at: string;
  protocol_definition_hash: string;
  scope: AnalysisScope;
  /** Identifier of the embedding / language-model collaborator used. */
  scorer: string;
  snapshot_range: { from: number; to: number; head_hash: string };
  results: MetricResult[];
};
