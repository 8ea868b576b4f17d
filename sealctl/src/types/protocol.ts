export const METRIC_KINDS = [
  "semantic_novelty",
  "conceptual_synthesis",
  "temporal_dynamics",
  "collaborative_emergence",
  "surprise",
] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

export type ProtocolParameters = Record<string, unknown>;

/** A pre-committed definition of one semantic metric. */
export type ProtocolDefinition = {
  name: string;
  metric_kind: MetricKind;
  parameters: ProtocolParameters;
  definition_hash: string;
};

export type ProtocolDefinitionInput = Omit<ProtocolDefinition, "definition_hash">;

/** protocols.json */
export type RegistryFile = {
  schema_version: 1;
  frozen: boolean;
  freeze_hash: string | null;
  frozen_at: string | null;
  definitions: ProtocolDefinition[];
};

export function isMetricKind(value: unknown): value is MetricKind {
  return typeof value === "string" && (METRIC_KINDS as readonly string[]).includes(value);
}
