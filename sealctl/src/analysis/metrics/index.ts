import type { MetricKind } from "../../types/protocol.js";
import { collaborativeEmergence } from "./emergence.js";
import { semanticNovelty } from "./novelty.js";
import { surprise } from "./surprise.js";
import { conceptualSynthesis } from "./synthesis.js";
import { temporalDynamics } from "./temporal.js";
import type { MetricComputer } from "./types.js";

export const METRICS: Record<MetricKind, MetricComputer> = {
  semantic_novelty: semanticNovelty,
  conceptual_synthesis: conceptualSynthesis,
  temporal_dynamics: temporalDynamics,
  collaborative_emergence: collaborativeEmergence,
  surprise,
};

export type { MetricComputer, MetricContext, MetricOutput } from "./types.js";
