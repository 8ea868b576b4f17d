import { InvalidArgumentError } from "../../core/errors.js";
import type { Logger } from "../../log/logger.js";
import type { ProtocolParameters } from "../../types/protocol.js";
import type { Corpus } from "../corpus.js";
import type { SemanticScorer } from "../scorer.js";

export type MetricContext = {
  corpus: Corpus;
  scorer: SemanticScorer;
  parameters: ProtocolParameters;
  logger?: Logger;
};

export type MetricOutput = {
  value: Record<string, unknown>;
  /** Items dropped because the scorer failed on them. */
  skipped_items: number;
};

export type MetricComputer = (ctx: MetricContext) => Promise<MetricOutput>;

export function numberParam(params: ProtocolParameters, key: string, fallback: number): number {
  const v = params[key];
  if (v === undefined) return fallback;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new InvalidArgumentError(`Parameter ${key} must be a number`);
  }
  return v;
}

export function stringListParam(params: ProtocolParameters, key: string, fallback: string[]): string[] {
  const v = params[key];
  if (v === undefined) return fallback;
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === "string")) {
    throw new InvalidArgumentError(`Parameter ${key} must be a list of strings`);
  }
  return v;
}

export function choiceParam<T extends string>(params: ProtocolParameters, key: string, choices: readonly T[], fallback: T): T {
  const v = params[key];
  if (v === undefined) return fallback;
  const found = choices.find((c) => c === v);
  if (found === undefined) {
    throw new InvalidArgumentError(`Parameter ${key} must be one of ${choices.join(", ")}`);
  }
  return found;
}
