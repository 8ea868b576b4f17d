/** Configuration types — layered config (base.yaml ← <env>.yaml ← SEALCTL_* variables). */
import type { AnalysisScope } from "./analysis.js";
import type { LogLevel } from "../log/logger.js";

export type RetryConfig = {
  attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
};

export type SourceConfig = {
  base_url: string;
  token?: string;
  limit: number;
  timeout_ms: number;
  retry: RetryConfig;
};

export type StructuralThresholds = {
  /** Younger tasks with no activity are NEW. */
  new_max_age_days: number;
  theory_min_comments: number;
  theory_min_age_days: number;
  /** Ratio above which a task counts as discourse-heavy. */
  high_ratio: number;
};

export type AnalysisConfig = {
  scope: AnalysisScope;
};

export type ScheduleConfig = {
  interval_ms: number;
};

export type SealctlConfig = {
  schema_version: string;
  data_dir: string;
  log_level: LogLevel;
  source: SourceConfig;
  structural: StructuralThresholds;
  analysis: AnalysisConfig;
  schedule: ScheduleConfig;
};
