import { compileValidator } from "../schema/ajv.js";
import type { SealctlConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "data_dir", "log_level", "source", "structural", "analysis", "schedule"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    data_dir: { type: "string", minLength: 1 },
    log_level: { type: "string", enum: ["debug", "info", "warn", "error"] },
    source: {
      type: "object",
      required: ["base_url", "limit", "timeout_ms", "retry"],
      additionalProperties: false,
      properties: {
        base_url: { type: "string", format: "uri" },
        token: { type: "string" },
        limit: { type: "integer", minimum: 1 },
        timeout_ms: { type: "integer", minimum: 1 },
        retry: {
          type: "object",
          required: ["attempts", "base_delay_ms", "max_delay_ms"],
          additionalProperties: false,
          properties: {
            attempts: { type: "integer", minimum: 1 },
            base_delay_ms: { type: "integer", minimum: 0 },
            max_delay_ms: { type: "integer", minimum: 0 },
          },
        },
      },
    },
    structural: {
      type: "object",
      required: ["new_max_age_days", "theory_min_comments", "theory_min_age_days", "high_ratio"],
      additionalProperties: false,
      properties: {
        new_max_age_days: { type: "number", minimum: 0 },
        theory_min_comments: { type: "integer", minimum: 1 },
        theory_min_age_days: { type: "number", minimum: 0 },
        high_ratio: { type: "number", minimum: 0 },
      },
    },
    analysis: {
      type: "object",
      required: ["scope"],
      additionalProperties: false,
      properties: {
        scope: { type: "string", enum: ["sealed_prefix", "full_chain"] },
      },
    },
    schedule: {
      type: "object",
      required: ["interval_ms"],
      additionalProperties: false,
      properties: {
        interval_ms: { type: "integer", minimum: 1000 },
      },
    },
  },
};

type SchemaNode = { type?: string; properties?: Record<string, SchemaNode> };

function stringPaths(properties: Record<string, SchemaNode>, prefix = ""): string[] {
  return Object.entries(properties).flatMap(([key, node]) => {
    const dotted = prefix + key;
    if (node.type === "string") return [dotted];
    return node.properties ? stringPaths(node.properties, `${dotted}.`) : [];
  });
}

/** Dotted paths of the string-typed settings, e.g. "source.token". */
export const STRING_SETTINGS: ReadonlySet<string> = new Set(stringPaths(CONFIG_SCHEMA.properties));

const configValidator = compileValidator<SealctlConfig>(CONFIG_SCHEMA, "config");

export type ConfigValidationResult =
  | { valid: true; config: SealctlConfig }
  | { valid: false; errors: string };

/** Validate a merged config tree against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (configValidator.is(config)) return { valid: true, config };
  return { valid: false, errors: configValidator.lastErrors() };
}
