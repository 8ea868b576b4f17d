import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../core/errors.js";
import { BUNDLED_CONFIG_DIR } from "../core/paths.js";
import type { SealctlConfig } from "../types/config.js";
import { STRING_SETTINGS, validateConfig } from "./validator.js";

const ENV_PREFIX = "SEALCTL_";

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isTree(val) && isTree(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) throw new ConfigError(`${filePath}: top level must be a mapping`);
  return parsed;
}

/**
 * YAML scalar semantics for env values: "3" → 3, "true" → true. String-typed
 * settings keep the raw value, so a numeric token stays a string.
 */
function coerce(raw: string, setting: string): unknown {
  if (STRING_SETTINGS.has(setting)) return raw;
  const parsed: unknown = YAML.parse(raw);
  return parsed === null || typeof parsed === "object" ? raw : parsed;
}

/**
 * SEALCTL_ prefixed environment overrides. A double underscore descends:
 * SEALCTL_SOURCE__TOKEN → source.token, SEALCTL_DATA_DIR → data_dir.
 */
export function envOverrides(env: NodeJS.ProcessEnv): ConfigTree {
  const out: ConfigTree = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let node = out;
    for (const seg of segments.slice(0, -1)) {
      const next = node[seg];
      if (isTree(next)) {
        node = next;
      } else {
        const created: ConfigTree = {};
        node[seg] = created;
        node = created;
      }
    }
    node[segments[segments.length - 1]] = coerce(value, segments.join("."));
  }
  return out;
}

/**
 * Load layered config: bundled base.yaml ← <configDir>/base.yaml ←
 * <configDir>/<envName>.yaml ← SEALCTL_* environment variables. A missing
 * layer is skipped. Relative `data_dir` resolves against the working directory.
 *
 * @param envName - Optional environment name (e.g. "test", "prod").
 * @param configDir - Directory holding the override layers; defaults to the bundled config.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): SealctlConfig {
  const dir = configDir ? path.resolve(configDir) : BUNDLED_CONFIG_DIR;

  let merged = loadYaml(path.join(BUNDLED_CONFIG_DIR, "base.yaml"));
  if (dir !== BUNDLED_CONFIG_DIR) {
    merged = deepMerge(merged, loadYaml(path.join(dir, "base.yaml")));
  }
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  merged = deepMerge(merged, envOverrides(env));

  const result = validateConfig(merged);
  if (!result.valid) throw new ConfigError(`Invalid configuration: ${result.errors}`);

  const config = result.config;
  return { ...config, data_dir: path.resolve(config.data_dir) };
}
