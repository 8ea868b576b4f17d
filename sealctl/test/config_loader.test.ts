import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { deepMerge, envOverrides, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { ConfigError } from "../src/core/errors.js";
import { makeTmpDir, testConfig } from "./helpers.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config.schema_version).toBe("1");
    expect(config.data_dir).toBe(path.resolve(".sealctl/data"));
    expect(config.source.retry.attempts).toBe(4);
    expect(config.structural.theory_min_comments).toBe(10);
    expect(config.analysis.scope).toBe("sealed_prefix");
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("test", CONFIG_DIR, {});
    expect(config.data_dir).toBe(path.resolve(".sealctl/test-data"));
    expect(config.source.retry).toEqual({ attempts: 2, base_delay_ms: 500, max_delay_ms: 8000 });
    // base fields still present
    expect(config.source.limit).toBe(100);
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR, {});
    expect(config.data_dir).toBe(path.resolve(".sealctl/data"));
  });

  it("applies environment variable overrides", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {
      SEALCTL_DATA_DIR: "/tmp/override",
      SEALCTL_SOURCE__TOKEN: "test-secret",
      SEALCTL_SOURCE__RETRY__ATTEMPTS: "7",
      SEALCTL_ANALYSIS__SCOPE: "full_chain",
      OTHER_VAR: "ignored",
    });
    expect(config.data_dir).toBe("/tmp/override");
    expect(config.source.token).toBe("test-secret");
    expect(config.source.retry.attempts).toBe(7);
    expect(config.analysis.scope).toBe("full_chain");
  });

  it("keeps numeric-looking env values as strings for string settings", () => {
    expect(
      envOverrides({ SEALCTL_SOURCE__TOKEN: "12345", SEALCTL_DATA_DIR: "0x1f", SEALCTL_SOURCE__LIMIT: "25" }),
    ).toEqual({ source: { token: "12345", limit: 25 }, data_dir: "0x1f" });

    const config = loadConfig(undefined, CONFIG_DIR, { SEALCTL_SOURCE__TOKEN: "12345" });
    expect(config.source.token).toBe("12345");
  });

  it("env vars override env-specific yaml", () => {
    const config = loadConfig("test", CONFIG_DIR, { SEALCTL_LOG_LEVEL: "warn" });
    expect(config.log_level).toBe("warn");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig(undefined, CONFIG_DIR, { SEALCTL_ANALYSIS__SCOPE: "everything" })).toThrow(ConfigError);
  });

  describe("with a project config directory", () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTmpDir();
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("layers the project base over the bundled defaults", () => {
      fs.writeFileSync(path.join(dir, "base.yaml"), "data_dir: /srv/study\nstructural:\n  high_ratio: 3\n");
      const config = loadConfig(undefined, dir, {});
      expect(config.data_dir).toBe("/srv/study");
      expect(config.structural).toEqual({ new_max_age_days: 1, theory_min_comments: 10, theory_min_age_days: 7, high_ratio: 3 });
    });

    it("rejects a non-mapping document", () => {
      fs.writeFileSync(path.join(dir, "base.yaml"), "- just\n- a list\n");
      expect(() => loadConfig(undefined, dir, {})).toThrow(ConfigError);
    });
  });
});

describe("config helpers", () => {
  it("replaces arrays instead of concatenating", () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 4 } })).toEqual({ a: [3], b: { c: 1, d: 4 } });
  });

  it("nests double-underscore keys", () => {
    expect(envOverrides({ SEALCTL_SCHEDULE__INTERVAL_MS: "5000", SEALCTL_LOG_LEVEL: "debug" })).toEqual({
      schedule: { interval_ms: 5000 },
      log_level: "debug",
    });
  });
});

describe("config validator", () => {
  it("validates a correct config", () => {
    const result = validateConfig(testConfig("/tmp/data"));
    expect(result.valid).toBe(true);
  });

  it("rejects config missing required fields", () => {
    const result = validateConfig({ data_dir: "x" });
    expect(result.valid).toBe(false);
    if (!result.valid) expect(result.errors).toContain("must have required property");
  });

  it("rejects unknown keys", () => {
    const result = validateConfig({ ...testConfig("/tmp/data"), phase: "1a" });
    expect(result.valid).toBe(false);
  });
});
