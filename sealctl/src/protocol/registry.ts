import path from "node:path";
import {
  InvalidArgumentError,
  ProtocolLockedError,
  RegistryMismatchError,
} from "../core/errors.js";
import { acquireLock, atomicWriteJson, readJsonFile } from "../store/fs-json.js";
import { hashCanonical } from "../store/hash.js";
import type { SealLedger } from "../seal/ledger.js";
import {
  isMetricKind,
  type ProtocolDefinition,
  type ProtocolDefinitionInput,
  type RegistryFile,
} from "../types/protocol.js";

const EMPTY_REGISTRY: RegistryFile = {
  schema_version: 1,
  frozen: false,
  freeze_hash: null,
  frozen_at: null,
  definitions: [],
};

const NAME_PATTERN = /^[a-z0-9][a-z0-9_.-]{0,63}$/;

export function computeDefinitionHash(input: ProtocolDefinitionInput): string {
  return hashCanonical({ name: input.name, metric_kind: input.metric_kind, parameters: input.parameters });
}

/** Hash over the canonical serialization of all definitions, ordered by name. */
export function computeFreezeHash(definitions: ProtocolDefinition[]): string {
  const ordered = [...definitions].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return hashCanonical(
    ordered.map((d) => ({
      name: d.name,
      metric_kind: d.metric_kind,
      parameters: d.parameters,
      definition_hash: d.definition_hash,
    })),
  );
}

export type ProtocolSummary = Pick<ProtocolDefinition, "name" | "metric_kind" | "definition_hash">;

/**
 * Pre-registered analysis protocol (protocols.json). Definitions can be added
 * only while collecting; `freeze()` pins them for the rest of the study.
 */
export class ProtocolRegistry {
  readonly filePath: string;

  private readonly lockTimeoutMs: number;

  constructor(
    dataDir: string,
    private readonly ledger: SealLedger,
    opts: { lockTimeoutMs?: number } = {},
  ) {
    this.filePath = path.join(dataDir, "protocols.json");
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 10000;
  }

  async read(): Promise<RegistryFile> {
    return (await readJsonFile<RegistryFile>(this.filePath)) ?? { ...EMPTY_REGISTRY, definitions: [] };
  }

  async register(input: ProtocolDefinitionInput): Promise<ProtocolDefinition> {
    const [definition] = await this.registerAll([input]);
    return definition;
  }

  /**
   * Add a batch of definitions in one write, or none of them. Runs under the
   * seal lock so a concurrent `seal` cannot freeze between the check and the write.
   */
  async registerAll(inputs: readonly ProtocolDefinitionInput[]): Promise<ProtocolDefinition[]> {
    const release = await acquireLock(this.ledger.lockPath, this.lockTimeoutMs);
    try {
      const current = await this.read();
      if (current.frozen) {
        throw new ProtocolLockedError(`frozen at ${current.frozen_at ?? "unknown time"}`);
      }
      const status = await this.ledger.status();
      if (status !== "COLLECTING") {
        throw new ProtocolLockedError(`seal status is ${status}`);
      }

      const names = new Set(current.definitions.map((d) => d.name));
      const added: ProtocolDefinition[] = [];
      for (const input of inputs) {
        validateInput(input);
        if (names.has(input.name)) {
          throw new InvalidArgumentError(`Protocol already registered: ${input.name}`);
        }
        names.add(input.name);
        added.push({
          name: input.name,
          metric_kind: input.metric_kind,
          parameters: input.parameters,
          definition_hash: computeDefinitionHash(input),
        });
      }

      await atomicWriteJson(this.filePath, { ...current, definitions: [...current.definitions, ...added] });
      return added;
    } finally {
      await release();
    }
  }

  /**
   * Pin the definitions and return the freeze hash. Freezing again with the same
   * content returns the recorded hash; different content is a RegistryMismatch.
   */
  async freeze(now: Date): Promise<string> {
    const current = await this.read();
    const hash = computeFreezeHash(current.definitions);

    if (current.frozen) {
      if (current.freeze_hash !== hash) {
        throw new RegistryMismatchError(current.freeze_hash ?? "none", hash);
      }
      return hash;
    }

    await atomicWriteJson(this.filePath, {
      ...current,
      frozen: true,
      freeze_hash: hash,
      frozen_at: now.toISOString(),
    } satisfies RegistryFile);
    return hash;
  }

  /** Recompute the freeze hash from the stored definitions and compare. */
  async verifyFreeze(expected: string): Promise<boolean> {
    const current = await this.read();
    if (!current.frozen || current.freeze_hash !== expected) return false;
    return current.definitions.every((d) => computeDefinitionHash(d) === d.definition_hash) &&
      computeFreezeHash(current.definitions) === expected;
  }

  /** Names, kinds and hashes. The protocol itself is public. */
  async list(): Promise<ProtocolSummary[]> {
    const current = await this.read();
    return current.definitions.map(({ name, metric_kind, definition_hash }) => ({ name, metric_kind, definition_hash }));
  }

  async getFrozenDefinitions(): Promise<{ freeze_hash: string; definitions: ProtocolDefinition[] }> {
    await this.ledger.assertUnlocked("frozen protocol definitions");
    const current = await this.read();
    if (!current.frozen || !current.freeze_hash) {
      throw new ProtocolLockedError("registry was never frozen");
    }
    return { freeze_hash: current.freeze_hash, definitions: current.definitions };
  }
}

function validateInput(input: ProtocolDefinitionInput): void {
  if (!NAME_PATTERN.test(input.name)) {
    throw new InvalidArgumentError(`Invalid protocol name: ${JSON.stringify(input.name)}`);
  }
  if (!isMetricKind(input.metric_kind)) {
    throw new InvalidArgumentError(`Unknown metric kind: ${String(input.metric_kind)}`);
  }
  if (typeof input.parameters !== "object" || input.parameters === null || Array.isArray(input.parameters)) {
    throw new InvalidArgumentError(`Protocol ${input.name}: parameters must be a mapping`);
  }
}
