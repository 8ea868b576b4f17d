import fs from "node:fs";
import YAML from "yaml";
import { InvalidArgumentError } from "../core/errors.js";
import { compileValidator } from "../schema/ajv.js";
import { METRIC_KINDS, type MetricKind, type ProtocolDefinitionInput, type ProtocolParameters } from "../types/protocol.js";

export type ProtocolFile = {
  protocols: Array<{ name: string; metric_kind: MetricKind; parameters?: ProtocolParameters }>;
};

const PROTOCOL_FILE_SCHEMA = {
  type: "object",
  required: ["protocols"],
  additionalProperties: false,
  properties: {
    protocols: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["name", "metric_kind"],
        additionalProperties: false,
        properties: {
          name: { type: "string", minLength: 1 },
          metric_kind: { type: "string", enum: [...METRIC_KINDS] },
          parameters: { type: "object" },
        },
      },
    },
  },
};

const protocolFile = compileValidator<ProtocolFile>(PROTOCOL_FILE_SCHEMA, "protocols");

/** Parse a YAML protocol file. Missing `parameters` become `{}`. */
export function parseProtocolFile(raw: string, source = "<inline>"): ProtocolDefinitionInput[] {
  const parsed: unknown = YAML.parse(raw);
  if (!protocolFile.is(parsed)) {
    throw new InvalidArgumentError(`Invalid protocol file ${source}: ${protocolFile.lastErrors()}`);
  }
  return parsed.protocols.map((p) => ({
    name: p.name,
    metric_kind: p.metric_kind,
    parameters: p.parameters ?? {},
  }));
}

export function loadProtocolFile(filePath: string): ProtocolDefinitionInput[] {
  if (!fs.existsSync(filePath)) {
    throw new InvalidArgumentError(`Protocol file not found: ${filePath}`);
  }
  return parseProtocolFile(fs.readFileSync(filePath, "utf8"), filePath);
}
