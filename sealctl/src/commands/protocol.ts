import type { Workspace } from "../core/workspace.js";
import { loadProtocolFile } from "../protocol/loader.js";
import type { ProtocolSummary } from "../protocol/registry.js";
import type { ProtocolDefinition } from "../types/protocol.js";
import { runCommand, type CommandResult } from "./exit-codes.js";

export type RegisterResult = CommandResult<{ registered: ProtocolDefinition[] }>;

/** Register every definition in a YAML protocol file, all or nothing. */
export function registerProtocols(ws: Workspace, filePath: string): Promise<RegisterResult> {
  return runCommand(async () => {
    const inputs = loadProtocolFile(filePath);
    const registered = await ws.registry.registerAll(inputs);
    for (const definition of registered) {
      ws.logger.info("PROTOCOL_REGISTERED", `${definition.name} (${definition.metric_kind})`, {
        definition_hash: definition.definition_hash,
      });
    }
    return { registered };
  });
}

export type ListProtocolsResult = CommandResult<{
  frozen: boolean;
  freeze_hash: string | null;
  protocols: ProtocolSummary[];
}>;

export function listProtocols(ws: Workspace): Promise<ListProtocolsResult> {
  return runCommand(async () => {
    const current = await ws.registry.read();
    return { frozen: current.frozen, freeze_hash: current.freeze_hash, protocols: await ws.registry.list() };
  });
}
