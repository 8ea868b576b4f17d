#!/usr/bin/env node

import { Command } from "commander";
import { analyze, listRuns } from "./commands/analyze.js";
import { collect } from "./commands/collect.js";
import { EXIT, isFailure, toFailure, type CommandFailure, type CommandResult } from "./commands/exit-codes.js";
import { listProtocols, registerProtocols } from "./commands/protocol.js";
import { schedule } from "./commands/schedule.js";
import { seal, unlock, verify } from "./commands/seal.js";
import { status } from "./commands/status.js";
import { talkToCode } from "./commands/talk-to-code.js";
import { loadConfig } from "./config/loader.js";
import { formatRemaining } from "./core/errors.js";
import { openWorkspace, type Workspace } from "./core/workspace.js";
import { Logger, type OutputFormat } from "./log/logger.js";

type GlobalOptions = { config?: string; env?: string; format: OutputFormat };

const program = new Command();

program
  .name("sealctl")
  .description("Blind discourse collection with a time-locked analysis protocol")
  .version("0.1.0")
  .option("--config <dir>", "Config directory holding base.yaml and <env>.yaml")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", "human");

function globals(): GlobalOptions {
  const opts = program.opts<{ config?: string; env?: string; format: string }>();
  return { config: opts.config, env: opts.env, format: opts.format === "jsonl" ? "jsonl" : "human" };
}

function workspace(): Workspace {
  const opts = globals();
  const config = loadConfig(opts.env, opts.config);
  const logger = new Logger({ level: config.log_level, format: opts.format });
  return openWorkspace({ config, logger });
}

function fail(res: CommandFailure, format: OutputFormat): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", ...res.error }) + "\n");
  } else {
    console.error(`${res.error.code}: ${res.error.message}`);
  }
  process.exit(res.exitCode);
}

/** Print a result: the whole object as one JSONL line, or `human(res)` lines. */
function emit<T extends object>(res: CommandResult<T>, human: (ok: { ok: true } & T) => string[]): void {
  const { format } = globals();
  if (isFailure(res)) fail(res, format);
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(res) + "\n");
  } else {
    for (const line of human(res)) console.log(line);
  }
}

/** Config errors surface the same way as command failures. */
function withWorkspace(action: (ws: Workspace) => Promise<void>): () => Promise<void> {
  return async () => {
    let ws: Workspace;
    try {
      ws = workspace();
    } catch (e: unknown) {
      fail(toFailure(e), globals().format);
    }
    await action(ws);
  };
}

program
  .command("collect")
  .description("Fetch the current state of the platform and append one snapshot")
  .action(
    withWorkspace(async (ws) => {
      emit(await collect(ws), ({ report }) => [
        `Snapshot ${report.snapshot.sequence_number} stored: ${report.snapshot.content_hash}`,
        `  tasks ${report.stored_tasks}/${report.listed}, comments ${report.stored_comments}, soft failures ${report.soft_failures.length}` +
          (report.post_seal ? " (after the seal; outside the sealed prefix)" : ""),
      ]);
    }),
  );

program
  .command("status")
  .description("Show seal state, time remaining and the chain head")
  .action(
    withWorkspace(async (ws) => {
      emit(await status(ws), ({ seal: s, head, protocols, frozen }) => {
        const lines = [`Status: ${s.status}`, `Snapshots: ${s.snapshot_count}`];
        if (head) lines.push(`Head: #${head.sequence_number} ${head.content_hash} (${head.collected_at})`);
        if (s.record) {
          lines.push(`Sealed: ${s.record.created_at} over ${s.record.sealed_length} snapshots`);
          lines.push(`Unlocks at: ${s.record.target_unlock_at}`);
          if (s.status === "SEALED" && s.remaining_ms !== null) lines.push(`Remaining: ${formatRemaining(s.remaining_ms)}`);
          if (s.tail_count > 0) lines.push(`Collected after seal: ${s.tail_count}`);
        }
        if (s.integrity_violation) {
          lines.push(`INTEGRITY VIOLATION at ${s.integrity_violation.detected_at}: ${s.integrity_violation.reason}`);
        }
        lines.push(`Protocols: ${protocols.length}${frozen ? " (frozen)" : ""}`);
        return lines;
      });
    }),
  );

program
  .command("seal")
  .description("Freeze the protocol registry and seal the collected snapshots")
  .argument("<target>", "Unlock time: ISO-8601 timestamp or a duration such as 30d")
  .action(async (target: string) => {
    await withWorkspace(async (ws) => {
      emit(await seal(ws, target), ({ record }) => [
        `Sealed ${record.sealed_length} snapshots until ${record.target_unlock_at}`,
        `  chain hash:    ${record.chain_hash_at_seal}`,
        `  protocol hash: ${record.protocol_freeze_hash}`,
      ]);
    })();
  });

program
  .command("unlock")
  .description("Lift the seal once the target time has passed")
  .action(
    withWorkspace(async (ws) => {
      emit(await unlock(ws), ({ unlock: u }) => [
        `Unlocked at ${u.unlocked_at}`,
        `  verified ${u.verified_length} snapshots: ${u.verified_chain_hash}`,
      ]);
    }),
  );

program
  .command("analyze")
  .description("Run the frozen analysis protocol over the unlocked snapshots")
  .action(
    withWorkspace(async (ws) => {
      emit(await analyze(ws), ({ run }) => [
        `Run ${run.run_id} (${run.scope}, snapshots ${run.snapshot_range.from}..${run.snapshot_range.to})`,
        ...run.results.map((r) =>
          r.status === "ok" ? `  ${r.name}: ok` : `  ${r.name}: FAILED ${r.error}`,
        ),
      ]);
    }),
  );

program
  .command("talk-to-code")
  .description("Structural talk-to-code report over the latest snapshot")
  .option("--trend", "Include activity per snapshot")
  .action(async (opts: { trend?: boolean }) => {
    await withWorkspace(async (ws) => {
      emit(await talkToCode(ws, { trend: opts.trend }), ({ report, trend }) => {
        const t = report.totals;
        const lines = [
          `Tasks ${t.tasks}, comments ${t.comments}, deliverables ${t.deliverables} (${t.completed_deliverables} completed)`,
          `Overall talk-to-code ratio: ${t.overall_ratio.toFixed(2)}`,
          `All talk: ${t.all_talk}, high ratio: ${t.high_ratio}`,
          ...Object.entries(report.by_category).map(([category, n]) => `  ${category.padEnd(9)} ${n}`),
        ];
        for (const row of report.rows.slice(0, 10)) {
          lines.push(`  ${row.id}  ${row.category}  ${row.comments}c/${row.deliverables}d  ratio ${row.ratio.toFixed(2)}`);
        }
        for (const point of trend ?? []) {
          lines.push(`  #${point.sequence_number} ${point.collected_at}  tasks ${point.tasks}  comments ${point.comments}`);
        }
        return lines;
      });
    })();
  });

program
  .command("verify")
  .description("Re-verify the hash chain and the sealed prefix")
  .action(
    withWorkspace(async (ws) => {
      const res = await verify(ws);
      emit(res, ({ chain, sealed_prefix }) => [
        chain.ok ? `Chain OK: ${chain.checked} snapshots, head ${chain.head}` : `Chain BROKEN at ${chain.broken_at}: ${chain.reason}`,
        ...(sealed_prefix
          ? [sealed_prefix.matches ? `Sealed prefix OK (${sealed_prefix.length})` : `Sealed prefix MISMATCH: ${sealed_prefix.actual || "unrecoverable"}`]
          : []),
      ]);
      if (res.ok && !res.intact) process.exit(EXIT.FATAL);
    }),
  );

program
  .command("runs")
  .description("List recorded analysis runs")
  .argument("[run-id]", "Show a single run")
  .action(async (runId: string | undefined) => {
    await withWorkspace(async (ws) => {
      emit(await listRuns(ws, runId), ({ runs }) =>
        runs.length === 0
          ? ["No analysis runs recorded."]
          : runs.map((r) => `${r.run_id}  ${r.executed_at}  ${r.scope}  ${r.results.length} results`),
      );
    })();
  });

program
  .command("schedule")
  .description("Collect and check the seal on a fixed interval")
  .option("--once", "Run a single tick and exit")
  .option("--interval <ms>", "Override schedule.interval_ms")
  .action(async (opts: { once?: boolean; interval?: string }) => {
    await withWorkspace(async (ws) => {
      const controller = new AbortController();
      const stop = () => controller.abort();
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
      const res = await schedule(ws, {
        once: opts.once,
        intervalMs: opts.interval ? Number(opts.interval) : undefined,
        signal: controller.signal,
      });
      emit(res, ({ ticks }) =>
        ticks.flatMap((t) => (t.skipped ? ["tick skipped"] : t.outcomes.map((o) => `${o.job}: ${o.status}`))),
      );
    })();
  });

const protocol = program.command("protocol").description("Manage the pre-registered analysis protocol");

protocol
  .command("register")
  .description("Register protocol definitions from a YAML file")
  .argument("<file>", "Protocol file (see config/protocols.yaml)")
  .action(async (file: string) => {
    await withWorkspace(async (ws) => {
      emit(await registerProtocols(ws, file), ({ registered }) =>
        registered.map((d) => `Registered ${d.name} (${d.metric_kind}) ${d.definition_hash}`),
      );
    })();
  });

protocol
  .command("list")
  .description("List registered protocol definitions")
  .action(
    withWorkspace(async (ws) => {
      emit(await listProtocols(ws), ({ frozen, freeze_hash, protocols }) => [
        frozen ? `Frozen: ${freeze_hash ?? ""}` : "Not frozen",
        ...protocols.map((p) => `  ${p.name}  ${p.metric_kind}  ${p.definition_hash}`),
      ]);
    }),
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(EXIT.FATAL);
});
