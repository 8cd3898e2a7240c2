#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { GenerationClient } from "./backend/generation-client.js";
import { configFromEnv, configure, getConfig, type DeepPartial, type DispatchConfig } from "./config.js";
import { ValidationError } from "./errors.js";
import { ConsoleSink } from "./notifications.js";
import { Orchestrator } from "./orchestrator.js";
import { BatchFileSchema, parseOrThrow, type TaskSpec } from "./schemas.js";
import { loadTeamFile } from "./team/roster.js";
import type { TaskResult } from "./team/types.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

type BackendOpts = {
  url?: string;
  model?: string;
  timeout?: string;
  maxAttempts?: string;
};

const program = new Command();

program
  .name("team-dispatch")
  .description("Dispatch customer requests to a team of text-generation workers")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

function toInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new ValidationError("VALIDATION_FAILED", `--${name} must be an integer, got "${raw}"`);
  return n;
}

/** Environment first, then command-line flags on top. */
function applyConfig(opts: BackendOpts): void {
  const env = configFromEnv();
  const timeout = toInt("timeout", opts.timeout);
  const maxAttempts = toInt("max-attempts", opts.maxAttempts);
  const overrides: DeepPartial<DispatchConfig> = {
    backend: { ...env.backend, ...(opts.url ? { baseUrl: opts.url } : {}), ...(opts.model ? { model: opts.model } : {}) },
    timeouts: { ...env.timeouts, ...(timeout !== undefined ? { generationMs: timeout } : {}) },
    retry: { ...env.retry, ...(maxAttempts !== undefined ? { maxAttempts } : {}) },
  };
  configure(overrides);
}

async function readBatchFile(path: string): Promise<TaskSpec[]> {
  const raw = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError("VALIDATION_FAILED", `Batch file ${path} is not valid JSON: ${String(err)}`);
  }
  return parseOrThrow(BatchFileSchema, data, `batch file ${path}`);
}

function printResults(results: TaskResult[], orch: Orchestrator): void {
  const names = new Map(orch.workers().map((w) => [w.id, w.name]));
  console.log("\n--- Results ---");
  for (const r of results) {
    const who = r.workerId !== null ? names.get(r.workerId) ?? `worker ${r.workerId}` : "unassigned";
    const body = r.status === "completed" ? r.text ?? "" : `${r.error?.code}: ${r.error?.message}`;
    console.log(`\n[${r.status}] ${r.label} (${who})`);
    console.log(`  ${body.slice(0, 400)}`);
  }
}

function withBackendOptions(cmd: Command): Command {
  return cmd
    .option("-u, --url <url>", "Generation backend base URL")
    .option("-m, --model <model>", "Model name")
    .option("--timeout <ms>", "Per-exchange timeout in ms")
    .option("--max-attempts <n>", "Attempts per exchange before giving up");
}

// --- run ---
withBackendOptions(
  program
    .command("run")
    .description("Run a batch of customer requests through the team")
    .argument("[requests...]", "Request descriptions")
    .option("-f, --file <path>", "JSON batch file ({ tasks: [...] } or an array)")
    .option("--team <path>", "Team file (default: bundled dealership team)"),
).action(async (requests: string[], opts: BackendOpts & { file?: string; team?: string }) => {
  applyConfig(opts);
  const specs: TaskSpec[] = [
    ...(opts.file ? await readBatchFile(opts.file) : []),
    ...requests.map((description) => ({ description })),
  ];
  if (specs.length === 0) {
    console.error("Nothing to do: pass request descriptions or --file.");
    process.exitCode = 1;
    return;
  }

  const sink = new ConsoleSink();
  const client = new GenerationClient({ onInteraction: (event) => sink.onInteraction(event) });
  const orch = new Orchestrator({ client, sink, workers: await loadTeamFile(opts.team) });

  const controller = new AbortController();
  const onSigint = () => {
    console.error(`\nCancelling (in-flight requests get ${getConfig().timeouts.cancelGraceMs}ms)...`);
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  try {
    const results = await orch.run(specs, { signal: controller.signal });
    printResults(results, orch);
    if (results.some((r) => r.status === "failed")) process.exitCode = 1;
  } finally {
    process.off("SIGINT", onSigint);
  }
});

// --- team ---
program
  .command("team")
  .description("List the team members")
  .option("--team <path>", "Team file (default: bundled dealership team)")
  .action(async (opts: { team?: string }) => {
    for (const m of await loadTeamFile(opts.team)) {
      console.log(`${m.key.padEnd(12)} ${m.name} (${m.role})${m.model ? ` [${m.model}]` : ""}`);
    }
  });

// --- check ---
withBackendOptions(program.command("check").description("Check that the generation backend is reachable")).action(
  async (opts: BackendOpts) => {
    applyConfig(opts);
    const client = new GenerationClient();
    const ok = await client.healthCheck();
    console.log(`[${ok ? "+" : "x"}] ${client.baseUrl} (model ${client.model}) ${ok ? "reachable" : "unreachable"}`);
    if (!ok) process.exitCode = 1;
  },
);

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

void main();
