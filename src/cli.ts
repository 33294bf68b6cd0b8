#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline/promises";
import { Command, Option } from "commander";
import { configure, getConfig, loadEnvConfig, mergeOverrides, type DeepPartial, type TaskGraphConfig } from "./config.js";
import { buildDemoGraph, describeDemo } from "./demo.js";
import { ExpansionEngine } from "./executor/expansion-engine.js";
import type { RunResult } from "./executor/types.js";
import { createSeedGraph } from "./graph/task-graph.js";
import { createChatClient } from "./oracle/create-client.js";
import { LlmOracle } from "./oracle/llm-oracle.js";
import { staticInput } from "./oracle/types.js";
import { parseAllocation } from "./planner/allocation-parser.js";
import { DotRenderer, graphLabels } from "./render/dot-renderer.js";
import { parseOrThrow, RunCommandOptionsSchema } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});
process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err.message);
});

const program = new Command();

program
  .name("dynamic-taskgraph")
  .description("Plan and execute a request as a task graph that grows while it runs")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  configure(loadEnvConfig());
  setLogLevel(getConfig().log.level);
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

async function promptForInput(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question("What should be done? (empty or \"exit\" to quit) ")).trim();
  } finally {
    rl.close();
  }
}

function printResult(engine: ExpansionEngine, result: RunResult): void {
  console.log("\n--- Result ---");
  console.log(result.finalOutput ?? "(the sink was not reached)");

  console.log("\n--- Tasks ---");
  for (const { task } of engine.graph.nodes()) {
    if (task.kind !== "regular") continue;
    const state = task.output ? "done" : "pending";
    const answer = task.output?.answer.replace(/\s+/g, " ").slice(0, 200) ?? "-";
    console.log(`  [${state}] ${task.name}: ${answer}`);
  }

  const durationMs = result.finishedAt - result.startedAt;
  console.log(`\n${result.status} after ${result.rounds} rounds in ${durationMs}ms`);
}

// --- run ---
program
  .command("run")
  .description("Expand and execute a request until its final output is ready")
  .argument("[input...]", "The request (prompted for when omitted)")
  .addOption(new Option("--backend <kind>", "Chat backend").choices(["http", "gateway"]))
  .option("--url <url>", "Backend URL (http(s):// for http, ws:// for gateway)")
  .option("--model <model>", "Model name (http backend)")
  .option("--api-key <key>", "Bearer key or gateway token")
  .option("-r, --max-rounds <n>", "Maximum number of rounds")
  .option("--render-dir <dir>", "Directory for per-round DOT files")
  .option("--no-render", "Do not render the graph")
  .action(async (words: string[], rawOpts: unknown) => {
    const opts = parseOrThrow(RunCommandOptionsSchema, rawOpts, "run options");
    const cliOverrides: DeepPartial<TaskGraphConfig> = {
      backend: { kind: opts.backend, url: opts.url, model: opts.model, apiKey: opts.apiKey },
      limits: { maxRounds: opts.maxRounds },
      render: { enabled: opts.render, dir: opts.renderDir },
    };
    configure(mergeOverrides(loadEnvConfig(), cliOverrides));
    const config = getConfig();

    const input = words.length > 0 ? words.join(" ").trim() : await promptForInput();
    if (!input || input.toLowerCase() === "exit") {
      console.error("Nothing to do.");
      return;
    }

    const client = createChatClient(config);
    const engine = new ExpansionEngine({
      graph: createSeedGraph(),
      oracle: new LlmOracle({ client }),
      input: staticInput(input),
      renderer: config.render.enabled ? new DotRenderer() : undefined,
      callbacks: {
        onTaskStart: (round, task) => console.error(`[round ${round}] ${task}...`),
        onSplice: (round, task, subtasks, mode) =>
          console.error(`[round ${round}] ${task} -> ${mode}: ${subtasks.join(", ")}`),
      },
    });

    const controller = new AbortController();
    const onSigint = () => {
      console.error("\nAborting after the current call...");
      controller.abort();
    };
    process.once("SIGINT", onSigint);

    try {
      const result = await engine.run(config.limits.maxRounds, { signal: controller.signal });
      printResult(engine, result);
      if (result.status !== "done") process.exitCode = 2;
    } catch (err) {
      console.error("Run failed:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    } finally {
      process.removeListener("SIGINT", onSigint);
      client.close?.();
    }
  });

// --- demo ---
program
  .command("demo")
  .description("Build the four-task sample graph, print its schedule and render it")
  .option("-o, --out <file>", "DOT output file")
  .action(async (opts: { out?: string }) => {
    const graph = buildDemoGraph();
    for (const line of describeDemo(graph)) console.log(line);

    const out = opts.out ?? join(getConfig().render.dir, "demo.dot");
    await new DotRenderer().render(graph.edges(), graphLabels(graph), out);
    console.log(`Rendered to ${out}`);
  });

// --- parse ---
program
  .command("parse")
  .description("Parse a saved allocator reply and print the structured result")
  .argument("<file>", "Text file holding the allocator reply")
  .action(async (file: string) => {
    try {
      const result = parseAllocation(await readFile(file, "utf-8"));
      console.log(JSON.stringify(result, null, 2));
    } catch (err) {
      console.error("Error:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
