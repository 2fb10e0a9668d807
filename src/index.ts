#!/usr/bin/env node
/**
 * Main entry point – interactive stress test suite for an OpenAI-style
 * completions gateway.
 *
 * Opens a kubectl port-forward to the gateway (unless disabled), detects
 * the model to test, then offers the preset test menu. When stdin is not a
 * terminal it runs LOADGEN_PRESET once with default settings.
 *
 * Usage:
 *   npx ts-node src/index.ts          (dev)
 *   node dist/src/index.js            (after build)
 */

import { loadConfig } from "./config";
import { PortForward, withPortForward } from "./cluster/port-forward";
import { detectModel } from "./models/catalog";
import { pickModel } from "./models/picker";
import { createTerminalPrompter } from "./cli/prompt";
import { runMenu, runPresetOnce } from "./cli/menu";
import type { RunDefaults } from "./cli/presets";
import { runLoadTest } from "./run";
import type { RunConfig } from "./types";

function printHeader(title: string): void {
  console.log("\n" + "═".repeat(50));
  console.log(`  ${title}`);
  console.log("═".repeat(50));
}

/** Set once a signal has started shutdown; the exit code is then 130 */
let interrupted = false;

async function main(): Promise<void> {
  printHeader("LLM Interactive Stress Test Suite");

  const cfg = loadConfig();
  const forward = new PortForward(cfg.portForward);
  const prompter = createTerminalPrompter();

  // Ctrl-C must still tear down the forward.
  const interrupt = (signal: NodeJS.Signals): void => {
    interrupted = true;
    console.log(`\n  ⚠  Received ${signal}`);
    prompter.close();
    forward.stop().then(
      () => process.exit(130),
      (err: unknown) => {
        console.error("  ❌  Failed to stop port-forward:", err);
        process.exit(130);
      },
    );
  };
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  const session = async (): Promise<void> => {
    let model: string;
    try {
      model = await detectModel(
        cfg.targetBaseUrl,
        cfg.targetModel,
        cfg.discoveryTimeoutMs,
        (models) => pickModel(prompter, models),
      );
    } catch (err) {
      console.error(`  ❌  Could not detect a model at ${cfg.targetBaseUrl}.`);
      console.error("     Ensure the gateway is running and port-forwarding works, or set TARGET_MODEL.");
      console.error(`     Details: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
      return;
    }

    console.log(`  Base URL        : ${cfg.targetBaseUrl}`);
    console.log(`  Model           : ${model}`);
    console.log(`  Endpoint        : ${cfg.completionsPath}`);
    console.log(`  Request timeout : ${cfg.requestTimeoutMs} ms`);

    const defaults: RunDefaults = {
      model,
      completionsPath: cfg.completionsPath,
      timeoutMs: cfg.requestTimeoutMs,
    };
    const run = (config: RunConfig) => runLoadTest(config, cfg.targetBaseUrl);

    if (prompter.interactive) {
      await runMenu(prompter, defaults, run);
    } else {
      await runPresetOnce(cfg.preset, prompter, defaults, run);
    }
  };

  try {
    if (cfg.portForward.enabled) {
      await withPortForward(forward, session);
    } else {
      await session();
    }
  } finally {
    prompter.close();
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
  }
}

main().catch((err) => {
  // Closing the prompter rejects the pending question; the handler owns the exit.
  if (interrupted) return;
  console.error("Fatal error:", err);
  process.exit(2);
});
