/**
 * Run orchestrator – one load test from config to rendered report.
 */

import type { ReportSink, RunConfig, RunReport } from "./types";
import { RunConfigError } from "./errors";
import { generatePrompts } from "./workload/prompts";
import { runBatch, type DriverOptions } from "./driver/batch";
import { summarizeRun } from "./report/summary";
import { renderReport } from "./report/render";
import { MAX_TIMER_MS } from "./utils/timing";

export interface RunOptions extends DriverOptions {
  /** Where report lines go (default console.log) */
  sink?: ReportSink;
  /** Random source for prompt generation */
  random?: () => number;
}

/** Reject configs the driver cannot run */
export function validateRunConfig(config: RunConfig): void {
  const positive: Array<keyof RunConfig> = ["numRequests", "concurrency", "maxTokens", "timeoutMs"];
  for (const key of positive) {
    const value = config[key];
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
      throw new RunConfigError(`${key} must be a positive integer, got ${String(value)}`);
    }
  }
  if (config.timeoutMs > MAX_TIMER_MS) {
    throw new RunConfigError(`timeoutMs must be at most ${MAX_TIMER_MS}, got ${config.timeoutMs}`);
  }
  if (!Number.isInteger(config.promptLength) || config.promptLength < 0) {
    throw new RunConfigError(
      `promptLength must be a non-negative integer, got ${config.promptLength}`,
    );
  }
  if (!config.model) {
    throw new RunConfigError("model is required");
  }
}

export async function runLoadTest(
  config: RunConfig,
  baseUrl: string,
  options: RunOptions = {},
): Promise<RunReport | undefined> {
  validateRunConfig(config);
  const sink = options.sink ?? ((line: string) => console.log(line));

  sink("");
  sink(`  🚀  Running test: ${config.testName}`);
  sink(
    `      Concurrency: ${config.concurrency}, Requests: ${config.numRequests}, ` +
      `Prompt length: ${config.promptLength}, Max tokens: ${config.maxTokens}, ` +
      `Stream: ${config.stream}`,
  );

  const prompts = generatePrompts(config.numRequests, config.promptLength, options.random);
  const progress = progressPrinter(config.numRequests, sink);
  const { outcomes, durationSeconds } = await runBatch(config, baseUrl, prompts, {
    ...options,
    onOutcome: (outcome, index) => {
      progress();
      options.onOutcome?.(outcome, index);
    },
  });

  sink("");
  sink(`  ✅  Test finished in ${durationSeconds.toFixed(2)} seconds.`);

  const report = summarizeRun(config.testName, outcomes, durationSeconds, config.numRequests);
  renderReport(report, sink);
  return report;
}

/** Prints a progress line at every tenth of the run and at the end */
function progressPrinter(total: number, sink: ReportSink): () => void {
  const step = Math.max(1, Math.ceil(total / 10));
  let done = 0;
  return () => {
    done++;
    if (done % step === 0 || done === total) {
      sink(`  ⏳  ${done}/${total} requests completed`);
    }
  };
}
