/**
 * Batch driver – fires every request of a run at once behind a p-limit
 * admission gate, so at most `concurrency` calls are in flight and
 * nothing paces the rest.
 *
 * Each unit resolves to exactly one RequestOutcome; a failing unit never
 * rejects, so siblings and the batch keep running.
 */

import pLimit from "p-limit";
import type { BatchResult, RequestOutcome, RunConfig } from "../types";
import { RunConfigError } from "../errors";
import { Timer, monotonicClock } from "../utils/timing";
import { classifyFailure, errorMessage } from "./errors";
import { sendCompletionRequest, type RequestOptions } from "./request";

export interface DriverOptions extends RequestOptions {
  /** Called as each request concludes, in completion order; a throw is logged and ignored */
  onOutcome?: (outcome: RequestOutcome, index: number) => void;
}

export async function runBatch(
  config: RunConfig,
  baseUrl: string,
  prompts: readonly string[],
  options: DriverOptions = {},
): Promise<BatchResult> {
  if (prompts.length !== config.numRequests) {
    throw new RunConfigError(
      `Expected ${config.numRequests} prompts, got ${prompts.length}`,
    );
  }

  const url = `${baseUrl.replace(/\/+$/, "")}${config.completionsPath}`;
  const limit = pLimit(config.concurrency);
  const outcomes: RequestOutcome[] = [];

  const record = (outcome: RequestOutcome, index: number): void => {
    outcomes.push(outcome);
    if (!options.onOutcome) return;
    try {
      options.onOutcome(outcome, index);
    } catch (err: unknown) {
      console.error(`  [driver] onOutcome callback failed: ${errorMessage(err)}`);
    }
  };

  const timer = new Timer(options.clock ?? monotonicClock);

  const units = prompts.map((prompt, index) =>
    limit(async () => {
      let outcome: RequestOutcome;
      try {
        outcome = await sendCompletionRequest(url, config, prompt, options);
      } catch (err: unknown) {
        // Only reachable when an injected clock throws.
        outcome = { finishReason: classifyFailure(err, false), error: errorMessage(err) };
      }
      record(outcome, index);
    }),
  );

  await Promise.all(units);

  return { outcomes, durationSeconds: timer.elapsedSeconds() };
}
