/**
 * Run summary – turns the driver's outcomes into a RunReport.
 *
 * Latency percentiles cover successful requests only (those with an E2E
 * latency). Throughput divides by the whole batch's duration and requested
 * count. The finish-reason histogram covers every outcome.
 */

import type {
  FinishReasonCount,
  RequestOutcome,
  RunReport,
  RunStatistics,
} from "../types";
import { summarizeLatencies } from "./stats";

/**
 * Build the report for one batch.
 * Returns undefined when there are no outcomes at all.
 */
export function summarizeRun(
  testName: string,
  outcomes: readonly RequestOutcome[],
  durationSeconds: number,
  numRequests: number,
): RunReport | undefined {
  if (outcomes.length === 0) return undefined;

  const successful = outcomes.filter((o) => o.e2eLatency !== undefined);

  return {
    testName,
    numRequests,
    durationSeconds,
    succeeded: successful.length,
    failed: outcomes.length - successful.length,
    statistics: successful.length > 0 ? computeStatistics(successful, durationSeconds, numRequests) : undefined,
    finishReasons: finishReasonHistogram(outcomes, numRequests),
  };
}

function computeStatistics(
  successful: readonly RequestOutcome[],
  durationSeconds: number,
  numRequests: number,
): RunStatistics {
  const e2e = collect(successful, (o) => o.e2eLatency);
  const ttft = collect(successful, (o) => o.ttft);
  const perToken = collect(successful, (o) => o.timePerOutputToken);

  const promptTokens = sum(successful, (o) => o.promptTokens);
  const generatedTokens = sum(successful, (o) => o.generatedTokens);

  return {
    e2eLatency: summarizeLatencies(e2e),
    ttft: ttft.length > 0 ? summarizeLatencies(ttft) : undefined,
    timePerOutputTokenMs: perToken.length > 0 ? summarizeLatencies(perToken, 1000) : undefined,
    throughput: {
      requestsPerSecond: rate(numRequests, durationSeconds),
      promptTokensPerSecond: rate(promptTokens, durationSeconds),
      generatedTokensPerSecond: rate(generatedTokens, durationSeconds),
    },
  };
}

/** Count of each finish reason in first-seen order, as a share of `numRequests` */
export function finishReasonHistogram(
  outcomes: readonly RequestOutcome[],
  numRequests: number,
): FinishReasonCount[] {
  const counts = new Map<string, number>();
  for (const o of outcomes) {
    const reason = o.finishReason || "client_abort";
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }

  return [...counts].map(([reason, count]) => ({
    reason,
    count,
    percent: numRequests > 0 ? (count / numRequests) * 100 : 0,
  }));
}

function collect(
  outcomes: readonly RequestOutcome[],
  pick: (o: RequestOutcome) => number | undefined,
): number[] {
  const out: number[] = [];
  for (const o of outcomes) {
    const v = pick(o);
    if (v !== undefined) out.push(v);
  }
  return out;
}

function sum(
  outcomes: readonly RequestOutcome[],
  pick: (o: RequestOutcome) => number | undefined,
): number {
  return outcomes.reduce((acc, o) => acc + (pick(o) ?? 0), 0);
}

function rate(count: number, seconds: number): number {
  return seconds > 0 ? count / seconds : 0;
}
