/**
 * Report rendering – writes a RunReport as console-style text to a sink.
 */

import type { LatencySummary, ReportSink, RunReport } from "../types";

const WIDTH = 60;

export function renderReport(
  report: RunReport | undefined,
  sink: ReportSink = (line) => console.log(line),
): void {
  if (!report) {
    sink("No results to report.");
    return;
  }

  header(sink, `Results: ${report.testName}`);
  sink(
    `  ${report.succeeded}/${report.numRequests} succeeded, ${report.failed} failed ` +
      `in ${report.durationSeconds.toFixed(2)} s`,
  );

  const stats = report.statistics;
  if (!stats) {
    sink("");
    sink("No successful requests to report.");
  } else {
    header(sink, "E2E Request Latency");
    latencyLines(sink, stats.e2eLatency, "s");

    if (stats.ttft) {
      header(sink, "Time To First Token Latency (Streaming)");
      latencyLines(sink, stats.ttft, "s");
    }

    if (stats.timePerOutputTokenMs) {
      header(sink, "Time Per Output Token Latency (Streaming)");
      latencyLines(sink, stats.timePerOutputTokenMs, "ms");
    }

    header(sink, "Token Throughput");
    sink(`  Overall RPS        : ${stats.throughput.requestsPerSecond.toFixed(2)} req/s`);
    sink(`  Prompt tokens/s    : ${stats.throughput.promptTokensPerSecond.toFixed(2)}`);
    sink(`  Generated tokens/s : ${stats.throughput.generatedTokensPerSecond.toFixed(2)}`);
  }

  header(sink, "Finish Reason");
  for (const { reason, count, percent } of report.finishReasons) {
    sink(`  ${reason}: ${count} (${percent.toFixed(1)}%)`);
  }
}

function header(sink: ReportSink, title: string): void {
  const sep = "═".repeat(WIDTH);
  sink("");
  sink(sep);
  sink(`  ${title}`);
  sink(sep);
}

function latencyLines(sink: ReportSink, s: LatencySummary, unit: string): void {
  sink(`  P99          : ${s.p99.toFixed(4)}${unit}`);
  sink(`  P95          : ${s.p95.toFixed(4)}${unit}`);
  sink(`  P90          : ${s.p90.toFixed(4)}${unit}`);
  sink(`  P50 (Median) : ${s.p50.toFixed(4)}${unit}`);
  sink(`  Mean         : ${s.mean.toFixed(4)}${unit}`);
}
