/**
 * Shared type definitions for run configuration, per-request outcomes
 * and the final run report.
 */

/** Immutable configuration for one test run */
export interface RunConfig {
  /** Label printed in the run header */
  readonly testName: string;
  /** Model identifier sent in every request */
  readonly model: string;
  /** Total requests in the batch */
  readonly numRequests: number;
  /** Max requests in flight at once */
  readonly concurrency: number;
  /** Prompt size in words (a fifth of this is actually sent) */
  readonly promptLength: number;
  readonly maxTokens: number;
  readonly stream: boolean;
  /** Endpoint path appended to the base URL, e.g. /v1/completions */
  readonly completionsPath: string;
  /** Per-request wall-clock budget (ms) */
  readonly timeoutMs: number;
}

/**
 * Why a request's generation ended.
 *
 * Server-reported values ("stop", "length", ...) pass through untouched;
 * the driver adds "client_abort", "client_error: <category>" and
 * "unexpected_error: <category>" for requests that never completed.
 */
export type FinishReason =
  | "stop"
  | "length"
  | "unknown"
  | "client_abort"
  | `client_error: ${string}`
  | `unexpected_error: ${string}`
  | (string & {});

/** Outcome of a single dispatched request */
export interface RequestOutcome {
  /** End-to-end latency (s), only when the request completed */
  readonly e2eLatency?: number;
  /** Time to first chunk (s); equals e2eLatency for non-streaming requests */
  readonly ttft?: number;
  /** Time per output token (s), streaming only */
  readonly timePerOutputToken?: number;
  readonly promptTokens?: number;
  readonly generatedTokens?: number;
  readonly finishReason: FinishReason;
  /** HTTP status, if response headers arrived */
  readonly httpStatus?: number;
  /** Body chunks received (streaming only) */
  readonly chunkCount?: number;
  /** Failure message for requests that did not complete */
  readonly error?: string;
}

/** Everything the driver hands back for one batch */
export interface BatchResult {
  /** Exactly one entry per dispatched request, in completion order */
  readonly outcomes: RequestOutcome[];
  /** Seconds from before the first dispatch to after the last outcome */
  readonly durationSeconds: number;
}

export interface LatencySummary {
  readonly p50: number;
  readonly p90: number;
  readonly p95: number;
  readonly p99: number;
  readonly mean: number;
}

export interface ThroughputSummary {
  readonly requestsPerSecond: number;
  readonly promptTokensPerSecond: number;
  readonly generatedTokensPerSecond: number;
}

export interface RunStatistics {
  /** Seconds */
  readonly e2eLatency: LatencySummary;
  /** Seconds; absent when no outcome carries a TTFT */
  readonly ttft?: LatencySummary;
  /** Milliseconds; absent when no outcome carries a per-token latency */
  readonly timePerOutputTokenMs?: LatencySummary;
  readonly throughput: ThroughputSummary;
}

export interface FinishReasonCount {
  readonly reason: FinishReason;
  readonly count: number;
  /** Share of the requested total, 0–100 */
  readonly percent: number;
}

/** Aggregate view over one batch. Derived on demand, never persisted. */
export interface RunReport {
  readonly testName: string;
  readonly numRequests: number;
  readonly durationSeconds: number;
  readonly succeeded: number;
  readonly failed: number;
  /** Absent when no request succeeded */
  readonly statistics?: RunStatistics;
  readonly finishReasons: FinishReasonCount[];
}

/** Completion request body sent to the target */
export interface CompletionRequest {
  model: string;
  prompt: string;
  max_tokens: number;
  stream: boolean;
}

/** The parts of a non-streaming completion response the driver reads */
export interface CompletionResponse {
  choices?: Array<{ finish_reason?: string | null; text?: string }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

/** Receives rendered report lines */
export type ReportSink = (line: string) => void;
