/**
 * Single completion request – the unit of work the batch driver schedules.
 *
 *   • stream:true  → TTFT at the first body chunk, E2E at end of stream
 *   • stream:false → E2E once the full body is read; usage parsed from JSON
 *
 * The whole call, including stream consumption, runs under one
 * AbortController timeout. Every failure is converted into the returned
 * outcome; this function never rejects.
 */

import type { CompletionRequest, CompletionResponse, RequestOutcome, RunConfig } from "../types";
import { HttpStatusError, MalformedResponseError, RequestTimeoutError } from "../errors";
import { Timer, monotonicClock, type Clock } from "../utils/timing";
import { readChunks } from "../stream/reader";
import { countWords } from "../workload/prompts";
import { classifyFailure, errorMessage } from "./errors";

/** The slice of fetch the driver uses */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RequestOptions {
  /** Defaults to the global fetch (undici's shared connection pool) */
  fetchImpl?: FetchLike;
  /** Defaults to a monotonic clock */
  clock?: Clock;
}

export type RequestParams = Pick<RunConfig, "model" | "maxTokens" | "stream" | "timeoutMs">;

export async function sendCompletionRequest(
  url: string,
  params: RequestParams,
  prompt: string,
  options: RequestOptions = {},
): Promise<RequestOutcome> {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;
  const timer = new Timer(options.clock ?? monotonicClock);
  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new RequestTimeoutError(params.timeoutMs)),
    params.timeoutMs,
  );

  const body: CompletionRequest = {
    model: params.model,
    prompt,
    max_tokens: params.maxTokens,
    stream: params.stream,
  };

  let httpStatus: number | undefined;

  try {
    const res = await fetchImpl(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: params.stream ? "text/event-stream" : "application/json",
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    httpStatus = res.status;

    return params.stream
      ? await consumeStream(res, params, prompt, timer, controller.signal)
      : await consumeJson(res, prompt, timer);
  } catch (err: unknown) {
    return {
      finishReason: classifyFailure(err, controller.signal.aborted),
      httpStatus,
      error: errorMessage(err),
    };
  } finally {
    clearTimeout(timeout);
  }
}

async function consumeStream(
  res: Response,
  params: RequestParams,
  prompt: string,
  timer: Timer,
  signal: AbortSignal,
): Promise<RequestOutcome> {
  let chunkCount = 0;

  if (res.body) {
    for await (const _chunk of readChunks(res.body, signal)) {
      timer.markFirstChunk();
      chunkCount++;
    }
  }

  const e2eLatency = timer.elapsedSeconds();
  const ttft = timer.firstChunkSeconds();

  // The stream carries no per-chunk token counts: the full max_tokens
  // budget is assumed consumed.
  return {
    e2eLatency,
    ttft,
    timePerOutputToken: timePerOutputToken(e2eLatency, ttft, params.maxTokens),
    promptTokens: countWords(prompt),
    generatedTokens: params.maxTokens,
    finishReason: "length",
    httpStatus: res.status,
    chunkCount,
  };
}

async function consumeJson(res: Response, prompt: string, timer: Timer): Promise<RequestOutcome> {
  const text = await res.text();
  const e2eLatency = timer.elapsedSeconds();

  if (!res.ok) {
    throw new HttpStatusError(res.status, text);
  }

  const json = parseCompletionResponse(text);
  const choice = json.choices?.[0];
  if (!choice) {
    throw new MalformedResponseError("Response JSON missing 'choices[0]'");
  }

  return {
    e2eLatency,
    ttft: e2eLatency,
    promptTokens: json.usage?.prompt_tokens ?? countWords(prompt),
    generatedTokens: json.usage?.completion_tokens ?? 0,
    finishReason: choice.finish_reason ?? "unknown",
    httpStatus: res.status,
  };
}

/** (e2e − ttft) / (maxTokens − 1); undefined without a first chunk or with maxTokens ≤ 1 */
export function timePerOutputToken(
  e2eLatency: number,
  ttft: number | undefined,
  maxTokens: number,
): number | undefined {
  if (ttft === undefined || maxTokens <= 1) return undefined;
  return (e2eLatency - ttft) / (maxTokens - 1);
}

function parseCompletionResponse(text: string): CompletionResponse {
  const json: unknown = JSON.parse(text);
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new MalformedResponseError("Response body is not a JSON object");
  }

  const out: CompletionResponse = {};
  if ("choices" in json && Array.isArray(json.choices)) {
    out.choices = json.choices.map((c: unknown) => ({
      finish_reason: readString(c, "finish_reason"),
      text: readString(c, "text"),
    }));
  }
  if ("usage" in json && typeof json.usage === "object" && json.usage !== null) {
    out.usage = {
      prompt_tokens: readNumber(json.usage, "prompt_tokens"),
      completion_tokens: readNumber(json.usage, "completion_tokens"),
    };
  }
  return out;
}

function readString(obj: unknown, key: string): string | undefined {
  if (typeof obj !== "object" || obj === null) return undefined;
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

function readNumber(obj: unknown, key: string): number | undefined {
  if (typeof obj !== "object" || obj === null) return undefined;
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}
