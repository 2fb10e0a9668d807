/**
 * Chunk reader for a streamed response body.
 *
 * Timing only needs the arrival of each chunk, not its SSE framing, so
 * chunks are yielded as they come off the wire without decoding.
 */

export interface StreamChunk {
  /** Bytes in this chunk */
  size: number;
}

/**
 * Async generator over the non-empty chunks of `stream`.
 * Aborting `signal` cancels the underlying reader and throws the abort reason.
 */
export async function* readChunks(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal,
): AsyncGenerator<StreamChunk> {
  const reader = stream.getReader();

  // A pending read() only settles on abort if the reader is cancelled.
  const onAbort = (): void => {
    reader.cancel(signal?.reason).catch(() => undefined);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    while (true) {
      if (signal?.aborted) throw signal.reason;

      const { done, value } = await reader.read();
      if (signal?.aborted) throw signal.reason;
      if (done) break;

      if (value.byteLength > 0) {
        yield { size: value.byteLength };
      }
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    reader.releaseLock();
  }
}
