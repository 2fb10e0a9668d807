import { describe, it, expect } from "vitest";
import { readChunks } from "../../src/stream/reader";

const encoder = new TextEncoder();

function streamOf(parts: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const p of parts) controller.enqueue(p);
      controller.close();
    },
  });
}

describe("readChunks", () => {
  it("yields the size of each non-empty chunk", async () => {
    const sizes: number[] = [];
    const stream = streamOf([encoder.encode("data: a\n\n"), new Uint8Array(0), encoder.encode("xy")]);
    for await (const chunk of readChunks(stream)) sizes.push(chunk.size);
    expect(sizes).toEqual([9, 2]);
  });

  it("releases the reader when done", async () => {
    const stream = streamOf([encoder.encode("x")]);
    for await (const _chunk of readChunks(stream)) {
      // drain
    }
    expect(stream.locked).toBe(false);
  });

  it("throws the abort reason when the signal fires mid-read", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode("first"));
      },
    });
    const controller = new AbortController();
    const reason = new Error("stop now");

    const consume = async (): Promise<number> => {
      let count = 0;
      for await (const _chunk of readChunks(stream, controller.signal)) {
        count++;
        setTimeout(() => controller.abort(reason), 5);
      }
      return count;
    };

    await expect(consume()).rejects.toBe(reason);
  });

  it("throws immediately for an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("already"));
    const iterator = readChunks(streamOf([encoder.encode("x")]), controller.signal);
    await expect(iterator.next()).rejects.toThrow("already");
  });
});
