/**
 * Lightweight monotonic timer for capturing request timing metrics.
 */

import { performance } from "node:perf_hooks";

/** Millisecond clock; monotonic unless a test injects its own */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

/** Longest delay setTimeout honours; larger values fire after 1 ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export class Timer {
  private readonly start: number;
  private end: number | undefined;
  private firstChunk: number | undefined;

  constructor(private readonly now: Clock = monotonicClock) {
    this.start = now();
  }

  /** Mark arrival of the first response chunk */
  markFirstChunk(): void {
    if (this.firstChunk === undefined) {
      this.firstChunk = this.now() - this.start;
    }
  }

  /** Finalize the timer */
  stop(): void {
    if (this.end === undefined) {
      this.end = this.now();
    }
  }

  /** Elapsed seconds up to stop() (stops the timer if still running) */
  elapsedSeconds(): number {
    this.stop();
    return ((this.end ?? this.start) - this.start) / 1000;
  }

  /** Seconds to the first chunk, undefined if none arrived */
  firstChunkSeconds(): number | undefined {
    return this.firstChunk === undefined ? undefined : this.firstChunk / 1000;
  }
}
