/**
 * Preset load tests offered by the menu. Each preset supplies defaults
 * that the user may override before the run starts.
 */

import type { RunConfig } from "../types";
import { askWithDefault, parseNonNegativeInt, parsePositiveInt, type Prompter } from "./prompt";

export type PresetId = "throughput" | "latency" | "scheduler-stress";

export interface Preset {
  id: PresetId;
  name: string;
  description: string;
  numRequests: number;
  concurrency: number;
  promptLength: number;
  maxTokens: number;
  stream: boolean;
}

export const PRESETS: readonly Preset[] = [
  {
    id: "throughput",
    name: "Throughput Test",
    description:
      "Moderate concurrency with small prompts and responses, to measure maximum " +
      "requests per second and token throughput.",
    numRequests: 200,
    concurrency: 20,
    promptLength: 50,
    maxTokens: 60,
    stream: false,
  },
  {
    id: "latency",
    name: "Latency (Streaming) Test",
    description:
      "Low concurrency with streaming, to measure time to first token and " +
      "per-token generation latency.",
    numRequests: 50,
    concurrency: 5,
    promptLength: 256,
    maxTokens: 512,
    stream: true,
  },
  {
    id: "scheduler-stress",
    name: "Scheduler Stress Test",
    description:
      "Very high concurrency to build a request queue and test how the scheduler " +
      "handles overload. Expect high P99 latencies.",
    numRequests: 500,
    concurrency: 150,
    promptLength: 10,
    maxTokens: 10,
    stream: false,
  },
];

export function findPreset(id: string): Preset | undefined {
  return PRESETS.find((p) => p.id === id);
}

/** Settings every preset run shares */
export interface RunDefaults {
  model: string;
  completionsPath: string;
  timeoutMs: number;
}

/** Ask for each of the preset's numbers (defaults on empty input) and build the run */
export async function buildPresetConfig(
  preset: Preset,
  defaults: RunDefaults,
  prompter: Prompter,
): Promise<RunConfig> {
  console.log(`\n--- ${preset.name} ---`);
  console.log(preset.description);

  const numRequests = await askWithDefault(prompter, "Number of requests", preset.numRequests, parsePositiveInt);
  const concurrency = await askWithDefault(prompter, "Concurrency level", preset.concurrency, parsePositiveInt);
  const promptLength = await askWithDefault(prompter, "Prompt word count", preset.promptLength, parseNonNegativeInt);
  const maxTokens = await askWithDefault(prompter, "Max new tokens", preset.maxTokens, parsePositiveInt);

  return {
    testName: preset.name,
    model: defaults.model,
    numRequests,
    concurrency,
    promptLength,
    maxTokens,
    stream: preset.stream,
    completionsPath: defaults.completionsPath,
    timeoutMs: defaults.timeoutMs,
  };
}
