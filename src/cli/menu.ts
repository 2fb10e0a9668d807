/**
 * Test menu loop – offers the presets until the user exits.
 */

import type { RunConfig } from "../types";
import { PRESETS, buildPresetConfig, findPreset, type RunDefaults } from "./presets";
import { askWithDefault, parseText, type Prompter } from "./prompt";

export type RunFn = (config: RunConfig) => Promise<unknown>;

const EXIT_CHOICE = String(PRESETS.length + 1);

export function formatMenu(): string {
  const lines = ["", "═".repeat(50), "  Test Menu", "═".repeat(50)];
  PRESETS.forEach((p, i) => lines.push(`  ${i + 1}: ${p.name}`));
  lines.push(`  ${EXIT_CHOICE}: Exit`);
  return lines.join("\n");
}

/**
 * Show the menu and run the chosen preset until the exit choice.
 * Returns the number of tests run.
 */
export async function runMenu(prompter: Prompter, defaults: RunDefaults, run: RunFn): Promise<number> {
  let runs = 0;

  while (true) {
    console.log(formatMenu());
    const choice = (await askWithDefault(prompter, "Select a test to run", "1", parseText)).trim();

    if (choice === EXIT_CHOICE) return runs;

    const index = Number(choice) - 1;
    const preset = Number.isInteger(index) ? PRESETS[index] : undefined;
    if (!preset) {
      console.log("  ❌  Invalid choice, please try again.");
      continue;
    }

    await run(await buildPresetConfig(preset, defaults, prompter));
    runs++;
  }
}

/** Run one preset with its defaults, for piped or CI use */
export async function runPresetOnce(
  presetId: string,
  prompter: Prompter,
  defaults: RunDefaults,
  run: RunFn,
): Promise<void> {
  const preset = findPreset(presetId);
  if (!preset) {
    throw new Error(
      `Unknown preset "${presetId}". Expected one of: ${PRESETS.map((p) => p.id).join(", ")}`,
    );
  }
  await run(await buildPresetConfig(preset, defaults, prompter));
}
