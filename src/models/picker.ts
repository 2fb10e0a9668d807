/**
 * Interactive model picker – lets the user choose one of the served models.
 */

import type { Prompter } from "../cli/prompt";
import type { ServedModel } from "./catalog";
import { formatModelTable } from "./catalog";

/**
 * Display the model list and prompt the user to pick one.
 *
 * Accepts a list number or a model ID (case-insensitive). A
 * non-interactive prompter selects the first model.
 */
export async function pickModel(prompter: Prompter, models: ServedModel[]): Promise<string> {
  if (models.length === 0) {
    throw new Error("No models to choose from");
  }

  if (!prompter.interactive) {
    console.log(`  ℹ  Non-interactive mode – auto-selecting first model: ${models[0].id}`);
    return models[0].id;
  }

  console.log(formatModelTable(models));

  while (true) {
    const answer = (
      await prompter.question(`  Select a model (1-${models.length}) or type model name: `)
    ).trim();

    const num = parseInt(answer, 10);
    if (!isNaN(num) && String(num) === answer && num >= 1 && num <= models.length) {
      const selected = models[num - 1].id;
      console.log(`\n  ✔  Selected: ${selected}\n`);
      return selected;
    }

    const byId = models.find((m) => m.id.toLowerCase() === answer.toLowerCase());
    if (byId) {
      console.log(`\n  ✔  Selected: ${byId.id}\n`);
      return byId.id;
    }

    console.log(`  ⚠  Invalid choice "${answer}". Enter a number or model ID.`);
  }
}
