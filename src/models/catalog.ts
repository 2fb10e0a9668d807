/**
 * Model catalog – lists the models served by the gateway's /v1/models
 * endpoint through the OpenAI SDK, and picks the one to test.
 */

import OpenAI from "openai";

export interface ServedModel {
  id: string;
  owned_by?: string;
}

/**
 * Fetch the models the gateway currently serves.
 *
 * @param baseUrl  Gateway root, without the /v1 suffix
 */
export async function fetchModelCatalog(
  baseUrl: string,
  timeoutMs: number = 5_000,
): Promise<ServedModel[]> {
  // The gateway is unauthenticated; the SDK still insists on a key.
  const client = new OpenAI({
    apiKey: "unused",
    baseURL: `${baseUrl.replace(/\/+$/, "")}/v1`,
    timeout: timeoutMs,
    maxRetries: 0,
  });

  const page = await client.models.list();
  return page.data
    .filter((m) => typeof m.id === "string" && m.id.length > 0)
    .map((m) => ({ id: m.id, owned_by: m.owned_by }));
}

/**
 * Format the model list into a numbered table for display.
 */
export function formatModelTable(models: ServedModel[]): string {
  const lines: string[] = [];

  lines.push("");
  lines.push("  #   Model ID                                  Owner");
  lines.push("  " + "─".repeat(60));

  models.forEach((m, i) => {
    const num = String(i + 1).padStart(3);
    lines.push(`  ${num}  ${m.id.padEnd(42)}${m.owned_by ?? "unknown"}`);
  });

  lines.push("");
  return lines.join("\n");
}

export type ModelChooser = (models: ServedModel[]) => Promise<string>;

/**
 * Resolve the model to test: the configured one if set, else the only
 * served model, else whatever `choose` returns.
 */
export async function detectModel(
  baseUrl: string,
  configuredModel: string,
  timeoutMs: number,
  choose: ModelChooser,
): Promise<string> {
  if (configuredModel) return configuredModel;

  console.log("  🔍  Detecting available models...");
  const models = await fetchModelCatalog(baseUrl, timeoutMs);

  if (models.length === 0) {
    throw new Error(`No models found at ${baseUrl}/v1/models`);
  }

  console.log(`  ✔  Found models: ${models.map((m) => m.id).join(", ")}`);
  if (models.length === 1) return models[0].id;
  return choose(models);
}
