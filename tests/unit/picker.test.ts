import { describe, it, expect, vi, beforeEach } from "vitest";
import { pickModel } from "../../src/models/picker";
import type { ServedModel } from "../../src/models/catalog";
import { scriptedPrompter } from "../helpers/fakes";

const models: ServedModel[] = [
  { id: "model-a", owned_by: "team" },
  { id: "model-b" },
];

describe("pickModel", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("selects by list number", async () => {
    expect(await pickModel(scriptedPrompter(["2"]), models)).toBe("model-b");
  });

  it("selects by model id, ignoring case", async () => {
    expect(await pickModel(scriptedPrompter(["MODEL-A"]), models)).toBe("model-a");
  });

  it("asks again after an invalid choice", async () => {
    const prompter = scriptedPrompter(["7", "2x", "1"]);
    expect(await pickModel(prompter, models)).toBe("model-a");
    expect(prompter.asked).toHaveLength(3);
  });

  it("picks the first model when not interactive", async () => {
    const prompter = scriptedPrompter([], false);
    expect(await pickModel(prompter, models)).toBe("model-a");
    expect(prompter.asked).toEqual([]);
  });

  it("rejects an empty list", async () => {
    await expect(pickModel(scriptedPrompter([]), [])).rejects.toThrow("No models to choose from");
  });
});
