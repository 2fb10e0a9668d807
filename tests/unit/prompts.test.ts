import { describe, it, expect } from "vitest";
import {
  PROMPT_VOCABULARY,
  countWords,
  generatePrompt,
  generatePrompts,
} from "../../src/workload/prompts";

describe("generatePrompt", () => {
  it("sends a fifth of the requested word count", () => {
    const words = generatePrompt(50).split(" ");
    expect(words).toHaveLength(10);
  });

  it("draws every word from the vocabulary", () => {
    const vocabulary: readonly string[] = PROMPT_VOCABULARY;
    for (const word of generatePrompt(200).split(" ")) {
      expect(vocabulary).toContain(word);
    }
  });

  it("uses integer division for the word count", () => {
    expect(generatePrompt(12, () => 0)).toBe("describe describe");
  });

  it("maps the top of the random range to the last word", () => {
    expect(generatePrompt(5, () => 0.9999)).toBe("history");
  });

  it("returns an empty prompt below five words", () => {
    expect(generatePrompt(0)).toBe("");
    expect(generatePrompt(4)).toBe("");
  });
});

describe("generatePrompts", () => {
  it("builds one prompt per request", () => {
    const prompts = generatePrompts(3, 25);
    expect(prompts).toHaveLength(3);
    for (const p of prompts) expect(countWords(p)).toBe(5);
  });

  it("draws each prompt independently", () => {
    let calls = 0;
    generatePrompts(4, 10, () => {
      calls++;
      return 0.5;
    });
    expect(calls).toBe(8);
  });
});

describe("countWords", () => {
  it("splits on runs of whitespace", () => {
    expect(countWords("  a  b\tc\n")).toBe(3);
  });

  it("counts nothing in an empty string", () => {
    expect(countWords("")).toBe(0);
    expect(countWords("   ")).toBe(0);
  });
});
