/**
 * Synthetic prompt generation. The target never inspects prompt content,
 * only its size, so prompts are random filler words.
 */

/** Filler vocabulary prompts are drawn from */
export const PROMPT_VOCABULARY = [
  "describe",
  "why",
  "the",
  "ocean",
  "is",
  "blue",
  "and",
  "how",
  "a",
  "compiler",
  "turns",
  "source",
  "into",
  "machine",
  "code",
  "write",
  "short",
  "poem",
  "about",
  "mountain",
  "river",
  "in",
  "winter",
  "list",
  "three",
  "facts",
  "of",
  "history",
] as const;

/** Words sent per requested prompt length unit */
const WORDS_PER_LENGTH_UNIT = 5;

/**
 * Build one prompt of `floor(wordCount / 5)` words, each drawn uniformly
 * with replacement from the vocabulary.
 */
export function generatePrompt(wordCount: number, random: () => number = Math.random): string {
  const n = Math.floor(wordCount / WORDS_PER_LENGTH_UNIT);
  const words: string[] = [];
  for (let i = 0; i < n; i++) {
    const index = Math.min(
      Math.floor(random() * PROMPT_VOCABULARY.length),
      PROMPT_VOCABULARY.length - 1,
    );
    words.push(PROMPT_VOCABULARY[index]);
  }
  return words.join(" ");
}

/** One independent prompt per request */
export function generatePrompts(
  count: number,
  wordCount: number,
  random: () => number = Math.random,
): string[] {
  return Array.from({ length: count }, () => generatePrompt(wordCount, random));
}

/** Whitespace word count – the harness's prompt-token estimate */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
