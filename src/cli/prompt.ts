/**
 * Terminal prompting on Node's readline. Everything that asks the user a
 * question goes through a Prompter so tests can script the answers.
 */

import * as readline from "node:readline";

export interface Prompter {
  /** Whether a human is on the other end */
  readonly interactive: boolean;
  question(text: string): Promise<string>;
  close(): void;
}

export interface TerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Defaults to whether stdin is a TTY */
  terminal?: boolean;
  /** Ctrl-C while readline holds the terminal in raw mode; defaults to raising SIGINT on this process */
  onInterrupt?: () => void;
}

/** Prompter on stdin/stdout */
export function createTerminalPrompter(options: TerminalOptions = {}): Prompter {
  const terminal = options.terminal ?? process.stdin.isTTY === true;
  const onInterrupt = options.onInterrupt ?? (() => process.kill(process.pid, "SIGINT"));
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    terminal,
  });

  // In raw mode Ctrl-C never becomes a signal; without a listener readline just closes.
  rl.on("SIGINT", onInterrupt);

  return {
    interactive: terminal,
    question: (text) =>
      new Promise<string>((resolve, reject) => {
        const onClose = (): void => reject(new Error("Input closed"));
        rl.once("close", onClose);
        rl.question(text, (answer) => {
          rl.off("close", onClose);
          resolve(answer);
        });
      }),
    close: () => rl.close(),
  };
}

/** Parses a raw answer; throws to make the user try again */
export type AnswerParser<T> = (raw: string) => T;

export const parsePositiveInt: AnswerParser<number> = (raw) => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error("Please enter a positive whole number.");
  }
  return value;
};

export const parseNonNegativeInt: AnswerParser<number> = (raw) => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("Please enter a whole number (0 or more).");
  }
  return value;
};

export const parseText: AnswerParser<string> = (raw) => raw;

/**
 * Ask until the answer parses. An empty answer – or a non-interactive
 * prompter – yields `fallback`.
 */
export async function askWithDefault<T>(
  prompter: Prompter,
  text: string,
  fallback: T,
  parse: AnswerParser<T>,
): Promise<T> {
  if (!prompter.interactive) return fallback;

  while (true) {
    const answer = (await prompter.question(`  ➡️  ${text} [${String(fallback)}]: `)).trim();
    if (!answer) return fallback;
    try {
      return parse(answer);
    } catch (err) {
      console.log(`  ❌  ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
