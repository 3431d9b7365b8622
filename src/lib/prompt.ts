import readline from "node:readline";
import type { Readable, Writable } from "node:stream";

export interface Prompter {
  /** Resolves to the answer line, or `undefined` once input has ended. */
  ask: (question: string) => Promise<string | undefined>;
}

/**
 * Opens a readline interface for each question and closes it once answered,
 * so the tools run between questions get the terminal in its normal mode.
 */
export const createTerminalPrompter = (
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Prompter => ({
  ask: (question) => {
    if (input.readableEnded) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const rl = readline.createInterface({ input, output });
      let answered = false;
      rl.once("close", () => {
        if (!answered) {
          resolve(undefined);
        }
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    });
  },
});

const ABORT_SENTINELS = new Set(["q", "quit"]);

export const isAbortAnswer = (answer: string | undefined): boolean =>
  answer === undefined || ABORT_SENTINELS.has(answer.trim().toLowerCase());
