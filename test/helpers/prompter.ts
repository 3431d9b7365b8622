import type { Prompter } from "../../src/lib/prompt.js";

export interface ScriptedPrompter {
  prompter: Prompter;
  questions: string[];
}

/** Answers questions in order; once the script runs out, input has ended. */
export const createScriptedPrompter = (answers: string[] = []): ScriptedPrompter => {
  const pending = [...answers];
  const questions: string[] = [];

  return {
    questions,
    prompter: {
      ask: async (question) => {
        questions.push(question);
        return pending.shift();
      },
    },
  };
};
