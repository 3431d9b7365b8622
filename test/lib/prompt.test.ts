import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import { test } from "node:test";

import { createTerminalPrompter, isAbortAnswer } from "../../src/lib/prompt.js";
import { createFakeRunner } from "../helpers/fake-runner.js";

test("createTerminalPrompter holds no reader on the input while a tool runs", async () => {
  const input = new PassThrough();
  const output = new PassThrough();
  const prompter = createTerminalPrompter(input, output);
  const readersDuringRun: number[] = [];
  const fake = createFakeRunner({
    run: () => {
      readersDuringRun.push(input.listenerCount("data"));
      return 0;
    },
  });

  const first = prompter.ask("Pages? ");
  input.write("3\n");
  assert.equal(await first, "3");
  fake.runner.run("scanin", ["-v"]);

  const second = prompter.ask("Coordinates? ");
  input.write("quit\n");
  assert.equal(await second, "quit");
  fake.runner.run("scanin", ["-v"]);

  assert.deepEqual(readersDuringRun, [0, 0]);
});

test("createTerminalPrompter resolves undefined once input has ended", async () => {
  const input = new PassThrough();
  const prompter = createTerminalPrompter(input, new PassThrough());

  input.end();

  assert.equal(await prompter.ask("Pages? "), undefined);
  assert.equal(await prompter.ask("Pages? "), undefined);
});

test("isAbortAnswer accepts q, quit and end of input", () => {
  assert.equal(isAbortAnswer(undefined), true);
  assert.equal(isAbortAnswer(" Quit "), true);
  assert.equal(isAbortAnswer("q"), true);
  assert.equal(isAbortAnswer("quiet"), false);
  assert.equal(isAbortAnswer(""), false);
});
