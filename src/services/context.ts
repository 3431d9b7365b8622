import type { PipelineConfig } from "../config/pipeline.js";
import type { Logger } from "../lib/logger.js";
import type { Prompter } from "../lib/prompt.js";
import type { ToolRunner } from "../lib/tool-runner.js";

export interface StageContext {
  config: PipelineConfig;
  runner: ToolRunner;
  prompter: Prompter;
  log: Logger;
}

/** Run a tool in the session working directory; any nonzero exit is fatal. */
export const runTool = (
  context: StageContext,
  command: string,
  args: readonly string[],
): void => {
  const status = context.runner.run(command, args, {
    cwd: context.config.workDir,
  });
  if (status !== 0) {
    throw new Error(`${command} exited with status ${status}.`);
  }
};

export const launchTool = (
  context: StageContext,
  command: string,
  args: readonly string[],
): void => {
  context.runner.launch(command, args, { cwd: context.config.workDir });
};
