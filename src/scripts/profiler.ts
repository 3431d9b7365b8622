#!/usr/bin/env node
import { loadEnvironment } from "../config/env.js";
import { createPipelineConfig } from "../config/pipeline.js";
import { consoleLogger, errorMessage } from "../lib/logger.js";
import { createTerminalPrompter } from "../lib/prompt.js";
import { createProcessRunner } from "../lib/tool-runner.js";
import { reportDriverParameters } from "../services/calibration/gutenprint.js";
import { runStageCommand } from "./lib/commands.js";
import {
  PROFILER_USAGE,
  parseProfilerCliArgs,
  type ProfilerCliArgs,
} from "./lib/profiler-cli.js";

const parseArgsOrExit = (argv: string[]): ProfilerCliArgs | undefined => {
  try {
    return parseProfilerCliArgs(argv);
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    console.error(PROFILER_USAGE);
    process.exitCode = 1;
    return undefined;
  }
};

const run = async (): Promise<void> => {
  const args = parseArgsOrExit(process.argv.slice(2));
  if (!args) {
    return;
  }
  const { command } = args;

  if (args.help || !command) {
    console.log(PROFILER_USAGE);
    if (!args.help) {
      process.exitCode = 1;
    }
    return;
  }

  if (command === "calibrate") {
    reportDriverParameters(args.positionals, consoleLogger);
    return;
  }

  const environment = loadEnvironment(args.envFile);
  const baseConfig = createPipelineConfig(environment);
  const config = { ...baseConfig, verbose: baseConfig.verbose || args.verbose };
  process.exitCode = await runStageCommand(
    {
      command,
      positionals: args.positionals,
      pages: args.pages,
      interactive: args.interactive,
    },
    {
      config,
      runner: createProcessRunner({ verbose: config.verbose, log: consoleLogger }),
      prompter: createTerminalPrompter(),
      log: consoleLogger,
    },
  );
};

void run().catch((error: unknown) => {
  const command =
    process.argv.slice(2).find((token) => !token.startsWith("-")) ??
    "print-profiler";
  console.error(`❌ ${command} failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
