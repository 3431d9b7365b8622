import { execFileSync, spawn, spawnSync } from "node:child_process";

import { errorMessage, type Logger } from "./logger.js";

export interface ToolOptions {
  cwd?: string;
}

/** Seam between the pipeline and the external command line tools it drives. */
export interface ToolRunner {
  /** Run in the foreground with the terminal attached; resolves to the exit status. */
  run: (command: string, args: readonly string[], options?: ToolOptions) => number;
  /** Run and return stdout; throws on a nonzero exit. */
  capture: (command: string, args: readonly string[], options?: ToolOptions) => string;
  /** Start in the background and return without waiting for it. */
  launch: (command: string, args: readonly string[], options?: ToolOptions) => void;
}

const quoteArg = (arg: string): string =>
  /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;

export const formatCommandLine = (
  command: string,
  args: readonly string[],
): string => [command, ...args].map(quoteArg).join(" ");

export interface ProcessRunnerOptions {
  verbose: boolean;
  log: Logger;
}

export const createProcessRunner = ({
  verbose,
  log,
}: ProcessRunnerOptions): ToolRunner => {
  const trace = (command: string, args: readonly string[]): void => {
    if (verbose) {
      log.log(`$ ${formatCommandLine(command, args)}`);
    }
  };

  return {
    run: (command, args, options = {}) => {
      trace(command, args);
      const result = spawnSync(command, args, {
        cwd: options.cwd,
        stdio: "inherit",
      });
      if (result.error) {
        throw new Error(
          `Unable to start ${command}: ${errorMessage(result.error)}`,
        );
      }
      // A null status means the tool died from a signal.
      return result.status ?? 1;
    },

    capture: (command, args, options = {}) => {
      trace(command, args);
      try {
        return execFileSync(command, args, {
          cwd: options.cwd,
          encoding: "utf8",
          stdio: ["ignore", "pipe", "inherit"],
        });
      } catch (error) {
        throw new Error(`${command} failed: ${errorMessage(error)}`);
      }
    },

    launch: (command, args, options = {}) => {
      trace(command, args);
      const child = spawn(command, args, {
        cwd: options.cwd,
        detached: true,
        stdio: "ignore",
      });
      child.on("error", (error) => {
        log.error(`❌ Unable to start ${command}: ${errorMessage(error)}`);
      });
      child.unref();
    },
  };
};
