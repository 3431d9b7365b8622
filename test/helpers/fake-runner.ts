import type { ToolOptions, ToolRunner } from "../../src/lib/tool-runner.js";

export interface ToolCall {
  kind: "run" | "capture" | "launch";
  command: string;
  args: string[];
  cwd?: string;
}

export interface FakeRunnerHandlers {
  /** Exit status for a foreground run; may create files as the real tool would. Defaults to 0. */
  run?: (call: ToolCall) => number;
  capture?: (call: ToolCall) => string;
}

export interface FakeRunner {
  runner: ToolRunner;
  calls: ToolCall[];
}

export const createFakeRunner = (handlers: FakeRunnerHandlers = {}): FakeRunner => {
  const calls: ToolCall[] = [];

  const record = (
    kind: ToolCall["kind"],
    command: string,
    args: readonly string[],
    options: ToolOptions = {},
  ): ToolCall => {
    const call: ToolCall = { kind, command, args: [...args], cwd: options.cwd };
    calls.push(call);
    return call;
  };

  return {
    calls,
    runner: {
      run: (command, args, options) => {
        const call = record("run", command, args, options);
        return handlers.run?.(call) ?? 0;
      },
      capture: (command, args, options) => {
        const call = record("capture", command, args, options);
        return handlers.capture?.(call) ?? "";
      },
      launch: (command, args, options) => {
        record("launch", command, args, options);
      },
    },
  };
};

/** Replays exit statuses in order, then succeeds. */
export const scriptedStatuses = (statuses: number[]): ((call: ToolCall) => number) => {
  const pending = [...statuses];
  return () => pending.shift() ?? 0;
};
