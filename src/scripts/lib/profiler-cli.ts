export const PROFILER_COMMANDS = [
  "targen",
  "print",
  "scan",
  "read",
  "black-prep",
  "black-limits",
  "black-curve",
  "profile",
  "check",
  "calibrate",
] as const;

export type ProfilerCommand = (typeof PROFILER_COMMANDS)[number];

export interface ProfilerCliArgs {
  command?: ProfilerCommand;
  positionals: string[];
  envFile?: string;
  pages?: string;
  verbose: boolean;
  interactive: boolean;
  help: boolean;
}

export const PROFILER_USAGE = `Usage: print-profiler <command> [options]

Commands (run in order):
  targen                 generate patches and the printable chart
  print                  send the chart to the printer
  scan [--pages=<n>]     scan every chart page
  read                   read the scanned charts into measurements
  black-prep             build the intermediate profile for black tuning
  black-limits           plot minimum and maximum black
  black-curve "<curve>"  save and preview a black curve (or --interactive)
  profile                create the final profile
  check                  plot the final profile
  calibrate <file.cal>...  estimate print driver parameters from calibration runs

Options:
  --env-file=<path>      settings file (default .env)
  --verbose              echo every tool command line
  --help                 show this text`;

const COMMAND_NAMES: ReadonlySet<string> = new Set(PROFILER_COMMANDS);

const isProfilerCommand = (value: string): value is ProfilerCommand =>
  COMMAND_NAMES.has(value);

const VALUE_FLAGS = new Set(["env-file", "pages"]);
const BOOLEAN_FLAGS = new Set(["verbose", "interactive", "help"]);

/**
 * Flags start with `--` and take `--flag=value` or `--flag value`.
 * Anything else is positional, so a curve such as `-kp 0 0 0.86 0.75 0.55`
 * passes through untouched.
 */
export const parseProfilerCliArgs = (argv: string[]): ProfilerCliArgs => {
  const args: ProfilerCliArgs = {
    positionals: [],
    verbose: false,
    interactive: false,
    help: false,
  };
  const rest: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "-h") {
      args.help = true;
      continue;
    }
    if (!token.startsWith("--")) {
      rest.push(token);
      continue;
    }

    const parts = token.slice(2).split(/=(.*)/s, 2);
    const flag = parts[0];
    const inlineValue: string | undefined = parts[1];
    if (BOOLEAN_FLAGS.has(flag) && inlineValue === undefined) {
      if (flag === "verbose") {
        args.verbose = true;
      } else if (flag === "interactive") {
        args.interactive = true;
      } else {
        args.help = true;
      }
      continue;
    }

    if (!VALUE_FLAGS.has(flag)) {
      throw new Error(`unknown argument: ${token}`);
    }

    let value: string | undefined = inlineValue;
    if (value === undefined && i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      i += 1;
      value = argv[i];
    }
    if (value === undefined || value.trim().length === 0) {
      throw new Error(`--${flag} requires a value`);
    }

    if (flag === "env-file") {
      args.envFile = value.trim();
    } else {
      args.pages = value.trim();
    }
  }

  const [command, ...positionals] = rest;
  if (command !== undefined) {
    if (!isProfilerCommand(command)) {
      throw new Error(`unknown command: ${command}`);
    }
    args.command = command;
  }
  args.positionals = positionals;

  return args;
};
