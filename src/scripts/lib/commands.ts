import type { StageContext } from "../../services/context.js";
import {
  prepareBlackBase,
  showBlackLimits,
  tuneBlackCurve,
  tuneBlackCurveInteractively,
} from "../../services/black.js";
import { readCharts } from "../../services/chart-read.js";
import { checkProfile, createProfile } from "../../services/profile.js";
import { createScanBackend } from "../../services/scan-backends.js";
import { scanPages } from "../../services/scan.js";
import { generateTarget, printTarget } from "../../services/target.js";
import type { ProfilerCommand } from "./profiler-cli.js";

export type StageCommand = Exclude<ProfilerCommand, "calibrate">;

export interface StageCommandArgs {
  command: StageCommand;
  positionals: string[];
  pages?: string;
  interactive: boolean;
}

/** Run one pipeline stage and return the process exit status. Fatal conditions throw. */
export const runStageCommand = async (
  args: StageCommandArgs,
  context: StageContext,
): Promise<number> => {
  switch (args.command) {
    case "targen":
      generateTarget(context);
      return 0;
    case "print":
      printTarget(context);
      return 0;
    case "scan":
      await scanPages(context, createScanBackend(context), { pages: args.pages });
      return 0;
    case "read": {
      const summary = await readCharts(context);
      if (summary.status === "aborted") {
        context.log.error(`❌ Chart reading aborted on page ${summary.page}.`);
        return 1;
      }
      return 0;
    }
    case "black-prep":
      prepareBlackBase(context);
      return 0;
    case "black-limits":
      showBlackLimits(context);
      return 0;
    case "black-curve": {
      if (args.interactive) {
        await tuneBlackCurveInteractively(context);
        return 0;
      }
      const curve = args.positionals.join(" ").trim();
      if (curve.length === 0) {
        throw new Error('Usage: black-curve "-kp a b c d e" (or --interactive)');
      }
      tuneBlackCurve(context, curve);
      return 0;
    }
    case "profile":
      createProfile(context);
      return 0;
    case "check":
      checkProfile(context);
      return 0;
  }
};
