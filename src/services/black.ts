import fs from "node:fs";

import { sessionPaths } from "../config/pipeline.js";
import {
  curveArgs,
  saveBlackCurve,
  validateBlackCurve,
} from "../lib/black-curve-store.js";
import { requireFile } from "../lib/files.js";
import { errorMessage } from "../lib/logger.js";
import { isAbortAnswer } from "../lib/prompt.js";
import {
  argyllCommand,
  blackBaseColprofArgs,
  xiccluBlackPlotArgs,
} from "../tools/argyll.js";
import { launchTool, runTool, type StageContext } from "./context.js";

const MIN_BLACK = ["-kz"];
const MAX_BLACK = ["-kx"];

/** Build the throwaway profile that black generation is explored against. */
export const prepareBlackBase = (context: StageContext): void => {
  const { config, log } = context;
  const paths = sessionPaths(config);

  requireFile(paths.measurements, "Measurement file", "Run the read stage first.");

  log.log("⚫ Preparing black curve base...");
  fs.copyFileSync(paths.measurements, paths.blackMeasurements);
  runTool(
    context,
    argyllCommand(config, "colprof"),
    blackBaseColprofArgs(config, paths.blackBase),
  );

  log.log(`✅ Created: ${paths.blackProfile}`);
};

const requireBlackProfile = (context: StageContext): string => {
  const { blackProfile } = sessionPaths(context.config);
  requireFile(blackProfile, "Intermediate profile", "Run the black-prep stage first.");
  return blackProfile;
};

/** Open the minimum and maximum black plots side by side; neither is waited on. */
export const showBlackLimits = (context: StageContext): void => {
  const { config, log } = context;
  const blackProfile = requireBlackProfile(context);
  const xicclu = argyllCommand(config, "xicclu");

  log.log("⚫ Minimum black (leave the window open)");
  launchTool(context, xicclu, xiccluBlackPlotArgs(config, MIN_BLACK, blackProfile));

  log.log("⚫ Maximum black (leave the window open)");
  launchTool(context, xicclu, xiccluBlackPlotArgs(config, MAX_BLACK, blackProfile));

  log.log('Adjust limits, then run black-curve "-kp <stle> <stpo> <enpo> <enle> <shape>".');
};

/** Persist a curve (last write wins) and open a preview of it. */
export const tuneBlackCurve = (context: StageContext, curve: string): void => {
  const { config, log } = context;
  const blackProfile = requireBlackProfile(context);
  validateBlackCurve(curve);

  saveBlackCurve(config.profile.curveStore, curve);
  log.log(`✅ Saved black curve to ${config.profile.curveStore}`);

  const args = xiccluBlackPlotArgs(config, curveArgs(curve), blackProfile);
  log.log(`⚫ Opening black curve preview: xicclu ${args.join(" ")}`);
  launchTool(context, argyllCommand(config, "xicclu"), args);
};

/**
 * Prompt for curves until the operator is satisfied. An empty answer,
 * `quit` or end of input ends the session; the last saved curve stands.
 */
export const tuneBlackCurveInteractively = async (
  context: StageContext,
): Promise<number> => {
  const { log, prompter } = context;
  requireBlackProfile(context);

  let saved = 0;
  for (;;) {
    const answer = await prompter.ask(
      "Black curve (e.g. -kp 0 0 0.86 0.75 0.55), empty to finish: ",
    );
    if (answer === undefined || answer.trim() === "" || isAbortAnswer(answer)) {
      break;
    }

    const curve = answer.trim();
    try {
      validateBlackCurve(curve);
    } catch (error) {
      log.warn(`⚠️ ${errorMessage(error)}`);
      continue;
    }

    tuneBlackCurve(context, curve);
    saved += 1;
  }

  log.log(`✅ ${saved} curve(s) previewed.`);
  return saved;
};
