import { sessionPaths } from "../config/pipeline.js";
import { curveArgs, readBlackCurve } from "../lib/black-curve-store.js";
import { requireFile } from "../lib/files.js";
import {
  argyllCommand,
  finalColprofArgs,
  xiccluProfileCheckArgs,
} from "../tools/argyll.js";
import { runTool, type StageContext } from "./context.js";

/** Assemble the finished profile from the measurements and the tuned black curve. */
export const createProfile = (context: StageContext): string => {
  const { config, log } = context;
  const paths = sessionPaths(config);

  const curve = readBlackCurve(config.profile.curveStore);
  requireFile(paths.measurements, "Measurement file", "Run the read stage first.");

  log.log(`🎨 Creating profile "${config.profile.name}" with black curve ${curve}`);
  runTool(
    context,
    argyllCommand(config, "colprof"),
    finalColprofArgs(config, curveArgs(curve)),
  );

  log.log(`✅ Created: ${paths.finalProfile}`);
  return paths.finalProfile;
};

export const checkProfile = (context: StageContext): void => {
  const { config, log } = context;
  const { finalProfile } = sessionPaths(config);

  requireFile(finalProfile, "Profile", "Run the profile stage first.");

  log.log(`🔍 Plotting ${finalProfile}`);
  runTool(context, argyllCommand(config, "xicclu"), xiccluProfileCheckArgs(finalProfile));
};
