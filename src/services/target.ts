import { sessionPaths } from "../config/pipeline.js";
import { requireFile } from "../lib/files.js";
import {
  argyllCommand,
  printtargArgs,
  targenArgs,
} from "../tools/argyll.js";
import { runTool, type StageContext } from "./context.js";

/** Generate the patch set and lay it out as a printable chart with recognition files. */
export const generateTarget = (context: StageContext): void => {
  const { config, log } = context;

  log.log(`🎯 Generating patches for ${config.session}...`);
  runTool(context, argyllCommand(config, "targen"), targenArgs(config));

  log.log(`📄 Laying out chart (${config.target.pageSize})...`);
  runTool(context, argyllCommand(config, "printtarg"), printtargArgs(config));

  log.log(`✅ Chart written: ${sessionPaths(config).chartPostscript}`);
};

export const printTarget = (context: StageContext): void => {
  const { config, log } = context;
  const { chartPostscript } = sessionPaths(config);

  requireFile(chartPostscript, "PostScript file", "Run the targen stage first.");

  log.log(`🖨️ Printing ${chartPostscript} to printer: ${config.printer.deviceName}`);
  runTool(context, "lpr", ["-P", config.printer.deviceName, chartPostscript]);
};
