import path from "node:path";

import { sessionPaths } from "../config/pipeline.js";
import { listFiles, requireFile } from "../lib/files.js";
import {
  FIDUCIAL_FORMAT,
  formatFiducials,
  parseFiducials,
} from "../lib/fiducials.js";
import { errorMessage } from "../lib/logger.js";
import { isAbortAnswer } from "../lib/prompt.js";
import {
  argyllCommand,
  scaninArgs,
  type ScaninMode,
} from "../tools/argyll.js";
import type { StageContext } from "./context.js";

export type ChartReadState =
  | "reading"
  | "awaiting-fiducials"
  | "corrected"
  | "aborted";

export interface PageReadResult {
  page: number;
  state: Extract<ChartReadState, "corrected" | "aborted">;
  attempts: number;
  fiducials?: string;
}

export type ChartReadSummary =
  | { status: "complete"; pages: PageReadResult[] }
  | { status: "aborted"; page: number; pages: PageReadResult[] };

export interface PageReadRequest {
  page: number;
  mode: ScaninMode;
  scanFile: string;
  chartFile: string;
}

const FIDUCIAL_HELP = [
  "You must now provide the pixel coordinates of the 4 chart fiducials.",
  "",
  `Format: ${FIDUCIAL_FORMAT}`,
  "",
  "  X1,Y1 = top-left fiducial",
  "  X2,Y2 = top-right fiducial",
  "  X3,Y3 = bottom-right fiducial",
  "  X4,Y4 = bottom-left fiducial",
  "",
  "Example: 191,245,6852,242,6860,4772,195,4774",
];

/**
 * Read one page: automatic fiducial detection first, then manual corner
 * coordinates until scanin succeeds or the operator gives up.
 */
export const readChartPage = async (
  context: StageContext,
  request: PageReadRequest,
): Promise<PageReadResult> => {
  const { config, log, prompter, runner } = context;
  const scanin = argyllCommand(config, "scanin");

  let state: ChartReadState = "reading";
  let attempts = 0;
  let fiducials: string | undefined;

  const invoke = (): number => {
    attempts += 1;
    return runner.run(
      scanin,
      scaninArgs(config, {
        mode: request.mode,
        scanFile: request.scanFile,
        chartFile: request.chartFile,
        fiducials,
      }),
      { cwd: config.workDir },
    );
  };

  while (state === "reading" || state === "awaiting-fiducials") {
    if (state === "reading") {
      const status = invoke();
      if (status === 0) {
        log.log(`✅ Page ${request.page} read successfully.`);
        state = "corrected";
        continue;
      }

      log.warn(
        `⚠️ scanin failed for page ${request.page} (exit status: ${status}). Likely cause: bad fiducials or scan misalignment.`,
      );
      state = "awaiting-fiducials";
      continue;
    }

    FIDUCIAL_HELP.forEach((line) => log.log(line));
    const answer = await prompter.ask(
      "Enter 8 coordinates (or 'quit' to abort): ",
    );
    if (isAbortAnswer(answer)) {
      log.warn(`⚠️ Operator aborted correction for page ${request.page}.`);
      state = "aborted";
      continue;
    }

    try {
      fiducials = formatFiducials(parseFiducials(answer ?? ""));
    } catch (error) {
      log.warn(`⚠️ ${errorMessage(error)}`);
      continue;
    }

    log.log(`Re-running scanin with -F ${fiducials}`);
    const status = invoke();
    if (status === 0) {
      log.log(`✅ Page ${request.page} successfully corrected and read.`);
      state = "corrected";
      continue;
    }

    log.warn(
      `⚠️ scanin failed again (exit ${status}). Try new coordinates or inspect the scan.`,
    );
  }

  return {
    page: request.page,
    state,
    attempts,
    fiducials,
  };
};

const PAGE_SUFFIX = /^\d+\.tiff$/i;

/** Scanned page images for the session, in page order. Multi-pass partials are not pages. */
export const listScannedPages = (context: StageContext): string[] => {
  const { config } = context;
  const { scanPrefix } = sessionPaths(config);
  return listFiles(config.scan.dir, scanPrefix, [".tiff"]).filter((filePath) =>
    PAGE_SUFFIX.test(path.basename(filePath).slice(scanPrefix.length)),
  );
};

/** Read every scanned page into the session's measurement file, stopping at the first abort. */
export const readCharts = async (
  context: StageContext,
): Promise<ChartReadSummary> => {
  const { config, log } = context;
  const paths = sessionPaths(config);

  const pageCount = listScannedPages(context).length;
  if (pageCount < 1) {
    throw new Error(`No scanned pages found in ${config.scan.dir}.`);
  }
  requireFile(config.scan.scannerProfile, "Scanner profile");

  log.log(`📄 Found ${pageCount} scanned page(s).`);

  const pages: PageReadResult[] = [];
  for (let page = 1; page <= pageCount; page += 1) {
    const scanFile = paths.scanFile(page);
    const chartFile = paths.chartRecognitionFile(page);
    requireFile(scanFile, "Scanned page", "Re-run the scan stage.");

    log.log(
      `🔍 Reading page ${page}: ${path.basename(scanFile)} with ${path.basename(chartFile)}`,
    );

    const result = await readChartPage(context, {
      page,
      mode: page === 1 ? "create" : "append",
      scanFile,
      chartFile,
    });
    pages.push(result);

    if (result.state === "aborted") {
      return { status: "aborted", page, pages };
    }
  }

  log.log(`✅ All pages read into ${paths.measurements}`);
  return { status: "complete", pages };
};
