import fs from "node:fs";

import { sessionPaths } from "../config/pipeline.js";
import { countOccurrences, ensureDir, requireFile } from "../lib/files.js";
import type { StageContext } from "./context.js";
import type { ScanBackend } from "./scan-backends.js";

export const PAGE_MARKER = "showpage";

export interface PageCountEstimate {
  pages: number;
  markers: number;
}

/** One page per `showpage` in the chart PostScript, or 1 when none is found. */
export const detectPageCount = (postscript: string): PageCountEstimate => {
  const markers = countOccurrences(postscript, PAGE_MARKER);
  return { pages: markers > 0 ? markers : 1, markers };
};

/** An all-digit answer replaces the detected count; anything else keeps it. */
export const resolvePageCount = (
  detected: number,
  answer: string | undefined,
): number => {
  const trimmed = answer?.trim() ?? "";
  if (/^[0-9]+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  return detected;
};

export interface ScanOptions {
  /** Answers the page-count prompt up front. */
  pages?: string;
}

/** Scan every chart page and return the session-named image paths in page order. */
export const scanPages = async (
  context: StageContext,
  backend: ScanBackend,
  options: ScanOptions = {},
): Promise<string[]> => {
  const { config, log, prompter } = context;
  const paths = sessionPaths(config);

  requireFile(paths.chartPostscript, "PostScript file", "Run the targen stage first.");

  const estimate = detectPageCount(
    fs.readFileSync(paths.chartPostscript, "latin1"),
  );
  if (estimate.markers === 0) {
    log.warn("⚠️ Could not auto-detect page count. Defaulting to 1.");
  }
  log.log(`📄 Detected ${estimate.pages} target page(s).`);

  const answer =
    options.pages ??
    (await prompter.ask(
      `Press Enter to accept (${estimate.pages} pages), or type a number: `,
    ));
  const pageCount = resolvePageCount(estimate.pages, answer);

  log.log(
    `🔍 Scanning ${pageCount} page(s) with ${backend.name} using ${config.scan.settingsFile}`,
  );
  backend.prepare();
  ensureDir(config.scan.dir);

  const outputs: string[] = [];
  for (let page = 1; page <= pageCount; page += 1) {
    const outputPath = paths.scanFile(page);
    log.log(`Scanning page ${page} -> ${outputPath}`);
    backend.scanPage(outputPath);
    log.log(`✅ Saved: ${outputPath}`);
    outputs.push(outputPath);
  }

  log.log("✅ All pages scanned.");
  return outputs;
};
