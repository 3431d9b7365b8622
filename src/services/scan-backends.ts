import fs from "node:fs";
import path from "node:path";

import type { ScanBackendName } from "../config/env.js";
import { sessionPaths } from "../config/pipeline.js";
import {
  deleteFileIfExists,
  findNewestFile,
  listFiles,
  requireFile,
} from "../lib/files.js";
import { runTool, type StageContext } from "./context.js";

export interface ScanBackend {
  name: ScanBackendName;
  /** Check preconditions once before the first page. */
  prepare: () => void;
  /** Scan one physical page into `outputPath` or throw. */
  scanPage: (outputPath: string) => void;
}

const TIFF_EXTENSIONS = [".tif", ".tiff"] as const;
const DEVICE_ID_LABEL = "device ID :";

/** First scanner id from `epsonscan2 -l` output, if any is listed. */
export const parseEpsonDeviceId = (listing: string): string | undefined => {
  for (const line of listing.split(/\r?\n/)) {
    if (!line.includes(DEVICE_ID_LABEL)) {
      continue;
    }
    const id = (line.split(":")[1] ?? "").trim();
    if (id.length > 0) {
      return id;
    }
  }
  return undefined;
};

// Truncated to whole seconds for filesystems with coarse timestamps.
const wholeSecond = (epochMs: number): number => Math.floor(epochMs / 1000) * 1000;

/**
 * Epson Scan 2 writes to the location stored inside the settings file and
 * offers no output flag, so the newest TIFF written in the working directory
 * during the scan is taken as the page just scanned. Pages already renamed
 * into the session naming scheme never qualify.
 */
export const createEpsonScan2Backend = (context: StageContext): ScanBackend => {
  const { config, log } = context;
  let deviceId: string | undefined;

  return {
    name: "epsonscan2",
    prepare: () => {
      requireFile(
        config.scan.settingsFile,
        "Scan settings file",
        "Create one with `epsonscan2 --create` or `epsonscan2 --edit <file>.SF2`.",
      );

      const listing = context.runner.capture("epsonscan2", ["-l"], {
        cwd: config.workDir,
      });
      deviceId = parseEpsonDeviceId(listing);
      if (!deviceId) {
        throw new Error("No Epson scanner found.");
      }
      log.log(`🔍 Using scanner: ${deviceId}`);
    },
    scanPage: (outputPath) => {
      if (!deviceId) {
        throw new Error("Scanner not prepared.");
      }

      const startedAt = Date.now();
      runTool(context, "epsonscan2", [
        "--scan",
        deviceId,
        config.scan.settingsFile,
      ]);

      const { scanPrefix } = sessionPaths(config);
      const rawOutput = findNewestFile(config.workDir, TIFF_EXTENSIONS, {
        modifiedSince: wholeSecond(startedAt),
        exclude: (fileName) => fileName.startsWith(scanPrefix),
      });
      if (!rawOutput) {
        throw new Error(`No TIFF written to ${config.workDir} was detected after scanning.`);
      }
      fs.renameSync(rawOutput, outputPath);
    },
  };
};

/** Multi-pass scanning: several passes per page merged into one image. */
export const createMultiScanBackend = (context: StageContext): ScanBackend => {
  const { config } = context;

  return {
    name: "multiscan",
    prepare: () => {
      requireFile(config.scan.settingsFile, "Scan settings file");
    },
    scanPage: (outputPath) => {
      const stem = outputPath.replace(/\.tiff?$/i, "");
      const partialPrefix = `${path.basename(stem)}_`;

      runTool(context, "multi_scan.sh", [
        "-n",
        String(config.scan.passes),
        "-s",
        config.scan.settingsFile,
        "-r",
        `${stem}_`,
      ]);

      const partials = listFiles(path.dirname(outputPath), partialPrefix, [
        ".tiff",
      ]);
      if (partials.length === 0) {
        throw new Error(`No partial scans matching ${stem}_*.tiff were written.`);
      }

      runTool(context, "scanlinecal.py", [
        "process-stack",
        ...partials,
        outputPath,
      ]);
      partials.forEach(deleteFileIfExists);

      if (!fs.existsSync(outputPath)) {
        throw new Error(`Merged scan ${outputPath} was not written.`);
      }
    },
  };
};

export const createScanBackend = (context: StageContext): ScanBackend => {
  switch (context.config.scan.backend) {
    case "epsonscan2":
      return createEpsonScan2Backend(context);
    case "multiscan":
      return createMultiScanBackend(context);
  }
};
