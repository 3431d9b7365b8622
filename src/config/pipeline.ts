import path from "node:path";

import type { Environment, ScanBackendName } from "./env.js";

export interface PrinterSettings {
  deviceName: string;
  friendlyName: string;
  manufacturer: string;
}

export interface TargetSettings {
  inkLimit: number;
  generatorOptions: string[];
  printOptions: string[];
  pageSize: string;
}

export interface ScanSettings {
  backend: ScanBackendName;
  dir: string;
  settingsFile: string;
  passes: number;
  scannerProfile: string;
}

export interface ProfileSettings {
  name: string;
  copyright?: string;
  inkLimit: number;
  blackInkLimit?: number;
  averageDeviation?: number;
  linkProfile: string;
  curveStore: string;
}

/** Settings for one profiling project, resolved once and handed to every stage. */
export interface PipelineConfig {
  session: string;
  workDir: string;
  printer: PrinterSettings;
  target: TargetSettings;
  scan: ScanSettings;
  profile: ProfileSettings;
  argyllBinDir?: string;
  verbose: boolean;
}

export const defaultProfileName = (environment: Environment): string => {
  const friendly = environment.PRINTER_FRIENDLY_NAME ?? environment.PRINTER_NAME;
  return `${friendly}, ${environment.INKSET} ink, ${environment.PAPER} paper, ${environment.RESOLUTION}, CMYK.icc`;
};

export const createPipelineConfig = (
  environment: Environment,
  cwd: string = process.cwd(),
): PipelineConfig => {
  const workDir = path.resolve(cwd, environment.OUTPUT_DIR);
  const inWorkDir = (value: string): string => path.resolve(workDir, value);

  return {
    session: environment.PROFILE_SESSION,
    workDir,
    printer: {
      deviceName: environment.PRINTER_NAME,
      friendlyName:
        environment.PRINTER_FRIENDLY_NAME ?? environment.PRINTER_NAME,
      manufacturer: environment.PRINTER_MANUFACTURER,
    },
    target: {
      inkLimit: environment.INK_LIMIT_PRINT,
      generatorOptions: environment.TARGEN_OPTIONS,
      printOptions: environment.PRINTTARG_OPTIONS,
      pageSize: environment.PAGE_SIZE,
    },
    scan: {
      backend: environment.SCAN_BACKEND,
      dir: inWorkDir(environment.SCAN_DIR),
      settingsFile: inWorkDir(environment.SCAN_SETTINGS_FILE),
      passes: environment.MULTISCAN_PASSES,
      scannerProfile: inWorkDir(environment.SCANNER_PROFILE),
    },
    profile: {
      name: environment.PROFILE_NAME ?? defaultProfileName(environment),
      copyright: environment.PROFILE_COPYRIGHT,
      inkLimit: environment.INK_LIMIT_PROFILE,
      blackInkLimit: environment.BLACK_INK_LIMIT,
      averageDeviation: environment.AVERAGE_DEVIATION,
      linkProfile: inWorkDir(environment.LINK_PROFILE),
      curveStore: inWorkDir(environment.BLACK_CURVE_FILE),
    },
    argyllBinDir: environment.ARGYLL_BIN_DIR
      ? path.resolve(cwd, environment.ARGYLL_BIN_DIR)
      : undefined,
    verbose: environment.PROFILER_VERBOSE,
  };
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** Artifact locations for a session; every tool runs with `workDir` as its cwd. */
export const sessionPaths = (config: PipelineConfig) => {
  const base = path.join(config.workDir, config.session);

  return {
    base,
    chartPostscript: `${base}.ps`,
    measurements: `${base}.ti3`,
    blackBase: `${config.session}_t`,
    blackMeasurements: `${base}_t.ti3`,
    blackProfile: `${base}_t.icc`,
    finalProfile: path.join(config.workDir, config.profile.name),
    scanPrefix: `${config.session}_scan_`,
    scanFile: (page: number): string =>
      path.join(config.scan.dir, `${config.session}_scan_${pad2(page)}.tiff`),
    chartRecognitionFile: (page: number): string =>
      page === 1
        ? `${base}.cht`
        : `${base}_${pad2(page)}.cht`,
  };
};
