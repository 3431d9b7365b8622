import path from "node:path";

import type { PipelineConfig } from "../config/pipeline.js";

export type ArgyllTool = "targen" | "printtarg" | "scanin" | "colprof" | "xicclu";

export const argyllCommand = (
  config: PipelineConfig,
  tool: ArgyllTool,
): string => (config.argyllBinDir ? path.join(config.argyllBinDir, tool) : tool);

export const targenArgs = (config: PipelineConfig): string[] => [
  ...config.target.generatorOptions,
  `-l${config.target.inkLimit}`,
  config.session,
];

export const printtargArgs = (config: PipelineConfig): string[] => [
  ...config.target.printOptions,
  `-p${config.target.pageSize}`,
  config.session,
];

/** `create` starts the session's .ti3; `append` accumulates into it. */
export type ScaninMode = "create" | "append";

export interface ScaninRequest {
  mode: ScaninMode;
  scanFile: string;
  chartFile: string;
  fiducials?: string;
}

export const scaninArgs = (
  config: PipelineConfig,
  request: ScaninRequest,
): string[] => {
  const args = ["-v", "-dipoan"];
  if (request.fiducials) {
    args.push("-F", request.fiducials);
  }
  args.push(
    request.mode === "create" ? "-c" : "-ca",
    request.scanFile,
    request.chartFile,
    config.scan.scannerProfile,
    config.session,
  );
  return args;
};

const averageDeviationArgs = (config: PipelineConfig): string[] =>
  config.profile.averageDeviation === undefined
    ? []
    : ["-r", String(config.profile.averageDeviation)];

const blackInkLimitArgs = (config: PipelineConfig): string[] =>
  config.profile.blackInkLimit === undefined
    ? []
    : [`-L${config.profile.blackInkLimit}`];

/** Intermediate profile used only to explore black generation. */
export const blackBaseColprofArgs = (
  config: PipelineConfig,
  blackBase: string,
): string[] => [
  ...averageDeviationArgs(config),
  "-v",
  "-qh",
  "-b",
  ...blackInkLimitArgs(config),
  "-cmt",
  "-dpp",
  blackBase,
];

export const finalColprofArgs = (
  config: PipelineConfig,
  curve: readonly string[],
): string[] => {
  const args = [
    ...averageDeviationArgs(config),
    "-v",
    "-A",
    config.printer.manufacturer,
    "-M",
    config.printer.friendlyName,
    "-D",
    config.profile.name,
  ];
  if (config.profile.copyright) {
    args.push("-C", config.profile.copyright);
  }
  args.push(
    "-qh",
    ...curve,
    `-l${config.profile.inkLimit}`,
    ...blackInkLimitArgs(config),
    "-S",
    config.profile.linkProfile,
    "-cmt",
    "-dpp",
    "-O",
    config.profile.name,
    config.session,
  );
  return args;
};

/** Plot of device values along the neutral axis for a given black generation. */
export const xiccluBlackPlotArgs = (
  config: PipelineConfig,
  blackGeneration: readonly string[],
  profilePath: string,
): string[] => [
  "-g",
  ...blackGeneration,
  `-l${config.profile.inkLimit}`,
  "-fif",
  "-ir",
  profilePath,
];

export const xiccluProfileCheckArgs = (profilePath: string): string[] => [
  "-g",
  "-fif",
  "-ir",
  profilePath,
];
