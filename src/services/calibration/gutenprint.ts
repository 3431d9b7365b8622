import fs from "node:fs";

import { requireFile } from "../../lib/files.js";
import { errorMessage, type Logger } from "../../lib/logger.js";
import {
  INK_CHANNELS,
  parseCalibrationFile,
  type CalibrationFile,
  type InkChannel,
} from "./cal-file.js";

export const PARAMETER_NAMES = [
  "CyanGamma",
  "CyanDensity",
  "LightCyanValue",
  "LightCyanScale",
  "LightCyanTrans",
  "MagentaGamma",
  "MagentaDensity",
  "LightMagentaValue",
  "LightMagentaScale",
  "LightMagentaTrans",
  "YellowGamma",
  "YellowDensity",
  "BlackGamma",
  "BlackDensity",
  "CompositeGamma",
] as const;

export type ParameterName = (typeof PARAMETER_NAMES)[number];
export type DriverParameters = Record<ParameterName, number>;

export const DEFAULT_PARAMETERS: Readonly<DriverParameters> = {
  CyanGamma: 1,
  CyanDensity: 1,
  LightCyanValue: 0.35,
  LightCyanScale: 1,
  LightCyanTrans: 0.6,
  MagentaGamma: 1,
  MagentaDensity: 1,
  LightMagentaValue: 0.35,
  LightMagentaScale: 1,
  LightMagentaTrans: 0.6,
  YellowGamma: 1,
  YellowDensity: 1,
  BlackGamma: 1,
  BlackDensity: 1,
  CompositeGamma: 1,
};

const LIGHT_INK_RANGE_END = 0.6;
const LIGHT_VALUE_SENSITIVITY = 0.8;
const LIGHT_VALUE_MIN = 0.1;
const LIGHT_VALUE_MAX = 0.9;
const SATURATION_RANGE_START = 0.9;
const SATURATION_MIN_SLOPE = 10;
const SATURATION_DENSITY_FACTOR = 0.95;

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

const FIT_OFFSET = 1e-6;
const FIT_MAX_ITERATIONS = 100;
const FIT_TOLERANCE = 1e-12;

const sumOfSquares = (xs: number[], ys: number[], gamma: number): number =>
  xs.reduce((sum, x, index) => sum + (x ** gamma - ys[index]) ** 2, 0);

/**
 * Exponent g of `output = input^g` by nonlinear least squares, starting
 * from 1. Both sides are offset by 1e-6 so zero coverage stays finite.
 * Returns 1 when the fit does not converge to a finite value.
 */
export const fitGamma = (inputs: number[], outputs: number[]): number => {
  const xs: number[] = [];
  const ys: number[] = [];
  inputs.forEach((input, index) => {
    const output = outputs[index];
    if (output !== undefined) {
      xs.push(input + FIT_OFFSET);
      ys.push(output + FIT_OFFSET);
    }
  });
  if (xs.length === 0) {
    return 1;
  }

  let gamma = 1;
  let error = sumOfSquares(xs, ys, gamma);

  for (let iteration = 0; iteration < FIT_MAX_ITERATIONS; iteration += 1) {
    let gradient = 0;
    let curvature = 0;
    xs.forEach((x, index) => {
      const predicted = x ** gamma;
      const slope = predicted * Math.log(x);
      gradient += slope * (predicted - ys[index]);
      curvature += slope * slope;
    });
    if (curvature === 0 || gradient === 0) {
      break;
    }

    // Gauss-Newton step, halved until the residual stops growing.
    let step = gradient / curvature;
    let candidate = gamma - step;
    let candidateError = sumOfSquares(xs, ys, candidate);
    while (!(candidateError <= error) && Math.abs(step) > FIT_TOLERANCE) {
      step /= 2;
      candidate = gamma - step;
      candidateError = sumOfSquares(xs, ys, candidate);
    }
    if (!(candidateError <= error)) {
      break;
    }

    gamma = candidate;
    error = candidateError;
    if (Math.abs(step) <= FIT_TOLERANCE * Math.max(1, Math.abs(gamma))) {
      break;
    }
  }

  return Number.isFinite(gamma) ? gamma : 1;
};

/**
 * A correction curve bowing above the diagonal in the highlights means the
 * printer prints light there, so the light ink value moves down.
 */
export const estimateLightInkValue = (
  inputs: number[],
  outputs: number[],
  currentValue: number,
): number => {
  const differences = inputs
    .map((input, index) => ({ input, output: outputs[index] }))
    .filter(
      (point): point is { input: number; output: number } =>
        point.input <= LIGHT_INK_RANGE_END && point.output !== undefined,
    )
    .map((point) => point.output - point.input);

  if (differences.length === 0) {
    return currentValue;
  }

  const meanDifference =
    differences.reduce((sum, value) => sum + value, 0) / differences.length;
  return clamp(
    currentValue - meanDifference * LIGHT_VALUE_SENSITIVITY,
    LIGHT_VALUE_MIN,
    LIGHT_VALUE_MAX,
  );
};

/** Density factor: a flat delta-E response near full coverage means the channel saturates. */
export const estimateDensityFactor = (
  inputs: number[],
  deltaE: number[],
): number => {
  const first = inputs.findIndex((input) => input > SATURATION_RANGE_START);
  const last = inputs.length - 1;
  if (first === -1 || last - first < 1) {
    return 1;
  }

  const slope = (deltaE[last] - deltaE[first]) / (inputs[last] - inputs[first]);
  return slope < SATURATION_MIN_SLOPE ? SATURATION_DENSITY_FACTOR : 1;
};

const LIGHT_INK_CHANNELS: ReadonlyArray<readonly [InkChannel, ParameterName]> = [
  ["Cyan", "LightCyanValue"],
  ["Magenta", "LightMagentaValue"],
];

const gammaParameter = (channel: InkChannel): ParameterName => `${channel}Gamma`;
const densityParameter = (channel: InkChannel): ParameterName => `${channel}Density`;

/** Fold calibration runs, oldest first, into cumulative driver parameters. */
export const estimateDriverParameters = (
  runs: CalibrationFile[],
  start: Readonly<DriverParameters> = DEFAULT_PARAMETERS,
): DriverParameters => {
  const parameters: DriverParameters = { ...start };

  for (const run of runs) {
    const gammas: Partial<Record<InkChannel, number>> = {};
    for (const channel of INK_CHANNELS) {
      const curve = run.curves[channel];
      if (!curve) {
        continue;
      }
      const gamma = fitGamma(curve.inputs, curve.outputs);
      gammas[channel] = gamma;
      parameters[gammaParameter(channel)] *= gamma;
    }

    const colorGammas = [gammas.Cyan, gammas.Magenta, gammas.Yellow].filter(
      (gamma): gamma is number => gamma !== undefined,
    );
    if (colorGammas.length > 0) {
      parameters.CompositeGamma *=
        colorGammas.reduce((sum, gamma) => sum + gamma, 0) / colorGammas.length;
    }

    // Light ink values move only for channels that also carry a delta-E response.
    for (const [channel, parameter] of LIGHT_INK_CHANNELS) {
      const curve = run.curves[channel];
      if (curve && run.expectedDeltaE[channel]) {
        parameters[parameter] = estimateLightInkValue(
          curve.inputs,
          curve.outputs,
          parameters[parameter],
        );
      }
    }

    for (const channel of INK_CHANNELS) {
      const response = run.expectedDeltaE[channel];
      if (response) {
        parameters[densityParameter(channel)] *= estimateDensityFactor(
          response.inputs,
          response.outputs,
        );
      }
    }
  }

  return parameters;
};

const REPORT_GROUPS: ReadonlyArray<{ title: string; names: ParameterName[] }> = [
  {
    title: "Cyan Channel",
    names: ["CyanDensity", "CyanGamma", "LightCyanValue", "LightCyanScale", "LightCyanTrans"],
  },
  {
    title: "Magenta Channel",
    names: [
      "MagentaDensity",
      "MagentaGamma",
      "LightMagentaValue",
      "LightMagentaScale",
      "LightMagentaTrans",
    ],
  },
  { title: "Yellow Channel", names: ["YellowDensity", "YellowGamma"] },
  { title: "Black Channel", names: ["BlackDensity", "BlackGamma"] },
  { title: "Global", names: ["CompositeGamma"] },
];

const REPORT_NOTES: Partial<Record<ParameterName, string>> = {
  LightCyanValue: "Lower=Uses More Light Ink",
  LightMagentaValue: "Lower=Uses More Light Ink",
};

export const formatParameterRow = (name: ParameterName, value: number): string =>
  `${name.padEnd(25)} ${value.toFixed(4).padEnd(8)}  ${REPORT_NOTES[name] ?? ""}`.trimEnd();

export const formatParameterReport = (parameters: DriverParameters): string[] => {
  const rule = "=".repeat(60);
  const lines = [
    rule,
    "CALCULATED GUTENPRINT PARAMETERS",
    rule,
    "Copy these values into your printer XML definition.",
    "",
  ];

  REPORT_GROUPS.forEach((group, index) => {
    if (index > 0) {
      lines.push("");
    }
    lines.push(`--- ${group.title} ---`);
    group.names.forEach((name) => lines.push(formatParameterRow(name, parameters[name])));
  });

  lines.push(rule);
  return lines;
};

/** Read calibration files in run order and print the estimated driver parameters. */
export const reportDriverParameters = (
  calFiles: string[],
  log: Logger,
): DriverParameters => {
  if (calFiles.length === 0) {
    throw new Error("Provide at least one .cal file.");
  }

  log.log(`📐 Processing ${calFiles.length} calibration file(s)...`);
  const runs = calFiles.map((calFile, index) => {
    requireFile(calFile, "Calibration file");
    log.log(`  > Analyzing run ${index + 1}: ${calFile}`);
    try {
      return parseCalibrationFile(fs.readFileSync(calFile, "utf8"));
    } catch (error) {
      throw new Error(`${calFile}: ${errorMessage(error)}`);
    }
  });

  const parameters = estimateDriverParameters(runs);
  formatParameterReport(parameters).forEach((line) => log.log(line));
  return parameters;
};
