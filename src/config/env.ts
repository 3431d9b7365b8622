import { config as loadEnv } from "dotenv";
import { z } from "zod";

const boolFromString = (value: string): boolean =>
  ["1", "true", "yes", "on"].includes(value.toLowerCase());

const argsFromString = (value: string): string[] =>
  value
    .split(/\s+/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const inkLimit = z.coerce.number().int().min(0).max(400);

const optionalNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema.optional(),
  );

const environmentSchema = z.object({
  PROFILE_SESSION: z
    .string()
    .trim()
    .min(1)
    .regex(/^[^/\\]+$/, "must not contain path separators"),
  PRINTER_NAME: z.string().trim().min(1),
  PRINTER_FRIENDLY_NAME: z.string().trim().min(1).optional(),
  PRINTER_MANUFACTURER: z.string().trim().min(1).default("Unknown"),
  INKSET: z.string().trim().min(1).default("Standard"),
  PAPER: z.string().trim().min(1).default("Plain"),
  RESOLUTION: z.string().trim().min(1).default("720dpi"),
  PROFILE_NAME: z.string().trim().min(1).optional(),
  PROFILE_COPYRIGHT: z.string().trim().min(1).optional(),
  INK_LIMIT_PRINT: inkLimit.default(260),
  INK_LIMIT_PROFILE: inkLimit.default(225),
  BLACK_INK_LIMIT: optionalNumber(z.coerce.number().int().min(0).max(100)),
  AVERAGE_DEVIATION: optionalNumber(z.coerce.number().positive()),
  TARGEN_OPTIONS: z
    .string()
    .default("-v -d4 -G -s16 -g16 -p2.0 -f1026 -O")
    .transform(argsFromString),
  PRINTTARG_OPTIONS: z
    .string()
    .default("-v -s -r -iSS -R0")
    .transform(argsFromString),
  PAGE_SIZE: z.string().trim().min(1).default("A4R"),
  SCANNER_PROFILE: z.string().trim().min(1).default("scanner.icc"),
  SCAN_BACKEND: z.enum(["epsonscan2", "multiscan"]).default("epsonscan2"),
  SCAN_SETTINGS_FILE: z.string().trim().min(1).default("ScanSettings.SF2"),
  MULTISCAN_PASSES: z.coerce.number().int().min(1).default(4),
  SCAN_DIR: z.string().trim().min(1).default("scans"),
  BLACK_CURVE_FILE: z.string().trim().min(1).default("K_CURVE.conf"),
  LINK_PROFILE: z
    .string()
    .trim()
    .min(1)
    .default("/usr/share/color/icc/compatibleWithAdobeRGB1998.icc"),
  OUTPUT_DIR: z.string().trim().min(1).default("."),
  ARGYLL_BIN_DIR: z.string().trim().min(1).optional(),
  PROFILER_VERBOSE: z.string().default("false").transform(boolFromString),
});

export type Environment = z.infer<typeof environmentSchema>;
export type ScanBackendName = Environment["SCAN_BACKEND"];

export const parseEnvironment = (
  rawEnv: NodeJS.ProcessEnv = process.env,
): Environment => environmentSchema.parse(rawEnv);

/** Load a dotenv file into `process.env`, then validate it. */
export const loadEnvironment = (envFile?: string): Environment => {
  loadEnv(envFile ? { path: envFile } : undefined);
  return parseEnvironment(process.env);
};
