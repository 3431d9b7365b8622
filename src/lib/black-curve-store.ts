import fs from "node:fs";
import path from "node:path";

import { ensureDir } from "./files.js";

/** Split a stored curve into the argument tokens colprof and xicclu take. */
export const curveArgs = (curve: string): string[] =>
  curve.split(/\s+/).filter((token) => token.length > 0);

/** Accepts colprof black generation options such as `-kp 0 0 0.86 0.75 0.55` or `-kr`. */
export const validateBlackCurve = (curve: string): string => {
  const tokens = curveArgs(curve);
  if (tokens.length === 0) {
    throw new Error('Black curve is empty. Expected e.g. "-kp 0 0 0.86 0.75 0.55".');
  }
  if (!/^-k[a-z]$/.test(tokens[0])) {
    throw new Error(
      `Black curve must start with a colprof -k option, got "${tokens[0]}".`,
    );
  }
  return curve;
};

/** Overwrite the curve state file with `curve` followed by a single newline. */
export const saveBlackCurve = (storePath: string, curve: string): void => {
  ensureDir(path.dirname(storePath));
  fs.writeFileSync(storePath, `${curve}\n`, "utf8");
};

export const readBlackCurve = (storePath: string): string => {
  if (!fs.existsSync(storePath)) {
    throw new Error(
      `No black curve stored at ${storePath}. Run the black-curve stage first.`,
    );
  }

  const curve = fs.readFileSync(storePath, "utf8").replace(/\r?\n$/, "");
  if (curve.trim().length === 0) {
    throw new Error(
      `Black curve file ${storePath} is empty. Run the black-curve stage first.`,
    );
  }
  return curve;
};
