import fs from "node:fs";
import path from "node:path";

export const ensureDir = (dirPath: string): void => {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
};

export const deleteFileIfExists = (filePath: string): void => {
  if (fs.existsSync(filePath)) {
    fs.rmSync(filePath, { force: true });
  }
};

/** Throw unless `filePath` is an existing regular file. */
export const requireFile = (
  filePath: string,
  description: string,
  hint?: string,
): void => {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    const suffix = hint ? ` ${hint}` : "";
    throw new Error(`${description} ${filePath} not found.${suffix}`);
  }
};

const hasExtension = (fileName: string, extensions: readonly string[]): boolean => {
  const extension = path.extname(fileName).toLowerCase();
  return extensions.includes(extension);
};

/** Files directly inside `dirPath` whose names start with `prefix` and carry one of `extensions`, sorted by name. */
export const listFiles = (
  dirPath: string,
  prefix: string,
  extensions: readonly string[],
): string[] => {
  if (!fs.existsSync(dirPath)) {
    return [];
  }

  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .filter(
      (entry) =>
        entry.isFile() &&
        entry.name.startsWith(prefix) &&
        hasExtension(entry.name, extensions),
    )
    .map((entry) => path.join(dirPath, entry.name))
    .sort((a, b) => a.localeCompare(b));
};

export interface NewestFileFilter {
  /** Only files modified at or after this time (epoch ms) qualify. */
  modifiedSince?: number;
  exclude?: (fileName: string) => boolean;
}

/** Most recently modified file in `dirPath` with one of `extensions`, if any. */
export const findNewestFile = (
  dirPath: string,
  extensions: readonly string[],
  filter: NewestFileFilter = {},
): string | undefined => {
  let newest: { filePath: string; mtimeMs: number } | undefined;

  for (const filePath of listFiles(dirPath, "", extensions)) {
    if (filter.exclude?.(path.basename(filePath))) {
      continue;
    }
    const { mtimeMs } = fs.statSync(filePath);
    if (filter.modifiedSince !== undefined && mtimeMs < filter.modifiedSince) {
      continue;
    }
    if (!newest || mtimeMs > newest.mtimeMs) {
      newest = { filePath, mtimeMs };
    }
  }

  return newest?.filePath;
};

/** Number of non-overlapping occurrences of `marker` in `text`. */
export const countOccurrences = (text: string, marker: string): number => {
  if (marker.length === 0) {
    return 0;
  }

  let count = 0;
  let index = text.indexOf(marker);
  while (index !== -1) {
    count += 1;
    index = text.indexOf(marker, index + marker.length);
  }
  return count;
};
