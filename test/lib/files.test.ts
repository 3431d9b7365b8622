import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, test } from "node:test";

import {
  countOccurrences,
  findNewestFile,
  listFiles,
  requireFile,
} from "../../src/lib/files.js";

let dir: string;

const touch = (name: string, mtimeSeconds: number): string => {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, "");
  fs.utimesSync(filePath, mtimeSeconds, mtimeSeconds);
  return filePath;
};

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "print-profiler-files-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

test("countOccurrences counts every marker, several per line included", () => {
  assert.equal(countOccurrences("showpage\n%% x showpage showpage\n", "showpage"), 3);
  assert.equal(countOccurrences("%!PS\n", "showpage"), 0);
  assert.equal(countOccurrences("aaaa", "aa"), 2);
});

test("findNewestFile picks the most recently modified matching file", () => {
  touch("older.tif", 1_000);
  const newest = touch("newer.TIFF", 2_000);
  touch("newest.txt", 3_000);

  assert.equal(findNewestFile(dir, [".tif", ".tiff"]), newest);
});

test("findNewestFile skips files older than the cutoff or excluded by name", () => {
  touch("stale.tiff", 1_000);
  touch("Test_CMYK_scan_01.tiff", 3_000);
  const fresh = touch("img.tif", 2_500);

  assert.equal(
    findNewestFile(dir, [".tif", ".tiff"], {
      modifiedSince: 2_000_000,
      exclude: (name) => name.startsWith("Test_CMYK_scan_"),
    }),
    fresh,
  );
  assert.equal(findNewestFile(dir, [".tiff"], { modifiedSince: 4_000_000 }), undefined);
});

test("findNewestFile returns undefined when nothing matches", () => {
  touch("notes.txt", 1_000);

  assert.equal(findNewestFile(dir, [".tif", ".tiff"]), undefined);
  assert.equal(findNewestFile(path.join(dir, "missing"), [".tif"]), undefined);
});

test("listFiles filters by prefix and extension and sorts by name", () => {
  const second = touch("Test_CMYK_scan_02.tiff", 1_000);
  const first = touch("Test_CMYK_scan_01.tiff", 2_000);
  touch("Other_scan_01.tiff", 1_000);
  touch("Test_CMYK_scan_03.png", 1_000);

  assert.deepEqual(listFiles(dir, "Test_CMYK_scan_", [".tiff"]), [first, second]);
});

test("requireFile names the missing file and the hint", () => {
  const missing = path.join(dir, "ScanSettings.SF2");

  assert.throws(
    () => requireFile(missing, "Scan settings file", "Create one first."),
    { message: `Scan settings file ${missing} not found. Create one first.` },
  );
  assert.throws(() => requireFile(dir, "Profile"), {
    message: `Profile ${dir} not found.`,
  });
  assert.doesNotThrow(() => requireFile(touch("a.icc", 1_000), "Profile"));
});
