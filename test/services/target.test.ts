import assert from "node:assert/strict";
import { test } from "node:test";

import { generateTarget, printTarget } from "../../src/services/target.js";
import { createFakeRunner, scriptedStatuses } from "../helpers/fake-runner.js";
import { createTestContext, trackWorkspaces } from "../helpers/workspace.js";

const openWorkspace = trackWorkspaces();

test("generateTarget runs targen then printtarg in the working directory", () => {
  const workspace = openWorkspace();
  const fake = createFakeRunner();

  generateTarget(createTestContext(workspace.config, fake.runner));

  assert.deepEqual(fake.calls, [
    {
      kind: "run",
      command: "targen",
      args: ["-v", "-d4", "-G", "-s16", "-g16", "-p2.0", "-f1026", "-O", "-l260", "Test_CMYK"],
      cwd: workspace.workDir,
    },
    {
      kind: "run",
      command: "printtarg",
      args: ["-v", "-s", "-r", "-iSS", "-R0", "-pA4R", "Test_CMYK"],
      cwd: workspace.workDir,
    },
  ]);
});

test("generateTarget uses the configured Argyll directory and limits", () => {
  const workspace = openWorkspace({
    ARGYLL_BIN_DIR: "/opt/argyll/bin",
    INK_LIMIT_PRINT: "280",
    PAGE_SIZE: "Letter",
  });
  const fake = createFakeRunner();

  generateTarget(createTestContext(workspace.config, fake.runner));

  assert.equal(fake.calls[0]?.command, "/opt/argyll/bin/targen");
  assert.equal(fake.calls[0]?.args.at(-2), "-l280");
  assert.equal(fake.calls[1]?.command, "/opt/argyll/bin/printtarg");
  assert.equal(fake.calls[1]?.args.at(-2), "-pLetter");
});

test("generateTarget stops when targen fails", () => {
  const workspace = openWorkspace();
  const fake = createFakeRunner({ run: scriptedStatuses([1]) });

  assert.throws(
    () => generateTarget(createTestContext(workspace.config, fake.runner)),
    { message: "targen exited with status 1." },
  );
  assert.equal(fake.calls.length, 1);
});

test("printTarget requires the chart PostScript", () => {
  const workspace = openWorkspace();
  const fake = createFakeRunner();

  assert.throws(
    () => printTarget(createTestContext(workspace.config, fake.runner)),
    /PostScript file .*Test_CMYK\.ps not found\. Run the targen stage first\./,
  );
  assert.equal(fake.calls.length, 0);
});

test("printTarget sends the chart to the configured printer", () => {
  const workspace = openWorkspace();
  const chart = workspace.write("Test_CMYK.ps", "%!PS\nshowpage\n");
  const fake = createFakeRunner();

  printTarget(createTestContext(workspace.config, fake.runner));

  assert.deepEqual(fake.calls, [
    {
      kind: "run",
      command: "lpr",
      args: ["-P", "Test_Printer", chart],
      cwd: workspace.workDir,
    },
  ]);
});
