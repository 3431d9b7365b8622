import assert from "node:assert/strict";
import { test } from "node:test";

import { saveBlackCurve } from "../../src/lib/black-curve-store.js";
import { checkProfile, createProfile } from "../../src/services/profile.js";
import { createFakeRunner, scriptedStatuses } from "../helpers/fake-runner.js";
import { createTestContext, trackWorkspaces } from "../helpers/workspace.js";

const openWorkspace = trackWorkspaces();

const PROFILE_NAME = "Test Printer 9000, Standard ink, Plain paper, 720dpi, CMYK.icc";

test("createProfile fails before running colprof when no curve is stored", () => {
  const workspace = openWorkspace();
  workspace.write("Test_CMYK.ti3", "CTI3\n");
  const fake = createFakeRunner();

  assert.throws(
    () => createProfile(createTestContext(workspace.config, fake.runner)),
    /No black curve stored at .*K_CURVE\.conf\. Run the black-curve stage first\./,
  );
  assert.equal(fake.calls.length, 0);
});

test("createProfile assembles colprof arguments from the settings and stored curve", () => {
  const workspace = openWorkspace({
    PRINTER_FRIENDLY_NAME: "Test Printer 9000",
    PRINTER_MANUFACTURER: "TestCo",
    PROFILE_COPYRIGHT: "Test Lab",
    AVERAGE_DEVIATION: "2.0",
  });
  workspace.write("Test_CMYK.ti3", "CTI3\n");
  saveBlackCurve(workspace.config.profile.curveStore, "-kp 0 0 0.86 0.75 0.55");
  const fake = createFakeRunner();

  const output = createProfile(createTestContext(workspace.config, fake.runner));

  assert.equal(output, `${workspace.workDir}/${PROFILE_NAME}`);
  assert.deepEqual(fake.calls, [
    {
      kind: "run",
      command: "colprof",
      args: [
        "-r",
        "2",
        "-v",
        "-A",
        "TestCo",
        "-M",
        "Test Printer 9000",
        "-D",
        PROFILE_NAME,
        "-C",
        "Test Lab",
        "-qh",
        "-kp",
        "0",
        "0",
        "0.86",
        "0.75",
        "0.55",
        "-l225",
        "-S",
        "/usr/share/color/icc/compatibleWithAdobeRGB1998.icc",
        "-cmt",
        "-dpp",
        "-O",
        PROFILE_NAME,
        "Test_CMYK",
      ],
      cwd: workspace.workDir,
    },
  ]);
});

test("createProfile adds the black-ink limit after the total limit", () => {
  const workspace = openWorkspace({ BLACK_INK_LIMIT: "90", INK_LIMIT_PROFILE: "240" });
  workspace.write("Test_CMYK.ti3", "CTI3\n");
  saveBlackCurve(workspace.config.profile.curveStore, "-kr");
  const fake = createFakeRunner();

  createProfile(createTestContext(workspace.config, fake.runner));

  const args = fake.calls[0]?.args ?? [];
  const limit = args.indexOf("-l240");
  assert.deepEqual(args.slice(limit - 2, limit + 2), ["-qh", "-kr", "-l240", "-L90"]);
  assert.equal(args.includes("-C"), false);
  assert.equal(args.includes("-r"), false);
});

test("createProfile surfaces a colprof failure", () => {
  const workspace = openWorkspace();
  workspace.write("Test_CMYK.ti3", "CTI3\n");
  saveBlackCurve(workspace.config.profile.curveStore, "-kr");

  assert.throws(
    () =>
      createProfile(
        createTestContext(workspace.config, createFakeRunner({ run: scriptedStatuses([1]) }).runner),
      ),
    { message: "colprof exited with status 1." },
  );
});

test("checkProfile plots the finished profile", () => {
  const workspace = openWorkspace({ PROFILE_NAME: "Lab Glossy.icc" });
  const profile = workspace.write("Lab Glossy.icc", "icc");
  const fake = createFakeRunner();

  checkProfile(createTestContext(workspace.config, fake.runner));

  assert.deepEqual(
    fake.calls.map((call) => [call.kind, call.command, ...call.args]),
    [["run", "xicclu", "-g", "-fif", "-ir", profile]],
  );
});

test("checkProfile requires the finished profile", () => {
  const workspace = openWorkspace({ PROFILE_NAME: "Lab Glossy.icc" });
  const fake = createFakeRunner();

  assert.throws(
    () => checkProfile(createTestContext(workspace.config, fake.runner)),
    /Profile .*Lab Glossy\.icc not found\. Run the profile stage first\./,
  );
  assert.equal(fake.calls.length, 0);
});
