import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { installDependencies } from "../installer.js";
import { DependencyInstallError } from "../../errors.js";
import { RecordingReporter } from "../../report/reporter.js";
import { FakeExecutor } from "../../testing/fake-executor.js";
import { createAppDir, makeTempDir } from "../../testing/fixtures.js";

describe("installDependencies", () => {
  let appDir: string;

  beforeEach(async () => {
    appDir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(appDir, { recursive: true, force: true });
  });

  it("creates a missing venv before installing into it", async () => {
    await createAppDir(appDir, { venv: false });
    const fake = new FakeExecutor();
    const venv = join(appDir, "env");

    const result = await installDependencies(appDir, {}, fake.runner(), new RecordingReporter());

    expect(result).toEqual({ venvCreated: true, devRequirementsInstalled: false });
    expect(fake.calls.map((c) => [c.file, ...c.args])).toEqual([
      ["python3", "-m", "venv", venv],
      [join(venv, "bin", "pip"), "install", "--upgrade", "pip"],
      [join(venv, "bin", "pip"), "install", "-r", join(appDir, "requirements", "main.txt")],
    ]);
  });

  it("reuses an existing venv and installs dev requirements when present", async () => {
    await createAppDir(appDir);
    await writeFile(join(appDir, "requirements", "dev.txt"), "pytest\n");
    const fake = new FakeExecutor();

    const result = await installDependencies(appDir, { venvDir: "env" }, fake.runner(), new RecordingReporter());

    expect(result).toEqual({ venvCreated: false, devRequirementsInstalled: true });
    expect(fake.lines()).toEqual([
      "pip install --upgrade pip",
      `pip install -r ${join(appDir, "requirements", "main.txt")}`,
      `pip install -r ${join(appDir, "requirements", "dev.txt")}`,
    ]);
  });

  it("names the failing step", async () => {
    await createAppDir(appDir);
    const fake = new FakeExecutor().on(
      (call) => call.args.includes(join(appDir, "requirements", "main.txt")),
      { exitCode: 1, stderr: "No matching distribution found for flask==99" },
    );

    const err = await installDependencies(appDir, {}, fake.runner(), new RecordingReporter()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DependencyInstallError);
    expect(err).toMatchObject({ step: join("requirements", "main.txt") });
    expect(fake.calls).toHaveLength(2);
  });
});
