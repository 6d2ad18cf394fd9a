import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm } from "node:fs/promises";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { runUpdate } from "../update.js";
import { createTestContext } from "../../../testing/context.js";
import { FakeExecutor } from "../../../testing/fake-executor.js";
import { createAppDir, makeTempDir } from "../../../testing/fixtures.js";

describe("bayanat update", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await makeTempDir();
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(cwd, { recursive: true, force: true });
  });

  it("fails with exit code 1 outside a Bayanat checkout", async () => {
    const { ctx, fake, reporter } = createTestContext(cwd);

    const summary = await runUpdate(undefined, {}, ctx);

    expect(summary).toBeUndefined();
    expect(reporter.messages("error")[0]).toMatch(
      new RegExp(`^Update failed: ${cwd} does not appear to be a valid Bayanat application directory\\.`),
    );
    expect(fake.calls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
  });

  it("locks, backs up, syncs and unlocks an up-to-date installation found from the install root", async () => {
    const appDir = await createAppDir(join(cwd, "bayanat"), { version: "1.2.0", git: true });
    writeFileSync(join(cwd, ".bayanat-cli"), "{}");
    const fake = new FakeExecutor().on("python -m flask backup-db", (call) => {
      const path = call.args[call.args.indexOf("--output") + 1];
      if (path) writeFileSync(path, "dump");
      return { stdout: "" };
    });
    const { ctx } = createTestContext(cwd, { fake });

    const summary = await runUpdate(undefined, {}, ctx);

    expect(summary).toMatchObject({
      status: "up-to-date",
      previousVersion: "1.2.0",
      currentVersion: "1.2.0",
      backupPath: join(appDir, "backups", "20240601080000_bayanat_backup.dump"),
    });
    expect(fake.lines()).toEqual([
      "python -m flask lock --reason CLI update in progress",
      "git --version",
      `python -m flask backup-db --output ${join(appDir, "backups", "20240601080000_bayanat_backup.dump")}`,
      "git fetch",
      "git checkout master",
      "git pull",
      "python -m flask unlock",
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("exits 1 when the lock is refused and never unlocks", async () => {
    const appDir = await createAppDir(join(cwd, "app"), { version: "1.2.0" });
    const fake = new FakeExecutor().on("python -m flask lock", { exitCode: 1, stderr: "already locked" });
    const { ctx, reporter } = createTestContext(cwd, { fake });

    await runUpdate(appDir, { serviceName: "bayanat-staging" }, ctx);

    expect(fake.lines()).toEqual(["python -m flask lock --reason CLI update in progress"]);
    expect(reporter.messages("error")).toEqual([
      "Update failed: Failed to lock the Bayanat application. Output:\nCommand failed: already locked",
    ]);
    expect(process.exitCode).toBe(1);
  });
});
