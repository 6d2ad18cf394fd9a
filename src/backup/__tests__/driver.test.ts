import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm, stat } from "node:fs/promises";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  backupDatabase,
  backupTimestamp,
  expectedBackupPath,
  parseBackupPathFromOutput,
  restoreDatabase,
} from "../driver.js";
import { AppCli } from "../../exec/app-cli.js";
import { RecordingReporter } from "../../report/reporter.js";
import { FakeExecutor, type RecordedCall } from "../../testing/fake-executor.js";
import { createAppDir, makeTempDir } from "../../testing/fixtures.js";

/** Behaves like `backup-db --output <path>`: writes the dump where asked. */
function writeRequestedDump(call: RecordedCall) {
  const path = call.args[call.args.indexOf("--output") + 1];
  if (path) writeFileSync(path, "dump");
  return { stdout: `Database backup created successfully at ${path}\n` };
}

describe("backup paths", () => {
  it("formats a 14-digit local timestamp", () => {
    expect(backupTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe("20240105090307");
  });

  it("places default backups under backups/", () => {
    const path = expectedBackupPath("/srv/bayanat", undefined, new Date(2024, 10, 30, 23, 59, 1));

    expect(path).toBe("/srv/bayanat/backups/20241130235901_bayanat_backup.dump");
    expect(path).toMatch(/\/backups\/\d{14}_bayanat_backup\.dump$/);
  });

  it("uses an explicit output path as given", () => {
    expect(expectedBackupPath("/srv/bayanat", "/var/dumps/nightly.dump")).toBe("/var/dumps/nightly.dump");
  });

  it("parses the announced path from command output", () => {
    expect(parseBackupPathFromOutput("pg_dump ok\nDatabase backup created successfully at /tmp/x.dump\n")).toBe(
      "/tmp/x.dump",
    );
    expect(parseBackupPathFromOutput("nothing to see")).toBeUndefined();
  });
});

describe("backupDatabase", () => {
  let appDir: string;

  beforeEach(async () => {
    appDir = await createAppDir(await makeTempDir());
  });

  afterEach(async () => {
    await rm(appDir, { recursive: true, force: true });
  });

  it("creates the backups directory and returns the dump path", async () => {
    const fake = new FakeExecutor().on("python -m flask backup-db", writeRequestedDump);
    const now = new Date(2024, 5, 1, 8, 0, 0);

    const result = await backupDatabase(new AppCli(appDir, fake.runner()), new RecordingReporter(), { now });

    const expected = join(appDir, "backups", "20240601080000_bayanat_backup.dump");
    expect(result).toEqual({ status: "created", path: expected });
    expect(fake.calls[0]?.args).toEqual(["-m", "flask", "backup-db", "--output", expected]);
    expect((await stat(join(appDir, "backups"))).isDirectory()).toBe(true);
  });

  it("falls back to the path announced in the output", async () => {
    const elsewhere = join(appDir, "elsewhere.dump");
    const fake = new FakeExecutor().on("python -m flask backup-db", () => {
      writeFileSync(elsewhere, "dump");
      return { stdout: `Database backup created successfully at ${elsewhere}\n` };
    });

    const result = await backupDatabase(new AppCli(appDir, fake.runner()), new RecordingReporter());

    expect(result).toEqual({ status: "created", path: elsewhere });
  });

  it("reports an unlocatable dump when the command succeeds without a file", async () => {
    const fake = new FakeExecutor().on("python -m flask backup-db", { stdout: "ok\n" });
    const reporter = new RecordingReporter();
    const output = join(appDir, "custom.dump");

    const result = await backupDatabase(new AppCli(appDir, fake.runner()), reporter, { output });

    expect(result).toEqual({ status: "unlocatable", expectedPath: output, output: "ok\n" });
    expect(reporter.messages("warn")).toEqual(["Backup completed but couldn't locate backup file"]);
  });

  it("reports a failed command", async () => {
    const fake = new FakeExecutor().on("python -m flask backup-db", { exitCode: 1, stderr: "pg_dump: error" });

    const result = await backupDatabase(new AppCli(appDir, fake.runner()), new RecordingReporter());

    expect(result).toEqual({ status: "failed", message: "Command failed: pg_dump: error" });
  });
});

describe("restoreDatabase", () => {
  it("passes the dump path to restore-db", async () => {
    const appDir = await createAppDir(await makeTempDir());
    try {
      const fake = new FakeExecutor();
      const reporter = new RecordingReporter();

      const result = await restoreDatabase(new AppCli(appDir, fake.runner()), "/tmp/a.dump", reporter);

      expect(result.success).toBe(true);
      expect(fake.calls[0]?.args).toEqual(["-m", "flask", "restore-db", "/tmp/a.dump"]);
      expect(reporter.messages("success")).toEqual(["Database restored successfully."]);
    } finally {
      await rm(appDir, { recursive: true, force: true });
    }
  });

  it("returns a failure without reporting it", async () => {
    const appDir = await createAppDir(await makeTempDir());
    try {
      const fake = new FakeExecutor().on("python -m flask restore-db", { exitCode: 1, stderr: "bad archive" });
      const reporter = new RecordingReporter();

      const result = await restoreDatabase(new AppCli(appDir, fake.runner()), "/tmp/a.dump", reporter);

      expect(result).toEqual({ success: false, output: "Command failed: bad archive" });
      expect(reporter.messages("error")).toEqual([]);
    } finally {
      await rm(appDir, { recursive: true, force: true });
    }
  });
});
