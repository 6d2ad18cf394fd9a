import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  REQUIRED_DIRECTORIES,
  REQUIRED_FILES,
  formatMissing,
  validateInstallation,
} from "../validator.js";
import { createAppDir, makeTempDir } from "../../testing/fixtures.js";

describe("validateInstallation", () => {
  let appDir: string;

  beforeEach(async () => {
    appDir = await createAppDir(await makeTempDir());
  });

  afterEach(async () => {
    await rm(appDir, { recursive: true, force: true });
  });

  it("accepts a complete checkout", async () => {
    expect(await validateInstallation(appDir)).toEqual({ valid: true, missing: [] });
  });

  it.each(REQUIRED_FILES)("rejects a checkout without %s", async (name) => {
    await rm(join(appDir, name));

    const result = await validateInstallation(appDir);

    expect(result.valid).toBe(false);
    expect(result.missing).toEqual([{ kind: "file", name }]);
  });

  it.each(REQUIRED_DIRECTORIES.filter((d) => d !== "requirements"))(
    "rejects a checkout without the %s directory",
    async (name) => {
      await rm(join(appDir, name), { recursive: true });

      const result = await validateInstallation(appDir);

      expect(result.valid).toBe(false);
      expect(result.missing).toEqual([{ kind: "directory", name }]);
    },
  );

  it("reports every missing item at once", async () => {
    const empty = await makeTempDir();
    try {
      const result = await validateInstallation(empty);
      expect(result.missing).toHaveLength(REQUIRED_FILES.length + REQUIRED_DIRECTORIES.length);
    } finally {
      await rm(empty, { recursive: true, force: true });
    }
  });

  it("does not accept a file where a directory is required", async () => {
    await rm(join(appDir, "nginx"), { recursive: true });
    await writeFile(join(appDir, "nginx"), "");

    const result = await validateInstallation(appDir);

    expect(result.missing).toEqual([{ kind: "directory", name: "nginx" }]);
  });
});

describe("formatMissing", () => {
  it("renders one line per missing item", () => {
    expect(
      formatMissing("/srv/bayanat", [
        { kind: "file", name: "run.py" },
        { kind: "directory", name: "docs" },
      ]),
    ).toEqual([
      "Required file 'run.py' not found in /srv/bayanat",
      "Required directory 'docs' not found in /srv/bayanat",
    ]);
  });
});
