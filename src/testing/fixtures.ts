/**
 * Filesystem fixtures for tests: a minimal Bayanat checkout in a temp dir.
 */

import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { REQUIRED_DIRECTORIES, REQUIRED_FILES } from "../installation/validator.js";

export async function makeTempDir(prefix = "bayanat-cli-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export interface AppDirOptions {
  /** `[project].version` in pyproject.toml; omitted when undefined. */
  version?: string;
  /** Create `env/bin/python` and `env/bin/pip` (default true). */
  venv?: boolean;
  /** Create an empty `.git` directory (default false). */
  git?: boolean;
}

export async function createAppDir(appDir: string, opts: AppDirOptions = {}): Promise<string> {
  await mkdir(appDir, { recursive: true });
  for (const dir of REQUIRED_DIRECTORIES) {
    await mkdir(join(appDir, dir), { recursive: true });
  }
  for (const file of REQUIRED_FILES) {
    await writeFile(join(appDir, file), "");
  }
  if (opts.version !== undefined) {
    await writeFile(join(appDir, "pyproject.toml"), `[project]\nname = "bayanat"\nversion = "${opts.version}"\n`);
  }
  if (opts.venv ?? true) {
    await mkdir(join(appDir, "env", "bin"), { recursive: true });
    await writeFile(join(appDir, "env", "bin", "python"), "");
    await writeFile(join(appDir, "env", "bin", "pip"), "");
  }
  if (opts.git) {
    await mkdir(join(appDir, ".git"), { recursive: true });
  }
  return appDir;
}
