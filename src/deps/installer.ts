/**
 * Python dependency installation into the application's own virtualenv.
 *
 * Every pip call goes through `<venv>/bin/pip`, never a system-wide pip.
 */

import { access } from "node:fs/promises";
import { join } from "node:path";
import type { CommandRunner } from "../exec/command-runner.js";
import type { Reporter } from "../report/reporter.js";
import { DependencyInstallError } from "../errors.js";

export const MAIN_REQUIREMENTS = join("requirements", "main.txt");
export const DEV_REQUIREMENTS = join("requirements", "dev.txt");

export interface DependencyOptions {
  /** Venv directory relative to appDir. */
  venvDir?: string;
  /** Interpreter that builds a missing venv via `-m venv`. */
  pythonCommand?: string;
}

export interface DependencyInstallResult {
  venvCreated: boolean;
  devRequirementsInstalled: boolean;
}

export async function installDependencies(
  appDir: string,
  opts: DependencyOptions,
  runner: CommandRunner,
  reporter: Reporter,
): Promise<DependencyInstallResult> {
  const venvPath = join(appDir, opts.venvDir ?? "env");
  const pip = join(venvPath, "bin", "pip");

  let venvCreated = false;
  if (!(await exists(venvPath))) {
    reporter.info(`Creating virtual environment at ${venvPath}...`);
    await step("create virtual environment", () =>
      runner.run(opts.pythonCommand ?? "python3", ["-m", "venv", venvPath], { cwd: appDir }),
    );
    venvCreated = true;
  }

  reporter.info("Upgrading pip...");
  await step("upgrade pip", () => runner.run(pip, ["install", "--upgrade", "pip"], { cwd: appDir }));

  reporter.info(`Installing packages from ${MAIN_REQUIREMENTS}...`);
  await step(MAIN_REQUIREMENTS, () =>
    runner.run(pip, ["install", "-r", join(appDir, MAIN_REQUIREMENTS)], { cwd: appDir }),
  );

  let devRequirementsInstalled = false;
  if (await exists(join(appDir, DEV_REQUIREMENTS))) {
    reporter.info(`Installing development packages from ${DEV_REQUIREMENTS}...`);
    await step(DEV_REQUIREMENTS, () =>
      runner.run(pip, ["install", "-r", join(appDir, DEV_REQUIREMENTS)], { cwd: appDir }),
    );
    devRequirementsInstalled = true;
  }

  reporter.success("Dependencies installed successfully.");
  return { venvCreated, devRequirementsInstalled };
}

async function step(name: string, fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    throw new DependencyInstallError(name, err);
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
