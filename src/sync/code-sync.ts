/**
 * Source checkout management: clone on first run, fetch/checkout/pull after.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";
import type { CommandRunner } from "../exec/command-runner.js";
import type { Reporter } from "../report/reporter.js";

export interface SyncOptions {
  appDir: string;
  repoUrl: string;
  /** Mainline branch. */
  branch: string;
  /** Hard-reset the branch to the remote before pulling, dropping local commits. */
  force: boolean;
}

export type SyncMode = "cloned" | "pulled";

export async function hasVcsMetadata(appDir: string): Promise<boolean> {
  try {
    return (await stat(join(appDir, ".git"))).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Bring the checkout at `appDir` up to date with the mainline.
 * Any failing git step throws and aborts the whole sync.
 */
export async function syncCode(opts: SyncOptions, runner: CommandRunner, reporter: Reporter): Promise<SyncMode> {
  const { appDir, repoUrl, branch, force } = opts;

  if (!(await hasVcsMetadata(appDir))) {
    reporter.info(`Cloning ${repoUrl} into ${appDir}...`);
    await runner.run("git", ["clone", repoUrl, appDir]);
    return "cloned";
  }

  reporter.info("Fetching latest code...");
  await runner.run("git", ["fetch"], { cwd: appDir });
  await runner.run("git", ["checkout", branch], { cwd: appDir });
  if (force) {
    reporter.warn(`Discarding local changes: resetting ${branch} to origin/${branch}`);
    await runner.run("git", ["reset", "--hard", `origin/${branch}`], { cwd: appDir });
  }
  await runner.run("git", ["pull"], { cwd: appDir });
  return "pulled";
}

/** Move the working tree one step back along the reflog. */
export async function revertWorkingTree(appDir: string, runner: CommandRunner): Promise<void> {
  await runner.run("git", ["reset", "--hard", "HEAD@{1}"], { cwd: appDir });
}
