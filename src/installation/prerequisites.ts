/**
 * Host prerequisite checks. Each check throws PreconditionError and mutates nothing.
 */

import { access, readdir, constants } from "node:fs/promises";
import type { CommandRunner } from "../exec/command-runner.js";
import { PreconditionError, describeError } from "../errors.js";

export async function checkGit(runner: CommandRunner): Promise<string> {
  const result = await runner.exec("git", ["--version"]);
  if (result.exitCode !== 0) {
    throw new PreconditionError("Git is not installed. Please install Git to proceed.");
  }
  return result.stdout.trim();
}

/** The interpreter must be able to build a venv (`python3 -m venv`). */
export async function checkVenvSupport(runner: CommandRunner, python = "python3"): Promise<void> {
  const result = await runner.exec(python, ["-m", "venv", "--help"]);
  if (result.exitCode !== 0) {
    throw new PreconditionError(`${python} cannot create virtual environments (the venv module is not available).`);
  }
}

export async function checkPermissions(dir: string): Promise<void> {
  try {
    await access(dir, constants.R_OK | constants.W_OK);
  } catch {
    throw new PreconditionError(`Insufficient permissions for directory '${dir}'.`);
  }
}

export async function isDirectoryEmpty(dir: string): Promise<boolean> {
  const entries = await readdir(dir);
  return entries.length === 0;
}

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<{ status: number }>;

/**
 * Plain GET against the repository URL; anything but HTTP 200 within the
 * timeout is a precondition failure.
 */
export async function checkNetworkConnectivity(
  url: string,
  opts: { timeoutMs?: number; fetchImpl?: FetchLike } = {},
): Promise<void> {
  const { timeoutMs = 5000, fetchImpl = fetch } = opts;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, { signal: controller.signal });
    if (response.status !== 200) {
      throw new PreconditionError(
        `Network connectivity issue. Cannot reach the repository (${url} returned HTTP ${response.status}).`,
      );
    }
  } catch (err) {
    if (err instanceof PreconditionError) throw err;
    const reason = err instanceof Error && err.name === "AbortError" ? "timed out" : describeError(err);
    throw new PreconditionError(`Network connectivity issue. Cannot reach the repository (${reason}).`);
  } finally {
    clearTimeout(timeout);
  }
}
