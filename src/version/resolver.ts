/**
 * Best-effort version lookup for an installation.
 *
 * Priority: pyproject.toml `[project].version` → latest reachable git tag
 * (leading "v" stripped) → "unknown". Never throws.
 */

import type { CommandRunner } from "../exec/command-runner.js";
import { declaredVersion, readPyproject } from "../installation/pyproject.js";

export const UNKNOWN_VERSION = "unknown";

export async function resolveVersion(appDir: string, runner: CommandRunner): Promise<string> {
  const manifestVersion = declaredVersion(await readPyproject(appDir));
  if (manifestVersion) return manifestVersion;

  const tagVersion = await latestTag(appDir, runner);
  if (tagVersion) return tagVersion;

  return UNKNOWN_VERSION;
}

async function latestTag(appDir: string, runner: CommandRunner): Promise<string | undefined> {
  try {
    const result = await runner.exec("git", ["describe", "--tags", "--abbrev=0"], { cwd: appDir });
    if (result.exitCode !== 0) return undefined;
    return stripVersionPrefix(result.stdout.trim()) || undefined;
  } catch {
    return undefined;
  }
}

export function stripVersionPrefix(tag: string): string {
  return tag.replace(/^v+/, "");
}
