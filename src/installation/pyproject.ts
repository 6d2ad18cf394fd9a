/**
 * Minimal accessors for the application's pyproject.toml.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseToml } from "smol-toml";

export const PYPROJECT_FILE = "pyproject.toml";

/** Parsed manifest, or undefined when the file is missing or malformed. */
export async function readPyproject(appDir: string): Promise<Record<string, unknown> | undefined> {
  try {
    const raw = await readFile(join(appDir, PYPROJECT_FILE), "utf-8");
    return parseToml(raw);
  } catch {
    return undefined;
  }
}

export function getTable(source: Record<string, unknown> | undefined, key: string): Record<string, unknown> | undefined {
  const value = source?.[key];
  if (value && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date)) {
    return { ...value };
  }
  return undefined;
}

/** `[project].version` when it is a non-empty string. */
export function declaredVersion(manifest: Record<string, unknown> | undefined): string | undefined {
  const version = getTable(manifest, "project")?.["version"];
  return typeof version === "string" && version.trim() ? version.trim() : undefined;
}

/** `[tool.bayanat].venv_path`, the application's own override of the venv location. */
export function declaredVenvPath(manifest: Record<string, unknown> | undefined): string | undefined {
  const venvPath = getTable(getTable(manifest, "tool"), "bayanat")?.["venv_path"];
  return typeof venvPath === "string" && venvPath.trim() ? venvPath.trim() : undefined;
}
