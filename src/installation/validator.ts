/**
 * Installation layout check, run before every mutating command.
 * Read-only.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";

export const REQUIRED_FILES = [
  "docker-compose.yml",
  "pyproject.toml",
  "README.md",
  "run.py",
  "requirements/main.txt",
] as const;

export const REQUIRED_DIRECTORIES = ["flask", "nginx", "docs", "tests", "requirements"] as const;

export interface MissingItem {
  kind: "file" | "directory";
  name: string;
}

export interface ValidationResult {
  valid: boolean;
  missing: MissingItem[];
}

/**
 * Check every required file and directory; all missing items are reported,
 * not just the first.
 */
export async function validateInstallation(appDir: string): Promise<ValidationResult> {
  const missing: MissingItem[] = [];

  for (const name of REQUIRED_FILES) {
    if (!(await isKind(join(appDir, name), "file"))) missing.push({ kind: "file", name });
  }
  for (const name of REQUIRED_DIRECTORIES) {
    if (!(await isKind(join(appDir, name), "directory"))) missing.push({ kind: "directory", name });
  }

  return { valid: missing.length === 0, missing };
}

export function formatMissing(appDir: string, missing: MissingItem[]): string[] {
  return missing.map((item) =>
    item.kind === "file"
      ? `Required file '${item.name}' not found in ${appDir}`
      : `Required directory '${item.name}' not found in ${appDir}`,
  );
}

async function isKind(path: string, kind: MissingItem["kind"]): Promise<boolean> {
  try {
    const info = await stat(path);
    return kind === "file" ? info.isFile() : info.isDirectory();
  } catch {
    return false;
  }
}
