/**
 * Database backup and restore via the application's `backup-db` / `restore-db`
 * subcommands.
 */

import { access, mkdir } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { AppCli, AppCommandResult } from "../exec/app-cli.js";
import type { Reporter } from "../report/reporter.js";

export const BACKUP_DIR_NAME = "backups";
export const BACKUP_FILE_SUFFIX = "_bayanat_backup.dump";
export const BACKUP_CREATED_MARKER = "Database backup created successfully at";

export type BackupResult =
  | { status: "created"; path: string }
  /** The subcommand succeeded but no file could be found; the dump may still exist. */
  | { status: "unlocatable"; expectedPath: string; output: string }
  | { status: "failed"; message: string };

/** Local time as YYYYMMDDHHmmss. */
export function backupTimestamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    String(now.getFullYear()) +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds())
  );
}

export function expectedBackupPath(appDir: string, output?: string, now: Date = new Date()): string {
  if (output) return resolve(output);
  return join(appDir, BACKUP_DIR_NAME, `${backupTimestamp(now)}${BACKUP_FILE_SUFFIX}`);
}

/** Path announced on a "backup created successfully at <path>" line, if any. */
export function parseBackupPathFromOutput(output: string): string | undefined {
  for (const line of output.split(/\r?\n/)) {
    const idx = line.indexOf(BACKUP_CREATED_MARKER);
    if (idx === -1) continue;
    const candidate = line.slice(idx + BACKUP_CREATED_MARKER.length).trim();
    if (candidate) return candidate;
  }
  return undefined;
}

export async function backupDatabase(
  appCli: AppCli,
  reporter: Reporter,
  opts: { output?: string; now?: Date } = {},
): Promise<BackupResult> {
  reporter.info("Backing up the database...");
  const backupPath = expectedBackupPath(appCli.appDir, opts.output, opts.now);
  await mkdir(dirname(backupPath), { recursive: true });

  const result = await appCli.run(["backup-db", "--output", backupPath]);
  if (!result.success) {
    reporter.error(`Database backup failed: ${result.output}`);
    return { status: "failed", message: result.output };
  }

  if (await exists(backupPath)) {
    reporter.success(`Database backup created at: ${backupPath}`);
    return { status: "created", path: backupPath };
  }

  const announced = parseBackupPathFromOutput(result.output);
  if (announced && (await exists(announced))) {
    reporter.success(`Database backup created at: ${announced}`);
    return { status: "created", path: announced };
  }

  reporter.warn("Backup completed but couldn't locate backup file");
  return { status: "unlocatable", expectedPath: backupPath, output: result.output };
}

/** Failures are returned, not reported. */
export async function restoreDatabase(
  appCli: AppCli,
  backupFile: string,
  reporter: Reporter,
): Promise<AppCommandResult> {
  reporter.info(`Restoring database from backup: ${backupFile}`);
  const result = await appCli.run(["restore-db", backupFile]);
  if (result.success) reporter.success("Database restored successfully.");
  return result;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
