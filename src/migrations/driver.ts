/**
 * Schema migrations through the application's `apply-migrations` subcommand.
 *
 * The subcommand's exit code is not trusted on its own: the dry-run and the
 * apply output are inspected for marker strings.
 */

import type { AppCli } from "../exec/app-cli.js";
import type { Reporter } from "../report/reporter.js";

export const NO_PENDING_MARKER = "No pending migrations to apply";
export const SUCCESS_MARKER = "[Success]";

export type MigrationOutcome = "no-pending-changes" | "applied" | "failed";

export interface MigrationResult {
  outcome: MigrationOutcome;
  success: boolean;
  message: string;
}

export function hasNoPendingMigrations(dryRunOutput: string): boolean {
  return dryRunOutput.includes(NO_PENDING_MARKER);
}

export function isMigrationSuccess(applyOutput: string): boolean {
  return applyOutput.includes(SUCCESS_MARKER);
}

export async function applyMigrations(appCli: AppCli, reporter: Reporter): Promise<MigrationResult> {
  const dryRun = await appCli.run(["apply-migrations", "--dry-run"]);
  reporter.info(dryRun.output);
  if (!dryRun.success) {
    return failed(dryRun.output);
  }

  if (hasNoPendingMigrations(dryRun.output)) {
    reporter.success("No pending migrations to apply.");
    return { outcome: "no-pending-changes", success: true, message: "No pending migrations to apply." };
  }

  const apply = await appCli.run(["apply-migrations"]);
  reporter.info(apply.output);
  if (!apply.success) {
    return failed(apply.output);
  }

  if (isMigrationSuccess(apply.output)) {
    reporter.success("Migrations applied successfully.");
    return { outcome: "applied", success: true, message: "Migrations applied successfully." };
  }

  const message = `Migration process failed: ${apply.output}`;
  reporter.error(message);
  return failed(message);
}

function failed(message: string): MigrationResult {
  return { outcome: "failed", success: false, message };
}
