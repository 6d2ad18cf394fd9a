/**
 * Standalone maintenance commands: backup, restore, version, restart.
 */

import { access } from "node:fs/promises";
import { resolve } from "node:path";
import type { Command } from "commander";
import type { CliContext } from "../context.js";
import { fail } from "../context.js";
import { AppCli } from "../../exec/app-cli.js";
import { resolveInstallationPath } from "../../installation/metadata.js";
import { formatMissing, validateInstallation } from "../../installation/validator.js";
import { backupDatabase, restoreDatabase, type BackupResult } from "../../backup/driver.js";
import { resolveVersion } from "../../version/resolver.js";
import { restartServices, type ServicesRestartResult } from "../../service/controller.js";
import { companionServicesFor } from "../../config/cli-config.js";
import { describeError } from "../../errors.js";

export interface BackupCommandOptions {
  output?: string;
}

export interface RestoreCommandOptions {
  path?: string;
  yes?: boolean;
}

export interface RestartCommandOptions {
  serviceName?: string;
}

async function validatedAppDir(pathArg: string | undefined, ctx: CliContext): Promise<string | undefined> {
  const appDir = await resolveInstallationPath(pathArg, { cwd: ctx.cwd, appDirName: ctx.config.appDirName });
  const validation = await validateInstallation(appDir);
  if (validation.valid) return appDir;

  for (const line of formatMissing(appDir, validation.missing)) ctx.reporter.error(line);
  fail(ctx, "The specified directory does not appear to be a valid Bayanat application directory.");
  return undefined;
}

function appCliFor(appDir: string, ctx: CliContext): AppCli {
  return new AppCli(appDir, ctx.runner, { venvDir: ctx.config.venvDir });
}

export async function runBackup(
  pathArg: string | undefined,
  opts: BackupCommandOptions,
  ctx: CliContext,
): Promise<BackupResult | undefined> {
  try {
    const appDir = await validatedAppDir(pathArg, ctx);
    if (!appDir) return undefined;

    const output = opts.output ? resolve(ctx.cwd, opts.output) : undefined;
    const result = await backupDatabase(appCliFor(appDir, ctx), ctx.reporter, { output, now: ctx.now?.() });
    switch (result.status) {
      case "created":
        ctx.reporter.success(`Backup created successfully at: ${result.path}`);
        break;
      case "unlocatable":
        fail(ctx, `Backup operation could not be confirmed: no file at ${result.expectedPath}.`);
        break;
      case "failed":
        fail(ctx, "Backup operation failed.");
        break;
    }
    return result;
  } catch (err) {
    fail(ctx, `Error during backup: ${describeError(err)}`);
    return undefined;
  }
}

export async function runRestore(backupFile: string, opts: RestoreCommandOptions, ctx: CliContext): Promise<boolean> {
  try {
    const appDir = await validatedAppDir(opts.path, ctx);
    if (!appDir) return false;

    const backupPath = resolve(ctx.cwd, backupFile);
    try {
      await access(backupPath);
    } catch {
      fail(ctx, `Backup file not found: ${backupPath}`);
      return false;
    }

    if (!opts.yes && ctx.interactive) {
      const proceed = await ctx.confirm(`Restore the database in ${appDir} from ${backupPath}? Current data will be replaced.`);
      if (!proceed) {
        ctx.reporter.info("Restore cancelled.");
        return false;
      }
    }

    const result = await restoreDatabase(appCliFor(appDir, ctx), backupPath, ctx.reporter);
    if (!result.success) {
      fail(ctx, `Failed to restore database: ${result.output}`);
      return false;
    }
    return true;
  } catch (err) {
    fail(ctx, `Error during restore: ${describeError(err)}`);
    return false;
  }
}

export async function runVersion(pathArg: string | undefined, ctx: CliContext): Promise<string> {
  const appDir = await resolveInstallationPath(pathArg, { cwd: ctx.cwd, appDirName: ctx.config.appDirName });
  const version = await resolveVersion(appDir, ctx.runner);
  ctx.reporter.panel("Bayanat Version", version);
  return version;
}

export async function runRestart(opts: RestartCommandOptions, ctx: CliContext): Promise<ServicesRestartResult> {
  const service = opts.serviceName ?? ctx.config.serviceName;
  const result = await restartServices(service, companionServicesFor(ctx.config, service), ctx.runner, ctx.reporter);
  if (result.main.status !== "restarted") process.exitCode = 1;
  return result;
}

export function registerMaintenanceCommands(program: Command, getContext: () => Promise<CliContext>): void {
  program
    .command("backup [path]")
    .description("Create a database backup without performing a full update")
    .option("-o, --output <file>", "Custom output file path for the backup")
    .action(async (path: string | undefined, opts: BackupCommandOptions) => {
      await runBackup(path, opts, await getContext());
    });

  program
    .command("restore <backupFile>")
    .description("Restore the database from a backup file")
    .option("-p, --path <path>", "Path to the Bayanat application directory")
    .option("-y, --yes", "Do not ask for confirmation", false)
    .action(async (backupFile: string, opts: RestoreCommandOptions) => {
      await runRestore(backupFile, opts, await getContext());
    });

  program
    .command("version [path]")
    .description("Display the current version of the Bayanat application")
    .action(async (path: string | undefined) => {
      await runVersion(path, await getContext());
    });

  program
    .command("restart")
    .description("Restart the Bayanat service and its companion services")
    .option("--service-name <name>", "Name of the systemd service to restart")
    .action(async (opts: RestartCommandOptions) => {
      await runRestart(opts, await getContext());
    });
}
