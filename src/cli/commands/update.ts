/**
 * `bayanat update`: run the update orchestrator against one installation.
 */

import type { Command } from "commander";
import type { CliContext } from "../context.js";
import { fail } from "../context.js";
import { resolveInstallationPath } from "../../installation/metadata.js";
import { UpdateOrchestrator, type UpdateSummary } from "../../update/orchestrator.js";
import { createUpdateToolkit } from "../../update/toolkit.js";
import { describeError } from "../../errors.js";

export interface UpdateCommandOptions {
  skipGit?: boolean;
  skipDeps?: boolean;
  skipMigrations?: boolean;
  skipRestart?: boolean;
  force?: boolean;
  serviceName?: string;
}

export async function runUpdate(
  pathArg: string | undefined,
  opts: UpdateCommandOptions,
  ctx: CliContext,
): Promise<UpdateSummary | undefined> {
  const appDir = await resolveInstallationPath(pathArg, { cwd: ctx.cwd, appDirName: ctx.config.appDirName });
  const toolkit = createUpdateToolkit(appDir, ctx.config, {
    runner: ctx.runner,
    reporter: ctx.reporter,
    now: ctx.now,
  });
  const orchestrator = new UpdateOrchestrator(toolkit, ctx.reporter);

  try {
    return await orchestrator.run(appDir, {
      skipGit: opts.skipGit,
      skipDeps: opts.skipDeps,
      skipMigrations: opts.skipMigrations,
      skipRestart: opts.skipRestart,
      force: opts.force,
      serviceName: opts.serviceName ?? ctx.config.serviceName,
    });
  } catch (err) {
    fail(ctx, `Update failed: ${describeError(err)}`);
    return undefined;
  }
}

export function registerUpdateCommand(program: Command, getContext: () => Promise<CliContext>): void {
  program
    .command("update [path]")
    .description("Update the Bayanat application (path auto-detected when omitted)")
    .option("--skip-git", "Skip Git operations", false)
    .option("--skip-deps", "Skip dependency installation", false)
    .option("--skip-migrations", "Skip database migrations", false)
    .option("--skip-restart", "Skip service restart", false)
    .option("--force", "Force update even if already up-to-date", false)
    .option("--service-name <name>", "Name of the systemd service to restart")
    .action(async (path: string | undefined, opts: UpdateCommandOptions) => {
      await runUpdate(path, opts, await getContext());
    });
}
