/**
 * `bayanat install`: bootstrap a new installation under an install root.
 *
 * Layout produced:
 *   <root>/.bayanat-cli        install metadata
 *   <root>/<appDirName>/       git checkout with its own venv
 */

import { mkdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Command } from "commander";
import type { CliContext } from "../context.js";
import { fail } from "../context.js";
import { AppCli } from "../../exec/app-cli.js";
import {
  checkGit,
  checkNetworkConnectivity,
  checkPermissions,
  checkVenvSupport,
  isDirectoryEmpty,
} from "../../installation/prerequisites.js";
import { writeInstallMetadata } from "../../installation/metadata.js";
import { syncCode } from "../../sync/code-sync.js";
import { installDependencies } from "../../deps/installer.js";
import { resolveVersion } from "../../version/resolver.js";
import { applyMigrations } from "../../migrations/driver.js";
import { PreconditionError, describeError } from "../../errors.js";

export interface InstallCommandOptions {
  force?: boolean;
}

export interface InstallResult {
  installRoot: string;
  appDir: string;
  version: string;
}

export async function runInstall(
  pathArg: string | undefined,
  opts: InstallCommandOptions,
  ctx: CliContext,
): Promise<InstallResult | undefined> {
  const { config, runner, reporter } = ctx;
  const installRoot = resolve(ctx.cwd, pathArg ?? ".");
  const force = opts.force ?? false;

  try {
    reporter.info("Checking system requirements...");
    await checkGit(runner);
    await checkVenvSupport(runner, config.pythonCommand);
    await checkNetworkConnectivity(config.repoUrl, {
      timeoutMs: config.networkTimeoutMs,
      fetchImpl: ctx.fetchImpl,
    });

    reporter.info(`Installing Bayanat in: ${installRoot}`);
    await mkdir(installRoot, { recursive: true });
    await checkPermissions(installRoot);
    if (!force && !(await isDirectoryEmpty(installRoot))) {
      throw new PreconditionError(`Directory '${installRoot}' is not empty. Use --force to override.`);
    }

    const appDir = join(installRoot, config.appDirName);
    await mkdir(appDir, { recursive: true });

    reporter.info("Cloning the Bayanat repository...");
    await syncCode({ appDir, repoUrl: config.repoUrl, branch: config.branch, force: true }, runner, reporter);

    reporter.info("Installing dependencies...");
    await installDependencies(appDir, { venvDir: config.venvDir, pythonCommand: config.pythonCommand }, runner, reporter);

    reporter.info("Creating installation metadata...");
    const version = await resolveVersion(appDir, runner);
    await writeInstallMetadata(installRoot, version, { now: ctx.now?.() });

    reporter.info("Applying initial database migrations...");
    const migration = await applyMigrations(new AppCli(appDir, runner, { venvDir: config.venvDir }), reporter);
    if (!migration.success) {
      reporter.warn(`Initial migrations were not applied: ${migration.message}`);
    }

    reporter.success("Bayanat installation completed successfully!");
    reporter.info(`Run 'bayanat update' from ${installRoot} to update in the future.`);
    return { installRoot, appDir, version };
  } catch (err) {
    fail(ctx, `Error during installation: ${describeError(err)}`);
    return undefined;
  }
}

export function registerInstallCommand(program: Command, getContext: () => Promise<CliContext>): void {
  program
    .command("install [path]")
    .description("Install the Bayanat application (defaults to the current directory)")
    .option("--force", "Force installation, even if the directory is not empty", false)
    .action(async (path: string | undefined, opts: InstallCommandOptions) => {
      await runInstall(path, opts, await getContext());
    });
}
