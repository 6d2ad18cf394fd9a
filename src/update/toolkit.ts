/**
 * Binds the drivers to one installation so the orchestrator can treat each
 * external collaborator as a single call.
 */

import { AppCli, type AppCommandResult } from "../exec/app-cli.js";
import type { CommandRunner } from "../exec/command-runner.js";
import type { Reporter } from "../report/reporter.js";
import type { CliConfig } from "../schemas/config.js";
import { companionServicesFor } from "../config/cli-config.js";
import { validateInstallation, type ValidationResult } from "../installation/validator.js";
import { checkGit } from "../installation/prerequisites.js";
import { resolveVersion } from "../version/resolver.js";
import { backupDatabase, restoreDatabase, type BackupResult } from "../backup/driver.js";
import { hasVcsMetadata, revertWorkingTree, syncCode, type SyncMode } from "../sync/code-sync.js";
import { installDependencies, type DependencyInstallResult } from "../deps/installer.js";
import { applyMigrations, type MigrationResult } from "../migrations/driver.js";
import { restartServices, type ServicesRestartResult } from "../service/controller.js";

export interface UpdateToolkit {
  validate(): Promise<ValidationResult>;
  resolveVersion(): Promise<string>;
  lock(reason: string): Promise<AppCommandResult>;
  unlock(): Promise<AppCommandResult>;
  checkPrerequisites(): Promise<void>;
  backup(): Promise<BackupResult>;
  restore(backupPath: string): Promise<AppCommandResult>;
  syncCode(force: boolean): Promise<SyncMode>;
  hasVcsMetadata(): Promise<boolean>;
  revertCode(): Promise<void>;
  /** Store the target version in the application database (`set_version`). */
  recordVersion(version: string): Promise<AppCommandResult>;
  installDependencies(): Promise<DependencyInstallResult>;
  applyMigrations(): Promise<MigrationResult>;
  restartServices(serviceName: string): Promise<ServicesRestartResult>;
  /** `get_version`: settings vs. database version report. */
  verifyVersion(): Promise<AppCommandResult>;
}

export interface ToolkitDeps {
  runner: CommandRunner;
  reporter: Reporter;
  now?: () => Date;
}

export function createUpdateToolkit(appDir: string, config: CliConfig, deps: ToolkitDeps): UpdateToolkit {
  const { runner, reporter } = deps;
  const appCli = new AppCli(appDir, runner, { venvDir: config.venvDir });

  return {
    validate: () => validateInstallation(appDir),
    resolveVersion: () => resolveVersion(appDir, runner),
    lock: (reason) => appCli.lock(reason),
    unlock: () => appCli.unlock(),
    checkPrerequisites: async () => {
      await checkGit(runner);
    },
    backup: () => backupDatabase(appCli, reporter, { now: deps.now?.() }),
    restore: (backupPath) => restoreDatabase(appCli, backupPath, reporter),
    syncCode: (force) =>
      syncCode({ appDir, repoUrl: config.repoUrl, branch: config.branch, force }, runner, reporter),
    hasVcsMetadata: () => hasVcsMetadata(appDir),
    revertCode: () => revertWorkingTree(appDir, runner),
    recordVersion: (version) => appCli.setVersion(version),
    installDependencies: () =>
      installDependencies(appDir, { venvDir: config.venvDir, pythonCommand: config.pythonCommand }, runner, reporter),
    applyMigrations: () => applyMigrations(appCli, reporter),
    restartServices: (serviceName) =>
      restartServices(serviceName, companionServicesFor(config, serviceName), runner, reporter),
    verifyVersion: () => appCli.getVersion(),
  };
}
