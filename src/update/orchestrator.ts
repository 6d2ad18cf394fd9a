/**
 * Update orchestrator.
 *
 * validate → lock → prerequisites → backup → sync → version check →
 * (record version → dependencies → migrations → restart → verify) → unlock.
 *
 * Any failure after the lock runs the rollback plan (restore database, revert
 * working tree) and then releases the lock. Whatever went wrong leaves this
 * class as a single UpdateError.
 */

import type { Reporter } from "../report/reporter.js";
import type { BackupResult } from "../backup/driver.js";
import type { MigrationResult } from "../migrations/driver.js";
import type { ServicesRestartResult } from "../service/controller.js";
import { hasVersionMismatch } from "../exec/app-cli.js";
import { formatMissing } from "../installation/validator.js";
import {
  BackupError,
  MigrationError,
  PreconditionError,
  UpdateError,
  describeError,
} from "../errors.js";
import { withApplicationLock } from "./lock.js";
import { RollbackPlan, type CompensationOutcome } from "./rollback.js";
import { addWarning, createSession, transition, type UpdatePhase, type UpdateSession } from "./session.js";
import type { UpdateToolkit } from "./toolkit.js";

export interface UpdateOptions {
  skipGit?: boolean;
  skipDeps?: boolean;
  skipMigrations?: boolean;
  skipRestart?: boolean;
  /** Upgrade even when the version did not change; also hard-resets the branch. */
  force?: boolean;
  serviceName: string;
}

export interface UpdateSummary {
  status: "updated" | "up-to-date";
  previousVersion: string;
  currentVersion: string;
  backupPath?: string;
  migration?: MigrationResult;
  restart?: ServicesRestartResult;
  warnings: string[];
  phases: UpdatePhase[];
}

/** Cumulative progress after each step. */
const PROGRESS = {
  prerequisites: 10,
  backup: 20,
  sync: 40,
  dependencies: 60,
  migrations: 80,
  restart: 100,
} as const;

export class UpdateOrchestrator {
  private readonly toolkit: UpdateToolkit;
  private readonly reporter: Reporter;
  private current?: UpdateSession;
  private lastRollback: CompensationOutcome[] = [];

  constructor(toolkit: UpdateToolkit, reporter: Reporter) {
    this.toolkit = toolkit;
    this.reporter = reporter;
  }

  /** State of the most recent run, including after a failure. */
  get session(): UpdateSession | undefined {
    return this.current;
  }

  /** Outcome of each compensating action from the most recent rollback. */
  get rollbackOutcomes(): CompensationOutcome[] {
    return this.lastRollback;
  }

  async run(appDir: string, opts: UpdateOptions): Promise<UpdateSummary> {
    const session = createSession(appDir);
    this.current = session;
    this.lastRollback = [];

    try {
      const validation = await this.toolkit.validate();
      if (!validation.valid) {
        throw PreconditionError.invalidInstallation(appDir, formatMissing(appDir, validation.missing));
      }
      transition(session, "validated");

      const previousVersion = await this.toolkit.resolveVersion();
      session.previousVersion = previousVersion;
      this.reporter.panel("Current Bayanat version", previousVersion);

      const summary = await withApplicationLock(
        this.toolkit,
        this.reporter,
        () => this.runLocked(session, opts, previousVersion),
        {
          onAcquired: () => {
            session.locked = true;
            transition(session, "locked");
          },
          onReleased: (released) => {
            session.unlockAttempts += 1;
            session.locked = !released;
            transition(session, "unlocked");
          },
        },
      );

      transition(session, "done");
      this.reporter.panel("Updated Bayanat version", summary.currentVersion);
      this.reporter.success("Update completed successfully!");
      return { ...summary, warnings: session.warnings, phases: session.phases };
    } catch (err) {
      transition(session, "aborted");
      if (err instanceof UpdateError) throw err;
      throw new UpdateError(describeError(err), err);
    }
  }

  private async runLocked(
    session: UpdateSession,
    opts: UpdateOptions,
    previousVersion: string,
  ): Promise<UpdateSummary> {
    try {
      await this.toolkit.checkPrerequisites();
      this.reporter.progress(PROGRESS.prerequisites, "Prerequisites checked");

      this.recordBackup(session, await this.toolkit.backup());
      transition(session, "backed-up");
      this.reporter.progress(PROGRESS.backup, "Database backed up");

      if (opts.skipGit) {
        this.reporter.info("Skipping Git operations.");
      } else {
        await this.toolkit.syncCode(opts.force ?? false);
        transition(session, "synced");
      }
      this.reporter.progress(PROGRESS.sync, "Source code synchronised");

      const currentVersion = await this.toolkit.resolveVersion();
      session.currentVersion = currentVersion;
      transition(session, "version-checked");

      if (previousVersion === currentVersion && !opts.force) {
        transition(session, "up-to-date");
        this.reporter.progress(PROGRESS.restart);
        this.reporter.success("Bayanat is already up-to-date!");
        return this.summarize(session, "up-to-date", previousVersion, currentVersion);
      }

      transition(session, "upgrading");
      return await this.upgrade(session, opts, previousVersion, currentVersion);
    } catch (err) {
      transition(session, "failed");
      this.reporter.error(`Error during update: ${describeError(err)}`);
      transition(session, "rolling-back");
      this.lastRollback = await this.buildRollbackPlan(session).execute(this.reporter);
      throw err;
    }
  }

  private async upgrade(
    session: UpdateSession,
    opts: UpdateOptions,
    previousVersion: string,
    currentVersion: string,
  ): Promise<UpdateSummary> {
    // Stored version points at the target before anything else changes.
    this.reporter.info(`Updating database version from ${previousVersion} to ${currentVersion}...`);
    const recorded = await this.toolkit.recordVersion(currentVersion);
    if (!recorded.success) {
      addWarning(session, this.reporter, `Failed to update version in database: ${recorded.output}`);
    }

    if (opts.skipDeps) {
      this.reporter.info("Skipping dependency installation.");
    } else {
      await this.toolkit.installDependencies();
    }
    this.reporter.progress(PROGRESS.dependencies, "Dependencies installed");

    let migration: MigrationResult | undefined;
    if (opts.skipMigrations) {
      this.reporter.info("Skipping database migrations.");
    } else {
      migration = await this.toolkit.applyMigrations();
      if (!migration.success) {
        throw new MigrationError(migration.message);
      }
      transition(session, "migrated");
    }
    this.reporter.progress(PROGRESS.migrations, "Migrations applied");

    // Code and schema are committed from here on: restart failures do not roll back.
    let restart: ServicesRestartResult | undefined;
    if (opts.skipRestart) {
      this.reporter.info("Skipping service restart.");
    } else {
      restart = await this.toolkit.restartServices(opts.serviceName);
      if (restart.main.status !== "restarted") {
        session.warnings.push(restart.main.message);
      }
      transition(session, "restarted");
    }
    this.reporter.progress(PROGRESS.restart, "Services restarted");

    await this.verify(session);

    const summary = this.summarize(session, "updated", previousVersion, currentVersion);
    return { ...summary, migration, restart };
  }

  private async verify(session: UpdateSession): Promise<void> {
    this.reporter.info("Verifying version consistency...");
    const check = await this.toolkit.verifyVersion();
    if (!check.success) {
      addWarning(session, this.reporter, `Could not verify version after update: ${check.output}`);
    } else if (hasVersionMismatch(check.output)) {
      addWarning(session, this.reporter, `Version mismatch detected after update:\n${check.output.trim()}`);
    } else {
      this.reporter.success("Version verification successful.");
    }
    transition(session, "verified");
  }

  private recordBackup(session: UpdateSession, backup: BackupResult): void {
    switch (backup.status) {
      case "created":
        session.backupPath = backup.path;
        return;
      case "unlocatable":
        addWarning(
          session,
          this.reporter,
          `Backup completed but the file could not be located (expected ${backup.expectedPath}); continuing without a restorable backup.`,
        );
        return;
      case "failed":
        throw new BackupError(backup.message);
    }
  }

  /** Database first (only with a recorded backup), then the working tree. */
  private buildRollbackPlan(session: UpdateSession): RollbackPlan {
    const plan = new RollbackPlan();
    const backupPath = session.backupPath;

    if (backupPath) {
      plan.add({
        name: "restore-database",
        run: async () => {
          const result = await this.toolkit.restore(backupPath);
          if (!result.success) throw new Error(result.output);
        },
      });
    } else {
      this.reporter.warn("No database backup file available for rollback.");
    }

    plan.add({
      name: "revert-code",
      run: async () => {
        if (!(await this.toolkit.hasVcsMetadata())) {
          this.reporter.info("No Git metadata found; leaving the working tree as is.");
          return;
        }
        this.reporter.info("Reverting code to previous state...");
        await this.toolkit.revertCode();
        this.reporter.success("Code reverted to previous state.");
      },
    });

    return plan;
  }

  private summarize(
    session: UpdateSession,
    status: UpdateSummary["status"],
    previousVersion: string,
    currentVersion: string,
  ): UpdateSummary {
    return {
      status,
      previousVersion,
      currentVersion,
      backupPath: session.backupPath,
      warnings: session.warnings,
      phases: session.phases,
    };
  }
}
