/**
 * Per-invocation update state. Lives in memory only and is dropped at exit.
 */

import type { Reporter } from "../report/reporter.js";

export type UpdatePhase =
  | "idle"
  | "validated"
  | "locked"
  | "backed-up"
  | "synced"
  | "version-checked"
  | "up-to-date"
  | "upgrading"
  | "migrated"
  | "restarted"
  | "verified"
  | "failed"
  | "rolling-back"
  | "unlocked"
  | "done"
  | "aborted";

export interface UpdateSession {
  appDir: string;
  phase: UpdatePhase;
  /** Every phase entered, in order. */
  phases: UpdatePhase[];
  locked: boolean;
  unlockAttempts: number;
  backupPath?: string;
  previousVersion?: string;
  currentVersion?: string;
  warnings: string[];
}

export function createSession(appDir: string): UpdateSession {
  return {
    appDir,
    phase: "idle",
    phases: ["idle"],
    locked: false,
    unlockAttempts: 0,
    warnings: [],
  };
}

export function transition(session: UpdateSession, phase: UpdatePhase): void {
  session.phase = phase;
  session.phases.push(phase);
}

/** Record and print a non-fatal problem. */
export function addWarning(session: UpdateSession, reporter: Reporter, text: string): void {
  session.warnings.push(text);
  reporter.warn(text);
}
