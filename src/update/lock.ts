/**
 * Scoped acquisition of the application's advisory maintenance lock.
 *
 * The lock is the application's own `lock`/`unlock` subcommands, honoured by
 * convention only; nothing at the OS level stops a second writer.
 */

import type { AppCommandResult } from "../exec/app-cli.js";
import type { Reporter } from "../report/reporter.js";
import { PreconditionError, describeError } from "../errors.js";

export const LOCK_REASON = "CLI update in progress";

export interface LockCommands {
  lock(reason: string): Promise<AppCommandResult>;
  unlock(): Promise<AppCommandResult>;
}

export interface LockHooks {
  onAcquired?: () => void;
  /** Called once after the release attempt; `released` is false when unlock failed. */
  onReleased?: (released: boolean) => void;
}

/**
 * Acquire the lock, run `body`, and attempt release exactly once whichever way
 * `body` exits. A refused lock throws before `body` runs. A failed release is
 * reported and swallowed so it cannot mask the body's own outcome.
 */
export async function withApplicationLock<T>(
  commands: LockCommands,
  reporter: Reporter,
  body: () => Promise<T>,
  hooks: LockHooks = {},
): Promise<T> {
  reporter.info("Attempting to lock the Bayanat application...");
  const acquired = await commands.lock(LOCK_REASON);
  if (!acquired.success) {
    throw PreconditionError.lockRefused(acquired.output);
  }
  reporter.success("Application locked successfully.");
  hooks.onAcquired?.();

  try {
    return await body();
  } finally {
    const released = await releaseLock(commands, reporter);
    hooks.onReleased?.(released);
  }
}

async function releaseLock(commands: LockCommands, reporter: Reporter): Promise<boolean> {
  reporter.info("Unlocking the Bayanat application...");
  try {
    const result = await commands.unlock();
    if (result.success) {
      reporter.success("Application unlocked successfully.");
      return true;
    }
    reporter.warn(`Failed to unlock application. Manual unlock may be required. Output:\n${result.output}`);
  } catch (err) {
    reporter.warn(`Failed to unlock application. Manual unlock may be required: ${describeError(err)}`);
  }
  return false;
}
