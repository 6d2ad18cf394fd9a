/**
 * Compensating actions run after a failed update.
 *
 * There is no atomicity across the database, the working tree and the lock:
 * each action is attempted once, and its failure is reported without stopping
 * the actions after it.
 */

import type { Reporter } from "../report/reporter.js";
import { describeError } from "../errors.js";

export interface CompensatingAction {
  name: string;
  run(): Promise<void>;
}

export interface CompensationOutcome {
  name: string;
  ok: boolean;
  error?: string;
}

export class RollbackPlan {
  private readonly actions: CompensatingAction[] = [];

  add(action: CompensatingAction): this {
    this.actions.push(action);
    return this;
  }

  names(): string[] {
    return this.actions.map((a) => a.name);
  }

  /** Run every action in order. Never throws. */
  async execute(reporter: Reporter): Promise<CompensationOutcome[]> {
    if (this.actions.length === 0) {
      reporter.info("Nothing to roll back.");
      return [];
    }

    reporter.warn("Rolling back the update...");
    const outcomes: CompensationOutcome[] = [];
    for (const action of this.actions) {
      try {
        await action.run();
        outcomes.push({ name: action.name, ok: true });
      } catch (err) {
        const error = describeError(err);
        reporter.error(`Rollback step '${action.name}' failed: ${error}`);
        outcomes.push({ name: action.name, ok: false, error });
      }
    }
    return outcomes;
  }
}
