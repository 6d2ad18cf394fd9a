/**
 * Everything a command handler needs, built once per invocation.
 * Tests construct their own context with fakes.
 */

import { confirm } from "@inquirer/prompts";
import { CommandRunner } from "../exec/command-runner.js";
import { ConsoleReporter, type Reporter } from "../report/reporter.js";
import { loadConfig } from "../config/cli-config.js";
import type { CliConfig } from "../schemas/config.js";
import type { FetchLike } from "../installation/prerequisites.js";

export interface CliContext {
  config: CliConfig;
  runner: CommandRunner;
  reporter: Reporter;
  cwd: string;
  /** Yes/no question; only asked when `interactive` is true. */
  confirm: (message: string) => Promise<boolean>;
  interactive: boolean;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

export async function createCliContext(opts: { configPath?: string } = {}): Promise<CliContext> {
  const config = await loadConfig({ configPath: opts.configPath });
  return {
    config,
    runner: new CommandRunner(undefined, { timeoutMs: config.commandTimeoutMs }),
    reporter: new ConsoleReporter(),
    cwd: process.cwd(),
    confirm: (message) => confirm({ message, default: false }),
    interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
  };
}

/** Mark the process as failed without throwing past commander. */
export function fail(ctx: CliContext, message: string): void {
  ctx.reporter.error(message);
  process.exitCode = 1;
}
