/**
 * Command runner: the only place that spawns external processes.
 *
 * `exec` never rejects on a non-zero exit; `run` is the fail-fast variant that
 * throws CommandError. Retries are left to callers.
 */

import { execFile } from "node:child_process";
import { constants } from "node:os";
import { CommandError } from "../errors.js";

export interface CommandOptions {
  cwd?: string;
  /** Merged over process.env. */
  env?: Record<string, string>;
  /** No timeout when omitted. */
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandExecutor = (
  file: string,
  args: readonly string[],
  opts: CommandOptions,
) => Promise<CommandResult>;

/** Exit code reported when the binary could not be spawned at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** A process killed by signal N is reported as exit 128 + N, as shells do. */
export const SIGNAL_EXIT_BASE = 128;

/** The parts of an execFile error that say how the process ended. */
export interface ExecFailure {
  message: string;
  code?: string | number | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

/**
 * Turn an execFile error into a result. A numeric code is a non-zero exit; a
 * signal means the process ran and was killed (by the timeout when `killed`
 * is set and a timeout was in force); anything else means it never ran.
 */
export function failureResult(
  error: ExecFailure,
  stdout: string,
  stderr: string,
  timeoutMs?: number,
): CommandResult {
  if (typeof error.code === "number") {
    return { exitCode: error.code, stdout, stderr: stderr || error.message };
  }
  if (error.signal) {
    const reason =
      error.killed && timeoutMs
        ? `Command timed out after ${timeoutMs} ms (killed with ${error.signal})`
        : `Command killed with ${error.signal}`;
    return {
      exitCode: SIGNAL_EXIT_BASE + constants.signals[error.signal],
      stdout,
      stderr: stderr ? `${stderr.trimEnd()}\n${reason}` : reason,
    };
  }
  return { exitCode: SPAWN_FAILURE_EXIT_CODE, stdout, stderr: stderr || error.message };
}

const MAX_BUFFER = 64 * 1024 * 1024;

/** Default executor backed by child_process.execFile (no shell). */
export const execFileExecutor: CommandExecutor = (file, args, opts) =>
  new Promise((resolve) => {
    execFile(
      file,
      [...args],
      {
        cwd: opts.cwd,
        env: opts.env ? { ...process.env, ...opts.env } : process.env,
        timeout: opts.timeoutMs ?? 0,
        maxBuffer: MAX_BUFFER,
        encoding: "utf-8",
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        resolve(failureResult(error, stdout, stderr, opts.timeoutMs));
      },
    );
  });

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

export class CommandRunner {
  private readonly executor: CommandExecutor;
  private readonly defaultTimeoutMs?: number;

  constructor(executor: CommandExecutor = execFileExecutor, opts?: { timeoutMs?: number }) {
    this.executor = executor;
    this.defaultTimeoutMs = opts?.timeoutMs;
  }

  /** Run to completion and return the raw result, whatever the exit code. */
  async exec(file: string, args: readonly string[], opts: CommandOptions = {}): Promise<CommandResult> {
    return this.executor(file, args, {
      ...opts,
      timeoutMs: opts.timeoutMs ?? this.defaultTimeoutMs,
    });
  }

  /** Run to completion and return stdout; throws CommandError on a non-zero exit. */
  async run(file: string, args: readonly string[], opts: CommandOptions = {}): Promise<string> {
    const result = await this.exec(file, args, opts);
    if (result.exitCode !== 0) {
      throw new CommandError(formatCommand(file, args), result.exitCode, result.stderr || result.stdout);
    }
    return result.stdout;
  }

  /** True when `which <binary>` finds it on PATH. */
  async which(binary: string): Promise<boolean> {
    const result = await this.exec("which", [binary]);
    return result.exitCode === 0;
  }
}
