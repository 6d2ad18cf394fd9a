/**
 * Bayanat's own administrative subcommands (`flask <command>`), run with the
 * interpreter from the application's virtual environment.
 *
 * Failures come back as `{ success: false, output }` instead of throwing:
 * callers decide whether a given subcommand is fatal.
 */

import { access } from "node:fs/promises";
import { join } from "node:path";
import type { CommandRunner } from "./command-runner.js";
import { declaredVenvPath, readPyproject } from "../installation/pyproject.js";
import { describeError } from "../errors.js";

export interface AppCommandResult {
  success: boolean;
  output: string;
}

export interface AppCliOptions {
  /** Venv directory used when pyproject.toml does not declare one. */
  venvDir?: string;
  env?: Record<string, string>;
}

export const FLASK_APP_ENTRY = "run.py";

export class AppCli {
  readonly appDir: string;
  private readonly runner: CommandRunner;
  private readonly opts: AppCliOptions;

  constructor(appDir: string, runner: CommandRunner, opts: AppCliOptions = {}) {
    this.appDir = appDir;
    this.runner = runner;
    this.opts = opts;
  }

  /** Absolute path of the venv's python, or throws when it is missing. */
  async pythonPath(): Promise<string> {
    const manifest = await readPyproject(this.appDir);
    const venvDir = declaredVenvPath(manifest) ?? this.opts.venvDir ?? "env";
    const python = join(this.appDir, venvDir, "bin", "python");
    try {
      await access(python);
    } catch {
      throw new Error(`Virtual environment Python interpreter not found at ${python}`);
    }
    return python;
  }

  async run(args: readonly string[]): Promise<AppCommandResult> {
    let python: string;
    try {
      python = await this.pythonPath();
    } catch (err) {
      return { success: false, output: `Environment error: ${describeError(err)}` };
    }

    try {
      const result = await this.runner.exec(python, ["-m", "flask", ...args], {
        cwd: this.appDir,
        env: { ...this.opts.env, FLASK_APP: FLASK_APP_ENTRY },
      });
      if (result.exitCode === 0) {
        return { success: true, output: result.stdout };
      }
      return { success: false, output: `Command failed: ${result.stderr || result.stdout}` };
    } catch (err) {
      return { success: false, output: `Unexpected error: ${describeError(err)}` };
    }
  }

  lock(reason: string): Promise<AppCommandResult> {
    return this.run(["lock", "--reason", reason]);
  }

  unlock(): Promise<AppCommandResult> {
    return this.run(["unlock"]);
  }

  setVersion(version: string): Promise<AppCommandResult> {
    return this.run(["set_version", version]);
  }

  getVersion(): Promise<AppCommandResult> {
    return this.run(["get_version"]);
  }
}

/** `get_version` prints a "Warning:" line when settings and database disagree. */
export function hasVersionMismatch(output: string): boolean {
  return output.includes("Warning:");
}
