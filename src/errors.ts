/**
 * Error taxonomy for the Bayanat CLI.
 *
 * Failures below the orchestrator keep their kind; the orchestrator collapses
 * everything it catches into a single UpdateError carrying the original message.
 */

export type CliErrorKind = "precondition" | "tool" | "semantic" | "update";

export class CliError extends Error {
  readonly kind: CliErrorKind;

  constructor(kind: CliErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliError";
    this.kind = kind;
  }
}

/** Bad layout, missing tools, permissions, unreachable repository, refused lock. */
export class PreconditionError extends CliError {
  constructor(message: string) {
    super("precondition", message);
    this.name = "PreconditionError";
  }

  static invalidInstallation(appDir: string, details: string[]): PreconditionError {
    const lines = [`${appDir} does not appear to be a valid Bayanat application directory.`, ...details];
    return new PreconditionError(lines.join("\n"));
  }

  static lockRefused(output: string): PreconditionError {
    return new PreconditionError(`Failed to lock the Bayanat application. Output:\n${output}`);
  }
}

/** Non-zero exit from an external command. */
export class CommandError extends CliError {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim();
    super("tool", `Command failed (exit ${exitCode}): ${command}${detail ? `\n${detail}` : ""}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class DependencyInstallError extends CliError {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    super("tool", `Failed to install dependencies (${step}): ${describeError(cause)}`, { cause });
    this.name = "DependencyInstallError";
    this.step = step;
  }
}

export class BackupError extends CliError {
  constructor(message: string) {
    super("tool", `Database backup failed: ${message}`);
    this.name = "BackupError";
  }
}

/** Output text says the migration did not apply, whatever the exit code was. */
export class MigrationError extends CliError {
  readonly output: string;

  constructor(message: string) {
    super("semantic", message);
    this.name = "MigrationError";
    this.output = message;
  }
}

/** The one failure the update command surfaces to the process boundary. */
export class UpdateError extends CliError {
  constructor(message: string, cause?: unknown) {
    super("update", message, { cause });
    this.name = "UpdateError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
