/**
 * Bayanat CLI: installs, updates and maintains a Bayanat deployment.
 *
 * This module configures the Commander program with all commands registered.
 * It is separated from the entrypoint (index.ts) so that tests can build a
 * program without triggering parseAsync.
 */

import { Command } from "commander";
import { createCliContext, type CliContext } from "./context.js";
import { registerInstallCommand } from "./commands/install.js";
import { registerUpdateCommand } from "./commands/update.js";
import { registerMaintenanceCommands } from "./commands/maintenance.js";

export const CLI_VERSION = "0.2.0";

/**
 * `contextFactory` is called at most once, on the first command action, with
 * the parsed global options.
 */
export function buildProgram(
  contextFactory: (opts: { configPath?: string }) => Promise<CliContext> = createCliContext,
): Command {
  const program = new Command()
    .name("bayanat")
    .version(CLI_VERSION)
    .description("Install, update and maintain a Bayanat deployment")
    .option("--config <path>", "YAML configuration file (defaults to $BAYANAT_CLI_CONFIG)");

  let context: Promise<CliContext> | undefined;
  const getContext = (): Promise<CliContext> => {
    if (!context) {
      const configPath: unknown = program.opts()["config"];
      context = contextFactory({ configPath: typeof configPath === "string" ? configPath : undefined });
    }
    return context;
  };

  // --- install ---
  registerInstallCommand(program, getContext);

  // --- update ---
  registerUpdateCommand(program, getContext);

  // --- backup / restore / version / restart ---
  registerMaintenanceCommands(program, getContext);

  return program;
}

export const program = buildProgram();
