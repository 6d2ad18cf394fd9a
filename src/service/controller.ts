/**
 * systemd service restarts.
 *
 * Reports when privileges are missing; never escalates on its own.
 */

import type { CommandRunner } from "../exec/command-runner.js";
import type { Reporter } from "../report/reporter.js";

export type RestartStatus = "restarted" | "permission-denied" | "failed" | "unsupported";

export interface RestartResult {
  service: string;
  status: RestartStatus;
  message: string;
}

export interface ServicesRestartResult {
  main: RestartResult;
  companions: RestartResult[];
}

const PERMISSION_MARKERS = ["Access denied", "Permission denied"];

export function isPermissionDenied(stderr: string): boolean {
  return PERMISSION_MARKERS.some((marker) => stderr.includes(marker));
}

export async function restartService(service: string, runner: CommandRunner): Promise<RestartResult> {
  if (!(await runner.which("systemctl"))) {
    return {
      service,
      status: "unsupported",
      message: "systemctl not found. Service restart requires systemd.",
    };
  }

  const result = await runner.exec("systemctl", ["restart", service]);
  if (result.exitCode === 0) {
    return { service, status: "restarted", message: `Successfully restarted ${service} service.` };
  }
  if (isPermissionDenied(result.stderr)) {
    return {
      service,
      status: "permission-denied",
      message: `Permission denied restarting ${service}. Try running with sudo or as root.`,
    };
  }
  return {
    service,
    status: "failed",
    message: `Failed to restart ${service} service: ${result.stderr.trim() || `exit ${result.exitCode}`}`,
  };
}

/**
 * Restart the main unit, then each companion. Only the main unit's result
 * counts; companion failures are reported as warnings.
 */
export async function restartServices(
  service: string,
  companions: readonly string[],
  runner: CommandRunner,
  reporter: Reporter,
): Promise<ServicesRestartResult> {
  reporter.info(`Restarting ${service} service...`);
  const main = await restartService(service, runner);
  if (main.status === "restarted") reporter.success(main.message);
  else reporter.error(main.message);

  const companionResults: RestartResult[] = [];
  if (main.status === "restarted") {
    for (const companion of companions) {
      const result = await restartService(companion, runner);
      companionResults.push(result);
      if (result.status === "restarted") reporter.success(result.message);
      else reporter.warn(`${companion} service not restarted: ${result.message}`);
    }
  }

  return { main, companions: companionResults };
}
