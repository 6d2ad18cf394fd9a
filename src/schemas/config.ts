/**
 * CLI configuration schema.
 *
 * Loaded from defaults, an optional YAML file and BAYANAT_* environment
 * variables (see config/cli-config.ts).
 */

import { z } from "zod";

export const DEFAULT_REPO_URL = "https://github.com/sjacorg/bayanat.git";

export const CliConfig = z.object({
  /** Canonical source repository. */
  repoUrl: z.string().min(1).default(DEFAULT_REPO_URL),
  /** Mainline branch that update checks out and pulls. */
  branch: z.string().min(1).default("master"),
  /** systemd unit restarted after an upgrade. */
  serviceName: z.string().min(1).default("bayanat"),
  /** Units restarted best-effort after the main one. Defaults to `<serviceName>-celery`. */
  companionServices: z.array(z.string().min(1)).optional(),
  /** Virtual environment directory, relative to the application directory. */
  venvDir: z.string().min(1).default("env"),
  /** Interpreter used to build a missing virtual environment. */
  pythonCommand: z.string().min(1).default("python3"),
  /** Subdirectory of an install root that holds the application checkout. */
  appDirName: z.string().min(1).default("bayanat"),
  /** Timeout for the repository reachability probe. */
  networkTimeoutMs: z.number().int().positive().default(5000),
  /** Per-command timeout; unset means wait forever. */
  commandTimeoutMs: z.number().int().positive().optional(),
});
export type CliConfig = z.infer<typeof CliConfig>;

/** Shape accepted before defaults are applied. */
export type CliConfigInput = z.input<typeof CliConfig>;
