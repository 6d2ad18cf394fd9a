/**
 * Configuration loading: defaults ← YAML file ← environment.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import { CliConfig, type CliConfigInput } from "../schemas/config.js";
import { PreconditionError, describeError } from "../errors.js";

export const CONFIG_PATH_ENV = "BAYANAT_CLI_CONFIG";

type Env = Record<string, string | undefined>;

/** Environment variables that override file values. */
const ENV_KEYS = {
  BAYANAT_REPO_URL: "repoUrl",
  BAYANAT_BRANCH: "branch",
  BAYANAT_SERVICE_NAME: "serviceName",
  BAYANAT_VENV_DIR: "venvDir",
  BAYANAT_PYTHON: "pythonCommand",
} as const satisfies Record<string, keyof CliConfigInput>;

export interface LoadConfigOptions {
  /** Explicit YAML path (from --config). Falls back to $BAYANAT_CLI_CONFIG. */
  configPath?: string;
  env?: Env;
}

export async function loadConfig(opts: LoadConfigOptions = {}): Promise<CliConfig> {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? env[CONFIG_PATH_ENV];

  const fromFile = configPath ? await readConfigFile(configPath) : {};
  return parseConfig({ ...fromFile, ...envOverrides(env) });
}

export function parseConfig(input: unknown): CliConfig {
  try {
    return CliConfig.parse(input);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new PreconditionError(["Invalid configuration:", ...issues].join("\n"));
    }
    throw err;
  }
}

/** Service units restarted after the main one. */
export function companionServicesFor(config: CliConfig, serviceName = config.serviceName): string[] {
  return config.companionServices ?? [`${serviceName}-celery`];
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new PreconditionError(`Cannot read config file ${path}: ${describeError(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new PreconditionError(`Config file ${path} is not valid YAML: ${describeError(err)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new PreconditionError(`Config file ${path} must contain a mapping`);
  }
  return { ...parsed };
}

function envOverrides(env: Env): Partial<CliConfigInput> {
  const out: Partial<CliConfigInput> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value) out[key] = value;
  }

  const timeout = env["BAYANAT_COMMAND_TIMEOUT_MS"];
  if (timeout) out.commandTimeoutMs = Number(timeout);

  return out;
}
