/**
 * Install metadata (`.bayanat-cli`) and installation path detection.
 */

import { access } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import {
  INSTALL_METADATA_FILE,
  InstallMetadata,
  type InstallationType,
} from "../schemas/install-metadata.js";

export function metadataPath(installRoot: string): string {
  return join(installRoot, INSTALL_METADATA_FILE);
}

export async function writeInstallMetadata(
  installRoot: string,
  version: string,
  opts: { now?: Date; installationType?: InstallationType } = {},
): Promise<InstallMetadata> {
  const metadata = InstallMetadata.parse({
    version,
    installed_at: (opts.now ?? new Date()).toISOString(),
    installation_type: opts.installationType,
  });
  await writeFileAtomic(metadataPath(installRoot), JSON.stringify(metadata, null, 2) + "\n");
  return metadata;
}

/**
 * Resolve the application directory for commands run without an explicit path.
 *
 * A `.bayanat-cli` file in `cwd` marks an install root created by `install`,
 * whose checkout lives in `<cwd>/<appDirName>`; otherwise `cwd` itself is
 * taken as the checkout.
 */
export async function detectInstallationPath(cwd: string, appDirName = "bayanat"): Promise<string> {
  try {
    await access(metadataPath(cwd));
    return join(cwd, appDirName);
  } catch {
    return cwd;
  }
}

export async function resolveInstallationPath(
  pathArg: string | undefined,
  opts: { cwd?: string; appDirName?: string } = {},
): Promise<string> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  if (pathArg) return resolve(cwd, pathArg);
  return detectInstallationPath(cwd, opts.appDirName);
}
