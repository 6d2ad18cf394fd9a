/**
 * Schema for the `.bayanat-cli` file written at an install root.
 */

import { z } from "zod";

export const INSTALL_METADATA_FILE = ".bayanat-cli";

export const InstallationType = z.enum(["production", "development"]);
export type InstallationType = z.infer<typeof InstallationType>;

export const InstallMetadata = z.object({
  version: z.string().min(1),
  /** ISO-8601 timestamp. */
  installed_at: z.string().min(1),
  installation_type: InstallationType.default("production"),
});
export type InstallMetadata = z.infer<typeof InstallMetadata>;
