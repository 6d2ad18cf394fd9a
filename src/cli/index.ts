#!/usr/bin/env node

/**
 * Bayanat CLI entrypoint.
 */

import { program } from "./program.js";

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? `❌ ${err.message}` : err);
  process.exitCode = 1;
});
