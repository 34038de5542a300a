// src/config/env.ts
/**
 * Purpose:
 * - Env files (dotenv + dotenv-expand) feeding loadBinderSettingsFromFiles().
 *
 * Notes:
 * - Files load in order into process.env. A variable keeps the first value
 *   it receives; values already present are never overwritten.
 */

import fs from "node:fs";
import path from "node:path";
import { config } from "dotenv";
import { expand } from "dotenv-expand";

export type EnvFileOptions = {
  /** Skip the "nothing loaded" failure. */
  allowMissing?: boolean;
};

/** Throws when no file loaded, unless allowMissing. Returns the loaded paths. */
export function loadEnvFilesOrThrow(
  files: readonly string[],
  opts: EnvFileOptions = {}
): string[] {
  const present = files
    .map((file) => path.resolve(file))
    .filter((file) => fs.existsSync(file));

  for (const file of present) {
    const result = expand(config({ path: file }));
    if (result.error) {
      throw new Error(
        `Failed to load env file ${file}: ${result.error.message}`
      );
    }
  }

  if (!present.length && !opts.allowMissing) {
    throw new Error(`No env files loaded from: ${files.join(", ")}`);
  }
  return present;
}
