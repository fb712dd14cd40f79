/**
 * esml config [--format text|jsonl] [--summary bool] [--allow-identical-redeclaration bool]
 *
 * Show the effective configuration, or update the config file.
 */

import {
  getConfigPath,
  loadConfigFile,
  parseBoolean,
  parseFormat,
  resolveConfig,
  saveConfigFile,
  type ConfigFile,
} from "../lib/config.js";
import { consoleOutput, type Output } from "../lib/output.js";

export interface ConfigOptions {
  format?: string;
  summary?: string;
  allowIdenticalRedeclaration?: string;
}

type Env = Record<string, string | undefined>;

export async function configCommand(
  opts: ConfigOptions,
  env: Env = process.env,
  output: Output = consoleOutput,
): Promise<void> {
  const path = getConfigPath(env);
  const file: ConfigFile = { ...(await loadConfigFile(path)) };
  let changed = false;

  if (opts.format !== undefined) {
    file.format = parseFormat(opts.format, "--format");
    changed = true;
  }
  if (opts.summary !== undefined) {
    file.summary = parseBoolean(opts.summary, "--summary");
    changed = true;
  }
  if (opts.allowIdenticalRedeclaration !== undefined) {
    file.allowIdenticalRedeclaration = parseBoolean(
      opts.allowIdenticalRedeclaration,
      "--allow-identical-redeclaration",
    );
    changed = true;
  }

  if (changed) {
    await saveConfigFile(path, file);
    output.out(`Config saved to ${path}`);
  }

  const config = resolveConfig(file, env);
  output.out("Current config:");
  output.out(`  format:                      ${config.format}`);
  output.out(`  summary:                     ${config.summary}`);
  output.out(`  allowIdenticalRedeclaration: ${config.allowIdenticalRedeclaration}`);
}
