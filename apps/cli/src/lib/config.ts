/**
 * CLI configuration — loads from ~/.esml/config.json + env overrides.
 *
 * Priority: command-line flags > env vars > config file > defaults.
 * Flags are applied by the command runner; everything below them is here.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const OutputFormat = Type.Union([Type.Literal("text"), Type.Literal("jsonl")]);

export type OutputFormat = Static<typeof OutputFormat>;

/** What may be written to the config file. Every key is optional. */
export const ConfigFile = Type.Object(
  {
    format: Type.Optional(OutputFormat),
    summary: Type.Optional(Type.Boolean()),
    allowIdenticalRedeclaration: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFile>;

export interface CliConfig {
  format: OutputFormat;
  /** Print the pass summary after the per-record output. */
  summary: boolean;
  allowIdenticalRedeclaration: boolean;
}

export const DEFAULT_CONFIG: Readonly<CliConfig> = {
  format: "text",
  summary: false,
  allowIdenticalRedeclaration: true,
};

type Env = Record<string, string | undefined>;

export function getConfigPath(env: Env = process.env): string {
  return env["ESML_CONFIG"] ?? join(homedir(), ".esml", "config.json");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Read and check the config file. A missing file is an empty config. */
export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!Value.Check(ConfigFile, parsed)) {
    const first = Value.Errors(ConfigFile, parsed).First();
    const where = first?.path ? `${first.path}: ` : "";
    throw new Error(`Invalid config file ${path}: ${where}${first?.message ?? "does not match the config schema"}`);
  }
  return parsed;
}

export function parseFormat(raw: string, source: string): OutputFormat {
  if (raw === "text" || raw === "jsonl") return raw;
  throw new Error(`${source} must be "text" or "jsonl", got "${raw}"`);
}

export function parseBoolean(raw: string, source: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new Error(`${source} must be true or false, got "${raw}"`);
  }
}

/** Merge env overrides on top of the file config and defaults. */
export function resolveConfig(file: ConfigFile, env: Env = process.env): CliConfig {
  const format = env["ESML_FORMAT"];
  const summary = env["ESML_SUMMARY"];
  const allow = env["ESML_ALLOW_IDENTICAL_REDECLARATION"];

  return {
    format: format ? parseFormat(format, "ESML_FORMAT") : (file.format ?? DEFAULT_CONFIG.format),
    summary: summary ? parseBoolean(summary, "ESML_SUMMARY") : (file.summary ?? DEFAULT_CONFIG.summary),
    allowIdenticalRedeclaration: allow
      ? parseBoolean(allow, "ESML_ALLOW_IDENTICAL_REDECLARATION")
      : (file.allowIdenticalRedeclaration ?? DEFAULT_CONFIG.allowIdenticalRedeclaration),
  };
}

/** Load config, merging env overrides on top. */
export async function loadConfig(env: Env = process.env): Promise<CliConfig> {
  return resolveConfig(await loadConfigFile(getConfigPath(env)), env);
}

/** Save the file config to disk. */
export async function saveConfigFile(path: string, config: ConfigFile): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
