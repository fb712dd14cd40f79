#!/usr/bin/env node
/**
 * esml CLI — validate ESML event logs from the command line.
 *
 * Commands:
 *   validate <file>         Replay a stream → OK, or one line per rejected record
 *   lineage <file> [name]   Replay a stream → print version trees
 *   seed                    Print the bootstrap record
 *   config                  Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { diagnostic, consoleOutput } from "./lib/output.js";
import { validateCommand } from "./commands/validate.js";
import { lineageCommand } from "./commands/lineage.js";
import { seedCommand } from "./commands/seed.js";
import { configCommand } from "./commands/config-cmd.js";

const program = new Command();

program
  .name("esml")
  .description("Validate self-describing event logs")
  .version("0.1.0");

function describeConfig(config: CliConfig): string {
  return `format=${config.format} summary=${config.summary} allowIdenticalRedeclaration=${config.allowIdenticalRedeclaration}`;
}

// ── validate ────────────────────────────────────────────────────────

program
  .command("validate")
  .description("Validate an ESML stream: bootstrap → declarations → events")
  .argument("<file>", "ESML file (concatenated JSON records)")
  .option("--summary", "Print the pass summary")
  .option("--jsonl", "Print every report entry as one JSON line")
  .option("--strict-redeclaration", "Reject identical redeclarations instead of ignoring them")
  .option("-v, --verbose", "Print [esml] diagnostics to stderr")
  .action(async (file: string, opts: { summary?: boolean; jsonl?: boolean; strictRedeclaration?: boolean; verbose?: boolean }) => {
    const config = await loadConfig();
    if (opts.summary) config.summary = true;
    if (opts.jsonl) config.format = "jsonl";
    if (opts.strictRedeclaration) config.allowIdenticalRedeclaration = false;
    if (opts.verbose) diagnostic(consoleOutput, `validating ${file} (${describeConfig(config)})`);
    process.exitCode = await validateCommand(file, config);
  });

// ── lineage ─────────────────────────────────────────────────────────

program
  .command("lineage")
  .description("Print the version tree of every declared type, or of one")
  .argument("<file>", "ESML file (concatenated JSON records)")
  .argument("[name]", "Type name")
  .option("--at <version>", "Print the ancestry of one version of <name>")
  .option("--strict-redeclaration", "Reject identical redeclarations instead of ignoring them")
  .action(async (file: string, name: string | undefined, opts: { at?: string; strictRedeclaration?: boolean }) => {
    const config = await loadConfig();
    if (opts.strictRedeclaration) config.allowIdenticalRedeclaration = false;
    process.exitCode = await lineageCommand(file, name, {
      allowIdenticalRedeclaration: config.allowIdenticalRedeclaration,
      ...(opts.at !== undefined ? { version: opts.at } : {}),
    });
  });

// ── seed ────────────────────────────────────────────────────────────

program
  .command("seed")
  .description("Print the bootstrap record every stream starts with")
  .option("--log <text>", "Attach a log annotation")
  .option("--pretty", "Indent the JSON output")
  .action((opts: { log?: string; pretty?: boolean }) => {
    seedCommand(opts);
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("--format <format>", "Set the default output format (text|jsonl)")
  .option("--summary <bool>", "Always print the pass summary (true|false)")
  .option("--allow-identical-redeclaration <bool>", "Accept identical redeclarations as no-ops (true|false)")
  .action(async (opts: { format?: string; summary?: string; allowIdenticalRedeclaration?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
