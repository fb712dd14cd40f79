/**
 * esml lineage <file> [name] [--at <version>]
 *
 * Validate a stream, then print the version tree of every declared type
 * (or of one). With --at, print the ancestry of that one version.
 */

import { StreamValidator, StreamDecodeError, iterateStream, normalizeVersion, type TypeRegistry } from "@esml/core";
import type { CliConfig } from "../lib/config.js";
import { consoleOutput, diagnostic, type Output } from "../lib/output.js";
import { readStreamFile } from "../lib/reader.js";
import { formatAbort, formatAncestry, formatDecodeError, formatTree } from "../lib/render.js";
import { EXIT_OK, EXIT_REJECTED } from "./validate.js";

export const EXIT_USAGE = 1;

export interface LineageOptions extends Pick<CliConfig, "allowIdenticalRedeclaration"> {
  version?: string;
}

/** Replay `text` and return the final registry; undefined when the pass cannot complete. */
function replay(text: string, opts: LineageOptions, output: Output): TypeRegistry | undefined {
  const validator = new StreamValidator({ allowIdenticalRedeclaration: opts.allowIdenticalRedeclaration });
  try {
    for (const record of iterateStream(text)) {
      validator.push(record.value, { line: record.line, column: record.column });
      if (validator.state === "aborted") break;
    }
  } catch (err) {
    if (err instanceof StreamDecodeError) {
      output.err(formatDecodeError(err));
      return undefined;
    }
    throw err;
  }

  const result = validator.finish();
  if (result.status === "aborted") {
    output.err(formatAbort(result.error));
    return undefined;
  }
  if (result.summary.rejected > 0) {
    diagnostic(output, `${result.summary.rejected} record(s) rejected; showing accepted declarations only`);
  }
  return validator.registry;
}

export function lineageText(
  text: string,
  name: string | undefined,
  opts: LineageOptions,
  output: Output = consoleOutput,
): number {
  const registry = replay(text, opts, output);
  if (!registry) return EXIT_REJECTED;

  if (name === undefined) {
    if (opts.version !== undefined) {
      output.err("ERROR: --at needs a type name");
      return EXIT_USAGE;
    }
    registry.names().forEach((n, i) => {
      if (i > 0) output.out("");
      for (const line of formatTree(registry, n)) output.out(line);
    });
    return EXIT_OK;
  }

  if (registry.versions(name).length === 0) {
    output.err(`ERROR: type ${name} is not declared`);
    return EXIT_USAGE;
  }

  if (opts.version === undefined) {
    for (const line of formatTree(registry, name)) output.out(line);
    return EXIT_OK;
  }

  const version = normalizeVersion(opts.version);
  if (version === undefined || !registry.has(name, version)) {
    output.err(`ERROR: ${name}@${opts.version} is not declared`);
    return EXIT_USAGE;
  }
  output.out(formatAncestry(registry, name, version));
  return EXIT_OK;
}

export async function lineageCommand(
  file: string,
  name: string | undefined,
  opts: LineageOptions,
  output: Output = consoleOutput,
): Promise<number> {
  return lineageText(await readStreamFile(file), name, opts, output);
}
