/**
 * esml validate <file> [--summary] [--jsonl] [--strict-redeclaration]
 *
 * Replay a stream through the validator. Text mode prints one line per
 * rejected record, then OK / FAILED; JSONL mode prints every report entry.
 *
 * Exit codes: 0 all accepted, 2 rejected records, aborted pass or
 * undecodable input. (1 is left to the runner for usage and I/O errors.)
 */

import {
  StreamDecodeError,
  iterateStream,
  validateDecoded,
  type PassResult,
  type ReportEntry,
} from "@esml/core";
import type { CliConfig } from "../lib/config.js";
import { consoleOutput, type Output } from "../lib/output.js";
import { readStreamFile } from "../lib/reader.js";
import {
  formatAbort,
  formatDecodeError,
  formatJsonl,
  formatRejection,
  formatResult,
  formatSummary,
} from "../lib/render.js";

export const EXIT_OK = 0;
export const EXIT_REJECTED = 2;

export type ValidateOptions = Pick<CliConfig, "format" | "summary" | "allowIdenticalRedeclaration">;

/**
 * Decode and validate `text`, streaming entries to `output` as they are
 * produced. Returns the pass result, or undefined when the text does not
 * decode.
 */
export function runPass(
  text: string,
  opts: Pick<ValidateOptions, "allowIdenticalRedeclaration">,
  output: Output,
  onEntry?: (entry: ReportEntry) => void,
): PassResult | undefined {
  try {
    return validateDecoded(iterateStream(text), {
      allowIdenticalRedeclaration: opts.allowIdenticalRedeclaration,
      ...(onEntry ? { onEntry } : {}),
    });
  } catch (err) {
    if (err instanceof StreamDecodeError) {
      output.err(formatDecodeError(err));
      return undefined;
    }
    throw err;
  }
}

/** Validate an ESML text. Returns the exit code. */
export function validateText(text: string, opts: ValidateOptions, output: Output = consoleOutput): number {
  const jsonl = opts.format === "jsonl";

  const result = runPass(text, opts, output, (entry) => {
    if (entry.status !== "rejected" || entry.errorKind === "MissingBootstrap") {
      if (jsonl && entry.status === "accepted") output.out(formatJsonl(entry));
      return;
    }
    output.out(jsonl ? formatJsonl(entry) : formatRejection(entry));
  });
  if (!result) return EXIT_REJECTED;

  if (result.status === "aborted") {
    if (jsonl) output.out(formatJsonl({ aborted: result.error }));
    output.err(formatAbort(result.error));
    return EXIT_REJECTED;
  }

  const { summary } = result;
  if (jsonl) {
    if (opts.summary) output.out(formatJsonl({ summary }));
  } else {
    output.out(formatResult(summary));
    if (opts.summary) {
      output.out("");
      for (const line of formatSummary(summary)) output.out(line);
    }
  }
  return summary.rejected === 0 ? EXIT_OK : EXIT_REJECTED;
}

export async function validateCommand(
  file: string,
  opts: ValidateOptions,
  output: Output = consoleOutput,
): Promise<number> {
  const text = await readStreamFile(file);
  return validateText(text, opts, output);
}
