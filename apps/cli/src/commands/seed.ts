/**
 * esml seed [--log <text>] [--pretty]
 *
 * Print the bootstrap record every stream must start with.
 */

import { buildSeedRecord } from "@esml/core";
import { consoleOutput, type Output } from "../lib/output.js";

export interface SeedOptions {
  log?: string;
  pretty?: boolean;
}

export function seedCommand(opts: SeedOptions, output: Output = consoleOutput): void {
  const record = buildSeedRecord(opts.log);
  output.out(opts.pretty ? JSON.stringify(record, null, 2) : JSON.stringify(record));
}
