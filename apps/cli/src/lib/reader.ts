/**
 * Stream files — read an ESML file from disk.
 */

import { readFile } from "node:fs/promises";

export async function readStreamFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read ${path}: ${reason}`);
  }
}
