/**
 * Where command output goes. Commands write lines; the runner decides
 * whether they reach the terminal or a buffer.
 */

export interface Output {
  /** Results: stdout. */
  out(line: string): void;
  /** Errors and `[esml]` diagnostics: stderr. */
  err(line: string): void;
}

export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface BufferedOutput extends Output {
  stdout: string[];
  stderr: string[];
}

export function bufferedOutput(): BufferedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

/** Diagnostic line, prefixed so it stands apart from results. */
export function diagnostic(output: Output, message: string): void {
  output.err(`[esml] ${message}`);
}
