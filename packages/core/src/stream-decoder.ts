/**
 * Stream decoder — ESML's on-disk form.
 *
 * An ESML file is JSON values written one after another, separated by
 * optional whitespace:
 *
 *   {"type": "TypeDeclared@1", "data": {...}}
 *   {"type": "order.Placed@1",
 *    "data": {...}}
 *
 * Each decoded record keeps the 1-based line and column it started at.
 * A value that does not decode throws StreamDecodeError; nothing after it
 * can be located reliably.
 */

export interface DecodedRecord {
  /** Position in the stream (0-based). */
  index: number;
  value: unknown;
  line: number;
  column: number;
  /** Character offset of the first character of the value. */
  offset: number;
}

export class StreamDecodeError extends Error {
  constructor(
    readonly reason: string,
    readonly line: number,
    readonly column: number,
    readonly index: number,
  ) {
    super(`line ${line}, col ${column}, event ${index}: ${reason}`);
    this.name = "StreamDecodeError";
  }
}

const WHITESPACE = new Set([" ", "\t", "\n", "\r", "\uFEFF"]);
const DELIMITERS = new Set([..."{}[]\","]);

function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") starts.push(i + 1);
  }
  return starts;
}

/** Offset → 1-based line and column (binary search over line starts). */
function locate(starts: readonly number[], offset: number): { line: number; column: number } {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: offset - (starts[lo] ?? 0) + 1 };
}

/**
 * Find the end (exclusive) of the JSON value starting at `start`.
 * Returns -1 when the input ends first.
 */
function scanValue(text: string, start: number): number {
  const first = text[start];
  if (first === "{" || first === "[") {
    let depth = 0;
    let inString = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (ch === "\\") i++;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === "{" || ch === "[") depth++;
      else if (ch === "}" || ch === "]") {
        depth--;
        if (depth === 0) return i + 1;
      }
    }
    return -1;
  }
  if (first === '"') {
    for (let i = start + 1; i < text.length; i++) {
      const ch = text[i];
      if (ch === "\\") i++;
      else if (ch === '"') return i + 1;
    }
    return -1;
  }
  let end = start;
  while (end < text.length) {
    const ch = text[end];
    if (ch === undefined || WHITESPACE.has(ch) || DELIMITERS.has(ch)) break;
    end++;
  }
  return end;
}

export function* iterateStream(text: string): Generator<DecodedRecord> {
  const starts = lineStarts(text);
  let pos = 0;
  let index = 0;

  for (;;) {
    while (pos < text.length && WHITESPACE.has(text[pos] ?? "")) pos++;
    if (pos >= text.length) return;

    const { line, column } = locate(starts, pos);
    const end = scanValue(text, pos);
    if (end === -1) {
      const eof = locate(starts, text.length);
      throw new StreamDecodeError("invalid JSON: unexpected end of input", eof.line, eof.column, index);
    }
    if (end === pos) {
      throw new StreamDecodeError(`invalid JSON: unexpected character '${text[pos] ?? ""}'`, line, column, index);
    }

    let value: unknown;
    try {
      value = JSON.parse(text.slice(pos, end));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new StreamDecodeError(`invalid JSON: ${reason}`, line, column, index);
    }

    yield { index, value, line, column, offset: pos };
    pos = end;
    index++;
  }
}

/** Decode a whole ESML text. */
export function decodeStream(text: string): DecodedRecord[] {
  return [...iterateStream(text)];
}
