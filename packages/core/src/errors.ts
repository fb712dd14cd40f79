/**
 * Validation errors — plain values, never thrown.
 *
 * Every failure the engine can report for a record is one of these.
 * Only MissingBootstrap ends a pass; the rest are recorded against their
 * record and replay continues.
 */

import type { LineageReason } from "./schemas/report.js";

export interface SchemaViolation {
  kind: "SchemaViolation";
  /** First failing path in pre-order (`a.b[2]`, empty for the root). */
  path: string;
  expected: string;
  found: string;
  detail: string;
}

export interface RefResolutionError {
  kind: "RefResolutionError";
  path: string;
  ref: string;
  detail: string;
}

export interface DeclareBeforeUseViolation {
  kind: "DeclareBeforeUseViolation";
  /** The tag that was used too early. */
  type: string;
  /** Set when the use was a `$ref` inside a declared schema. */
  path?: string;
  detail: string;
}

export interface LineageViolation {
  kind: "LineageViolation";
  reason: LineageReason;
  detail: string;
}

export interface MalformedEvent {
  kind: "MalformedEvent";
  detail: string;
}

export interface MissingBootstrap {
  kind: "MissingBootstrap";
  detail: string;
}

export type ValidationError =
  | SchemaViolation
  | RefResolutionError
  | DeclareBeforeUseViolation
  | LineageViolation
  | MalformedEvent
  | MissingBootstrap;

// ── Paths ──────────────────────────────────────────────────────────

export function joinPath(base: string, key: string): string {
  return base === "" ? key : `${base}.${key}`;
}

export function indexPath(base: string, index: number): string {
  return `${base}[${index}]`;
}

/** Path as shown to a human: the empty root path reads as `$`. */
export function displayPath(path: string): string {
  return path === "" ? "$" : path;
}

// ── Constructors ───────────────────────────────────────────────────

export function schemaViolation(
  path: string,
  expected: string,
  found: string,
): SchemaViolation {
  return {
    kind: "SchemaViolation",
    path,
    expected,
    found,
    detail: `${displayPath(path)}: expected ${expected}, found ${found}`,
  };
}

export function refResolutionError(
  path: string,
  ref: string,
  reason: string,
): RefResolutionError {
  return {
    kind: "RefResolutionError",
    path,
    ref,
    detail: `${displayPath(path)}: $ref '${ref}' ${reason}`,
  };
}

export function lineageViolation(
  reason: LineageReason,
  detail: string,
): LineageViolation {
  return { kind: "LineageViolation", reason, detail };
}
