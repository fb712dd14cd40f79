/**
 * Validation report — one entry per input record, plus a pass summary.
 *
 * These are the wire types the CLI prints with `--jsonl`.
 */

import { Type, type Static } from "@sinclair/typebox";

// ── Error taxonomy ─────────────────────────────────────────────────

export const ErrorKind = Type.Union([
  /** First record is not the root self-declaration. Aborts the pass. */
  Type.Literal("MissingBootstrap"),
  /** A type identity was used before a record declared it. */
  Type.Literal("DeclareBeforeUseViolation"),
  /** The declaration breaks the per-name version tree. */
  Type.Literal("LineageViolation"),
  /** Data does not match its schema. */
  Type.Literal("SchemaViolation"),
  /** A `$ref` points nowhere reachable. */
  Type.Literal("RefResolutionError"),
  /** Not a `{type, data}` mapping, or an unparseable type tag. */
  Type.Literal("MalformedEvent"),
]);

export type ErrorKind = Static<typeof ErrorKind>;

export const LineageReason = Type.Union([
  Type.Literal("UnknownParent"),
  Type.Literal("MissingParent"),
  Type.Literal("InvalidParent"),
  Type.Literal("DuplicateVersion"),
  Type.Literal("ConflictingParent"),
  Type.Literal("NonMonotonicVersion"),
  Type.Literal("BranchingForbidden"),
  Type.Literal("ReservedName"),
]);

export type LineageReason = Static<typeof LineageReason>;

/** How the orchestrator treated a record. */
export const RecordKind = Type.Union([
  Type.Literal("bootstrap"),
  Type.Literal("declaration"),
  Type.Literal("event"),
]);

export type RecordKind = Static<typeof RecordKind>;

// ── Entries ────────────────────────────────────────────────────────

export const AcceptedEntry = Type.Object(
  {
    /** 0-based position in the stream. */
    index: Type.Integer({ minimum: 0 }),
    status: Type.Literal("accepted"),
    kind: RecordKind,
    /** Resolved type identity of the record, `name@version`. */
    type: Type.String(),
    /** Declarations: the identity that was registered. */
    declared: Type.Optional(Type.String()),
    /** Declarations: the assigned lineage parent (null for a first version). */
    parent: Type.Optional(Type.Union([Type.Integer({ minimum: 1 }), Type.Null()])),
    /** Declarations: versions from the lineage root down to `declared`. */
    lineage: Type.Optional(Type.Array(Type.Integer({ minimum: 1 }))),
    /** Declarations: identical redeclaration, registry unchanged. */
    noop: Type.Optional(Type.Boolean()),
    line: Type.Optional(Type.Integer({ minimum: 1 })),
    column: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false },
);

export type AcceptedEntry = Static<typeof AcceptedEntry>;

export const RejectedEntry = Type.Object(
  {
    index: Type.Integer({ minimum: 0 }),
    status: Type.Literal("rejected"),
    /** Present when the record's type resolved far enough to tell. */
    kind: Type.Optional(RecordKind),
    /** Resolved identity, or the raw tag when it did not resolve. */
    type: Type.String(),
    errorKind: ErrorKind,
    reason: Type.Optional(LineageReason),
    /** First failing path (`a.b[2].c`, empty for the root). */
    path: Type.Optional(Type.String()),
    expected: Type.Optional(Type.String()),
    found: Type.Optional(Type.String()),
    /** The `$ref` that failed to resolve. */
    ref: Type.Optional(Type.String()),
    detail: Type.String(),
    line: Type.Optional(Type.Integer({ minimum: 1 })),
    column: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false },
);

export type RejectedEntry = Static<typeof RejectedEntry>;

export const ReportEntry = Type.Union([AcceptedEntry, RejectedEntry]);

export type ReportEntry = Static<typeof ReportEntry>;

// ── Summary ────────────────────────────────────────────────────────

export const RegistryVersion = Type.Object({
  version: Type.Integer({ minimum: 1 }),
  parent: Type.Union([Type.Integer({ minimum: 1 }), Type.Null()]),
});

export type RegistryVersion = Static<typeof RegistryVersion>;

/** name → versions in declaration order. */
export const RegistrySnapshot = Type.Record(Type.String(), Type.Array(RegistryVersion));

export type RegistrySnapshot = Static<typeof RegistrySnapshot>;

export const ValidationSummary = Type.Object({
  total: Type.Integer({ minimum: 0 }),
  accepted: Type.Integer({ minimum: 0 }),
  rejected: Type.Integer({ minimum: 0 }),
  /** Accepted declarations, the bootstrap record included. */
  declarations: Type.Integer({ minimum: 0 }),
  /** Accepted ordinary events. */
  events: Type.Integer({ minimum: 0 }),
  /** Registered types whose schema makes them declaring types. */
  declaringTypes: Type.Array(Type.String()),
  /** Type tag as written → number of records that used it. */
  countsByType: Type.Record(Type.String(), Type.Integer({ minimum: 0 })),
  registry: RegistrySnapshot,
  /** SHA256 over the canonical registry contents. */
  fingerprint: Type.String({ pattern: "^[0-9a-f]{64}$" }),
});

export type ValidationSummary = Static<typeof ValidationSummary>;

export const PassResult = Type.Union([
  Type.Object({
    status: Type.Literal("completed"),
    entries: Type.Array(ReportEntry),
    summary: ValidationSummary,
  }),
  Type.Object({
    status: Type.Literal("aborted"),
    error: RejectedEntry,
  }),
]);

export type PassResult = Static<typeof PassResult>;
