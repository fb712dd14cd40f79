/**
 * Validation orchestrator — sequential replay of one stream.
 *
 * States: awaiting-bootstrap → streaming → completed | aborted.
 *
 *   awaiting-bootstrap  the first record must restate the built-in seed;
 *                       anything else aborts the pass (no report)
 *   streaming           each record resolves its type in the registry; a
 *                       declaring type makes it a declaration, any other
 *                       type an ordinary event
 *
 * Records are atomic: a rejected record leaves the registry untouched and
 * replay continues with the next one.
 */

import { checkBootstrapRecord, BOOTSTRAP_TYPE_TAG } from "./bootstrap.js";
import { DEFAULT_DECLARED_VERSION } from "./constants.js";
import {
  lineageViolation,
  schemaViolation,
  type MalformedEvent,
  type MissingBootstrap,
  type ValidationError,
} from "./errors.js";
import { hasOwn, isRecord, kindOf } from "./json-value.js";
import { matchValue } from "./matcher.js";
import { TypeRegistry, type RegistryEntry, type RegistryOptions } from "./registry.js";
import type { RecordLocation } from "./schemas/record.js";
import type { DecodedRecord } from "./stream-decoder.js";
import type {
  AcceptedEntry,
  PassResult,
  RecordKind,
  RejectedEntry,
  ReportEntry,
  ValidationSummary,
} from "./schemas/report.js";
import {
  formatTypeTag,
  isValidTypeName,
  normalizeVersion,
  parseTypeTag,
  type TypeTag,
} from "./type-tag.js";

export type ValidatorState = "awaiting-bootstrap" | "streaming" | "completed" | "aborted";

export interface ValidatorOptions extends RegistryOptions {
  /** Called with every entry as soon as it is produced. */
  onEntry?: (entry: ReportEntry) => void;
}

export type Envelope =
  | { ok: true; tag: TypeTag; raw: string; data: unknown }
  | { ok: false; raw: string; error: MalformedEvent };

/** Read the `{type, data}` envelope of a decoded record. */
export function readEnvelope(value: unknown): Envelope {
  const malformed = (raw: string, detail: string): Envelope => ({
    ok: false,
    raw,
    error: { kind: "MalformedEvent", detail },
  });

  if (!isRecord(value)) return malformed("", `each event must be an object, found ${kindOf(value)}`);
  if (!hasOwn(value, "type") || !hasOwn(value, "data")) {
    return malformed(typeof value["type"] === "string" ? value["type"] : "", "event must have 'type' and 'data'");
  }
  const type = value["type"];
  if (typeof type !== "string") return malformed("", `'type' must be a string, found ${kindOf(type)}`);
  const tag = parseTypeTag(type);
  if (!tag) return malformed(type, `invalid type tag '${type}': expected name or name@version`);
  return { ok: true, tag, raw: type, data: value["data"] };
}

export class StreamValidator {
  readonly registry: TypeRegistry;
  private phase: ValidatorState = "awaiting-bootstrap";
  private readonly entries: ReportEntry[] = [];
  private readonly countsByType = new Map<string, number>();
  private abortedWith: RejectedEntry | undefined;
  private declarations = 0;
  private events = 0;
  private readonly onEntry: ((entry: ReportEntry) => void) | undefined;

  constructor(options: ValidatorOptions = {}) {
    this.registry = new TypeRegistry(options);
    this.onEntry = options.onEntry;
  }

  get state(): ValidatorState {
    return this.phase;
  }

  /** Validate the next record of the stream. */
  push(value: unknown, location?: RecordLocation): ReportEntry {
    if (this.phase === "completed" || this.phase === "aborted") {
      throw new Error(`cannot push records to a ${this.phase} pass`);
    }
    const index = this.entries.length;
    const envelope = readEnvelope(value);
    const entry =
      this.phase === "awaiting-bootstrap"
        ? this.bootstrap(index, envelope, location)
        : this.stream(index, envelope, location);
    if (entry !== this.abortedWith) this.entries.push(entry);
    this.onEntry?.(entry);
    return entry;
  }

  /** End the pass. An empty stream aborts: it has no bootstrap record. */
  finish(): PassResult {
    if (this.phase === "awaiting-bootstrap") {
      this.abortedWith = rejected(0, "", undefined, {
        kind: "MissingBootstrap",
        detail: `the stream is empty; the first record must declare ${BOOTSTRAP_TYPE_TAG}`,
      });
      this.phase = "aborted";
    }
    if (this.phase === "aborted" && this.abortedWith) {
      return { status: "aborted", error: this.abortedWith };
    }
    this.phase = "completed";
    return { status: "completed", entries: [...this.entries], summary: this.summary() };
  }

  summary(): ValidationSummary {
    const rejectedCount = this.entries.filter((e) => e.status === "rejected").length;
    return {
      total: this.entries.length,
      accepted: this.entries.length - rejectedCount,
      rejected: rejectedCount,
      declarations: this.declarations,
      events: this.events,
      declaringTypes: this.registry.declaringTypes(),
      countsByType: Object.fromEntries(this.countsByType),
      registry: this.registry.snapshot(),
      fingerprint: this.registry.fingerprint(),
    };
  }

  // ── States ───────────────────────────────────────────────────────

  private bootstrap(index: number, envelope: Envelope, location?: RecordLocation): ReportEntry {
    const abort = (detail: string): ReportEntry => {
      const error: MissingBootstrap = { kind: "MissingBootstrap", detail };
      const entry = rejected(index, envelope.raw, location, error);
      this.abortedWith = entry;
      this.phase = "aborted";
      return entry;
    };

    if (!envelope.ok) return abort(`the first record is malformed: ${envelope.error.detail}`);
    const check = checkBootstrapRecord(envelope.tag, envelope.data);
    if (!check.ok) return abort(check.detail);

    const entry = this.registry.registerBootstrap(index, check.log);
    this.count(envelope.raw);
    this.declarations++;
    this.phase = "streaming";
    return accepted(index, "bootstrap", BOOTSTRAP_TYPE_TAG, location, {
      declared: BOOTSTRAP_TYPE_TAG,
      parent: entry.parent,
      lineage: this.registry.lineage.ancestors(entry.identity.name, entry.identity.version),
    });
  }

  private stream(index: number, envelope: Envelope, location?: RecordLocation): ReportEntry {
    if (!envelope.ok) return rejected(index, envelope.raw, location, envelope.error);
    this.count(envelope.raw);

    const type = this.registry.resolve(envelope.tag);
    if (!type) {
      return rejected(index, envelope.raw, location, {
        kind: "DeclareBeforeUseViolation",
        type: envelope.raw,
        detail: `type ${envelope.raw} used before declaration`,
      });
    }

    return type.declaring
      ? this.declaration(index, type, envelope.data, location)
      : this.event(index, type, envelope.data, location);
  }

  private event(
    index: number,
    type: RegistryEntry,
    data: unknown,
    location?: RecordLocation,
  ): ReportEntry {
    const tag = formatTypeTag(type.identity);
    const match = matchValue(data, type.node, this.registry);
    if (!match.ok) return rejected(index, tag, location, match.error, "event");
    this.events++;
    return accepted(index, "event", tag, location);
  }

  private declaration(
    index: number,
    declarer: RegistryEntry,
    data: unknown,
    location?: RecordLocation,
  ): ReportEntry {
    const tag = formatTypeTag(declarer.identity);
    const reject = (error: ValidationError) => rejected(index, tag, location, error, "declaration");

    const match = matchValue(data, declarer.node, this.registry);
    if (!match.ok) {
      const error = match.error;
      if (error.kind === "SchemaViolation" && isParentPath(error.path)) {
        return reject(lineageViolation("InvalidParent", `parent field: ${error.detail}`));
      }
      return reject(error);
    }
    if (!isRecord(data)) return reject(schemaViolation("", "object", kindOf(data)));

    const name = data["name"];
    if (typeof name !== "string" || !isValidTypeName(name)) {
      return reject(schemaViolation("name", "dot-separated type name", describeValue(name)));
    }
    const schema = data["schema"];
    if (!isRecord(schema)) return reject(schemaViolation("schema", "object", kindOf(schema)));

    let version = DEFAULT_DECLARED_VERSION;
    if (hasOwn(data, "version")) {
      const normalized = normalizeVersion(data["version"]);
      if (normalized === undefined) {
        return reject(schemaViolation("version", "positive integer version", describeValue(data["version"])));
      }
      version = normalized;
    }

    let parent: number | undefined;
    const rawParent = data["parent"];
    if (rawParent !== undefined && rawParent !== null) {
      parent = normalizeVersion(rawParent);
      if (parent === undefined) {
        return reject(
          lineageViolation("InvalidParent", `parent must be a positive integer version, found ${describeValue(rawParent)}`),
        );
      }
    }

    const log = data["log"];
    const result = this.registry.register({
      name,
      version,
      schema,
      ...(parent !== undefined ? { parent } : {}),
      ...(typeof log === "string" ? { log } : {}),
      declaredBy: declarer.identity,
      index,
    });
    if (!result.ok) return reject(result.error);

    this.declarations++;
    const declared = result.entry.identity;
    return accepted(index, "declaration", tag, location, {
      declared: formatTypeTag(declared),
      parent: result.entry.parent,
      lineage: this.registry.lineage.ancestors(declared.name, declared.version),
      ...(result.noop ? { noop: true } : {}),
    });
  }

  private count(tag: string): void {
    this.countsByType.set(tag, (this.countsByType.get(tag) ?? 0) + 1);
  }
}

/** Validate a whole stream of records. */
export function validateRecords(
  records: Iterable<unknown>,
  options: ValidatorOptions = {},
): PassResult {
  const validator = new StreamValidator(options);
  for (const record of records) {
    validator.push(record);
    if (validator.state === "aborted") break;
  }
  return validator.finish();
}

/** Validate records produced by the stream decoder, keeping their positions. */
export function validateDecoded(
  records: Iterable<DecodedRecord>,
  options: ValidatorOptions = {},
): PassResult {
  const validator = new StreamValidator(options);
  for (const record of records) {
    validator.push(record.value, { line: record.line, column: record.column });
    if (validator.state === "aborted") break;
  }
  return validator.finish();
}

// ── Entry builders ─────────────────────────────────────────────────

function isParentPath(path: string): boolean {
  return path === "parent" || path.startsWith("parent.") || path.startsWith("parent[");
}

function describeValue(value: unknown): string {
  return typeof value === "string" ? `'${value}'` : kindOf(value);
}

function withLocation<T extends object>(entry: T, location?: RecordLocation): T {
  return location ? { ...entry, line: location.line, column: location.column } : entry;
}

function accepted(
  index: number,
  kind: RecordKind,
  type: string,
  location: RecordLocation | undefined,
  extra: Pick<AcceptedEntry, "declared" | "parent" | "lineage" | "noop"> = {},
): AcceptedEntry {
  const entry: AcceptedEntry = { index, status: "accepted", kind, type, ...extra };
  return withLocation(entry, location);
}

function rejected(
  index: number,
  type: string,
  location: RecordLocation | undefined,
  error: ValidationError,
  kind?: RecordKind,
): RejectedEntry {
  const entry: RejectedEntry = {
    index,
    status: "rejected",
    ...(kind ? { kind } : {}),
    type,
    errorKind: error.kind,
    detail: error.detail,
  };
  switch (error.kind) {
    case "SchemaViolation":
      entry.path = error.path;
      entry.expected = error.expected;
      entry.found = error.found;
      break;
    case "RefResolutionError":
      entry.path = error.path;
      entry.ref = error.ref;
      break;
    case "LineageViolation":
      entry.reason = error.reason;
      break;
    case "DeclareBeforeUseViolation":
      if (error.path !== undefined) entry.path = error.path;
      break;
    default:
      break;
  }
  return withLocation(entry, location);
}
