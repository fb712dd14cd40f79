/**
 * Type registry — (name, version) → schema, parent link and metadata.
 *
 * Empty at the start of a pass and mutated only by accepted declarations,
 * in stream order. A registration is checked completely before anything is
 * written, so a rejected declaration leaves the registry as it was.
 *
 * Functions:
 *   registerBootstrap() — insert the hardcoded root declaring type
 *   register()          — reserved names → duplicates → lineage → references → commit
 *   lookup()/resolve()  — exact version, or the latest registered one
 *   snapshot()          — plain-data copy for reports
 *   fingerprint()       — SHA256 over the canonical registry contents
 */

import { BOOTSTRAP_SEED_NODE, BOOTSTRAP_SEED_SCHEMA } from "./bootstrap.js";
import {
  BRANCHING_KEYWORD,
  ROOT_TYPE_NAME,
  ROOT_TYPE_VERSION,
  isReservedName,
} from "./constants.js";
import {
  lineageViolation,
  type DeclareBeforeUseViolation,
  type LineageViolation,
  type RefResolutionError,
  type SchemaViolation,
} from "./errors.js";
import { fingerprintOf, type Fingerprint } from "./fingerprint.js";
import { LineageTracker } from "./lineage.js";
import { checkReferences, type ResolvedType, type TypeResolver } from "./references.js";
import { parseSchema, requiresFields, type SchemaNode } from "./schema-node.js";
import type { RegistrySnapshot } from "./schemas/report.js";
import { formatTypeTag, type TypeIdentity, type TypeTag } from "./type-tag.js";

// ── Types ──────────────────────────────────────────────────────────

/** A normalised declaration payload, ready to register. */
export interface TypeDeclaration {
  name: string;
  version: number;
  schema: Record<string, unknown>;
  parent?: number;
  /** Free-text annotation. */
  log?: string;
  /** Identity of the declaring type that produced this declaration. */
  declaredBy: TypeIdentity;
  /** Stream index of the declaring record. */
  index: number;
}

export interface RegistryEntry {
  identity: TypeIdentity;
  schema: Readonly<Record<string, unknown>>;
  node: SchemaNode;
  parent: number | null;
  log: string | undefined;
  fingerprint: Fingerprint;
  /** Instances of this type declare new types. */
  declaring: boolean;
  /** Types declared through this one may branch (only meaningful when declaring). */
  branching: boolean;
  /** Null for the built-in root type. */
  declaredBy: TypeIdentity | null;
  index: number;
}

export type RegistrationError =
  | LineageViolation
  | DeclareBeforeUseViolation
  | RefResolutionError
  | SchemaViolation;

export type RegisterResult =
  | { ok: true; entry: RegistryEntry; noop: boolean }
  | { ok: false; error: RegistrationError };

export interface RegistryOptions {
  /** Accept a redeclaration with an identical schema and parent as a no-op. Default: true. */
  allowIdenticalRedeclaration?: boolean;
}

/** Fields every declaring type's schema must declare and require. */
export const DECLARING_FIELDS = ["name", "schema"] as const;

/** A type is declaring when its schema requires both a name and a schema field. */
export function isDeclaringSchema(node: SchemaNode): boolean {
  return requiresFields(node, DECLARING_FIELDS);
}

// ── Registry ───────────────────────────────────────────────────────

export class TypeRegistry implements TypeResolver {
  private readonly types = new Map<string, Map<number, RegistryEntry>>();
  private readonly order: RegistryEntry[] = [];
  private readonly tracker = new LineageTracker();
  private readonly allowIdenticalRedeclaration: boolean;

  constructor(options: RegistryOptions = {}) {
    this.allowIdenticalRedeclaration = options.allowIdenticalRedeclaration ?? true;
  }

  /** Read-only view of the version trees. */
  get lineage(): Pick<
    LineageTracker,
    "ancestors" | "isDescendant" | "parentOf" | "childrenOf" | "roots" | "versions"
  > {
    return this.tracker;
  }

  get size(): number {
    return this.order.length;
  }

  /** Entries in registration order. */
  entries(): readonly RegistryEntry[] {
    return this.order;
  }

  names(): string[] {
    return [...this.types.keys()];
  }

  has(name: string, version: number): boolean {
    return this.types.get(name)?.has(version) ?? false;
  }

  /** Registered versions of `name`, in declaration order. */
  versions(name: string): number[] {
    return this.tracker.versions(name);
  }

  /** Highest registered version of `name`. */
  latest(name: string): RegistryEntry | undefined {
    const versions = this.types.get(name);
    if (!versions) return undefined;
    let best: RegistryEntry | undefined;
    for (const entry of versions.values()) {
      if (!best || entry.identity.version > best.identity.version) best = entry;
    }
    return best;
  }

  /** Exact version, or the latest one when `version` is omitted. */
  lookup(name: string, version?: number): RegistryEntry | undefined {
    if (version === undefined) return this.latest(name);
    return this.types.get(name)?.get(version);
  }

  resolve(tag: TypeTag): RegistryEntry | undefined {
    return this.lookup(tag.name, tag.version);
  }

  resolveType(tag: TypeTag): ResolvedType | undefined {
    return this.resolve(tag);
  }

  /** Insert the root declaring type. Only valid on an empty registry. */
  registerBootstrap(index: number, log?: string): RegistryEntry {
    if (this.order.length > 0) throw new Error("bootstrap must be the first registration");
    const entry: RegistryEntry = {
      identity: { name: ROOT_TYPE_NAME, version: ROOT_TYPE_VERSION },
      schema: BOOTSTRAP_SEED_SCHEMA,
      node: BOOTSTRAP_SEED_NODE,
      parent: null,
      log,
      fingerprint: fingerprintOf(BOOTSTRAP_SEED_SCHEMA),
      declaring: true,
      branching: true,
      declaredBy: null,
      index,
    };
    this.commit(entry);
    return entry;
  }

  register(decl: TypeDeclaration): RegisterResult {
    const { name, version } = decl;
    const tag = formatTypeTag({ name, version });

    const parsed = parseSchema(decl.schema, "schema");
    if (!parsed.ok) return { ok: false, error: parsed.error };
    const fingerprint = fingerprintOf(decl.schema);
    const parent = decl.parent ?? null;

    const existing = this.lookup(name, version);
    if (existing) {
      if (existing.fingerprint !== fingerprint) {
        return fail(
          isReservedName(name) ? "ReservedName" : "DuplicateVersion",
          `${tag} is already registered with a different schema`,
        );
      }
      if (existing.parent !== parent) {
        return fail(
          "ConflictingParent",
          `${tag} is registered with parent ${existing.parent ?? "none"}; a version cannot also claim parent ${parent ?? "none"}`,
        );
      }
      if (!this.allowIdenticalRedeclaration) {
        return fail("DuplicateVersion", `${tag} is already registered`);
      }
      return { ok: true, entry: existing, noop: true };
    }

    if (isReservedName(name)) {
      return fail("ReservedName", `${name} is in the reserved namespace and cannot be declared`);
    }

    const lineageError = this.tracker.check(name, version, decl.parent, this.allowsBranching(name, decl.parent));
    if (lineageError) return { ok: false, error: lineageError };

    const node = parsed.node;
    const selfAware: TypeResolver = {
      resolveType: (t) =>
        t.name === name && (t.version === undefined || t.version === version)
          ? { identity: { name, version }, node }
          : this.resolveType(t),
    };
    const refError = checkReferences(node, selfAware, "schema");
    if (refError) return { ok: false, error: refError };

    const entry: RegistryEntry = {
      identity: { name, version },
      schema: decl.schema,
      node,
      parent,
      log: decl.log,
      fingerprint,
      declaring: isDeclaringSchema(node),
      branching: decl.schema[BRANCHING_KEYWORD] !== false,
      declaredBy: decl.declaredBy,
      index: decl.index,
    };
    this.commit(entry);
    return { ok: true, entry, noop: false };
  }

  /** The branching policy belongs to the type that declared the parent version. */
  private allowsBranching(name: string, parent: number | undefined): boolean {
    if (parent === undefined) return true;
    const declaredBy = this.lookup(name, parent)?.declaredBy;
    if (!declaredBy) return true;
    return this.lookup(declaredBy.name, declaredBy.version)?.branching ?? true;
  }

  private commit(entry: RegistryEntry): void {
    const { name, version } = entry.identity;
    if (entry.parent === null) this.tracker.addRoot(name, version);
    else this.tracker.addChild(name, version, entry.parent);

    let versions = this.types.get(name);
    if (!versions) {
      versions = new Map();
      this.types.set(name, versions);
    }
    versions.set(version, entry);
    this.order.push(entry);
  }

  /** name → versions (declaration order) with their parents. */
  snapshot(): RegistrySnapshot {
    const snapshot: RegistrySnapshot = {};
    for (const [name, versions] of this.types) {
      snapshot[name] = [...versions.values()].map((e) => ({
        version: e.identity.version,
        parent: e.parent,
      }));
    }
    return snapshot;
  }

  /** Tags of every registered declaring type, in registration order. */
  declaringTypes(): string[] {
    return this.order.filter((e) => e.declaring).map((e) => formatTypeTag(e.identity));
  }

  fingerprint(): Fingerprint {
    return fingerprintOf(
      this.order.map((e) => [e.identity.name, e.identity.version, e.parent, e.fingerprint]),
    );
  }
}

function fail(reason: LineageViolation["reason"], detail: string): RegisterResult {
  return { ok: false, error: lineageViolation(reason, detail) };
}
