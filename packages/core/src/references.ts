/**
 * `$ref` resolution.
 *
 * Order: `#` → the root of the schema under validation; `#/$defs/<key>` →
 * the nearest enclosing `$defs` scope holding `<key>`, then the registry by
 * the type tag `<key>` (explicit version, or the latest visible one).
 *
 * Shared by the matcher (validation time) and the registry (declaration
 * time, where every reference of a new schema must already resolve).
 */

import {
  refResolutionError,
  type DeclareBeforeUseViolation,
  type RefResolutionError,
} from "./errors.js";
import type { ReferenceNode, SchemaNode } from "./schema-node.js";
import { walkSchema } from "./schema-node.js";
import { formatTypeTag, parseTypeTag, type TypeIdentity, type TypeTag } from "./type-tag.js";

/** Registry view the resolver needs. */
export interface TypeResolver {
  resolveType(tag: TypeTag): ResolvedType | undefined;
}

export interface ResolvedType {
  identity: TypeIdentity;
  node: SchemaNode;
}

/** A chain of `$defs` maps, innermost first. */
export interface Scope {
  defs: ReadonlyMap<string, SchemaNode>;
  parent: Scope | undefined;
}

export function enterScope(node: SchemaNode, scope: Scope | undefined): Scope | undefined {
  return node.defs ? { defs: node.defs, parent: scope } : scope;
}

export type Resolution =
  | {
      ok: true;
      node: SchemaNode;
      /** Root and scope to validate the target under. */
      root: SchemaNode;
      scope: Scope | undefined;
      /** Set when the target is a registered type. */
      identity?: TypeIdentity;
    }
  | { ok: false; reason: "undeclared"; tag: TypeTag }
  | { ok: false; reason: "unknown"; key: string };

export function resolveReference(
  ref: ReferenceNode,
  root: SchemaNode,
  scope: Scope | undefined,
  resolver: TypeResolver,
): Resolution {
  if (ref.target.kind === "root") {
    return { ok: true, node: root, root, scope: undefined };
  }

  const key = ref.target.key;
  for (let s = scope; s; s = s.parent) {
    const local = s.defs.get(key);
    if (local) return { ok: true, node: local, root, scope: s };
  }

  const tag = parseTypeTag(key);
  if (!tag) return { ok: false, reason: "unknown", key };
  const resolved = resolver.resolveType(tag);
  if (!resolved) return { ok: false, reason: "undeclared", tag };
  return {
    ok: true,
    node: resolved.node,
    root: resolved.node,
    scope: undefined,
    identity: resolved.identity,
  };
}

export function describeFailure(resolution: Exclude<Resolution, { ok: true }>): string {
  return resolution.reason === "undeclared"
    ? `targets type ${formatTypeTag(resolution.tag)}, which is not declared`
    : `targets '${resolution.key}', which is neither a $defs entry in scope nor a type name`;
}

// ── Declaration-time check ─────────────────────────────────────────

export type ReferenceCheckError = RefResolutionError | DeclareBeforeUseViolation;

/**
 * Check that every reference in `root` resolves, and that no chain of
 * references loops back on itself without passing through a structural
 * node. `basePath` prefixes reported paths.
 */
export function checkReferences(
  root: SchemaNode,
  resolver: TypeResolver,
  basePath: string,
): ReferenceCheckError | undefined {
  let failure: ReferenceCheckError | undefined;

  walkSchema(
    root,
    (node, path, scopes) => {
      if (failure || node.kind !== "reference") return;
      const refPath = path === "" ? "$ref" : `${path}.$ref`;
      const fullPath = basePath === "" ? refPath : `${basePath}.${refPath}`;

      let scope: Scope | undefined;
      for (const defs of scopes) scope = { defs, parent: scope };

      const seen = new Set<SchemaNode>([node]);
      let current: ReferenceNode = node;
      let currentRoot = root;
      let currentScope = scope;
      for (;;) {
        const resolution = resolveReference(current, currentRoot, currentScope, resolver);
        if (!resolution.ok) {
          failure =
            resolution.reason === "undeclared"
              ? {
                  kind: "DeclareBeforeUseViolation",
                  type: formatTypeTag(resolution.tag),
                  path: fullPath,
                  detail: `${fullPath}: $ref '${current.ref}' ${describeFailure(resolution)}`,
                }
              : refResolutionError(fullPath, current.ref, describeFailure(resolution));
          return;
        }
        // Registered types were checked when they were declared.
        if (resolution.identity) return;
        const target = resolution.node;
        if (target.kind !== "reference") return;
        if (seen.has(target)) {
          failure = refResolutionError(fullPath, node.ref, "is part of a reference cycle");
          return;
        }
        seen.add(target);
        current = target;
        currentRoot = resolution.root;
        currentScope = enterScope(target, resolution.scope);
      }
    },
  );

  return failure;
}
