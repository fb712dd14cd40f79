/**
 * Schema matcher — checks a generic tree value against a schema node.
 *
 * Stateless given its resolver. The first failure in pre-order is reported:
 * declared properties in declaration order, then required-but-undeclared
 * names, then additional keys in value order; array elements in index order.
 */

import {
  indexPath,
  joinPath,
  refResolutionError,
  schemaViolation,
  type RefResolutionError,
  type SchemaViolation,
} from "./errors.js";
import { hasOwn, isRecord, kindOf } from "./json-value.js";
import {
  describeFailure,
  enterScope,
  resolveReference,
  type Scope,
  type TypeResolver,
} from "./references.js";
import type { ArrayNode, ObjectNode, PrimitiveNode, ReferenceNode, SchemaNode } from "./schema-node.js";

export type MatchError = SchemaViolation | RefResolutionError;

export type MatchResult = { ok: true } | { ok: false; error: MatchError };

const OK: MatchResult = { ok: true };

interface MatchContext {
  resolver: TypeResolver;
  /** Top-level schema that `#` refers to. */
  root: SchemaNode;
  scope: Scope | undefined;
  path: string;
  /** References followed at this value position without descending. */
  visiting: ReadonlySet<SchemaNode>;
}

/**
 * Match `value` against `node`. `path` prefixes reported paths (the root
 * of the value is the empty path).
 */
export function matchValue(
  value: unknown,
  node: SchemaNode,
  resolver: TypeResolver,
  path = "",
): MatchResult {
  return matchNode(value, node, {
    resolver,
    root: node,
    scope: undefined,
    path,
    visiting: new Set(),
  });
}

function matchNode(value: unknown, node: SchemaNode, ctx: MatchContext): MatchResult {
  const inner: MatchContext = { ...ctx, scope: enterScope(node, ctx.scope) };
  switch (node.kind) {
    case "any":
      return OK;
    case "primitive":
      return matchPrimitive(value, node, inner.path);
    case "reference":
      return matchReference(value, node, inner);
    case "array":
      return matchArray(value, node, inner);
    case "object":
      return matchObject(value, node, inner);
  }
}

function descend(ctx: MatchContext, path: string): MatchContext {
  return { ...ctx, path, visiting: new Set() };
}

function isPrimitive(value: unknown, type: PrimitiveNode["type"]): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
  }
}

function matchPrimitive(value: unknown, node: PrimitiveNode, path: string): MatchResult {
  if (isPrimitive(value, node.type)) return OK;
  return { ok: false, error: schemaViolation(path, node.type, kindOf(value)) };
}

function matchReference(value: unknown, node: ReferenceNode, ctx: MatchContext): MatchResult {
  if (ctx.visiting.has(node)) {
    return { ok: false, error: refResolutionError(ctx.path, node.ref, "is part of a reference cycle") };
  }
  const resolution = resolveReference(node, ctx.root, ctx.scope, ctx.resolver);
  if (!resolution.ok) {
    return { ok: false, error: refResolutionError(ctx.path, node.ref, describeFailure(resolution)) };
  }
  const visiting = new Set(ctx.visiting);
  visiting.add(node);
  return matchNode(value, resolution.node, {
    resolver: ctx.resolver,
    root: resolution.root,
    scope: resolution.scope,
    path: ctx.path,
    visiting,
  });
}

function matchArray(value: unknown, node: ArrayNode, ctx: MatchContext): MatchResult {
  if (!Array.isArray(value)) {
    return { ok: false, error: schemaViolation(ctx.path, "array", kindOf(value)) };
  }
  const items = node.items;
  if (!items) return OK;
  for (let i = 0; i < value.length; i++) {
    const result = matchNode(value[i], items, descend(ctx, indexPath(ctx.path, i)));
    if (!result.ok) return result;
  }
  return OK;
}

function matchObject(value: unknown, node: ObjectNode, ctx: MatchContext): MatchResult {
  if (!isRecord(value)) {
    return { ok: false, error: schemaViolation(ctx.path, "object", kindOf(value)) };
  }

  const required = new Set(node.required);

  for (const [key, child] of node.properties) {
    const childPath = joinPath(ctx.path, key);
    if (!hasOwn(value, key)) {
      if (required.has(key)) return missing(childPath);
      continue;
    }
    const result = matchNode(value[key], child, descend(ctx, childPath));
    if (!result.ok) return result;
  }

  for (const key of node.required) {
    if (!node.properties.has(key) && !hasOwn(value, key)) return missing(joinPath(ctx.path, key));
  }

  const additional = node.additional;
  if (additional.policy === "allow") return OK;
  for (const key of Object.keys(value)) {
    if (node.properties.has(key)) continue;
    const childPath = joinPath(ctx.path, key);
    if (additional.policy === "forbid") {
      return {
        ok: false,
        error: schemaViolation(childPath, "no additional properties", `property '${key}'`),
      };
    }
    const result = matchNode(value[key], additional.schema, descend(ctx, childPath));
    if (!result.ok) return result;
  }
  return OK;
}

function missing(path: string): MatchResult {
  return { ok: false, error: schemaViolation(path, "required property", "missing") };
}
