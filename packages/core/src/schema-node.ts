/**
 * Schema node model — the in-memory form of the supported JSON-Schema subset.
 *
 * Supported keywords: `type`, `properties`, `required`,
 * `additionalProperties`, `items`, `$defs`, and internal `$ref`
 * (`#` or `#/$defs/<key>`). Every other keyword is an annotation and is
 * carried through untouched in the raw schema but ignored here.
 *
 * parseSchema() turns a raw (decoded) schema into nodes, reporting the
 * first unsupported construct with its path.
 */

import { DEFS_REF_PREFIX, ROOT_REF } from "./constants.js";
import {
  joinPath,
  refResolutionError,
  schemaViolation,
  type RefResolutionError,
  type SchemaViolation,
} from "./errors.js";
import { hasOwn, isRecord, kindOf } from "./json-value.js";

// ── Types ──────────────────────────────────────────────────────────

export type PrimitiveType = "string" | "integer" | "number" | "boolean";

export const PRIMITIVE_TYPES: readonly PrimitiveType[] = ["string", "integer", "number", "boolean"];

const SUPPORTED_TYPES = ["object", "array", ...PRIMITIVE_TYPES];

interface NodeBase {
  /** Local `$defs`, scoping every `$ref` in this node's subtree. */
  defs?: ReadonlyMap<string, SchemaNode>;
}

export type AdditionalPolicy =
  | { policy: "allow" }
  | { policy: "forbid" }
  | { policy: "match"; schema: SchemaNode };

export interface ObjectNode extends NodeBase {
  kind: "object";
  /** Declared properties, in declaration order. */
  properties: ReadonlyMap<string, SchemaNode>;
  required: readonly string[];
  additional: AdditionalPolicy;
}

export interface ArrayNode extends NodeBase {
  kind: "array";
  items: SchemaNode | undefined;
}

export interface PrimitiveNode extends NodeBase {
  kind: "primitive";
  type: PrimitiveType;
}

export type RefTarget = { kind: "root" } | { kind: "defs"; key: string };

export interface ReferenceNode extends NodeBase {
  kind: "reference";
  ref: string;
  target: RefTarget;
}

/** No `type` and no `$ref`: every value matches. */
export interface AnyNode extends NodeBase {
  kind: "any";
}

export type SchemaNode = ObjectNode | ArrayNode | PrimitiveNode | ReferenceNode | AnyNode;

export type SchemaParseError = SchemaViolation | RefResolutionError;

export type ParseResult =
  | { ok: true; node: SchemaNode }
  | { ok: false; error: SchemaParseError };

// ── Parsing ────────────────────────────────────────────────────────

/** Parse a `$ref` string. Returns undefined for unsupported forms. */
export function parseRef(ref: string): RefTarget | undefined {
  if (ref === ROOT_REF) return { kind: "root" };
  if (!ref.startsWith(DEFS_REF_PREFIX)) return undefined;
  const key = ref.slice(DEFS_REF_PREFIX.length);
  if (key === "" || key.includes("/")) return undefined;
  return { kind: "defs", key };
}

/**
 * Parse a raw schema. `path` prefixes every reported path, so a schema
 * found in a payload's `schema` field reports `schema.properties.x.type`.
 */
export function parseSchema(raw: unknown, path = ""): ParseResult {
  try {
    return { ok: true, node: parseNode(raw, path) };
  } catch (err) {
    if (err instanceof SchemaParseFailure) return { ok: false, error: err.error };
    throw err;
  }
}

class SchemaParseFailure extends Error {
  constructor(readonly error: SchemaParseError) {
    super(error.detail);
    this.name = "SchemaParseFailure";
  }
}

function fail(path: string, expected: string, found: string): never {
  throw new SchemaParseFailure(schemaViolation(path, expected, found));
}

function parseNode(raw: unknown, path: string): SchemaNode {
  if (!isRecord(raw)) fail(path, "schema object", kindOf(raw));

  const defs = hasOwn(raw, "$defs") ? parseDefs(raw["$defs"], joinPath(path, "$defs")) : undefined;
  const base: NodeBase = defs ? { defs } : {};

  if (hasOwn(raw, "$ref")) {
    const ref = raw["$ref"];
    const refPath = joinPath(path, "$ref");
    if (typeof ref !== "string") {
      throw new SchemaParseFailure(
        refResolutionError(refPath, String(ref), `must be a string, found ${kindOf(ref)}`),
      );
    }
    const target = parseRef(ref);
    if (!target) {
      throw new SchemaParseFailure(
        refResolutionError(refPath, ref, `is not supported (use '${ROOT_REF}' or '${DEFS_REF_PREFIX}<name>')`),
      );
    }
    return { ...base, kind: "reference", ref, target };
  }

  if (!hasOwn(raw, "type")) return { ...base, kind: "any" };

  const type = raw["type"];
  const typePath = joinPath(path, "type");
  if (typeof type !== "string") fail(typePath, "type name", kindOf(type));

  switch (type) {
    case "object":
      return parseObject(raw, path, base);
    case "array": {
      const items = hasOwn(raw, "items") ? parseNode(raw["items"], joinPath(path, "items")) : undefined;
      return { ...base, kind: "array", items };
    }
    case "string":
    case "integer":
    case "number":
    case "boolean":
      return { ...base, kind: "primitive", type };
    default:
      return fail(typePath, `one of ${SUPPORTED_TYPES.join(", ")}`, `'${type}'`);
  }
}

function parseDefs(raw: unknown, path: string): ReadonlyMap<string, SchemaNode> {
  if (!isRecord(raw)) fail(path, "object", kindOf(raw));
  const defs = new Map<string, SchemaNode>();
  for (const [key, value] of Object.entries(raw)) {
    defs.set(key, parseNode(value, joinPath(path, key)));
  }
  return defs;
}

function parseObject(raw: Record<string, unknown>, path: string, base: NodeBase): ObjectNode {
  const properties = new Map<string, SchemaNode>();
  if (hasOwn(raw, "properties")) {
    const rawProps = raw["properties"];
    const propsPath = joinPath(path, "properties");
    if (!isRecord(rawProps)) fail(propsPath, "object", kindOf(rawProps));
    for (const [key, value] of Object.entries(rawProps)) {
      properties.set(key, parseNode(value, joinPath(propsPath, key)));
    }
  }

  const required: string[] = [];
  if (hasOwn(raw, "required")) {
    const rawRequired = raw["required"];
    const requiredPath = joinPath(path, "required");
    if (!Array.isArray(rawRequired)) fail(requiredPath, "array of strings", kindOf(rawRequired));
    rawRequired.forEach((name: unknown, i) => {
      if (typeof name !== "string") fail(`${requiredPath}[${i}]`, "string", kindOf(name));
      if (!required.includes(name)) required.push(name);
    });
  }

  let additional: AdditionalPolicy = { policy: "allow" };
  if (hasOwn(raw, "additionalProperties")) {
    const ap = raw["additionalProperties"];
    const apPath = joinPath(path, "additionalProperties");
    if (ap === true) additional = { policy: "allow" };
    else if (ap === false) additional = { policy: "forbid" };
    else if (isRecord(ap)) additional = { policy: "match", schema: parseNode(ap, apPath) };
    else fail(apPath, "boolean or schema object", kindOf(ap));
  }

  return { ...base, kind: "object", properties, required, additional };
}

// ── Structural queries ─────────────────────────────────────────────

/** True when `node` is an object schema that declares and requires every field. */
export function requiresFields(node: SchemaNode, fields: readonly string[]): boolean {
  if (node.kind !== "object") return false;
  return fields.every((f) => node.properties.has(f) && node.required.includes(f));
}

/**
 * Visit every node in pre-order. `path` is the schema path of the node,
 * `scopes` the `$defs` maps enclosing it (innermost last, its own included).
 */
export function walkSchema(
  node: SchemaNode,
  visit: (node: SchemaNode, path: string, scopes: readonly ReadonlyMap<string, SchemaNode>[]) => void,
  path = "",
  scopes: readonly ReadonlyMap<string, SchemaNode>[] = [],
): void {
  const inner = node.defs ? [...scopes, node.defs] : scopes;
  visit(node, path, inner);
  if (node.defs) {
    for (const [key, def] of node.defs) walkSchema(def, visit, joinPath(joinPath(path, "$defs"), key), inner);
  }
  switch (node.kind) {
    case "object":
      for (const [key, prop] of node.properties) {
        walkSchema(prop, visit, joinPath(joinPath(path, "properties"), key), inner);
      }
      if (node.additional.policy === "match") {
        walkSchema(node.additional.schema, visit, joinPath(path, "additionalProperties"), inner);
      }
      break;
    case "array":
      if (node.items) walkSchema(node.items, visit, joinPath(path, "items"), inner);
      break;
    default:
      break;
  }
}
