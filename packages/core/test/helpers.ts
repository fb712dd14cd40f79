/**
 * Stream builders shared by the engine tests.
 */

import {
  buildSeedRecord,
  parseSchema,
  type JsonObject,
  type JsonValue,
  type SchemaNode,
  type TypeResolver,
} from "../src/index.js";

export interface TestRecord {
  type: string;
  data: JsonValue;
}

export const ROOT = "TypeDeclared@1";

export function seed(): TestRecord {
  return buildSeedRecord();
}

/** A declaration through TypeDeclared@1 (or `via`). */
export function declare(
  name: string,
  version: number | string,
  schema: JsonObject,
  extra: JsonObject = {},
  via = ROOT,
): TestRecord {
  return { type: via, data: { name, version, schema, ...extra } };
}

export function event(type: string, data: JsonValue): TestRecord {
  return { type, data };
}

/** Resolver that knows no registered types. */
export const NO_TYPES: TypeResolver = { resolveType: () => undefined };

/** Parse a schema that is known to be valid. */
export function node(raw: unknown): SchemaNode {
  const parsed = parseSchema(raw);
  if (!parsed.ok) throw new Error(parsed.error.detail);
  return parsed.node;
}

export const ADDRESS_SCHEMA: JsonObject = {
  type: "object",
  properties: {
    street: { type: "string" },
    city: { type: "string" },
    zip: { type: "string" },
  },
  required: ["street", "city", "zip"],
};
