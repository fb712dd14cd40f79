/**
 * Bootstrap seed — the root declaring type, compiled in.
 *
 * `TypeDeclared@1` describes itself: its schema is the shape of a type
 * declaration. A validator cannot read it from the stream before it knows
 * how to validate the stream, so the seed is a constant and the first
 * record of every stream must restate it exactly.
 */

import {
  ROOT_TYPE_NAME,
  ROOT_TYPE_VERSION,
} from "./constants.js";
import { fingerprintOf } from "./fingerprint.js";
import { hasOwn, isRecord, type JsonObject } from "./json-value.js";
import { matchValue } from "./matcher.js";
import { parseSchema, type SchemaNode } from "./schema-node.js";
import { formatTypeTag, normalizeVersion, type TypeTag } from "./type-tag.js";

const VERSION_DESCRIPTION = "positive integer or decimal string";

function seedSchema(): JsonObject {
  return {
    type: "object",
    properties: {
      name: { type: "string" },
      version: { description: VERSION_DESCRIPTION },
      schema: { type: "object" },
      log: { type: "string" },
      parent: { description: VERSION_DESCRIPTION },
    },
    required: ["name", "schema"],
    additionalProperties: false,
  };
}

/** Raw schema of TypeDeclared@1. */
export const BOOTSTRAP_SEED_SCHEMA: Readonly<JsonObject> = Object.freeze(seedSchema());

function parseSeed(): SchemaNode {
  const parsed = parseSchema(BOOTSTRAP_SEED_SCHEMA);
  if (!parsed.ok) throw new Error(`bootstrap seed does not parse: ${parsed.error.detail}`);
  return parsed.node;
}

export const BOOTSTRAP_SEED_NODE: SchemaNode = parseSeed();

export const BOOTSTRAP_SEED_FINGERPRINT = fingerprintOf(BOOTSTRAP_SEED_SCHEMA);

export const BOOTSTRAP_TYPE_TAG = formatTypeTag({ name: ROOT_TYPE_NAME, version: ROOT_TYPE_VERSION });

/** A mutable copy of the seed schema, for writing streams. */
export function bootstrapSeedSchema(): JsonObject {
  return seedSchema();
}

/** The record every stream starts with. */
export function buildSeedRecord(log?: string): { type: string; data: JsonObject } {
  const data: JsonObject = {
    name: ROOT_TYPE_NAME,
    version: ROOT_TYPE_VERSION,
    schema: bootstrapSeedSchema(),
  };
  if (log !== undefined) data["log"] = log;
  return { type: BOOTSTRAP_TYPE_TAG, data };
}

export type BootstrapCheck =
  | { ok: true; log: string | undefined }
  | { ok: false; detail: string };

/**
 * Check a first record against the seed without consulting any registry.
 * `tag` is the record's parsed type tag, `data` its payload.
 */
export function checkBootstrapRecord(tag: TypeTag, data: unknown): BootstrapCheck {
  const expected = `the first record must declare ${BOOTSTRAP_TYPE_TAG}`;
  if (tag.name !== ROOT_TYPE_NAME || (tag.version !== undefined && tag.version !== ROOT_TYPE_VERSION)) {
    return { ok: false, detail: `${expected}, found a record of type ${formatTypeTag(tag)}` };
  }

  const match = matchValue(data, BOOTSTRAP_SEED_NODE, { resolveType: () => undefined });
  if (!match.ok) return { ok: false, detail: `${expected}: ${match.error.detail}` };
  if (!isRecord(data)) return { ok: false, detail: `${expected}: data must be an object` };

  if (data["name"] !== ROOT_TYPE_NAME) {
    return { ok: false, detail: `${expected}: name must be '${ROOT_TYPE_NAME}'` };
  }
  if (hasOwn(data, "version") && normalizeVersion(data["version"]) !== ROOT_TYPE_VERSION) {
    return { ok: false, detail: `${expected}: version must be ${ROOT_TYPE_VERSION}` };
  }
  if (hasOwn(data, "parent")) {
    return { ok: false, detail: `${expected}: the root type has no parent` };
  }
  if (fingerprintOf(data["schema"]) !== BOOTSTRAP_SEED_FINGERPRINT) {
    return { ok: false, detail: `${expected}: schema differs from the built-in seed` };
  }

  const log = data["log"];
  return { ok: true, log: typeof log === "string" ? log : undefined };
}
