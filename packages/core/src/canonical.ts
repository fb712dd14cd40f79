/**
 * Canonical schema encoding — the bytes a schema fingerprint is taken over.
 *
 * Objects become CBOR maps with keys in lexicographic order, recursively;
 * arrays keep their order. Keys come straight from the stream, so they are
 * copied into a Map: a `__proto__` key is data here, never a prototype.
 */

import { Encoder } from "cbor-x";
import { isRecord } from "./json-value.js";

const encoder = new Encoder({
  structuredClone: false,
  useRecords: false,
  pack: false,
});

function canonicalForm(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalForm);
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return new Map(keys.map((key) => [key, canonicalForm(value[key])]));
  }
  return value;
}

/** CBOR bytes of `value` with every object's keys sorted. */
export function canonicalEncode(value: unknown): Uint8Array {
  return encoder.encode(canonicalForm(value));
}
