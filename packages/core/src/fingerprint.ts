/**
 * Structural fingerprints.
 *
 * fingerprint = SHA256(canonical(value)), hex-encoded.
 * Two schemas are "structurally identical" iff their fingerprints match.
 * Key order is insignificant at every level, including inside `properties`.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";

/** 32-byte hex-encoded SHA256 hash. */
export type Fingerprint = string;

/** SHA256 of a canonically-encoded value → hex fingerprint. */
export function fingerprintOf(value: unknown): Fingerprint {
  return bytesToHex(sha256(canonicalEncode(value)));
}
