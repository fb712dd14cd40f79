/**
 * Reserved names and built-in constants.
 *
 * The root declaring type is must-understand: every validator knows it at
 * version 1 without reading it from the stream.
 */

/** Name of the root, self-describing declaring type. */
export const ROOT_TYPE_NAME = "TypeDeclared";

/** The only version of the root type a validator has hardcoded knowledge of. */
export const ROOT_TYPE_VERSION = 1;

/** Names under this prefix are reserved alongside the root type. */
export const RESERVED_PREFIX = "core.";

/** Version assumed when a declaration omits one. */
export const DEFAULT_DECLARED_VERSION = 1;

/** Schema annotation a declaring type uses to forbid lineage branching. */
export const BRANCHING_KEYWORD = "x-branching";

/** Prefix of every supported internal reference into a `$defs` scope. */
export const DEFS_REF_PREFIX = "#/$defs/";

/** Reference to the root of the schema being validated. */
export const ROOT_REF = "#";

export function isReservedName(name: string): boolean {
  return name === ROOT_TYPE_NAME || name.startsWith(RESERVED_PREFIX);
}
