/**
 * Type tags — `name` or `name@version`.
 *
 * Names are dot-separated segments. Versions are positive decimal integers
 * without leading zeros; the textual scheme (`Foo@new`) is not accepted.
 */

export interface TypeIdentity {
  name: string;
  version: number;
}

/** A parsed tag. `version` is undefined when the tag omits it. */
export interface TypeTag {
  name: string;
  version: number | undefined;
}

const NAME_RE = /^[A-Za-z_$][A-Za-z0-9_$-]*(?:\.[A-Za-z_$][A-Za-z0-9_$-]*)*$/;
const VERSION_RE = /^[1-9][0-9]*$/;

export function isValidTypeName(name: string): boolean {
  return NAME_RE.test(name);
}

/** Parse a decimal version string. Returns undefined when not a positive integer. */
export function parseVersionString(raw: string): number | undefined {
  if (!VERSION_RE.test(raw)) return undefined;
  const version = Number(raw);
  return Number.isSafeInteger(version) ? version : undefined;
}

/**
 * Normalise a version written in a payload: a positive integer or a decimal
 * string. Returns undefined for anything else.
 */
export function normalizeVersion(raw: unknown): number | undefined {
  if (typeof raw === "number") {
    return Number.isSafeInteger(raw) && raw > 0 ? raw : undefined;
  }
  if (typeof raw === "string") return parseVersionString(raw);
  return undefined;
}

/** Parse `name[@version]`. Returns undefined when the tag is malformed. */
export function parseTypeTag(tag: string): TypeTag | undefined {
  const at = tag.lastIndexOf("@");
  const name = at === -1 ? tag : tag.slice(0, at);
  if (!isValidTypeName(name)) return undefined;
  if (at === -1) return { name, version: undefined };
  const version = parseVersionString(tag.slice(at + 1));
  if (version === undefined) return undefined;
  return { name, version };
}

export function formatTypeTag(tag: TypeTag | TypeIdentity): string {
  return tag.version === undefined ? tag.name : `${tag.name}@${tag.version}`;
}
