/**
 * @esml/core — the ESML validation engine.
 *
 * Pure: no I/O, no logging. One TypeRegistry per validation pass.
 * The CLI and any other front end import from here, never the reverse.
 */

// Constants
export {
  ROOT_TYPE_NAME,
  ROOT_TYPE_VERSION,
  RESERVED_PREFIX,
  DEFAULT_DECLARED_VERSION,
  BRANCHING_KEYWORD,
  isReservedName,
} from "./constants.js";

// Generic tree values
export { kindOf, isRecord, type JsonValue, type JsonObject, type ValueKind } from "./json-value.js";

// Canonical encoding + structural fingerprints
export { canonicalEncode } from "./canonical.js";
export { fingerprintOf, type Fingerprint } from "./fingerprint.js";

// Type tags
export {
  parseTypeTag,
  formatTypeTag,
  normalizeVersion,
  isValidTypeName,
  type TypeIdentity,
  type TypeTag,
} from "./type-tag.js";

// Errors
export {
  displayPath,
  type ValidationError,
  type SchemaViolation,
  type RefResolutionError,
  type DeclareBeforeUseViolation,
  type LineageViolation,
  type MalformedEvent,
  type MissingBootstrap,
} from "./errors.js";

// Schema node model
export {
  parseSchema,
  parseRef,
  requiresFields,
  walkSchema,
  PRIMITIVE_TYPES,
  type SchemaNode,
  type ObjectNode,
  type ArrayNode,
  type PrimitiveNode,
  type ReferenceNode,
  type AnyNode,
  type PrimitiveType,
  type AdditionalPolicy,
  type RefTarget,
  type ParseResult,
} from "./schema-node.js";

// Matcher + references
export { matchValue, type MatchResult, type MatchError } from "./matcher.js";
export {
  resolveReference,
  checkReferences,
  type TypeResolver,
  type ResolvedType,
  type Scope,
} from "./references.js";

// Lineage + registry
export { LineageTracker } from "./lineage.js";
export {
  TypeRegistry,
  isDeclaringSchema,
  DECLARING_FIELDS,
  type TypeDeclaration,
  type RegistryEntry,
  type RegisterResult,
  type RegistrationError,
  type RegistryOptions,
} from "./registry.js";

// Bootstrap seed
export {
  BOOTSTRAP_SEED_SCHEMA,
  BOOTSTRAP_SEED_NODE,
  BOOTSTRAP_SEED_FINGERPRINT,
  BOOTSTRAP_TYPE_TAG,
  bootstrapSeedSchema,
  buildSeedRecord,
  checkBootstrapRecord,
  type BootstrapCheck,
} from "./bootstrap.js";

// Orchestrator
export {
  StreamValidator,
  validateRecords,
  validateDecoded,
  readEnvelope,
  type ValidatorOptions,
  type ValidatorState,
  type Envelope,
} from "./orchestrator.js";

// Stream decoder
export {
  decodeStream,
  iterateStream,
  StreamDecodeError,
  type DecodedRecord,
} from "./stream-decoder.js";

// Wire schemas
export * from "./schemas/index.js";
