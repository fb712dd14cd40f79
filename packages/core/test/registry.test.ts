import { describe, it, expect, beforeEach } from "vitest";
import {
  BOOTSTRAP_SEED_FINGERPRINT,
  TypeRegistry,
  bootstrapSeedSchema,
  isRecord,
  type RegisterResult,
  type TypeDeclaration,
} from "../src/index.js";
import { ADDRESS_SCHEMA } from "./helpers.js";

const VIA_ROOT = { name: "TypeDeclared", version: 1 };

function decl(
  name: string,
  version: number,
  schema: Record<string, unknown>,
  extra: Partial<TypeDeclaration> = {},
): TypeDeclaration {
  return { name, version, schema, declaredBy: VIA_ROOT, index: 1, ...extra };
}

function errorOf(result: RegisterResult) {
  if (result.ok) throw new Error("expected a rejected registration");
  return result.error;
}

function reasonOf(result: RegisterResult): string {
  const error = errorOf(result);
  if (error.kind !== "LineageViolation") throw new Error(`expected a lineage violation, got ${error.kind}`);
  return error.reason;
}

function parsedSchema(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text);
  if (!isRecord(value)) throw new Error("expected a schema object");
  return value;
}

describe("TypeRegistry", () => {
  let registry: TypeRegistry;

  beforeEach(() => {
    registry = new TypeRegistry();
    registry.registerBootstrap(0);
  });

  it("holds the root declaring type after bootstrap", () => {
    const root = registry.lookup("TypeDeclared", 1);
    expect(root?.declaring).toBe(true);
    expect(root?.parent).toBeNull();
    expect(root?.fingerprint).toBe(BOOTSTRAP_SEED_FINGERPRINT);
    expect(registry.declaringTypes()).toEqual(["TypeDeclared@1"]);
  });

  it("refuses a second bootstrap", () => {
    expect(() => registry.registerBootstrap(1)).toThrow("bootstrap must be the first registration");
  });

  it("registers a first version and resolves it with and without version", () => {
    const result = registry.register(decl("common.Address", 1, ADDRESS_SCHEMA));
    expect(result.ok && result.noop).toBe(false);
    expect(registry.has("common.Address", 1)).toBe(true);
    expect(registry.resolve({ name: "common.Address", version: undefined })?.identity).toEqual({
      name: "common.Address",
      version: 1,
    });
    expect(registry.lookup("common.Address", 2)).toBeUndefined();
  });

  it("resolves an omitted version to the highest one", () => {
    registry.register(decl("T", 1, { type: "string" }));
    registry.register(decl("T", 5, { type: "integer" }, { parent: 1 }));
    registry.register(decl("T", 3, { type: "boolean" }, { parent: 1 }));
    expect(registry.versions("T")).toEqual([1, 5, 3]);
    expect(registry.latest("T")?.identity.version).toBe(5);
    expect(registry.snapshot()["T"]).toEqual([
      { version: 1, parent: null },
      { version: 5, parent: 1 },
      { version: 3, parent: 1 },
    ]);
  });

  it("accepts an identical redeclaration as a no-op", () => {
    registry.register(decl("T", 1, { type: "object", properties: { a: { type: "string" } } }));
    const again = registry.register(decl("T", 1, { properties: { a: { type: "string" } }, type: "object" }));
    expect(again.ok && again.noop).toBe(true);
    expect(registry.size).toBe(2);
  });

  it("rejects an identical redeclaration when configured to", () => {
    const strict = new TypeRegistry({ allowIdenticalRedeclaration: false });
    strict.registerBootstrap(0);
    strict.register(decl("T", 1, { type: "string" }));
    expect(errorOf(strict.register(decl("T", 1, { type: "string" })))).toEqual({
      kind: "LineageViolation",
      reason: "DuplicateVersion",
      detail: "T@1 is already registered",
    });
  });

  it("rejects a different schema under a registered version", () => {
    registry.register(decl("T", 1, { type: "string" }));
    expect(errorOf(registry.register(decl("T", 1, { type: "integer" })))).toEqual({
      kind: "LineageViolation",
      reason: "DuplicateVersion",
      detail: "T@1 is already registered with a different schema",
    });
  });

  it("rejects a schema that differs only under a __proto__ property", () => {
    registry.register(decl("T", 1, parsedSchema('{"type": "object", "properties": {"__proto__": {"type": "string"}}}')));
    const changed = parsedSchema('{"type": "object", "properties": {"__proto__": {"type": "integer"}}}');
    expect(reasonOf(registry.register(decl("T", 1, changed)))).toBe("DuplicateVersion");
  });

  it("keeps the first property order when a reordered schema is redeclared", () => {
    const first = { type: "object", properties: { a: { type: "string" }, b: { type: "string" } } };
    const reordered = { type: "object", properties: { b: { type: "string" }, a: { type: "string" } } };
    registry.register(decl("T", 1, first));
    const again = registry.register(decl("T", 1, reordered));
    expect(again.ok && again.noop).toBe(true);
    const node = registry.lookup("T", 1)?.node;
    if (node?.kind !== "object") throw new Error("expected an object schema");
    expect([...node.properties.keys()]).toEqual(["a", "b"]);
  });

  it("takes the branching policy from the type that declared the parent", () => {
    const strictDeclarer = { name: "meta.Strict", version: 1 };
    registry.register(
      decl("meta.Strict", 1, {
        type: "object",
        properties: { name: { type: "string" }, schema: { type: "object" } },
        required: ["name", "schema"],
        "x-branching": false,
      }),
    );
    registry.register(decl("X", 1, { type: "string" }, { declaredBy: strictDeclarer }));
    registry.register(decl("X", 2, { type: "string" }, { parent: 1, declaredBy: strictDeclarer }));
    expect(reasonOf(registry.register(decl("X", 3, { type: "string" }, { parent: 1 })))).toBe("BranchingForbidden");

    registry.register(decl("Y", 1, { type: "string" }));
    registry.register(decl("Y", 2, { type: "string" }, { parent: 1, declaredBy: strictDeclarer }));
    const branch = registry.register(decl("Y", 3, { type: "string" }, { parent: 1, declaredBy: strictDeclarer }));
    expect(branch.ok).toBe(true);
  });

  it("rejects a version claiming a second parent", () => {
    registry.register(decl("T", 1, { type: "string" }));
    registry.register(decl("T", 2, { type: "string" }, { parent: 1 }));
    registry.register(decl("T", 3, { type: "string" }, { parent: 2 }));
    expect(errorOf(registry.register(decl("T", 3, { type: "string" }, { parent: 1 })))).toEqual({
      kind: "LineageViolation",
      reason: "ConflictingParent",
      detail: "T@3 is registered with parent 2; a version cannot also claim parent 1",
    });
  });

  it("protects the reserved namespace", () => {
    expect(reasonOf(registry.register(decl("core.Audit", 1, { type: "object" })))).toBe("ReservedName");
    expect(reasonOf(registry.register(decl("TypeDeclared", 2, { type: "object" }, { parent: 1 })))).toBe(
      "ReservedName",
    );
    expect(reasonOf(registry.register(decl("TypeDeclared", 1, { type: "object" })))).toBe("ReservedName");
    const restated = registry.register(decl("TypeDeclared", 1, bootstrapSeedSchema()));
    expect(restated.ok && restated.noop).toBe(true);
  });

  it("requires referenced types to be registered first", () => {
    const customer = {
      type: "object",
      properties: { address: { $ref: "#/$defs/common.Address@1" } },
    };
    expect(errorOf(registry.register(decl("shop.Customer", 1, customer)))).toEqual({
      kind: "DeclareBeforeUseViolation",
      type: "common.Address@1",
      path: "schema.properties.address.$ref",
      detail:
        "schema.properties.address.$ref: $ref '#/$defs/common.Address@1' targets type common.Address@1, which is not declared",
    });
    expect(registry.has("shop.Customer", 1)).toBe(false);

    registry.register(decl("common.Address", 1, ADDRESS_SCHEMA));
    expect(registry.register(decl("shop.Customer", 1, customer)).ok).toBe(true);
  });

  it("lets a schema reference its own identity", () => {
    const node = {
      type: "object",
      properties: { next: { $ref: "#/$defs/list.Node@1" }, self: { $ref: "#/$defs/list.Node" } },
    };
    expect(registry.register(decl("list.Node", 1, node)).ok).toBe(true);
  });

  it("rejects local reference cycles", () => {
    const schema = {
      $defs: { A: { $ref: "#/$defs/B" }, B: { $ref: "#/$defs/A" } },
      type: "object",
      properties: { x: { $ref: "#/$defs/A" } },
    };
    expect(errorOf(registry.register(decl("Loop", 1, schema)))).toEqual({
      kind: "RefResolutionError",
      path: "schema.$defs.A.$ref",
      ref: "#/$defs/B",
      detail: "schema.$defs.A.$ref: $ref '#/$defs/B' is part of a reference cycle",
    });
  });

  it("reports a $defs key that is neither local nor a type name", () => {
    const schema = { type: "object", properties: { x: { $ref: "#/$defs/not a tag" } } };
    expect(errorOf(registry.register(decl("Bad", 1, schema)))).toMatchObject({
      kind: "RefResolutionError",
      path: "schema.properties.x.$ref",
    });
  });

  it("leaves the registry untouched when a registration fails", () => {
    registry.register(decl("T", 1, { type: "string" }));
    const before = registry.fingerprint();
    registry.register(decl("T", 2, { type: "date" }, { parent: 1 }));
    registry.register(decl("T", 3, { type: "string" }, { parent: 7 }));
    expect(registry.fingerprint()).toBe(before);
    expect(registry.versions("T")).toEqual([1]);
  });

  it("marks declaring types by structure and reads the branching annotation", () => {
    const result = registry.register(
      decl("meta.EntityDeclared", 1, {
        type: "object",
        properties: { name: { type: "string" }, schema: { type: "object" } },
        required: ["name", "schema"],
        "x-branching": false,
      }),
    );
    expect(result.ok && result.entry.declaring).toBe(true);
    expect(result.ok && result.entry.branching).toBe(false);
    expect(registry.declaringTypes()).toEqual(["TypeDeclared@1", "meta.EntityDeclared@1"]);
  });

  it("fingerprints registry contents", () => {
    const other = new TypeRegistry();
    other.registerBootstrap(0);
    expect(other.fingerprint()).toBe(registry.fingerprint());
    other.register(decl("T", 1, { type: "string" }));
    expect(other.fingerprint()).not.toBe(registry.fingerprint());
    expect(other.fingerprint()).toMatch(/^[0-9a-f]{64}$/);
  });
});
