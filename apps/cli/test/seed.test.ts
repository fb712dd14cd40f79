import { describe, it, expect } from "vitest";
import { validateRecords } from "@esml/core";
import { seedCommand } from "../src/commands/seed.js";
import { bufferedOutput } from "../src/lib/output.js";

describe("seed", () => {
  it("prints a record that bootstraps a stream", () => {
    const out = bufferedOutput();
    seedCommand({ log: "genesis" }, out);
    expect(out.stdout).toHaveLength(1);
    const record: unknown = JSON.parse(out.stdout[0] ?? "");
    expect(record).toMatchObject({ type: "TypeDeclared@1", data: { name: "TypeDeclared", version: 1, log: "genesis" } });
    expect(validateRecords([record]).status).toBe("completed");
  });

  it("pretty-prints the same record", () => {
    const compact = bufferedOutput();
    const pretty = bufferedOutput();
    seedCommand({}, compact);
    seedCommand({ pretty: true }, pretty);
    const printed = pretty.stdout[0] ?? "";
    expect(printed.split("\n").length).toBeGreaterThan(1);
    expect(JSON.parse(printed)).toEqual(JSON.parse(compact.stdout[0] ?? ""));
  });
});
