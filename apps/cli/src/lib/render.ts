/**
 * Report rendering — entries, summaries and version trees as text lines.
 * Pure: no I/O.
 */

import type {
  RejectedEntry,
  ReportEntry,
  StreamDecodeError,
  TypeRegistry,
  ValidationSummary,
} from "@esml/core";

// ── Entries ─────────────────────────────────────────────────────────

/** `line 3, col 1, event 2` — or just `event 2` for records without a position. */
export function formatLocation(entry: ReportEntry): string {
  const event = `event ${entry.index}`;
  return entry.line !== undefined && entry.column !== undefined
    ? `line ${entry.line}, col ${entry.column}, ${event}`
    : event;
}

export function formatRejection(entry: RejectedEntry): string {
  const kind = entry.reason ? `${entry.errorKind}(${entry.reason})` : entry.errorKind;
  return `ERROR: ${formatLocation(entry)}: ${kind}: ${entry.detail}`;
}

export function formatAbort(entry: RejectedEntry): string {
  return `ABORTED: ${formatLocation(entry)}: ${entry.errorKind}: ${entry.detail}`;
}

export function formatDecodeError(err: StreamDecodeError): string {
  return `ERROR: ${err.message}`;
}

export function formatJsonl(value: unknown): string {
  return JSON.stringify(value);
}

// ── Summary ─────────────────────────────────────────────────────────

export function formatResult(summary: ValidationSummary): string {
  return summary.rejected === 0
    ? "OK"
    : `FAILED: ${summary.rejected} of ${summary.total} records rejected`;
}

function formatVersions(versions: ValidationSummary["registry"][string]): string {
  return versions.map((v) => (v.parent === null ? `${v.version}` : `${v.version}<-${v.parent}`)).join(", ");
}

export function formatSummary(summary: ValidationSummary): string[] {
  const lines = [
    `Total events: ${summary.total}`,
    `  Type-declaring events: ${summary.declarations}`,
    `  Normal events: ${summary.events}`,
    `  Rejected events: ${summary.rejected}`,
    `Declared types (unique): ${Object.keys(summary.registry).length}`,
    `Declarer-capable types: ${summary.declaringTypes.join(", ")}`,
    "Event counts by type:",
  ];
  for (const [tag, count] of Object.entries(summary.countsByType)) {
    lines.push(`  ${tag}: ${count}`);
  }
  lines.push("Registry:");
  for (const [name, versions] of Object.entries(summary.registry)) {
    lines.push(`  ${name}: ${formatVersions(versions)}`);
  }
  lines.push(`Registry fingerprint: ${summary.fingerprint}`);
  return lines;
}

// ── Lineage ─────────────────────────────────────────────────────────

/** Version tree of `name`, one version per line, children indented under parents. */
export function formatTree(registry: TypeRegistry, name: string): string[] {
  const { lineage } = registry;
  const lines = [name];
  const visit = (version: number, depth: number): void => {
    const entry = registry.lookup(name, version);
    const log = entry?.log ? `  # ${entry.log}` : "";
    lines.push(`${"  ".repeat(depth)}@${version}${log}`);
    for (const child of lineage.childrenOf(name, version)) visit(child, depth + 1);
  };
  for (const root of lineage.roots(name)) visit(root, 1);
  return lines;
}

/** `name@3: 1 -> 2 -> 3` */
export function formatAncestry(registry: TypeRegistry, name: string, version: number): string {
  return `${name}@${version}: ${registry.lineage.ancestors(name, version).join(" -> ")}`;
}
