/**
 * Lineage tracker — the per-name version tree.
 *
 * Tree rule:
 *   - the first declared version of a name is its root and has no parent
 *   - every later version names exactly one registered version of the same
 *     name as parent, and is greater than it
 *   - branching (several children of one version) is allowed unless the
 *     type that declared the parent version forbids it; merging cannot be
 *     expressed
 *
 * Versions are never evicted, so references to old versions stay valid.
 */

import { lineageViolation, type LineageViolation } from "./errors.js";

interface LineageNode {
  version: number;
  parent: number | null;
  children: number[];
}

export class LineageTracker {
  private readonly trees = new Map<string, Map<number, LineageNode>>();

  has(name: string, version: number): boolean {
    return this.trees.get(name)?.has(version) ?? false;
  }

  /** Versions of `name` in declaration order. */
  versions(name: string): number[] {
    return [...(this.trees.get(name)?.keys() ?? [])];
  }

  /** Parent of a version: null for a root, undefined when not registered. */
  parentOf(name: string, version: number): number | null | undefined {
    return this.trees.get(name)?.get(version)?.parent;
  }

  childrenOf(name: string, version: number): readonly number[] {
    return this.trees.get(name)?.get(version)?.children ?? [];
  }

  roots(name: string): number[] {
    const tree = this.trees.get(name);
    if (!tree) return [];
    return [...tree.values()].filter((n) => n.parent === null).map((n) => n.version);
  }

  /**
   * Check whether `version` may join the tree of `name` under `parent`.
   * The version itself must not be registered yet. Does not mutate.
   */
  check(
    name: string,
    version: number,
    parent: number | undefined,
    branching: boolean,
  ): LineageViolation | undefined {
    const tree = this.trees.get(name);
    if (!tree || tree.size === 0) {
      if (parent !== undefined) {
        return lineageViolation(
          "UnknownParent",
          `${name}@${version} names parent version ${parent}, but ${name} has no registered versions`,
        );
      }
      return undefined;
    }
    if (parent === undefined) {
      return lineageViolation(
        "MissingParent",
        `${name}@${version} must name a parent version: ${name} is already registered`,
      );
    }
    const parentNode = tree.get(parent);
    if (!parentNode) {
      return lineageViolation(
        "UnknownParent",
        `${name}@${version} names parent version ${parent}, which is not registered`,
      );
    }
    if (version <= parent) {
      return lineageViolation(
        "NonMonotonicVersion",
        `${name}@${version} must be greater than its parent version ${parent}`,
      );
    }
    if (!branching && parentNode.children.length > 0) {
      return lineageViolation(
        "BranchingForbidden",
        `${name}@${parent} already has child version ${parentNode.children.join(", ")}; branching is forbidden`,
      );
    }
    return undefined;
  }

  addRoot(name: string, version: number): void {
    let tree = this.trees.get(name);
    if (!tree) {
      tree = new Map();
      this.trees.set(name, tree);
    }
    if (tree.has(version)) throw new Error(`${name}@${version} is already in the lineage`);
    tree.set(version, { version, parent: null, children: [] });
  }

  addChild(name: string, version: number, parent: number): void {
    const tree = this.trees.get(name);
    const parentNode = tree?.get(parent);
    if (!tree || !parentNode) throw new Error(`${name}@${parent} is not in the lineage`);
    if (tree.has(version)) throw new Error(`${name}@${version} is already in the lineage`);
    tree.set(version, { version, parent, children: [] });
    parentNode.children.push(version);
  }

  /** Versions from the root down to `version`, inclusive. Empty when unknown. */
  ancestors(name: string, version: number): number[] {
    const tree = this.trees.get(name);
    const chain: number[] = [];
    let node = tree?.get(version);
    while (node) {
      chain.unshift(node.version);
      node = node.parent === null ? undefined : tree?.get(node.parent);
    }
    return chain;
  }

  /** True when `ancestor` lies strictly above `candidate` in the tree of `name`. */
  isDescendant(name: string, candidate: number, ancestor: number): boolean {
    if (candidate === ancestor) return false;
    return this.ancestors(name, candidate).includes(ancestor);
  }
}
