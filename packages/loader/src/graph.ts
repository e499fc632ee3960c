import type { AssetId } from "@depload/ids";

export interface DependencyNode {
  id: AssetId;
  dependencyIds: readonly AssetId[];
}

export interface MissingDependency {
  assetId: AssetId;
  dependencyId: AssetId;
}

type Frame = { id: AssetId; next: number };

/**
 * Returns the first dependency cycle found as a closed path (`[a, b, a]`), or
 * null. Ids that are not among the nodes are treated as leaves.
 */
export function findDependencyCycle(nodes: Iterable<DependencyNode>): AssetId[] | null {
  const edges = new Map<AssetId, readonly AssetId[]>();
  for (const node of nodes) {
    edges.set(node.id, node.dependencyIds);
  }

  const visited = new Map<AssetId, "visiting" | "done">();
  for (const root of edges.keys()) {
    if (visited.has(root)) continue;

    visited.set(root, "visiting");
    const stack: Frame[] = [{ id: root, next: 0 }];
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const dependencyIds = edges.get(frame.id) ?? [];
      const dependencyId = dependencyIds[frame.next];
      if (dependencyId === undefined) {
        visited.set(frame.id, "done");
        stack.pop();
        continue;
      }
      frame.next += 1;

      if (!edges.has(dependencyId)) continue;
      const state = visited.get(dependencyId);
      if (state === "done") continue;
      if (state === "visiting") {
        const start = stack.findIndex((entry) => entry.id === dependencyId);
        return [...stack.slice(start).map((entry) => entry.id), dependencyId];
      }

      visited.set(dependencyId, "visiting");
      stack.push({ id: dependencyId, next: 0 });
    }
  }

  return null;
}

export function findMissingDependencies(nodes: Iterable<DependencyNode>): MissingDependency[] {
  const list = Array.from(nodes);
  const known = new Set(list.map((node) => node.id));
  const missing: MissingDependency[] = [];
  for (const node of list) {
    for (const dependencyId of node.dependencyIds) {
      if (!known.has(dependencyId)) {
        missing.push({ assetId: node.id, dependencyId });
      }
    }
  }
  return missing;
}
