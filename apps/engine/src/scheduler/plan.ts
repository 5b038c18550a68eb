import { ConfigurationError } from '../errors';

export type DependencyNode = {
  id: string;
  depends_on?: string | undefined;
};

/**
 * Groups checks into execution levels: level 0 has no dependency, level n depends on a
 * check in level n-1. Input order is preserved within a level.
 *
 * Throws ConfigurationError for unknown dependency targets, self references and cycles.
 */
export function buildExecutionLevels<T extends DependencyNode>(nodes: readonly T[]): T[][] {
  const byId = new Map<string, T>();
  for (const node of nodes) {
    byId.set(node.id, node);
  }

  for (const node of nodes) {
    if (node.depends_on === undefined) continue;
    if (node.depends_on === node.id) {
      throw new ConfigurationError(`Check ${node.id} depends on itself`);
    }
    if (!byId.has(node.depends_on)) {
      throw new ConfigurationError(`Check ${node.id} depends on unknown check ${node.depends_on}`);
    }
  }

  const depth = new Map<string, number>();

  function depthOf(node: T, path: string[]): number {
    const known = depth.get(node.id);
    if (known !== undefined) return known;

    if (path.includes(node.id)) {
      const cycle = [...path.slice(path.indexOf(node.id)), node.id].join(' -> ');
      throw new ConfigurationError(`Dependency cycle: ${cycle}`);
    }

    let d = 0;
    if (node.depends_on !== undefined) {
      const parent = byId.get(node.depends_on);
      if (parent) d = depthOf(parent, [...path, node.id]) + 1;
    }
    depth.set(node.id, d);
    return d;
  }

  const levels: T[][] = [];
  for (const node of nodes) {
    const d = depthOf(node, []);
    while (levels.length <= d) levels.push([]);
    levels[d]?.push(node);
  }

  return levels;
}
