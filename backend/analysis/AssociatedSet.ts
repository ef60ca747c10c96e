import type { PolicyObject } from '../catalog/PolicyObject';
import type { RelationshipGraph } from '../graph/RelationshipGraph';

/**
 * Objects related to `targetUid`, in breadth-first discovery order, target first.
 *
 * Traversal:
 * 1. First hop: only networks at the far (`end`) side of the target's own edges.
 * 2. Then, from every queued object, the `start` side of each of its edges.
 *
 * Walking `start` sides means a member reaches the groups that list it (and
 * their parents, transitively), while a network does not fan out to its hosts.
 */
export const associatedSet = (graph: RelationshipGraph, targetUid: string): PolicyObject[] => {
  const target = graph.catalog.require(targetUid, 'the audit target');

  const visited = new Set<string>([target.uid]);
  const queue: PolicyObject[] = [target];

  for (const edge of graph.incidentEdges(target.uid)) {
    if (visited.has(edge.end)) continue;
    const neighbour = graph.catalog.require(edge.end, `edge ${edge.handle}`);
    if (neighbour.kind !== 'network') continue;

    visited.add(neighbour.uid);
    queue.push(neighbour);
  }

  const associated: PolicyObject[] = [];
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    associated.push(current);

    for (const edge of graph.incidentEdges(current.uid)) {
      if (visited.has(edge.start)) continue;
      visited.add(edge.start);
      queue.push(graph.catalog.require(edge.start, `edge ${edge.handle}`));
    }
  }

  return associated;
};
