import type { ElementDefinition } from 'cytoscape';

import type { PolicyObject } from '../catalog/PolicyObject';
import type { RelationshipGraph } from './RelationshipGraph';

export type CytoscapeGraph = {
  elements: ElementDefinition[];
};

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const nodeFor = (object: PolicyObject, order: number): ElementDefinition => ({
  group: 'nodes',
  data: {
    id: object.uid,
    label: object.name,
    kind: object.kind,
    objectType: object.type,
    order,
  },
});

/**
 * GraphRenderingAdapter (read-only).
 *
 * Responsibilities:
 * - Transform the subgraph induced by a set of object uids into Cytoscape element definitions.
 *
 * Non-responsibilities:
 * - No traversal, no layout, no mutation.
 *
 * Nodes keep the order of `uids` (the associated-set discovery order); edges are
 * sorted by method, source and target. The two records of a containment pair
 * collapse into one undirected element.
 */
export class GraphRenderingAdapter {
  toCytoscape(graph: RelationshipGraph, uids: readonly string[]): CytoscapeGraph {
    const included = new Set(uids);
    const nodes: ElementDefinition[] = [];
    uids.forEach((uid, idx) => {
      const object = graph.catalog.get(uid);
      if (object) nodes.push(nodeFor(object, idx));
    });

    const edgeById = new Map<string, ElementDefinition>();
    for (const uid of uids) {
      for (const edge of graph.incidentEdges(uid)) {
        if (!included.has(edge.start) || !included.has(edge.end)) continue;

        const [source, target] =
          edge.method === 'Containment' && compareStrings(edge.end, edge.start) < 0
            ? [edge.end, edge.start]
            : [edge.start, edge.end];
        const id = `${edge.method}:${source}->${target}`;
        if (edgeById.has(id)) continue;

        edgeById.set(id, {
          group: 'edges',
          data: {
            id,
            source,
            target,
            method: edge.method,
            directed: edge.method === 'Membership',
          },
        });
      }
    }

    const edges = Array.from(edgeById.entries())
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([, element]) => element);

    return { elements: [...nodes, ...edges] };
  }
}
