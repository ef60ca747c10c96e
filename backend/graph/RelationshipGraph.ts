import type { ObjectCatalog } from '../catalog/ObjectCatalog';
import type { PolicyObject } from '../catalog/PolicyObject';
import { DomainError } from '../reliability/DomainError';
import { cidrContains, formatCidr, parseCidr, parseIpv4 } from './Ipv4';

/**
 * - `Containment`: a host address falls inside a network; installed once per direction.
 * - `Membership`: an object is listed as a group member; one record, group → member,
 *   visible from both endpoints.
 */
export type EdgeMethod = 'Containment' | 'Membership';

export type EdgeHandle = number;

export type GraphEdge = {
  readonly handle: EdgeHandle;
  readonly start: string;
  readonly end: string;
  readonly method: EdgeMethod;
};

/**
 * Relationship graph over one catalog.
 *
 * Edges live in an arena and are addressed by handle; every object keeps the
 * handles of the edges it participates in, in installation order.
 */
export class RelationshipGraph {
  readonly catalog: ObjectCatalog;

  private readonly edges: GraphEdge[] = [];
  private readonly incidence = new Map<string, EdgeHandle[]>();

  constructor(catalog: ObjectCatalog) {
    this.catalog = catalog;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  edge(handle: EdgeHandle): GraphEdge {
    const edge = this.edges[handle];
    if (!edge) {
      throw new DomainError({
        code: 'DATA_INTEGRITY_ERROR',
        message: `Unknown edge handle ${handle}.`,
        details: { handle },
      });
    }
    return edge;
  }

  incidentEdges(uid: string): readonly GraphEdge[] {
    return (this.incidence.get(uid) ?? []).map((h) => this.edge(h));
  }

  edgesByMethod(method: EdgeMethod): readonly GraphEdge[] {
    return this.edges.filter((e) => e.method === method);
  }

  private allocate(start: string, end: string, method: EdgeMethod): EdgeHandle {
    const handle = this.edges.length;
    this.edges.push({ handle, start, end, method });
    return handle;
  }

  private attach(uid: string, handle: EdgeHandle): void {
    const existing = this.incidence.get(uid);
    if (existing) existing.push(handle);
    else this.incidence.set(uid, [handle]);
  }

  addMembership(group: PolicyObject, member: PolicyObject): void {
    const handle = this.allocate(group.uid, member.uid, 'Membership');
    this.attach(member.uid, handle);
    this.attach(group.uid, handle);
  }

  addContainment(host: PolicyObject, network: PolicyObject): void {
    this.attach(host.uid, this.allocate(host.uid, network.uid, 'Containment'));
    this.attach(network.uid, this.allocate(network.uid, host.uid, 'Containment'));
  }
}

/**
 * Builds membership edges (every group member) and containment edges (every
 * network × host pair whose address is inside the subnet).
 */
export const buildRelationshipGraph = (catalog: ObjectCatalog): RelationshipGraph => {
  const graph = new RelationshipGraph(catalog);

  for (const group of catalog.byKind('group')) {
    for (const memberUid of group.members) {
      const member = catalog.require(memberUid, `group "${group.name}" (${group.uid})`);
      graph.addMembership(group, member);
    }
  }

  const hosts = catalog
    .byKind('host')
    .map((host) => ({ host, address: parseIpv4(host.ipv4Address) }));

  for (const network of catalog.byKind('network')) {
    const range = parseCidr(network.subnet4, network.maskLength4);
    if (!range) {
      throw new DomainError({
        code: 'DATA_INTEGRITY_ERROR',
        message: `Network "${network.name}" (${network.uid}) has an unparsable subnet "${formatCidr(network.subnet4, network.maskLength4)}".`,
        details: { uid: network.uid, subnet4: network.subnet4, maskLength4: network.maskLength4 },
      });
    }

    for (const { host, address } of hosts) {
      if (address !== null && cidrContains(range, address)) {
        graph.addContainment(host, network);
      }
    }
  }

  return graph;
};
