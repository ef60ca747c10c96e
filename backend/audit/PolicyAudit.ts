import { associatedSet } from '../analysis/AssociatedSet';
import { classifyRules, type RuleClassification } from '../analysis/RuleClassifier';
import {
  loadCatalog,
  resolveTarget,
  type ObjectCatalog,
  type TargetSelector,
} from '../catalog/ObjectCatalog';
import type { PolicyObject } from '../catalog/PolicyObject';
import { buildRelationshipGraph, type RelationshipGraph } from '../graph/RelationshipGraph';
import { collectAccessRules, type AccessRule } from '../rules/AccessRule';
import type { Telemetry } from '../telemetry/Telemetry';

export type PolicyAuditInput = {
  objectRecords: readonly unknown[];
  ruleRecords: readonly unknown[];
  target: TargetSelector;
};

export type PolicyAuditResult = RuleClassification & {
  catalog: ObjectCatalog;
  graph: RelationshipGraph;
  target: PolicyObject;
  associated: PolicyObject[];
  rules: AccessRule[];
};

/**
 * Runs the whole audit for one target. Every stage either completes or throws;
 * no partial result is returned.
 */
export function runPolicyAudit(input: PolicyAuditInput, telemetry: Telemetry): PolicyAuditResult {
  const catalog = telemetry.measure('audit.catalog.load', () => loadCatalog(input.objectRecords), (c) => ({
    metrics: {
      objectCount: c.size,
      duplicateUidCount: c.duplicateUids().length,
      duplicateNameCount: c.duplicateNames().size,
    },
  }));

  const graph = telemetry.measure('audit.graph.build', () => buildRelationshipGraph(catalog), (g) => ({
    metrics: {
      edgeCount: g.edgeCount,
      membershipEdgeCount: g.edgesByMethod('Membership').length,
      containmentEdgeCount: g.edgesByMethod('Containment').length,
    },
  }));

  const target = resolveTarget(catalog, input.target);

  const associated = telemetry.measure('audit.associated', () => associatedSet(graph, target.uid), (a) => ({
    tags: { targetUid: target.uid },
    metrics: { associatedCount: a.length },
  }));

  const rules = collectAccessRules(input.ruleRecords);

  const classification = telemetry.measure('audit.rules.classify', () => classifyRules(rules, associated, catalog), (c) => ({
    metrics: {
      ruleCount: rules.length,
      inboundCount: c.inbound.length,
      outboundCount: c.outbound.length,
    },
  }));

  return { catalog, graph, target, associated, rules, ...classification };
}
