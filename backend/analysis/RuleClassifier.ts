import type { ObjectCatalog } from '../catalog/ObjectCatalog';
import {
  ACCEPT_ACTION_NAME,
  ANY_OBJECT_TYPE,
  type PolicyObject,
} from '../catalog/PolicyObject';
import type { AccessRule } from '../rules/AccessRule';

export type RuleClassification = {
  /** Rules whose destination side matches: traffic into the associated set. */
  inbound: AccessRule[];
  /** Rules whose source side matches: traffic out of the associated set. */
  outbound: AccessRule[];
};

/**
 * Partitions enabled accept rules by which side references the associated set.
 *
 * - The source side is checked first; a rule lands in at most one bucket.
 * - A side matches when one of its uids is associated or is the "Any" object.
 * - A negated side never matches; negation is not inverted into a match.
 * - Buckets keep rulebase order.
 */
export const classifyRules = (
  rules: readonly AccessRule[],
  associated: readonly PolicyObject[],
  catalog: ObjectCatalog,
): RuleClassification => {
  const associatedUids = new Set(associated.map((o) => o.uid));

  const matches = (uid: string, rule: AccessRule): boolean =>
    associatedUids.has(uid) ||
    catalog.require(uid, `rule ${rule.ruleNumber} (${rule.uid})`).type === ANY_OBJECT_TYPE;

  const isAccept = (rule: AccessRule): boolean =>
    catalog.require(rule.action, `the action of rule ${rule.ruleNumber} (${rule.uid})`).name ===
    ACCEPT_ACTION_NAME;

  const result: RuleClassification = { inbound: [], outbound: [] };

  for (const rule of rules) {
    if (!rule.enabled || !isAccept(rule)) continue;

    if (!rule.sourceNegate && rule.source.some((uid) => matches(uid, rule))) {
      result.outbound.push(rule);
      continue;
    }

    if (!rule.destinationNegate && rule.destination.some((uid) => matches(uid, rule))) {
      result.inbound.push(rule);
    }
  }

  return result;
};
