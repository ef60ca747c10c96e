import { DomainError } from '../reliability/DomainError';
import {
  createFieldReader,
  finishDecode,
  isJsonRecord,
  type DecodeResult,
  type JsonRecord,
} from '../io/recordFields';

/**
 * One access-control entry of the rulebase export.
 *
 * All object references (action, sources, destinations, services) are uids and
 * are resolved against the catalog only when the rule is classified or rendered.
 */
export type AccessRule = {
  readonly uid: string;
  readonly name: string;
  readonly type: string;
  /** uid of the rulebase action object (Accept, Drop, ...). */
  readonly action: string;
  readonly enabled: boolean;
  readonly source: readonly string[];
  readonly destination: readonly string[];
  readonly sourceNegate: boolean;
  readonly destinationNegate: boolean;
  readonly service: readonly string[];
  readonly ruleNumber: number;
  readonly comments: string;
};

const ACCESS_RULE_MARKER = 'access-rule';
const ACCESS_SECTION_TYPE = 'access-section';

export const decodeAccessRule = (record: unknown): DecodeResult<AccessRule> => {
  if (!isJsonRecord(record)) {
    return { ok: false, error: 'rule record must be a JSON object' };
  }

  const f = createFieldReader(record);
  return finishDecode<AccessRule>(f, {
    uid: f.string('uid'),
    name: f.string('name'),
    type: f.string('type'),
    action: f.uidRef('action'),
    enabled: f.boolean('enabled'),
    source: f.uidList('source'),
    destination: f.uidList('destination'),
    sourceNegate: f.boolean('source-negate'),
    destinationNegate: f.boolean('destination-negate'),
    service: f.uidList('service'),
    ruleNumber: f.number('rule-number'),
    comments: f.string('comments'),
  });
};

const typeOf = (record: JsonRecord): string =>
  typeof record.type === 'string' ? record.type : '';

/**
 * Picks the access rules out of a rulebase export, in export order.
 *
 * Sections are flattened: the rules nested in an `access-section` record's
 * `rulebase` take the section's place. Records that are neither rules nor
 * sections are skipped.
 */
export const collectAccessRules = (records: readonly unknown[]): AccessRule[] => {
  const rules: AccessRule[] = [];

  const visit = (items: readonly unknown[], path: string) => {
    items.forEach((item, index) => {
      if (!isJsonRecord(item)) return;
      const where = `${path}[${index}]`;
      const type = typeOf(item);

      if (type === ACCESS_SECTION_TYPE) {
        if (Array.isArray(item.rulebase)) visit(item.rulebase, `${where}.rulebase`);
        return;
      }
      if (!type.includes(ACCESS_RULE_MARKER)) return;

      const decoded = decodeAccessRule(item);
      if (!decoded.ok) {
        throw new DomainError({
          code: 'LOAD_ERROR',
          message: `Rule record ${where} could not be decoded: ${decoded.error}.`,
          details: { record: where },
        });
      }
      rules.push(decoded.value);
    });
  };

  visit(records, 'rulebase');
  return rules;
};
