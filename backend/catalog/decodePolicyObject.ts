import {
  createFieldReader,
  finishDecode,
  isJsonRecord,
  type DecodeResult,
} from '../io/recordFields';
import { kindForType, type PolicyObject } from './PolicyObject';

/**
 * Decodes one record of the object export into its `PolicyObject` variant.
 *
 * Only the fields the relationship graph and the reports read are checked.
 */
export const decodePolicyObject = (record: unknown): DecodeResult<PolicyObject> => {
  if (!isJsonRecord(record)) {
    return { ok: false, error: 'object record must be a JSON object' };
  }

  const f = createFieldReader(record);
  const base = {
    uid: f.string('uid'),
    name: f.string('name'),
    comments: f.string('comments'),
    type: f.string('type'),
  };

  if (!base.uid && f.errors.length === 0) {
    return { ok: false, error: 'field "uid" is required' };
  }

  switch (kindForType(base.type)) {
    case 'host':
      return finishDecode<PolicyObject>(f, {
        ...base,
        kind: 'host',
        ipv4Address: f.string('ipv4-address'),
      });
    case 'network':
      return finishDecode<PolicyObject>(f, {
        ...base,
        kind: 'network',
        subnet4: f.string('subnet4'),
        maskLength4: f.number('mask-length4'),
      });
    case 'group':
      return finishDecode<PolicyObject>(f, {
        ...base,
        kind: 'group',
        members: f.uidList('members'),
      });
    case 'service':
      return finishDecode<PolicyObject>(f, {
        ...base,
        kind: 'service',
        port: f.text('port'),
        protocol: f.string('protocol'),
      });
    case 'other':
      return finishDecode<PolicyObject>(f, { ...base, kind: 'other' });
  }
};
