export type PolicyObjectKind = 'host' | 'network' | 'group' | 'service' | 'other';

/** Export type tag of the universal "Any" placeholder object. */
export const ANY_OBJECT_TYPE = 'CpmiAnyObject';

/** Name of the rulebase action object that lets traffic through. */
export const ACCEPT_ACTION_NAME = 'Accept';

/**
 * Fields shared by every object of a policy export.
 *
 * Notes:
 * - `uid` is opaque and stable within one export.
 * - `name` is human-chosen and not guaranteed unique.
 * - `type` keeps the export's own type tag (e.g. `service-tcp`, `CpmiAnyObject`).
 */
type PolicyObjectBase = {
  readonly uid: string;
  readonly name: string;
  readonly comments: string;
  readonly type: string;
};

export type HostObject = PolicyObjectBase & {
  readonly kind: 'host';
  /** Empty when the export carries no IPv4 address for the host. */
  readonly ipv4Address: string;
};

export type NetworkObject = PolicyObjectBase & {
  readonly kind: 'network';
  readonly subnet4: string;
  readonly maskLength4: number;
};

export type GroupObject = PolicyObjectBase & {
  readonly kind: 'group';
  /** Member uids in export order; members may be groups themselves. */
  readonly members: readonly string[];
};

export type ServiceObject = PolicyObjectBase & {
  readonly kind: 'service';
  readonly port: string;
  readonly protocol: string;
};

export type OtherObject = PolicyObjectBase & {
  readonly kind: 'other';
};

export type PolicyObject =
  | HostObject
  | NetworkObject
  | GroupObject
  | ServiceObject
  | OtherObject;

export const kindForType = (type: string): PolicyObjectKind => {
  switch (type) {
    case 'host':
      return 'host';
    case 'network':
      return 'network';
    case 'group':
    case 'service-group':
      return 'group';
    default:
      return type.startsWith('service-') ? 'service' : 'other';
  }
};
