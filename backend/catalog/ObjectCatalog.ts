import { DomainError } from '../reliability/DomainError';
import { decodePolicyObject } from './decodePolicyObject';
import type { PolicyObject, PolicyObjectKind } from './PolicyObject';

/**
 * In-memory catalog of one policy export.
 *
 * Responsibilities:
 * - Own every decoded object, keyed by uid (the only allocator of objects).
 * - Keep a name → uid index for target lookup.
 * - Remember duplicate uids and names so callers can report them.
 *
 * Non-responsibilities:
 * - No relationships (see RelationshipGraph).
 * - No mutation after load.
 */
export class ObjectCatalog {
  private readonly byUid = new Map<string, PolicyObject>();
  private readonly nameIndex = new Map<string, string>();
  private readonly uidsByName = new Map<string, string[]>();
  private readonly duplicates = new Set<string>();

  /** Last write wins, for both the uid map and the name index. */
  insert(object: PolicyObject): void {
    const previous = this.byUid.get(object.uid);
    if (previous) {
      this.duplicates.add(object.uid);
      this.forgetName(previous.name, previous.uid);
      // Re-insert so iteration order follows the winning record.
      this.byUid.delete(object.uid);
    }

    this.byUid.set(object.uid, object);
    this.nameIndex.set(object.name, object.uid);

    const uids = this.uidsByName.get(object.name);
    if (uids) uids.push(object.uid);
    else this.uidsByName.set(object.name, [object.uid]);
  }

  private forgetName(name: string, uid: string): void {
    const uids = (this.uidsByName.get(name) ?? []).filter((u) => u !== uid);
    if (uids.length > 0) this.uidsByName.set(name, uids);
    else this.uidsByName.delete(name);

    if (this.nameIndex.get(name) === uid) {
      const remaining = uids[uids.length - 1];
      if (remaining) this.nameIndex.set(name, remaining);
      else this.nameIndex.delete(name);
    }
  }

  get size(): number {
    return this.byUid.size;
  }

  get(uid: string): PolicyObject | null {
    return this.byUid.get(uid) ?? null;
  }

  /** Like `get`, but an unknown uid is a data integrity error naming `context`. */
  require(uid: string, context: string): PolicyObject {
    const object = this.byUid.get(uid);
    if (!object) {
      throw new DomainError({
        code: 'DATA_INTEGRITY_ERROR',
        message: `Unknown object uid "${uid}" referenced by ${context}.`,
        details: { uid, context },
      });
    }
    return object;
  }

  resolveName(name: string): string | null {
    return this.nameIndex.get(name) ?? null;
  }

  /** Every uid carrying `name`, in insertion order. */
  uidsForName(name: string): readonly string[] {
    return this.uidsByName.get(name) ?? [];
  }

  all(): readonly PolicyObject[] {
    return Array.from(this.byUid.values());
  }

  byKind<K extends PolicyObjectKind>(kind: K): Array<Extract<PolicyObject, { kind: K }>> {
    const matches: Array<Extract<PolicyObject, { kind: K }>> = [];
    for (const object of this.byUid.values()) {
      if (isKind(object, kind)) matches.push(object);
    }
    return matches;
  }

  duplicateUids(): readonly string[] {
    return Array.from(this.duplicates);
  }

  /** Names shared by more than one object, with the uids sharing them. */
  duplicateNames(): ReadonlyMap<string, readonly string[]> {
    const out = new Map<string, readonly string[]>();
    for (const [name, uids] of this.uidsByName) {
      if (uids.length > 1) out.set(name, [...uids]);
    }
    return out;
  }
}

const isKind = <K extends PolicyObjectKind>(
  object: PolicyObject,
  kind: K,
): object is Extract<PolicyObject, { kind: K }> => object.kind === kind;

/**
 * Decodes every record into the catalog. The first record that fails to decode
 * aborts the load: a partially decoded export is not audited.
 */
export const loadCatalog = (records: readonly unknown[]): ObjectCatalog => {
  const catalog = new ObjectCatalog();

  records.forEach((record, index) => {
    const decoded = decodePolicyObject(record);
    if (!decoded.ok) {
      throw new DomainError({
        code: 'LOAD_ERROR',
        message: `Object record #${index} could not be decoded: ${decoded.error}.`,
        details: { index },
      });
    }
    catalog.insert(decoded.value);
  });

  return catalog;
};

export type TargetSelector = { name: string } | { uid: string };

/**
 * Resolves the audit target. A name shared by several objects is rejected with
 * the candidate uids rather than silently picking one of them.
 */
export const resolveTarget = (catalog: ObjectCatalog, selector: TargetSelector): PolicyObject => {
  if ('uid' in selector) {
    const object = catalog.get(selector.uid);
    if (!object) {
      throw new DomainError({
        code: 'NOT_FOUND',
        message: `No object with uid "${selector.uid}" in the export.`,
        details: { uid: selector.uid },
      });
    }
    return object;
  }

  const uids = catalog.uidsForName(selector.name);
  if (uids.length > 1) {
    throw new DomainError({
      code: 'VALIDATION_ERROR',
      message: `Target name "${selector.name}" is ambiguous; select one of these uids: ${uids.join(', ')}.`,
      details: { name: selector.name, uids },
    });
  }

  const uid = catalog.resolveName(selector.name);
  const object = uid ? catalog.get(uid) : null;
  if (!object) {
    throw new DomainError({
      code: 'NOT_FOUND',
      message: `No object named "${selector.name}" in the export.`,
      details: { name: selector.name },
    });
  }
  return object;
};
