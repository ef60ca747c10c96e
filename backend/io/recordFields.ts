// ─── Record field reading ─────────────────────────────────────────────────
// Shared by the object and rule decoders. Absent (or null) fields fall back
// to an empty value; present fields of the wrong shape are decode errors.

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export type JsonRecord = Record<string, unknown>;

export const isJsonRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const describe = (value: unknown): string =>
  Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;

export type FieldReader = {
  readonly errors: readonly string[];
  string(key: string): string;
  number(key: string): number;
  boolean(key: string): boolean;
  /** Accepts a string or a number, kept as text (ports are exported either way). */
  text(key: string): string;
  /** One uid, written either as a plain string or as an object carrying a `uid`. */
  uidRef(key: string): string;
  /** List of uids, each written like a `uidRef`. */
  uidList(key: string): string[];
};

const uidOf = (value: unknown): string | null => {
  if (typeof value === 'string') return value;
  if (isJsonRecord(value) && typeof value.uid === 'string') return value.uid;
  return null;
};

const UID_EXPECTED = 'a uid string or an object with a uid';

export const createFieldReader = (record: JsonRecord): FieldReader => {
  const errors: string[] = [];

  const fail = (key: string, expected: string, value: unknown) => {
    errors.push(`field "${key}" must be ${expected} (got ${describe(value)})`);
  };

  const present = (key: string): unknown => {
    const v = record[key];
    return v === null ? undefined : v;
  };

  return {
    errors,

    string(key) {
      const v = present(key);
      if (v === undefined) return '';
      if (typeof v !== 'string') {
        fail(key, 'a string', v);
        return '';
      }
      return v;
    },

    number(key) {
      const v = present(key);
      if (v === undefined) return 0;
      if (typeof v !== 'number' || !Number.isFinite(v)) {
        fail(key, 'a number', v);
        return 0;
      }
      return v;
    },

    boolean(key) {
      const v = present(key);
      if (v === undefined) return false;
      if (typeof v !== 'boolean') {
        fail(key, 'a boolean', v);
        return false;
      }
      return v;
    },

    text(key) {
      const v = present(key);
      if (v === undefined) return '';
      if (typeof v === 'number' && Number.isFinite(v)) return String(v);
      if (typeof v !== 'string') {
        fail(key, 'a string or number', v);
        return '';
      }
      return v;
    },

    uidRef(key) {
      const v = present(key);
      if (v === undefined) return '';
      const uid = uidOf(v);
      if (uid === null) {
        fail(key, UID_EXPECTED, v);
        return '';
      }
      return uid;
    },

    uidList(key) {
      const v = present(key);
      if (v === undefined) return [];
      if (!Array.isArray(v)) {
        fail(key, 'an array', v);
        return [];
      }

      const uids: string[] = [];
      for (const entry of v) {
        const uid = uidOf(entry);
        if (uid === null) {
          fail(`${key}[]`, UID_EXPECTED, entry);
          return [];
        }
        uids.push(uid);
      }
      return uids;
    },
  };
};

export const finishDecode = <T>(reader: FieldReader, value: T): DecodeResult<T> =>
  reader.errors.length > 0
    ? { ok: false, error: reader.errors.join('; ') }
    : { ok: true, value };
