import fs from 'node:fs';
import path from 'node:path';
import { gunzipSync, strFromU8, unzipSync } from 'fflate';

import { DomainError } from '../reliability/DomainError';
import { isJsonRecord } from './recordFields';

export type ExportRecords = {
  objectRecords: unknown[];
  ruleRecords: unknown[];
};

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

const loadError = (message: string, file: string, cause?: unknown) =>
  new DomainError({ code: 'LOAD_ERROR', message, details: { file }, cause });

const readBytes = (file: string): Uint8Array => {
  try {
    return fs.readFileSync(file);
  } catch (err) {
    throw loadError(`Cannot read "${file}": ${describeError(err)}.`, file, err);
  }
};

const parseJson = (bytes: Uint8Array, label: string): unknown => {
  try {
    return JSON.parse(strFromU8(bytes));
  } catch (err) {
    throw loadError(`Failed to parse JSON in "${label}": ${describeError(err)}.`, label, err);
  }
};

/** Reads one export document; `.gz` files are decompressed first. */
export const readExportFile = (file: string): unknown => {
  const raw = readBytes(file);
  if (!file.toLowerCase().endsWith('.gz')) return parseJson(raw, file);

  let inflated: Uint8Array;
  try {
    inflated = gunzipSync(raw);
  } catch (err) {
    throw loadError(`Cannot decompress "${file}": ${describeError(err)}.`, file, err);
  }
  return parseJson(inflated, file);
};

// ZIP archives may store paths with back-slashes or leading slashes.
const normalizeEntryName = (p: string): string => path.posix.basename(p.replace(/\\/g, '/'));

const isObjectsEntry = (name: string) => /^objects.*\.json$/i.test(name);
const isRulesEntry = (name: string) => /(^rules.*|rulebase.*)\.json$/i.test(name);

/** Reads a ZIP package holding one objects file and one rulebase file. */
export const readExportPackage = (file: string): { objects: unknown; rules: unknown } => {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(readBytes(file));
  } catch (err) {
    if (err instanceof DomainError) throw err;
    throw loadError(`Cannot unzip "${file}": ${describeError(err)}.`, file, err);
  }

  let objects: { name: string; bytes: Uint8Array } | null = null;
  let rules: { name: string; bytes: Uint8Array } | null = null;

  for (const [entryPath, bytes] of Object.entries(entries)) {
    const name = normalizeEntryName(entryPath);
    if (!name || bytes.length === 0) continue;
    if (!objects && isObjectsEntry(name)) objects = { name: entryPath, bytes };
    else if (!rules && isRulesEntry(name)) rules = { name: entryPath, bytes };
  }

  if (!objects || !rules) {
    const available = Object.keys(entries).join(', ');
    throw loadError(
      `Package "${file}" must contain an objects*.json and a rules*.json or *rulebase*.json file. Available files: [${available}].`,
      file,
    );
  }

  return {
    objects: parseJson(objects.bytes, `${file}:${objects.name}`),
    rules: parseJson(rules.bytes, `${file}:${rules.name}`),
  };
};

const arrayField = (document: unknown, keys: readonly string[]): unknown[] | null => {
  if (Array.isArray(document)) return document;
  if (!isJsonRecord(document)) return null;
  for (const key of keys) {
    const value = document[key];
    if (Array.isArray(value)) return value;
  }
  return null;
};

export const objectRecordsOf = (document: unknown, label: string): unknown[] => {
  const records = arrayField(document, ['objects', 'objects-dictionary']);
  if (!records) {
    throw loadError(`"${label}" is not an array of objects (nor an object with an "objects" array).`, label);
  }
  return records;
};

export const ruleRecordsOf = (document: unknown, label: string): unknown[] => {
  const records = arrayField(document, ['rulebase']);
  if (!records) {
    throw loadError(`"${label}" is not an array of rules (nor an object with a "rulebase" array).`, label);
  }
  return records;
};

/** Objects shipped inside a rulebase document (its `objects-dictionary`), if any. */
export const dictionaryRecordsOf = (document: unknown): unknown[] => {
  if (!isJsonRecord(document)) return [];
  const dictionary = document['objects-dictionary'];
  return Array.isArray(dictionary) ? dictionary : [];
};

/**
 * Combines the two export documents. Objects from the rulebase's dictionary come
 * first so the objects export wins when both describe the same uid.
 */
export const combineExportDocuments = (
  objects: { document: unknown; label: string },
  rules: { document: unknown; label: string },
): ExportRecords => ({
  objectRecords: [
    ...dictionaryRecordsOf(rules.document),
    ...objectRecordsOf(objects.document, objects.label),
  ],
  ruleRecords: ruleRecordsOf(rules.document, rules.label),
});

export type ExportSource =
  | { kind: 'files'; objectsPath: string; rulesPath: string }
  | { kind: 'package'; packagePath: string };

export const loadExportRecords = (source: ExportSource): ExportRecords => {
  if (source.kind === 'package') {
    const { objects, rules } = readExportPackage(source.packagePath);
    return combineExportDocuments(
      { document: objects, label: `${source.packagePath} (objects)` },
      { document: rules, label: `${source.packagePath} (rules)` },
    );
  }

  return combineExportDocuments(
    { document: readExportFile(source.objectsPath), label: source.objectsPath },
    { document: readExportFile(source.rulesPath), label: source.rulesPath },
  );
};
