// src/core/transform/mapper.ts
import { configurationError } from '../errors.js';
import {
  CANONICAL_FIELDS,
  type CanonicalField,
  type ColumnMapping,
  type ColumnMappingEntry,
  type JsonValue,
  type NormalizedRecord,
  type RawRecord,
} from '../types/index.js';

export type MappingTable = Readonly<Record<string, string>>;

const canonical = new Set<string>(CANONICAL_FIELDS);

export function isCanonicalField(value: string): value is CanonicalField {
  return canonical.has(value);
}

/**
 * Builds a frozen mapping from a `rawKey -> canonicalField` table.
 * Entry order is the column order of every record normalized with it.
 */
export function createColumnMapping(name: string, table: MappingTable): ColumnMapping {
  const issues: string[] = [];
  const entries: ColumnMappingEntry[] = [];
  const targeted = new Map<CanonicalField, string>();

  const pairs = Object.entries(table);
  if (pairs.length === 0) {
    issues.push('mapping is empty');
  }

  for (const [rawKey, field] of pairs) {
    if (rawKey.trim().length === 0) {
      issues.push('raw field name must not be empty');
      continue;
    }
    if (!isCanonicalField(field)) {
      issues.push(`"${rawKey}" maps to unknown field "${field}"`);
      continue;
    }
    const previous = targeted.get(field);
    if (previous !== undefined) {
      issues.push(`"${rawKey}" and "${previous}" both map to "${field}"`);
      continue;
    }
    targeted.set(field, rawKey);
    entries.push(Object.freeze([rawKey, field] as const));
  }

  if (issues.length > 0) {
    throw configurationError(
      `Invalid column mapping "${name}"`,
      issues,
      `Canonical fields are: ${CANONICAL_FIELDS.join(', ')}`
    );
  }

  return Object.freeze({ name, entries: Object.freeze(entries) });
}

export function mappedFields(mapping: ColumnMapping): CanonicalField[] {
  return mapping.entries.map(([, field]) => field);
}

/**
 * Copies every mapped raw field into its canonical name.
 * Unmapped vendor fields are dropped; mapped fields the record lacks are omitted.
 */
export function normalize(rawRecords: readonly RawRecord[], mapping: ColumnMapping): NormalizedRecord[] {
  return rawRecords.map(raw => normalizeOne(raw, mapping));
}

function normalizeOne(raw: RawRecord, mapping: ColumnMapping): NormalizedRecord {
  const record: NormalizedRecord = {};

  for (const [rawKey, field] of mapping.entries) {
    const found = lookup(raw, rawKey);
    if (found.present) {
      record[field] = toJsonValue(found.value);
    }
  }

  return record;
}

type Lookup = { present: true; value: unknown } | { present: false };

// Exact key first; a dotted key then walks nested vendor objects.
function lookup(raw: RawRecord, rawKey: string): Lookup {
  if (Object.prototype.hasOwnProperty.call(raw, rawKey)) {
    return { present: true, value: raw[rawKey] };
  }
  if (!rawKey.includes('.')) {
    return { present: false };
  }

  let current: unknown = raw;
  for (const segment of rawKey.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      const index = Number(segment);
      if (index >= current.length) {
        return { present: false };
      }
      current = current[index];
      continue;
    }
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return { present: false };
    }
    current = current[segment];
  }
  return { present: true, value: current };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, nested] of Object.entries(value)) {
      out[key] = toJsonValue(nested);
    }
    return out;
  }
  return String(value);
}
