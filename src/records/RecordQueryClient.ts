import type { CompiledStep, ParentRecord, RecordKey } from '../criteria/types.js';

/**
 * A record returned by the record-query service. Field values are exposed as
 * plain data; `pk()` gives the record's primary key.
 */
export interface QueryRecord extends ParentRecord {
  readonly fields: Readonly<Record<string, unknown>>;
}

/**
 * Backend-neutral client for the record-query service.
 *
 * Implementations own transport, authentication and timeouts. The derivation
 * executor only needs to run one compiled criterion against one table. An
 * `undefined` criterion fetches every record in the table.
 */
export interface RecordQueryClient {
  fetch(table: string, criterion: CompiledStep): Promise<QueryRecord[]>;
}

/**
 * Read a primary key given as text. Integers within the safe range become
 * numbers; anything else, including longer digit strings, stays text.
 */
export function parseRecordKey(raw: string): RecordKey {
  if (!/^-?\d+$/.test(raw)) {
    return raw;
  }
  const key = Number(raw);
  return Number.isSafeInteger(key) ? key : raw;
}

/**
 * Group derived records under the parent they were derived from, keyed by the
 * parent's primary key. Parents without derived records map to an empty list.
 */
export function groupByOriginal(
  parents: readonly ParentRecord[],
  derived: readonly QueryRecord[],
  linkField: string
): Map<RecordKey, QueryRecord[]> {
  const groups = new Map<RecordKey, QueryRecord[]>();
  for (const parent of parents) {
    groups.set(parent.pk(), []);
  }

  for (const record of derived) {
    const original = record.fields[linkField];
    if (typeof original !== 'string' && typeof original !== 'number') {
      continue;
    }
    groups.get(original)?.push(record);
  }

  return groups;
}
