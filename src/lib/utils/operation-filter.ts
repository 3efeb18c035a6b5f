import type { DeltaRecord } from '@/types/nfs';

/**
 * Keep only the named operations. An empty set means no filter.
 * Names are matched exactly (READ and read are different operations).
 */
export function filterOperations(
  records: DeltaRecord[],
  allowed: ReadonlySet<string>,
): DeltaRecord[] {
  if (allowed.size === 0) return records;
  return records.filter(record => allowed.has(record.operation));
}

/**
 * Parse a comma-separated operation list such as "READ, WRITE,GETATTR"
 */
export function parseOperationsFilter(raw?: string): Set<string> {
  if (!raw || raw.trim().length === 0) return new Set();

  return new Set(
    raw
      .split(',')
      .map(name => name.trim())
      .filter(name => name.length > 0)
  );
}
