import { ConformedRow, LandingRow, MergeResult } from './types';

// Same set as the merge statement's BTRIM(..., E' \t\r\n')
const BLANK_KEY = /^[ \t\r\n]*$/;

export function isBlankKeyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && BLANK_KEY.test(value);
}

/**
 * Canonical identity of a row's business key, or `null` when any key column is blank.
 * Values are compared verbatim: `' 7'` and `'7'` are different keys.
 */
export function businessKeyOf(
  row: Readonly<Record<string, unknown>>,
  keyColumns: readonly string[]
): string | null {
  const parts: unknown[] = [];
  for (const column of keyColumns) {
    const value = row[column];
    if (isBlankKeyValue(value)) return null;
    parts.push(value);
  }
  return JSON.stringify(parts);
}

export interface DedupeResult<T> {
  /** One row per business key; the last occurrence in input order wins. */
  winners: Map<string, T>;
  blankKeys: number;
  superseded: number;
}

export function dedupeByBusinessKey<T extends Readonly<Record<string, unknown>>>(
  rows: readonly T[],
  keyColumns: readonly string[]
): DedupeResult<T> {
  const winners = new Map<string, T>();
  let blankKeys = 0;
  let superseded = 0;

  for (const row of rows) {
    const key = businessKeyOf(row, keyColumns);
    if (key === null) {
      blankKeys++;
      continue;
    }
    if (winners.has(key)) superseded++;
    winners.set(key, row);
  }

  return { winners, blankKeys, superseded };
}

function sameValues(a: LandingRow, b: LandingRow, columns: readonly string[]): boolean {
  return columns.every(column => (a[column] ?? null) === (b[column] ?? null));
}

/**
 * Upserts landing rows into `target` (keyed by business key identity) in place.
 * Never deletes; an existing row is only touched when a non-key column changes.
 */
export function applyMerge(
  target: Map<string, ConformedRow>,
  landing: readonly LandingRow[],
  columns: readonly string[],
  keyColumns: readonly string[],
  now: Date
): MergeResult {
  const { winners } = dedupeByBusinessKey(landing, keyColumns);
  const nonKeyColumns = columns.filter(column => !keyColumns.includes(column));
  let inserted = 0;
  let updated = 0;

  for (const [key, row] of winners) {
    const values: LandingRow = {};
    for (const column of columns) {
      values[column] = row[column] ?? null;
    }

    const existing = target.get(key);
    if (!existing) {
      target.set(key, { values, created_at: now, updated_at: now });
      inserted++;
    } else if (!sameValues(existing.values, values, nonKeyColumns)) {
      target.set(key, { values, created_at: existing.created_at, updated_at: now });
      updated++;
    }
  }

  return { inserted, updated, skipped: landing.length - inserted - updated };
}
