import { IntegrityError } from './errors';

/**
 * One version of a slowly changing dimension member. Dates are ISO days
 * (`YYYY-MM-DD`), so lexical order is chronological order.
 */
export interface DimensionVersion {
  key: string;
  startDate: string;
  endDate: string | null;
}

export interface KeyedVersion extends DimensionVersion {
  surrogateKey: number;
}

export type UnknownReason = 'no-event-date' | 'unknown-key' | 'no-covering-version';

export type Resolution =
  | { kind: 'resolved'; surrogateKey: number }
  | { kind: 'unknown'; reason: UnknownReason };

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

export function previousDay(date: string): string {
  const match = ISO_DAY.exec(date);
  if (!match) {
    throw new RangeError(`Not an ISO day: "${date}"`);
  }
  const [, year, month, day] = match;
  const shifted = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day) - 1));
  return shifted.toISOString().slice(0, 10);
}

function groupByKey<T extends DimensionVersion>(versions: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const version of versions) {
    const group = groups.get(version.key);
    if (group) {
      group.push(version);
    } else {
      groups.set(version.key, [version]);
    }
  }
  for (const group of groups.values()) {
    group.sort((a, b) => (a.startDate < b.startDate ? -1 : a.startDate > b.startDate ? 1 : 0));
  }
  return groups;
}

/**
 * Checks that the versions of one key, ordered by start date, do not overlap:
 * every interval is non-empty, and only the last one may be open-ended.
 */
export function assertNonOverlapping(key: string, ordered: readonly DimensionVersion[]): void {
  ordered.forEach((version, index) => {
    if (version.endDate !== null && version.endDate < version.startDate) {
      throw new IntegrityError(
        'INTEGRITY_OVERLAP',
        key,
        `Version of "${key}" starting ${version.startDate} ends before it starts (${version.endDate})`
      );
    }

    const next = ordered[index + 1];
    if (next === undefined) return;

    if (version.endDate === null || version.endDate >= next.startDate) {
      throw new IntegrityError(
        'INTEGRITY_OVERLAP',
        key,
        `Version of "${key}" starting ${version.startDate} overlaps the version starting ${next.startDate}`
      );
    }
  });
}

/**
 * Repairs end dates recorded before their own start date: such a version ends the
 * day before the next version of the same key starts, or stays open when it is the
 * latest. Valid end dates are kept. Output is ordered by key, then start date.
 *
 * Two versions of a key starting on the same day, and any overlap left after the
 * repair, raise an IntegrityError.
 */
export function correctIntervals<T extends DimensionVersion>(versions: readonly T[]): T[] {
  const corrected: T[] = [];

  for (const [key, ordered] of groupByKey(versions)) {
    for (let i = 1; i < ordered.length; i++) {
      if (ordered[i].startDate === ordered[i - 1].startDate) {
        throw new IntegrityError(
          'INTEGRITY_DUPLICATE_START',
          key,
          `Two versions of "${key}" start on ${ordered[i].startDate}`
        );
      }
    }

    const repaired = ordered.map((version, index) => {
      if (version.endDate === null || version.endDate >= version.startDate) {
        return version;
      }
      const next = ordered[index + 1];
      return { ...version, endDate: next ? previousDay(next.startDate) : null };
    });

    assertNonOverlapping(key, repaired);
    corrected.push(...repaired);
  }

  return corrected;
}

/**
 * Lookup of surrogate keys by business key and event day.
 */
export class PointInTimeIndex {
  private byKey = new Map<string, KeyedVersion[]>();

  static from(versions: Iterable<KeyedVersion>): PointInTimeIndex {
    const index = new PointInTimeIndex();
    for (const version of versions) {
      index.add(version);
    }
    return index;
  }

  add(version: KeyedVersion): void {
    const list = this.byKey.get(version.key);
    if (list) {
      list.push(version);
    } else {
      this.byKey.set(version.key, [version]);
    }
  }

  get size(): number {
    let count = 0;
    for (const list of this.byKey.values()) count += list.length;
    return count;
  }

  resolve(key: string, at: string | null): Resolution {
    if (at === null) return { kind: 'unknown', reason: 'no-event-date' };

    const versions = this.byKey.get(key);
    if (!versions) return { kind: 'unknown', reason: 'unknown-key' };

    const matches = versions.filter(
      version => version.startDate <= at && (version.endDate === null || at <= version.endDate)
    );

    if (matches.length > 1) {
      throw new IntegrityError(
        'INTEGRITY_AMBIGUOUS_MATCH',
        key,
        `${matches.length} versions of "${key}" are valid on ${at}: ` +
          matches.map(m => m.surrogateKey).join(', ')
      );
    }
    if (matches.length === 0) return { kind: 'unknown', reason: 'no-covering-version' };
    return { kind: 'resolved', surrogateKey: matches[0].surrogateKey };
  }
}
