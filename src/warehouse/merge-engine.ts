import { PoolClient } from 'pg';
import { MergeError, describeError, systemErrorCode } from '../core/errors';
import { ContainerRef, MergeResult } from '../core/types';
import { LANDING_SEQUENCE_COLUMN, columnList, qualified, quoteIdent } from './sql';

export interface MergeRequest {
  table: string;
  landing: ContainerRef;
  target: ContainerRef;
  columns: readonly string[];
  businessKeyColumns: readonly string[];
}

export interface MergeEngine {
  merge(client: PoolClient, request: MergeRequest): Promise<MergeResult>;
}

// unique_violation, cardinality_violation ("ON CONFLICT DO UPDATE command cannot affect row a second time")
const CONSISTENCY_CODES = new Set(['23505', '21000']);

/**
 * One statement: the latest landing row per business key (blank keys dropped)
 * is inserted, or updates the existing row when a non-key column differs.
 * `RETURNING (xmax = 0)` tells inserts from updates; unchanged rows return nothing.
 */
export function buildMergeStatement(request: MergeRequest): string {
  const { columns, businessKeyColumns } = request;
  const nonKey = columns.filter(column => !businessKeyColumns.includes(column));
  const keys = columnList(businessKeyColumns);

  const keyFilter = businessKeyColumns
    .map(column => `NULLIF(BTRIM(${quoteIdent(column)}, E' \\t\\r\\n'), '') IS NOT NULL`)
    .join(' AND ');

  const latest =
    `WITH latest AS (` +
    `SELECT DISTINCT ON (${keys}) ${columnList(columns)} ` +
    `FROM ${qualified(request.landing)} ` +
    `WHERE ${keyFilter} ` +
    `ORDER BY ${keys}, ${quoteIdent(LANDING_SEQUENCE_COLUMN)} DESC)`;

  const insert =
    `INSERT INTO ${qualified(request.target)} AS t (${columnList(columns)}) ` +
    `SELECT ${columnList(columns)} FROM latest`;

  let conflict: string;
  if (nonKey.length === 0) {
    conflict = `ON CONFLICT (${keys}) DO NOTHING`;
  } else {
    const assignments = nonKey.map(column => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`);
    assignments.push(`${quoteIdent('updated_at')} = clock_timestamp()`);
    conflict =
      `ON CONFLICT (${keys}) DO UPDATE SET ${assignments.join(', ')} ` +
      `WHERE (${columnList(nonKey, 't')}) IS DISTINCT FROM (${columnList(nonKey, 'EXCLUDED')})`;
  }

  return `${latest} ${insert} ${conflict} RETURNING (xmax = 0) AS inserted`;
}

type LandingCountRow = { total: number };
type MergedRow = { inserted: boolean };

export class PgMergeEngine implements MergeEngine {
  public async merge(client: PoolClient, request: MergeRequest): Promise<MergeResult> {
    try {
      const count = await client.query<LandingCountRow>(
        `SELECT count(*)::int AS total FROM ${qualified(request.landing)}`
      );
      const landed = count.rows[0]?.total ?? 0;

      const result = await client.query<MergedRow>(buildMergeStatement(request));
      const inserted = result.rows.filter(row => row.inserted).length;
      const updated = result.rows.length - inserted;

      return { inserted, updated, skipped: landed - inserted - updated };
    } catch (error) {
      const code = systemErrorCode(error);
      throw new MergeError(
        code !== undefined && CONSISTENCY_CODES.has(code) ? 'MERGE_CONSISTENCY' : 'MERGE_FAILED',
        request.table,
        describeError(error),
        { cause: error }
      );
    }
  }
}
