import { describe, it, expect } from 'vitest';
import { buildMergeStatement } from '../src/warehouse/merge-engine';

const customers = {
  table: 'customers',
  landing: { schema: 'bronze', table: 'stg_customers' },
  target: { schema: 'bronze', table: 'customers' },
  columns: ['id', 'name', 'city'],
  businessKeyColumns: ['id']
};

describe('buildMergeStatement', () => {
  const sql = buildMergeStatement(customers);

  it('takes the latest landing row per non-blank key', () => {
    expect(sql).toContain(
      'WITH latest AS (SELECT DISTINCT ON ("id") "id", "name", "city" FROM "bronze"."stg_customers" ' +
        `WHERE NULLIF(BTRIM("id", E' \\t\\r\\n'), '') IS NOT NULL ORDER BY "id", "_landing_seq" DESC)`
    );
  });

  it('updates only when a non-key column differs', () => {
    expect(sql).toContain(
      'ON CONFLICT ("id") DO UPDATE SET "name" = EXCLUDED."name", "city" = EXCLUDED."city", ' +
        '"updated_at" = clock_timestamp() ' +
        'WHERE (t."name", t."city") IS DISTINCT FROM (EXCLUDED."name", EXCLUDED."city")'
    );
  });

  it('tells inserts from updates', () => {
    expect(sql).toContain('INSERT INTO "bronze"."customers" AS t ("id", "name", "city") SELECT "id", "name", "city" FROM latest');
    expect(sql.endsWith('RETURNING (xmax = 0) AS inserted')).toBe(true);
  });

  it('filters every column of a composite key and never updates key-only tables', () => {
    const keyOnly = buildMergeStatement({
      ...customers,
      columns: ['order_id', 'line'],
      businessKeyColumns: ['order_id', 'line']
    });

    expect(keyOnly).toContain(
      `WHERE NULLIF(BTRIM("order_id", E' \\t\\r\\n'), '') IS NOT NULL AND NULLIF(BTRIM("line", E' \\t\\r\\n'), '') IS NOT NULL`
    );
    expect(keyOnly).toContain('ON CONFLICT ("order_id", "line") DO NOTHING');
  });
});
