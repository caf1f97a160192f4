import { describe, it, expect, beforeEach } from 'vitest';
import { FaultPolicy, TableSpec } from '../src/core/types';
import { MemoryRunLedger } from '../src/ledger/memory-run-ledger';
import { PipelineOrchestrator, exitCodeFor } from '../src/pipeline/orchestrator';
import { MemoryWarehouse } from '../src/warehouse/memory-warehouse';
import { quietLogger, steppingClock, tableSpec } from './helpers';

const customers = tableSpec('customers', ['id', 'name', 'city'], ['id']);
const orders = tableSpec('orders', ['order_id', 'line', 'amount'], ['order_id', 'line']);
const products = tableSpec('products', ['sku', 'title'], ['sku']);

function orchestrator(
  warehouse: MemoryWarehouse,
  ledger: MemoryRunLedger,
  tables: TableSpec[],
  faultPolicy: FaultPolicy = 'continue'
): PipelineOrchestrator {
  return new PipelineOrchestrator({
    config: { processName: 'bronze_load', tables, faultPolicy },
    warehouse,
    ledger,
    logger: quietLogger(),
    clock: steppingClock('2024-03-01T00:00:00Z', 1500)
  });
}

describe('PipelineOrchestrator', () => {
  let warehouse: MemoryWarehouse;
  let ledger: MemoryRunLedger;

  beforeEach(() => {
    warehouse = new MemoryWarehouse({ clock: steppingClock('2024-03-01T00:00:00Z', 60_000) });
    ledger = new MemoryRunLedger({ clock: steppingClock('2024-03-01T00:00:00Z', 1000) });

    warehouse.putSource(customers.sourcePath, [
      ['id', 'name', 'city'],
      ['1', 'Ana', 'Lisbon'],
      ['2', 'Ben', 'Porto'],
      ['', 'Nobody', 'Nowhere'],
      ['1', 'Ana', 'Braga']
    ]);
    warehouse.putSource(orders.sourcePath, [
      ['order_id', 'line', 'amount'],
      ['SO1', '1', '10.00'],
      ['SO1', '2', '4.50']
    ]);
    warehouse.putSource(products.sourcePath, [
      ['sku', 'title'],
      ['P-1', 'Widget']
    ]);
  });

  it('loads every table and reports the merge counts', async () => {
    const summary = await orchestrator(warehouse, ledger, [customers, orders, products]).run();

    expect(summary.status).toBe('success');
    expect(summary.message).toBe('All 3 tables loaded successfully in 1.50s.');
    expect(summary.outcomes.map(o => [o.table, o.status, o.stage, o.rows_loaded])).toEqual([
      ['customers', 'success', 'commit', 4],
      ['orders', 'success', 'commit', 2],
      ['products', 'success', 'commit', 1]
    ]);
    expect(summary.outcomes[0].merge).toEqual({ inserted: 2, updated: 0, skipped: 2 });
    expect(warehouse.targetRows('customers')).toEqual([
      { id: '1', name: 'Ana', city: 'Braga' },
      { id: '2', name: 'Ben', city: 'Porto' }
    ]);
  });

  it('keeps the other tables when one fails under the continue policy', async () => {
    warehouse.removeSource(orders.sourcePath);

    const summary = await orchestrator(warehouse, ledger, [customers, orders, products]).run();

    expect(summary.status).toBe('error');
    expect(summary.aborted).toBe(false);
    expect(summary.message).toBe('orders [load]: Load of "orders" from /data/orders.csv failed: no such file');
    expect(summary.outcomes.map(o => o.status)).toEqual(['success', 'error', 'success']);
    expect(warehouse.targetRows('customers')).toHaveLength(2);
    expect(warehouse.targetRows('orders')).toEqual([]);
    expect(warehouse.targetRows('products')).toEqual([{ sku: 'P-1', title: 'Widget' }]);
    expect(exitCodeFor(summary, 'continue')).toBe(0);
  });

  it('skips the remaining tables under the abort policy', async () => {
    warehouse.removeSource(orders.sourcePath);

    const summary = await orchestrator(warehouse, ledger, [customers, orders, products], 'abort').run();

    expect(summary.aborted).toBe(true);
    expect(summary.outcomes[2]).toEqual({
      table: 'products',
      status: 'skipped',
      stage: null,
      rows_loaded: null,
      merge: null,
      duration_ms: 0,
      message: 'Not attempted: run aborted after "orders" failed'
    });
    expect(warehouse.targetRows('customers')).toHaveLength(2);
    expect(warehouse.targetRows('products')).toEqual([]);
    expect(exitCodeFor(summary, 'abort')).toBe(1);
  });

  it('is idempotent for an unchanged source', async () => {
    await orchestrator(warehouse, ledger, [customers]).run();
    const before = warehouse.conformedRows('customers');

    const summary = await orchestrator(warehouse, ledger, [customers]).run();

    expect(summary.outcomes[0].merge).toEqual({ inserted: 0, updated: 0, skipped: 4 });
    expect(warehouse.conformedRows('customers')).toEqual(before);
  });

  it('updates changed rows and inserts new ones on a later run', async () => {
    await orchestrator(warehouse, ledger, [customers]).run();
    const [ana] = warehouse.conformedRows('customers');
    warehouse.putSource(customers.sourcePath, [
      ['id', 'name', 'city'],
      ['1', 'Ana', 'Braga'],
      ['2', 'Ben', 'Faro'],
      ['3', 'Cy', 'Evora']
    ]);

    const summary = await orchestrator(warehouse, ledger, [customers]).run();

    expect(summary.outcomes[0].merge).toEqual({ inserted: 1, updated: 1, skipped: 1 });
    expect(warehouse.conformedRows('customers')[0]).toEqual(ana);
    expect(warehouse.targetRows('customers')).toEqual([
      { id: '1', name: 'Ana', city: 'Braga' },
      { id: '2', name: 'Ben', city: 'Faro' },
      { id: '3', name: 'Cy', city: 'Evora' }
    ]);
  });

  it.each(['clear', 'load', 'merge', 'commit'] as const)(
    'rolls the whole table back when it fails at %s',
    async stage => {
      await orchestrator(warehouse, ledger, [customers]).run();
      const targetBefore = warehouse.conformedRows('customers');
      const landingBefore = warehouse.landingRows('customers');
      warehouse.putSource(customers.sourcePath, [
        ['id', 'name', 'city'],
        ['1', 'Ana', 'Coimbra']
      ]);
      warehouse.injectFault('customers', stage);

      const summary = await orchestrator(warehouse, ledger, [customers]).run();

      expect(summary.outcomes[0].status).toBe('error');
      expect(summary.outcomes[0].stage).toBe(stage);
      expect(summary.outcomes[0].merge).toBeNull();
      expect(warehouse.conformedRows('customers')).toEqual(targetBefore);
      expect(warehouse.landingRows('customers')).toEqual(landingBefore);
    }
  );

  it('reports a record with the wrong number of fields as a load failure', async () => {
    warehouse.putSource(products.sourcePath, [
      ['sku', 'title'],
      ['P-1', 'Widget', 'extra']
    ]);

    const summary = await orchestrator(warehouse, ledger, [products]).run();

    expect(summary.message).toBe(
      'products [load]: Load of "products" from /data/products.csv failed: record 1 has 3 fields, expected 2'
    );
  });

  it('brackets the run in the ledger and records every table', async () => {
    warehouse.removeSource(orders.sourcePath);

    const summary = await orchestrator(warehouse, ledger, [customers, orders]).run();

    const [run] = await ledger.query({ processName: 'bronze_load' });
    expect(run.run_id).toBe(summary.runId);
    expect(run.status).toBe('error');
    expect(run.message).toBe(summary.message);
    expect(run.end_time?.getTime()).toBeGreaterThan(run.start_time.getTime());
    // start, two table records, finish: one second apart
    expect(run.duration_sec).toBe(3);

    const tables = await ledger.tableOutcomes(run.run_id);
    expect(tables.map(t => [t.table, t.status, t.stage])).toEqual([
      ['customers', 'success', 'commit'],
      ['orders', 'error', 'load']
    ]);
  });

  it('still loads when the ledger cannot be written', async () => {
    ledger.failWrites();

    const summary = await orchestrator(warehouse, ledger, [customers, products]).run();

    expect(summary.runId).toBeNull();
    expect(summary.status).toBe('success');
    expect(warehouse.targetRows('products')).toEqual([{ sku: 'P-1', title: 'Widget' }]);
  });
});
