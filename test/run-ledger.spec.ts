import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerError } from '../src/core/errors';
import { MemoryRunLedger } from '../src/ledger/memory-run-ledger';
import { bracketRun } from '../src/ledger/run-bracket';
import { quietLogger, steppingClock } from './helpers';

describe('MemoryRunLedger', () => {
  let ledger: MemoryRunLedger;

  beforeEach(() => {
    ledger = new MemoryRunLedger({ clock: steppingClock('2024-03-01T00:00:00Z', 2500) });
  });

  it('starts runs in progress and finishes them once', async () => {
    const runId = await ledger.start('bronze_load');
    const [open] = await ledger.query();
    expect(open).toMatchObject({ run_id: runId, status: 'in_progress', end_time: null, duration_sec: null });

    const finished = await ledger.finish(runId, 'success');

    expect(finished).toEqual({
      run_id: runId,
      process_name: 'bronze_load',
      start_time: new Date('2024-03-01T00:00:02.500Z'),
      end_time: new Date('2024-03-01T00:00:05.000Z'),
      duration_sec: 2.5,
      status: 'success',
      message: null
    });
  });

  it('refuses a second finish and leaves the first one in place', async () => {
    const runId = await ledger.start('bronze_load');
    await ledger.finish(runId, 'error', 'customers [load]: boom');

    await expect(ledger.finish(runId, 'success')).rejects.toMatchObject({
      code: 'LEDGER_ALREADY_FINISHED'
    });
    const [run] = await ledger.query();
    expect(run.status).toBe('error');
    expect(run.message).toBe('customers [load]: boom');
  });

  it('refuses to finish a run it never started', async () => {
    await expect(ledger.finish(42, 'success')).rejects.toBeInstanceOf(LedgerError);
  });

  it('filters by process, status and start time, newest first', async () => {
    const bronze1 = await ledger.start('bronze_load');
    const silver = await ledger.start('silver_load');
    const bronze2 = await ledger.start('bronze_load');
    await ledger.finish(bronze1, 'success');
    await ledger.finish(bronze2, 'error', 'failed');

    expect((await ledger.query({ processName: 'bronze_load' })).map(r => r.run_id)).toEqual([bronze2, bronze1]);
    expect((await ledger.query({ status: 'in_progress' })).map(r => r.run_id)).toEqual([silver]);
    expect(
      (await ledger.query({ startedFrom: new Date('2024-03-01T00:00:05Z') })).map(r => r.run_id)
    ).toEqual([bronze2, silver]);
    expect(
      (await ledger.query({ startedTo: new Date('2024-03-01T00:00:05Z') })).map(r => r.run_id)
    ).toEqual([silver, bronze1]);
    expect((await ledger.query({ limit: 1 })).map(r => r.run_id)).toEqual([bronze2]);
  });

  it('keeps table outcomes per run', async () => {
    const runId = await ledger.start('bronze_load');
    await ledger.recordTable(runId, {
      table: 'customers',
      status: 'success',
      stage: 'commit',
      rows_loaded: 3,
      merge: { inserted: 3, updated: 0, skipped: 0 },
      duration_ms: 12,
      message: null
    });

    const outcomes = await ledger.tableOutcomes(runId);

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ run_id: runId, table: 'customers', rows_loaded: 3 });
    expect(await ledger.tableOutcomes(runId + 1)).toEqual([]);
  });
});

describe('bracketRun', () => {
  it('finishes the run with the status the work reports', async () => {
    const ledger = new MemoryRunLedger();

    const value = await bracketRun(ledger, quietLogger(), 'gold_load', async runId => ({
      status: 'success',
      message: `run ${runId} done`,
      value: 7
    }));

    const [run] = await ledger.query();
    expect(value).toBe(7);
    expect(run.status).toBe('success');
    expect(run.message).toBe(`run ${run.run_id} done`);
  });

  it('finishes the run as an error and rethrows when the work throws', async () => {
    const ledger = new MemoryRunLedger();

    await expect(
      bracketRun(ledger, quietLogger(), 'gold_load', async () => {
        throw new Error('connection lost');
      })
    ).rejects.toThrow('connection lost');

    const [run] = await ledger.query();
    expect(run.status).toBe('error');
    expect(run.message).toBe('connection lost');
  });

  it('runs the work without a run id when the ledger is down', async () => {
    const ledger = new MemoryRunLedger();
    ledger.failWrites();

    const seen = await bracketRun(ledger, quietLogger(), 'gold_load', async runId => ({
      status: 'success',
      message: null,
      value: runId
    }));

    expect(seen).toBeNull();
  });
});
