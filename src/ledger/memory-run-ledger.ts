import { LedgerError } from '../core/errors';
import { RunQuery, RunRecord, TableOutcome, TableRunRecord, TerminalRunStatus } from '../core/types';
import { RunLedger } from './run-ledger';

/**
 * In-process ledger for tests and dry runs. Records are copied on the way in
 * and out so callers cannot rewrite history.
 */
export class MemoryRunLedger implements RunLedger {
  private runs: RunRecord[] = [];
  private tables: TableRunRecord[] = [];
  private nextId = 1;
  private clock: () => Date;
  private failing = false;

  constructor(options: { clock?: () => Date } = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Makes every subsequent write fail, as an unreachable ledger table would. */
  public failWrites(failing = true): void {
    this.failing = failing;
  }

  async start(processName: string): Promise<number> {
    this.assertWritable('start');
    const runId = this.nextId++;
    this.runs.push({
      run_id: runId,
      process_name: processName,
      start_time: this.clock(),
      end_time: null,
      duration_sec: null,
      status: 'in_progress',
      message: null
    });
    return runId;
  }

  async finish(runId: number, status: TerminalRunStatus, message: string | null = null): Promise<RunRecord> {
    this.assertWritable('finish');
    const run = this.runs.find(r => r.run_id === runId);
    if (!run || run.status !== 'in_progress') {
      throw new LedgerError('LEDGER_ALREADY_FINISHED', `Run ${runId} is not in progress`);
    }

    const endTime = this.clock();
    run.end_time = endTime;
    run.duration_sec = (endTime.getTime() - run.start_time.getTime()) / 1000;
    run.status = status;
    run.message = message;
    return { ...run };
  }

  async recordTable(runId: number, outcome: TableOutcome): Promise<void> {
    this.assertWritable('recordTable');
    if (!this.runs.some(r => r.run_id === runId)) {
      throw new LedgerError('LEDGER_WRITE_FAILED', `Run ${runId} does not exist`);
    }
    this.tables.push({
      ...outcome,
      merge: outcome.merge ? { ...outcome.merge } : null,
      run_id: runId,
      recorded_at: this.clock()
    });
  }

  async query(filter: RunQuery = {}): Promise<RunRecord[]> {
    const matches = this.runs.filter(run => {
      if (filter.processName !== undefined && run.process_name !== filter.processName) return false;
      if (filter.status !== undefined && run.status !== filter.status) return false;
      if (filter.startedFrom !== undefined && run.start_time < filter.startedFrom) return false;
      if (filter.startedTo !== undefined && run.start_time > filter.startedTo) return false;
      return true;
    });

    const newestFirst = matches
      .map(run => ({ ...run }))
      .sort((a, b) => b.start_time.getTime() - a.start_time.getTime() || b.run_id - a.run_id);
    return filter.limit !== undefined ? newestFirst.slice(0, filter.limit) : newestFirst;
  }

  async tableOutcomes(runId: number): Promise<TableRunRecord[]> {
    return this.tables.filter(t => t.run_id === runId).map(t => ({ ...t }));
  }

  private assertWritable(operation: string): void {
    if (this.failing) {
      throw new LedgerError('LEDGER_WRITE_FAILED', `Ledger unavailable during ${operation}`);
    }
  }
}
