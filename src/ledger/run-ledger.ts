import { RunQuery, RunRecord, TableOutcome, TableRunRecord, TerminalRunStatus } from '../core/types';

/**
 * Append-only record of runs and of every table unit inside them. The only
 * mutation allowed is the single in-progress to terminal transition.
 */
export interface RunLedger {
  start(processName: string): Promise<number>;

  /** Throws `LedgerError('LEDGER_ALREADY_FINISHED')` when the run is not in progress. */
  finish(runId: number, status: TerminalRunStatus, message?: string | null): Promise<RunRecord>;

  recordTable(runId: number, outcome: TableOutcome): Promise<void>;

  /** Newest first. */
  query(filter?: RunQuery): Promise<RunRecord[]>;

  tableOutcomes(runId: number): Promise<TableRunRecord[]>;
}
