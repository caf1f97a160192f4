import { Pool } from 'pg';
import { LedgerError, describeError } from '../core/errors';
import {
  RunQuery,
  RunRecord,
  RunStatus,
  TableOutcome,
  TableOutcomeStatus,
  TableRunRecord,
  TableStage,
  TerminalRunStatus
} from '../core/types';
import { RUN_LOG_TABLE, RUN_TABLE_LOG_TABLE } from '../config/schema';
import { quoteIdent } from '../warehouse/sql';
import { RunLedger } from './run-ledger';

// bigint and numeric come back from pg as strings
type RunLogRow = {
  run_id: string;
  process_name: string;
  start_time: Date;
  end_time: Date | null;
  duration_sec: string | null;
  status: RunStatus;
  message: string | null;
};

type TableLogRow = {
  run_id: string;
  table_name: string;
  status: TableOutcomeStatus;
  stage: TableStage | null;
  rows_loaded: number | null;
  inserted: number | null;
  updated: number | null;
  skipped_rows: number | null;
  duration_ms: number;
  message: string | null;
  recorded_at: Date;
};

const RUN_COLUMNS = 'run_id, process_name, start_time, end_time, duration_sec, status, message';

function toRunRecord(row: RunLogRow): RunRecord {
  return {
    run_id: Number(row.run_id),
    process_name: row.process_name,
    start_time: row.start_time,
    end_time: row.end_time,
    duration_sec: row.duration_sec === null ? null : Number(row.duration_sec),
    status: row.status,
    message: row.message
  };
}

function toTableRunRecord(row: TableLogRow): TableRunRecord {
  return {
    run_id: Number(row.run_id),
    table: row.table_name,
    status: row.status,
    stage: row.stage,
    rows_loaded: row.rows_loaded,
    merge:
      row.inserted === null || row.updated === null || row.skipped_rows === null
        ? null
        : { inserted: row.inserted, updated: row.updated, skipped: row.skipped_rows },
    duration_ms: row.duration_ms,
    message: row.message,
    recorded_at: row.recorded_at
  };
}

/**
 * Ledger on the warehouse itself. Every write is its own autocommitted
 * statement on the pool, outside any table's unit of work, so a rolled back
 * table still leaves its error in the ledger.
 */
export class PgRunLedger implements RunLedger {
  private runs: string;
  private tables: string;

  constructor(private pool: Pool, schema: string) {
    this.runs = `${quoteIdent(schema)}.${RUN_LOG_TABLE}`;
    this.tables = `${quoteIdent(schema)}.${RUN_TABLE_LOG_TABLE}`;
  }

  async start(processName: string): Promise<number> {
    const result = await this.write('start', () =>
      this.pool.query<{ run_id: string }>(
        `INSERT INTO ${this.runs} (process_name, start_time, status)
         VALUES ($1, clock_timestamp(), 'in_progress')
         RETURNING run_id`,
        [processName]
      )
    );
    const row = result.rows[0];
    if (!row) {
      throw new LedgerError('LEDGER_WRITE_FAILED', 'Run insert returned no identifier');
    }
    return Number(row.run_id);
  }

  async finish(runId: number, status: TerminalRunStatus, message: string | null = null): Promise<RunRecord> {
    // One clock reading for both end_time and duration
    const result = await this.write('finish', () =>
      this.pool.query<RunLogRow>(
        `WITH clock AS (SELECT clock_timestamp() AS ts)
         UPDATE ${this.runs} AS r
            SET end_time = clock.ts,
                duration_sec = EXTRACT(EPOCH FROM (clock.ts - r.start_time)),
                status = $2,
                message = $3
           FROM clock
          WHERE r.run_id = $1 AND r.status = 'in_progress'
         RETURNING r.run_id, r.process_name, r.start_time, r.end_time, r.duration_sec, r.status, r.message`,
        [runId, status, message]
      )
    );

    const row = result.rows[0];
    if (!row) {
      throw new LedgerError('LEDGER_ALREADY_FINISHED', `Run ${runId} is not in progress`);
    }
    return toRunRecord(row);
  }

  async recordTable(runId: number, outcome: TableOutcome): Promise<void> {
    await this.write('recordTable', () =>
      this.pool.query(
        `INSERT INTO ${this.tables}
           (run_id, table_name, status, stage, rows_loaded, inserted, updated, skipped_rows, duration_ms, message)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          runId,
          outcome.table,
          outcome.status,
          outcome.stage,
          outcome.rows_loaded,
          outcome.merge?.inserted ?? null,
          outcome.merge?.updated ?? null,
          outcome.merge?.skipped ?? null,
          Math.round(outcome.duration_ms),
          outcome.message
        ]
      )
    );
  }

  async query(filter: RunQuery = {}): Promise<RunRecord[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.processName !== undefined) {
      params.push(filter.processName);
      conditions.push(`process_name = $${params.length}`);
    }
    if (filter.status !== undefined) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.startedFrom !== undefined) {
      params.push(filter.startedFrom);
      conditions.push(`start_time >= $${params.length}`);
    }
    if (filter.startedTo !== undefined) {
      params.push(filter.startedTo);
      conditions.push(`start_time <= $${params.length}`);
    }

    let sql = `SELECT ${RUN_COLUMNS} FROM ${this.runs}`;
    if (conditions.length) sql += ` WHERE ${conditions.join(' AND ')}`;
    sql += ' ORDER BY start_time DESC, run_id DESC';
    if (filter.limit !== undefined) {
      params.push(filter.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const result = await this.pool.query<RunLogRow>(sql, params);
    return result.rows.map(toRunRecord);
  }

  async tableOutcomes(runId: number): Promise<TableRunRecord[]> {
    const result = await this.pool.query<TableLogRow>(
      `SELECT run_id, table_name, status, stage, rows_loaded, inserted, updated, skipped_rows,
              duration_ms, message, recorded_at
         FROM ${this.tables}
        WHERE run_id = $1
        ORDER BY recorded_at, table_name`,
      [runId]
    );
    return result.rows.map(toTableRunRecord);
  }

  private async write<T>(operation: string, statement: () => Promise<T>): Promise<T> {
    try {
      return await statement();
    } catch (error) {
      throw new LedgerError('LEDGER_WRITE_FAILED', `Ledger ${operation} failed: ${describeError(error)}`, {
        cause: error
      });
    }
  }
}
