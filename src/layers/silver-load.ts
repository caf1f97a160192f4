import { Pool, PoolClient } from 'pg';
import Cursor from 'pg-cursor';
import { describeError } from '../core/errors';
import { PipelineLogger } from '../core/logger';
import { dedupeByBusinessKey } from '../core/merge-plan';
import { SilverRow, SilverTransformer } from '../core/transformer';
import {
  FaultPolicy,
  LandingRow,
  RunSummary,
  TableOutcome,
  TableSpec,
  TableStage,
  WarehouseSchemas
} from '../core/types';
import { bracketRun } from '../ledger/run-bracket';
import { RunLedger } from '../ledger/run-ledger';
import { skippedOutcome, summarizeRun } from '../pipeline/orchestrator';
import { columnList, quoteIdent, valuesPlaceholders } from '../warehouse/sql';

export const SILVER_PROCESS_NAME = 'silver_load';

export interface SilverTableDefinition {
  /** Same name in bronze and silver. */
  name: string;
  columns: readonly string[];
  keyColumns: readonly string[];
  transform: (transformer: SilverTransformer, row: LandingRow) => SilverRow | null;
}

export const SILVER_TABLES: readonly SilverTableDefinition[] = [
  {
    name: 'crm_cust_info',
    columns: ['cst_id', 'cst_key', 'cst_firstname', 'cst_lastname', 'cst_marital_status', 'cst_gndr', 'cst_create_date'],
    keyColumns: ['cst_id'],
    transform: (t, row) => t.customerInfo(row)
  },
  {
    name: 'crm_prd_info',
    columns: ['prd_id', 'prd_category', 'prd_key', 'prd_nm', 'prd_cost', 'prd_line', 'prd_start_dt', 'prd_end_dt'],
    keyColumns: ['prd_id'],
    transform: (t, row) => t.productInfo(row)
  },
  {
    name: 'crm_sales_details',
    columns: [
      'sls_ord_num', 'sls_prd_key', 'sls_cust_id', 'sls_order_dt', 'sls_ship_dt',
      'sls_due_dt', 'sls_sales', 'sls_quantity', 'sls_price'
    ],
    keyColumns: ['sls_ord_num', 'sls_prd_key'],
    transform: (t, row) => t.salesDetail(row)
  },
  {
    name: 'erp_cust_az12',
    columns: ['cid', 'bdate', 'gen'],
    keyColumns: ['cid'],
    transform: (t, row) => t.customerDemographics(row)
  },
  {
    name: 'erp_loc_a101',
    columns: ['cid', 'cntry'],
    keyColumns: ['cid'],
    transform: (t, row) => t.customerLocation(row)
  },
  {
    name: 'erp_px_cat_g1v2',
    columns: ['id', 'cat', 'subcat', 'maintenance'],
    keyColumns: ['id'],
    transform: (t, row) => t.productCategory(row)
  }
];

export function buildSilverUpsert(schema: string, table: SilverTableDefinition, rowCount: number): string {
  const keys = columnList(table.keyColumns);
  const assignments = table.columns
    .filter(column => !table.keyColumns.includes(column))
    .map(column => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`);
  assignments.push('meta_updated_at = now()');

  return (
    `INSERT INTO ${quoteIdent(schema)}.${quoteIdent(table.name)} (${columnList(table.columns)}) ` +
    `VALUES ${valuesPlaceholders(rowCount, table.columns.length)} ` +
    `ON CONFLICT (${keys}) DO UPDATE SET ${assignments.join(', ')} ` +
    `RETURNING (xmax = 0) AS inserted`
  );
}

export interface SilverLoadOptions {
  pool: Pool;
  schemas: WarehouseSchemas;
  bronzeTables: readonly TableSpec[];
  faultPolicy: FaultPolicy;
  ledger: RunLedger;
  logger: PipelineLogger;
  transformer?: SilverTransformer;
  batchSize?: number;
}

interface SilverProgress {
  stage: TableStage;
  read: number;
  inserted: number;
  updated: number;
  rejected: number;
}

/**
 * Bronze to silver: full refresh of each silver table in its own transaction.
 * Bronze rows are streamed through a cursor on a second connection, typed by
 * the transformer and upserted in chunks.
 */
export class SilverLoad {
  private readonly batchSize: number;
  private readonly transformer: SilverTransformer;

  constructor(private options: SilverLoadOptions) {
    this.batchSize = options.batchSize ?? 1000;
    this.transformer = options.transformer ?? new SilverTransformer();
  }

  async run(): Promise<RunSummary> {
    const { logger, ledger, faultPolicy } = this.options;
    const startedAt = new Date();
    logger.logPhaseStart(SILVER_PROCESS_NAME, { tables: SILVER_TABLES.length });

    const summary = await bracketRun(ledger, logger, SILVER_PROCESS_NAME, async runId => {
      const outcomes: TableOutcome[] = [];
      let failedTable: string | null = null;

      for (const table of SILVER_TABLES) {
        const outcome =
          failedTable !== null && faultPolicy === 'abort'
            ? skippedOutcome(table.name, failedTable)
            : await this.loadTable(table);

        outcomes.push(outcome);
        logger.logTableOutcome(outcome);
        if (runId !== null) {
          await ledger.recordTable(runId, outcome).catch((error: unknown) =>
            logger.logError(error, { operation: 'ledger.recordTable', run_id: runId, table: outcome.table })
          );
        }

        if (outcome.status === 'error' && failedTable === null) {
          failedTable = table.name;
        }
      }

      const result = summarizeRun({
        runId,
        processName: SILVER_PROCESS_NAME,
        startedAt,
        finishedAt: new Date(),
        outcomes,
        policy: faultPolicy
      });
      return { status: result.status, message: result.message, value: result };
    });

    logger.logPhaseEnd(SILVER_PROCESS_NAME, summary.outcomes.length);
    logger.logRunSummary(summary);
    return summary;
  }

  private async loadTable(table: SilverTableDefinition): Promise<TableOutcome> {
    const started = Date.now();
    const progress: SilverProgress = { stage: 'clear', read: 0, inserted: 0, updated: 0, rejected: 0 };
    const { pool, schemas, logger } = this.options;

    const bronze = this.options.bronzeTables.find(spec => spec.name === table.name);
    if (!bronze) {
      return {
        table: table.name,
        status: 'error',
        stage: 'load',
        rows_loaded: null,
        merge: null,
        duration_ms: 0,
        message: `Bronze table "${table.name}" is not configured`
      };
    }

    const writer = await pool.connect();
    let reader: PoolClient | null = null;
    try {
      reader = await pool.connect();
      await writer.query('BEGIN');
      await writer.query(`TRUNCATE TABLE ${quoteIdent(schemas.silver)}.${quoteIdent(table.name)}`);

      progress.stage = 'load';
      const cursor = reader.query(
        new Cursor(
          `SELECT ${columnList(bronze.columns)} FROM ${quoteIdent(schemas.bronze)}.${quoteIdent(bronze.name)} ` +
            `ORDER BY ${columnList(bronze.businessKeyColumns)}`
        )
      );

      try {
        let rows: LandingRow[] = await cursor.read(this.batchSize);
        while (rows.length > 0) {
          progress.read += rows.length;
          const typed: SilverRow[] = [];
          for (const row of rows) {
            const result = table.transform(this.transformer, row);
            if (result === null) {
              progress.rejected++;
            } else {
              typed.push(result);
            }
          }

          progress.stage = 'merge';
          await this.upsertChunk(writer, table, typed, progress);
          progress.stage = 'load';
          rows = await cursor.read(this.batchSize);
        }
      } finally {
        await cursor.close();
      }

      progress.stage = 'commit';
      await writer.query('COMMIT');
    } catch (error) {
      await writer.query('ROLLBACK');
      logger.logError(error, { table: table.name, stage: progress.stage });
      return {
        table: table.name,
        status: 'error',
        stage: progress.stage,
        rows_loaded: progress.read,
        merge: null,
        duration_ms: Date.now() - started,
        message: describeError(error)
      };
    } finally {
      reader?.release();
      writer.release();
    }

    if (progress.rejected > 0) {
      logger.warn(`Rejected ${progress.rejected} ${table.name} rows without a usable key`, { table: table.name });
    }

    return {
      table: table.name,
      status: 'success',
      stage: 'commit',
      rows_loaded: progress.read,
      merge: { inserted: progress.inserted, updated: progress.updated, skipped: progress.read - progress.inserted - progress.updated },
      duration_ms: Date.now() - started,
      message: null
    };
  }

  private async upsertChunk(
    client: PoolClient,
    table: SilverTableDefinition,
    rows: SilverRow[],
    progress: SilverProgress
  ): Promise<void> {
    // Two rows with one key in a single statement would fail ON CONFLICT
    const unique = [...dedupeByBusinessKey(rows, table.keyColumns).winners.values()];
    if (unique.length === 0) return;

    const values: unknown[] = [];
    for (const row of unique) {
      for (const column of table.columns) {
        values.push(row[column] ?? null);
      }
    }

    const result = await client.query<{ inserted: boolean }>(
      buildSilverUpsert(this.options.schemas.silver, table, unique.length),
      values
    );
    const inserted = result.rows.filter(row => row.inserted).length;
    progress.inserted += inserted;
    progress.updated += result.rows.length - inserted;
  }
}
