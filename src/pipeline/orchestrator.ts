import { PipelineConfig } from '../config/pipeline';
import { describeError } from '../core/errors';
import { PipelineLogger } from '../core/logger';
import {
  FaultPolicy,
  MergeResult,
  RunSummary,
  TableOutcome,
  TableSpec,
  TableStage,
  TerminalRunStatus
} from '../core/types';
import { bracketRun } from '../ledger/run-bracket';
import { RunLedger } from '../ledger/run-ledger';
import { Warehouse } from '../warehouse/warehouse';

export interface OrchestratorOptions {
  config: Pick<PipelineConfig, 'processName' | 'tables' | 'faultPolicy'>;
  warehouse: Warehouse;
  ledger: RunLedger;
  logger: PipelineLogger;
  clock?: () => Date;
}

interface UnitProgress {
  stage: TableStage;
  rowsLoaded: number | null;
  merge: MergeResult | null;
}

/**
 * Bronze load: for each configured table, in order, one transaction of
 * clear landing, bulk load and merge. A failed table rolls back alone; the
 * fault policy decides whether the remaining tables still run.
 */
export class PipelineOrchestrator {
  private config: OrchestratorOptions['config'];
  private warehouse: Warehouse;
  private ledger: RunLedger;
  private logger: PipelineLogger;
  private clock: () => Date;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.warehouse = options.warehouse;
    this.ledger = options.ledger;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  async run(): Promise<RunSummary> {
    const { processName, tables, faultPolicy } = this.config;
    const startedAt = this.clock();

    this.logger.logPhaseStart(processName, { tables: tables.length, fault_policy: faultPolicy });

    const summary = await bracketRun(this.ledger, this.logger, processName, async runId => {
      const outcomes: TableOutcome[] = [];
      let failedTable: string | null = null;

      for (const table of tables) {
        const outcome =
          failedTable !== null && faultPolicy === 'abort'
            ? skippedOutcome(table.name, failedTable)
            : await this.runTable(table);

        outcomes.push(outcome);
        this.logger.logTableOutcome(outcome);
        await this.recordOutcome(runId, outcome);

        if (outcome.status === 'error' && failedTable === null) {
          failedTable = table.name;
        }
      }

      const result = summarizeRun({
        runId,
        processName,
        startedAt,
        finishedAt: this.clock(),
        outcomes,
        policy: faultPolicy
      });
      return { status: result.status, message: result.message, value: result };
    });

    this.logger.logPhaseEnd(processName, summary.outcomes.length);
    this.logger.logRunSummary(summary);
    return summary;
  }

  private async runTable(table: TableSpec): Promise<TableOutcome> {
    const started = Date.now();
    const progress: UnitProgress = { stage: 'clear', rowsLoaded: null, merge: null };

    try {
      await this.warehouse.unitOfWork(async unit => {
        progress.stage = 'clear';
        await unit.clearLanding(table);

        progress.stage = 'load';
        progress.rowsLoaded = await unit.bulkLoad(table);

        progress.stage = 'merge';
        progress.merge = await unit.merge(table);

        progress.stage = 'commit';
      });

      return {
        table: table.name,
        status: 'success',
        stage: progress.stage,
        rows_loaded: progress.rowsLoaded,
        merge: progress.merge,
        duration_ms: Date.now() - started,
        message: null
      };
    } catch (error) {
      this.logger.logError(error, { table: table.name, stage: progress.stage });
      // Rolled back: nothing merged for this table became visible
      return {
        table: table.name,
        status: 'error',
        stage: progress.stage,
        rows_loaded: progress.rowsLoaded,
        merge: null,
        duration_ms: Date.now() - started,
        message: describeError(error)
      };
    }
  }

  private async recordOutcome(runId: number | null, outcome: TableOutcome): Promise<void> {
    if (runId === null) return;
    try {
      await this.ledger.recordTable(runId, outcome);
    } catch (error) {
      this.logger.logError(error, { operation: 'ledger.recordTable', run_id: runId, table: outcome.table });
    }
  }
}

export function skippedOutcome(table: string, failedTable: string): TableOutcome {
  return {
    table,
    status: 'skipped',
    stage: null,
    rows_loaded: null,
    merge: null,
    duration_ms: 0,
    message: `Not attempted: run aborted after "${failedTable}" failed`
  };
}

/**
 * Run status from table outcomes: `error` with the first failure when any
 * table failed, otherwise `success` with the elapsed time.
 */
export function summarizeRun(run: {
  runId: number | null;
  processName: string;
  startedAt: Date;
  finishedAt: Date;
  outcomes: TableOutcome[];
  policy: FaultPolicy;
}): RunSummary {
  const firstFailure = run.outcomes.find(outcome => outcome.status === 'error');

  let status: TerminalRunStatus;
  let message: string;
  if (firstFailure) {
    status = 'error';
    message = `${firstFailure.table} [${firstFailure.stage ?? 'unknown'}]: ${firstFailure.message ?? 'failed'}`;
  } else {
    status = 'success';
    const seconds = (run.finishedAt.getTime() - run.startedAt.getTime()) / 1000;
    message = `All ${run.outcomes.length} tables loaded successfully in ${seconds.toFixed(2)}s.`;
  }

  return {
    runId: run.runId,
    processName: run.processName,
    status,
    aborted: run.policy === 'abort' && firstFailure !== undefined,
    message,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    outcomes: run.outcomes
  };
}

/** Non-zero only when a table failed under the abort policy. */
export function exitCodeFor(summary: RunSummary, policy: FaultPolicy): number {
  const anyFailed = summary.outcomes.some(outcome => outcome.status === 'error');
  return policy === 'abort' && anyFailed ? 1 : 0;
}
