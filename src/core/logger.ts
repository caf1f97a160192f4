import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { TableOutcome, RunSummary } from './types';

export interface PipelineLoggerOptions {
  processName: string;
  level?: string;
  /** Directory for the JSON log file; `null` logs to the console only. */
  logDir?: string | null;
  silent?: boolean;
}

export interface PhaseTiming {
  phase: string;
  duration_ms: number;
  records?: number;
  timestamp: Date;
}

export class PipelineLogger {
  private logger: winston.Logger;
  private startTime: number;
  private phaseStarts = new Map<string, number>();
  private timings: PhaseTiming[] = [];

  readonly processName: string;

  constructor(options: PipelineLoggerOptions, parent?: winston.Logger) {
    this.processName = options.processName;
    this.logger = parent
      ? parent.child({ process: options.processName })
      : PipelineLogger.createWinston(options);
    this.startTime = Date.now();
  }

  private static createWinston(options: PipelineLoggerOptions): winston.Logger {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ];

    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      const timestamp = new Date().toISOString().replace(/:/g, '-');
      const logFile = path.join(options.logDir, `${options.processName}_${timestamp}.log`);
      transports.push(new winston.transports.File({ filename: logFile }));
    }

    return winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      defaultMeta: { process: options.processName },
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      transports
    });
  }

  /** Same transports, own phase clock, tagged with another process name. */
  child(processName: string): PipelineLogger {
    return new PipelineLogger({ processName }, this.logger);
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  public debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  public logPhaseStart(phase: string, meta?: Record<string, unknown>): void {
    this.phaseStarts.set(phase, Date.now());
    this.logger.info(`Phase started: ${phase}`, {
      phase,
      elapsed_ms: Date.now() - this.startTime,
      ...meta
    });
  }

  public logPhaseEnd(phase: string, recordCount?: number): number {
    const startedAt = this.phaseStarts.get(phase) ?? this.startTime;
    const duration = Date.now() - startedAt;
    this.phaseStarts.delete(phase);

    this.logger.info(`Phase completed: ${phase}`, {
      phase,
      duration_ms: duration,
      records: recordCount
    });

    this.timings.push({
      phase,
      duration_ms: duration,
      records: recordCount,
      timestamp: new Date()
    });
    return duration;
  }

  public logTableOutcome(outcome: TableOutcome): void {
    const meta = {
      table: outcome.table,
      stage: outcome.stage,
      rows_loaded: outcome.rows_loaded,
      inserted: outcome.merge?.inserted,
      updated: outcome.merge?.updated,
      skipped: outcome.merge?.skipped,
      duration_ms: outcome.duration_ms
    };

    switch (outcome.status) {
      case 'success':
        this.logger.info(`Table loaded: ${outcome.table}`, meta);
        break;
      case 'error':
        this.logger.error(`Table failed: ${outcome.table}`, { ...meta, message: outcome.message });
        break;
      case 'skipped':
        this.logger.warn(`Table skipped: ${outcome.table}`, { table: outcome.table, message: outcome.message });
        break;
    }
  }

  public logError(error: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.logger.error('Error occurred', {
        name: error.name,
        message: error.message,
        stack: error.stack,
        context,
        elapsed_ms: Date.now() - this.startTime
      });
      return;
    }
    this.logger.error('Error occurred', { message: String(error), context });
  }

  public logRunSummary(summary: RunSummary): void {
    const failed = summary.outcomes.filter(o => o.status === 'error').length;
    const meta = {
      run_id: summary.runId,
      status: summary.status,
      aborted: summary.aborted,
      duration_seconds: ((summary.finishedAt.getTime() - summary.startedAt.getTime()) / 1000).toFixed(2),
      tables: summary.outcomes.length,
      failed_tables: failed
    };

    if (summary.status === 'success') {
      this.logger.info(summary.message, meta);
    } else {
      this.logger.error(summary.message, meta);
    }
  }

  public getTimings(): readonly PhaseTiming[] {
    return this.timings;
  }
}
