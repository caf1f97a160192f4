import { PipelineLogger } from '../core/logger';
import { describeError } from '../core/errors';
import { TerminalRunStatus } from '../core/types';
import { RunLedger } from './run-ledger';

export interface BracketResult<T> {
  status: TerminalRunStatus;
  message: string | null;
  value: T;
}

/**
 * Opens a ledger run, runs `work`, and finishes the run exactly once on every
 * exit path. Ledger failures are logged and never replace the work's own
 * result or error; `work` receives `null` when no run could be opened.
 */
export async function bracketRun<T>(
  ledger: RunLedger,
  logger: PipelineLogger,
  processName: string,
  work: (runId: number | null) => Promise<BracketResult<T>>
): Promise<T> {
  let runId: number | null = null;
  try {
    runId = await ledger.start(processName);
  } catch (error) {
    logger.logError(error, { operation: 'ledger.start', process: processName });
  }

  let status: TerminalRunStatus = 'error';
  let message: string | null = null;
  try {
    const result = await work(runId);
    status = result.status;
    message = result.message;
    return result.value;
  } catch (error) {
    message = describeError(error);
    throw error;
  } finally {
    if (runId !== null) {
      try {
        await ledger.finish(runId, status, message);
      } catch (error) {
        logger.logError(error, { operation: 'ledger.finish', run_id: runId, status });
      }
    }
  }
}
