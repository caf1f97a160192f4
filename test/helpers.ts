import { PipelineLogger } from '../src/core/logger';
import { FormatSpec, TableSpec } from '../src/core/types';

export function quietLogger(): PipelineLogger {
  return new PipelineLogger({ processName: 'test', silent: true, logDir: null });
}

/** Each call returns `stepMs` later than the previous one. */
export function steppingClock(startIso: string, stepMs: number): () => Date {
  let now = Date.parse(startIso);
  return () => {
    now += stepMs;
    return new Date(now);
  };
}

export const CSV_FORMAT: FormatSpec = {
  delimiter: ',',
  quoteChar: '"',
  lineTerminator: '\r\n',
  headerRowsToSkip: 1
};

export function tableSpec(name: string, columns: string[], businessKeyColumns: string[]): TableSpec {
  return {
    name,
    columns,
    businessKeyColumns,
    sourcePath: `/data/${name}.csv`,
    format: CSV_FORMAT
  };
}
