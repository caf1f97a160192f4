import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, afterAll } from 'vitest';
import { RunSummary } from '../src/core/types';
import { reportRows, writeRunReport } from '../src/pipeline/run-report';

const summary: RunSummary = {
  runId: 7,
  processName: 'bronze_load',
  status: 'error',
  aborted: false,
  message: 'orders [load]: source missing',
  startedAt: new Date('2024-03-01T00:00:00Z'),
  finishedAt: new Date('2024-03-01T00:00:02Z'),
  outcomes: [
    {
      table: 'customers',
      status: 'success',
      stage: 'commit',
      rows_loaded: 3,
      merge: { inserted: 2, updated: 0, skipped: 1 },
      duration_ms: 15,
      message: null
    },
    {
      table: 'orders',
      status: 'error',
      stage: 'load',
      rows_loaded: null,
      merge: null,
      duration_ms: 4,
      message: 'source missing'
    }
  ]
};

describe('run report', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'warehouse-report-'));

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('leaves cells empty for values a table never reached', () => {
    expect(reportRows(summary)[1]).toEqual({
      run_id: 7,
      process_name: 'bronze_load',
      table: 'orders',
      status: 'error',
      stage: 'load',
      rows_loaded: '',
      inserted: '',
      updated: '',
      skipped: '',
      duration_ms: 4,
      message: 'source missing'
    });
  });

  it('writes one csv line per table', async () => {
    const file = path.join(dir, 'reports', 'run.csv');

    await writeRunReport(file, summary);

    expect(fs.readFileSync(file, 'utf8').trimEnd().split('\n')).toEqual([
      'run_id,process_name,table,status,stage,rows_loaded,inserted,updated,skipped,duration_ms,message',
      '7,bronze_load,customers,success,commit,3,2,0,1,15,',
      '7,bronze_load,orders,error,load,,,,,4,source missing'
    ]);
  });
});
