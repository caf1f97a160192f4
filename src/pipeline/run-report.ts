import * as fs from 'fs';
import * as path from 'path';
import * as csvWriter from 'csv-writer';
import { RunSummary } from '../core/types';

export type ReportRow = {
  run_id: number | string;
  process_name: string;
  table: string;
  status: string;
  stage: string;
  rows_loaded: number | string;
  inserted: number | string;
  updated: number | string;
  skipped: number | string;
  duration_ms: number;
  message: string;
};

// Empty cells for values a table never reached
export function reportRows(summary: RunSummary): ReportRow[] {
  return summary.outcomes.map(outcome => ({
    run_id: summary.runId ?? '',
    process_name: summary.processName,
    table: outcome.table,
    status: outcome.status,
    stage: outcome.stage ?? '',
    rows_loaded: outcome.rows_loaded ?? '',
    inserted: outcome.merge?.inserted ?? '',
    updated: outcome.merge?.updated ?? '',
    skipped: outcome.merge?.skipped ?? '',
    duration_ms: outcome.duration_ms,
    message: outcome.message ?? ''
  }));
}

export async function writeRunReport(filePath: string, summary: RunSummary): Promise<void> {
  const directory = path.dirname(filePath);
  if (!fs.existsSync(directory)) {
    fs.mkdirSync(directory, { recursive: true });
  }

  const writer = csvWriter.createObjectCsvWriter({
    path: filePath,
    header: [
      { id: 'run_id', title: 'run_id' },
      { id: 'process_name', title: 'process_name' },
      { id: 'table', title: 'table' },
      { id: 'status', title: 'status' },
      { id: 'stage', title: 'stage' },
      { id: 'rows_loaded', title: 'rows_loaded' },
      { id: 'inserted', title: 'inserted' },
      { id: 'updated', title: 'updated' },
      { id: 'skipped', title: 'skipped' },
      { id: 'duration_ms', title: 'duration_ms' },
      { id: 'message', title: 'message' }
    ]
  });

  await writer.writeRecords(reportRows(summary));
}

export function printRunSummary(summary: RunSummary): void {
  console.log('\n===========================================');
  console.log(`RUN SUMMARY: ${summary.processName} (run ${summary.runId ?? 'not recorded'})`);
  console.log('===========================================\n');

  console.table(
    summary.outcomes.map(outcome => ({
      Table: outcome.table,
      Status: outcome.status,
      Stage: outcome.stage ?? '-',
      Loaded: outcome.rows_loaded ?? '-',
      Inserted: outcome.merge?.inserted ?? '-',
      Updated: outcome.merge?.updated ?? '-',
      Skipped: outcome.merge?.skipped ?? '-',
      'Time (s)': (outcome.duration_ms / 1000).toFixed(2)
    }))
  );

  console.log(`\n${summary.status.toUpperCase()}: ${summary.message}`);
}
