export type FaultPolicy = 'continue' | 'abort';

export type LineTerminator = '\n' | '\r\n';

export interface FormatSpec {
  delimiter: string;
  quoteChar: string;
  lineTerminator: LineTerminator;
  headerRowsToSkip: number;
}

export interface TableSpec {
  name: string;
  columns: readonly string[];
  businessKeyColumns: readonly string[];
  sourcePath: string;
  format: FormatSpec;
}

export interface WarehouseSchemas {
  bronze: string;
  silver: string;
  gold: string;
}

/** A physical table: `schema.table`. */
export interface ContainerRef {
  schema: string;
  table: string;
}

// Raw capture: every column is a nullable string, no constraint applies
export type LandingRow = Record<string, string | null>;

export interface ConformedRow {
  values: LandingRow;
  created_at: Date;
  updated_at: Date;
}

export interface MergeResult {
  inserted: number;
  updated: number;
  skipped: number;
}

export type RunStatus = 'in_progress' | 'success' | 'error';
export type TerminalRunStatus = Exclude<RunStatus, 'in_progress'>;

export interface RunRecord {
  run_id: number;
  process_name: string;
  start_time: Date;
  end_time: Date | null;
  duration_sec: number | null;
  status: RunStatus;
  message: string | null;
}

export interface RunQuery {
  processName?: string;
  status?: RunStatus;
  startedFrom?: Date;
  startedTo?: Date;
  limit?: number;
}

export type TableStage = 'clear' | 'load' | 'merge' | 'commit';

export type TableOutcomeStatus = 'success' | 'error' | 'skipped';

export interface TableOutcome {
  table: string;
  status: TableOutcomeStatus;
  stage: TableStage | null;
  rows_loaded: number | null;
  merge: MergeResult | null;
  duration_ms: number;
  message: string | null;
}

export interface TableRunRecord extends TableOutcome {
  run_id: number;
  recorded_at: Date;
}

export interface RunSummary {
  runId: number | null;
  processName: string;
  status: TerminalRunStatus;
  aborted: boolean;
  message: string;
  startedAt: Date;
  finishedAt: Date;
  outcomes: TableOutcome[];
}
