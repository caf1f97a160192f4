import { LoadError, MergeError, PipelineError } from '../core/errors';
import { applyMerge } from '../core/merge-plan';
import { ConformedRow, LandingRow, MergeResult, TableSpec, TableStage } from '../core/types';
import { Warehouse, WarehouseUnit } from './warehouse';

interface WarehouseState {
  landing: Map<string, LandingRow[]>;
  targets: Map<string, Map<string, ConformedRow>>;
}

class MemoryWarehouseUnit implements WarehouseUnit {
  public readonly touched = new Set<string>();

  constructor(
    public readonly state: WarehouseState,
    private owner: MemoryWarehouse
  ) {}

  public async clearLanding(table: TableSpec): Promise<void> {
    this.enter(table, 'clear');
    this.state.landing.set(table.name, []);
  }

  public async bulkLoad(table: TableSpec): Promise<number> {
    this.enter(table, 'load');
    const records = this.owner.sourceRecords(table.sourcePath);
    if (records === undefined) {
      throw new LoadError('SOURCE_NOT_FOUND', table.name, table.sourcePath, 'no such file');
    }

    const landed = this.state.landing.get(table.name) ?? [];
    const rows = records.slice(table.format.headerRowsToSkip).map((record, index) => {
      if (record.length !== table.columns.length) {
        throw new LoadError(
          'LOAD_FAILED',
          table.name,
          table.sourcePath,
          `record ${index + 1} has ${record.length} fields, expected ${table.columns.length}`
        );
      }
      const row: LandingRow = {};
      table.columns.forEach((column, position) => {
        // unquoted empty field is NULL, as with COPY ... NULL ''
        row[column] = record[position] === '' ? null : record[position];
      });
      return row;
    });

    this.state.landing.set(table.name, [...landed, ...rows]);
    return rows.length;
  }

  public async merge(table: TableSpec): Promise<MergeResult> {
    this.enter(table, 'merge');
    let target = this.state.targets.get(table.name);
    if (!target) {
      target = new Map();
      this.state.targets.set(table.name, target);
    }
    return applyMerge(
      target,
      this.state.landing.get(table.name) ?? [],
      table.columns,
      table.businessKeyColumns,
      this.owner.now()
    );
  }

  private enter(table: TableSpec, stage: TableStage): void {
    this.touched.add(table.name);
    this.owner.raiseInjectedFault(table.name, stage);
  }
}

/**
 * In-process stand-in for the warehouse. Units of work run against a copy of
 * the state that replaces it only on commit.
 */
export class MemoryWarehouse implements Warehouse {
  private state: WarehouseState = { landing: new Map(), targets: new Map() };
  private sources = new Map<string, string[][]>();
  private faults = new Map<string, TableStage>();
  private clock: () => Date;

  constructor(options: { clock?: () => Date } = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Registers file contents as already-split records, header rows included. */
  public putSource(path: string, records: string[][]): void {
    this.sources.set(path, records);
  }

  public removeSource(path: string): void {
    this.sources.delete(path);
  }

  public injectFault(table: string, stage: TableStage): void {
    this.faults.set(table, stage);
  }

  public clearFault(table: string): void {
    this.faults.delete(table);
  }

  public landingRows(table: string): LandingRow[] {
    return [...(this.state.landing.get(table) ?? [])];
  }

  public conformedRows(table: string): ConformedRow[] {
    return [...(this.state.targets.get(table)?.values() ?? [])];
  }

  public targetRows(table: string): LandingRow[] {
    return this.conformedRows(table).map(row => row.values);
  }

  public async unitOfWork<T>(work: (unit: WarehouseUnit) => Promise<T>): Promise<T> {
    const unit = new MemoryWarehouseUnit(structuredClone(this.state), this);
    const result = await work(unit);
    for (const table of unit.touched) {
      this.raiseInjectedFault(table, 'commit');
    }
    this.state = unit.state;
    return result;
  }

  public sourceRecords(path: string): string[][] | undefined {
    return this.sources.get(path);
  }

  public now(): Date {
    return this.clock();
  }

  public raiseInjectedFault(table: string, stage: TableStage): void {
    if (this.faults.get(table) !== stage) return;
    const message = `injected ${stage} fault`;
    switch (stage) {
      case 'load':
        throw new LoadError('LOAD_FAILED', table, '(memory)', message);
      case 'merge':
        throw new MergeError('MERGE_FAILED', table, message);
      default:
        throw new PipelineError('INJECTED_FAULT', `${table}: ${message}`);
    }
  }
}
