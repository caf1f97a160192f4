import { MergeResult, TableSpec } from '../core/types';

/**
 * Operations available inside one table's unit of work. Everything done
 * through a unit becomes visible together on commit, or not at all.
 */
export interface WarehouseUnit {
  /** Empties the table's landing container. Safe on an already empty container. */
  clearLanding(table: TableSpec): Promise<void>;

  /** Copies the table's source file into its landing container; returns rows loaded. */
  bulkLoad(table: TableSpec): Promise<number>;

  /** Reconciles landing into the constrained container. */
  merge(table: TableSpec): Promise<MergeResult>;
}

export interface Warehouse {
  /**
   * Runs `work` in its own transaction: committed when it resolves, rolled back
   * when it (or the commit) fails.
   */
  unitOfWork<T>(work: (unit: WarehouseUnit) => Promise<T>): Promise<T>;
}
