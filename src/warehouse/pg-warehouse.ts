import { Pool, PoolClient } from 'pg';
import { MergeResult, TableSpec, WarehouseSchemas } from '../core/types';
import { BulkLoader, PgCopyBulkLoader } from './bulk-loader';
import { MergeEngine, PgMergeEngine } from './merge-engine';
import { landingContainer, qualified, targetContainer } from './sql';
import { Warehouse, WarehouseUnit } from './warehouse';

class PgWarehouseUnit implements WarehouseUnit {
  constructor(
    private client: PoolClient,
    private schemas: WarehouseSchemas,
    private loader: BulkLoader,
    private engine: MergeEngine
  ) {}

  public async clearLanding(table: TableSpec): Promise<void> {
    await this.client.query(
      `TRUNCATE TABLE ${qualified(landingContainer(table, this.schemas))} RESTART IDENTITY`
    );
  }

  public bulkLoad(table: TableSpec): Promise<number> {
    return this.loader.load(this.client, {
      table: table.name,
      sourcePath: table.sourcePath,
      format: table.format,
      landing: landingContainer(table, this.schemas),
      columns: table.columns
    });
  }

  public merge(table: TableSpec): Promise<MergeResult> {
    return this.engine.merge(this.client, {
      table: table.name,
      landing: landingContainer(table, this.schemas),
      target: targetContainer(table, this.schemas),
      columns: table.columns,
      businessKeyColumns: table.businessKeyColumns
    });
  }
}

export class PgWarehouse implements Warehouse {
  constructor(
    private pool: Pool,
    private schemas: WarehouseSchemas,
    private loader: BulkLoader = new PgCopyBulkLoader(),
    private engine: MergeEngine = new PgMergeEngine()
  ) {}

  public async unitOfWork<T>(work: (unit: WarehouseUnit) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PgWarehouseUnit(client, this.schemas, this.loader, this.engine));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
