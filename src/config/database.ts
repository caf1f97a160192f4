import { Pool, PoolConfig } from 'pg';
import * as dotenv from 'dotenv';
import { PipelineConfig } from './pipeline';
import {
  bronzeTableDdl,
  goldSchemaDdl,
  ledgerDdl,
  silverSchemaDdl
} from './schema';
import { quoteIdent } from '../warehouse/sql';

dotenv.config();

export function loadDatabaseConfig(env: NodeJS.ProcessEnv): PoolConfig {
  return Object.freeze({
    host: env.WAREHOUSE_DB_HOST || 'localhost',
    port: parseInt(env.WAREHOUSE_DB_PORT || '5432', 10),
    database: env.WAREHOUSE_DB_NAME || 'warehouse',
    user: env.WAREHOUSE_DB_USER || 'postgres',
    password: env.WAREHOUSE_DB_PASSWORD || 'password',
    // Sequential loader: one connection for the unit, one for the ledger, one for cursors
    max: parseInt(env.WAREHOUSE_DB_POOL_MAX || '5', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: parseInt(env.WAREHOUSE_DB_CONN_TIMEOUT_MS || '10000', 10),
    application_name: 'layered-warehouse-loader'
  });
}

export function createPool(config: PoolConfig): Pool {
  return new Pool(config);
}

/**
 * Creates schemas, bronze landing/constrained tables, ledger, silver and gold
 * tables when they are missing. Existing tables are left untouched.
 */
export async function initializeWarehouseSchema(pool: Pool, config: PipelineConfig): Promise<void> {
  const { bronze, silver, gold } = config.schemas;

  const statements = [
    `CREATE SCHEMA IF NOT EXISTS ${quoteIdent(bronze)};`,
    `CREATE SCHEMA IF NOT EXISTS ${quoteIdent(silver)};`,
    `CREATE SCHEMA IF NOT EXISTS ${quoteIdent(gold)};`,
    ledgerDdl(bronze),
    ...config.tables.map(table => bronzeTableDdl(bronze, table)),
    silverSchemaDdl(silver),
    goldSchemaDdl(gold)
  ];

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    for (const statement of statements) {
      await client.query(statement);
    }
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
