import { TableSpec } from '../core/types';
import {
  LANDING_PREFIX,
  LANDING_SEQUENCE_COLUMN,
  quoteIdent
} from '../warehouse/sql';

export const RUN_LOG_TABLE = 'etl_run_log';
export const RUN_TABLE_LOG_TABLE = 'etl_run_table_log';

export function ledgerDdl(schema: string): string {
  const s = quoteIdent(schema);
  return `
    CREATE TABLE IF NOT EXISTS ${s}.${RUN_LOG_TABLE} (
      run_id BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
      process_name VARCHAR(100) NOT NULL,
      start_time TIMESTAMPTZ NOT NULL,
      end_time TIMESTAMPTZ,
      duration_sec NUMERIC(12, 4),
      status VARCHAR(20) NOT NULL CHECK (status IN ('in_progress', 'success', 'error')),
      message TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_${RUN_LOG_TABLE}_process ON ${s}.${RUN_LOG_TABLE}(process_name);
    CREATE INDEX IF NOT EXISTS idx_${RUN_LOG_TABLE}_start ON ${s}.${RUN_LOG_TABLE}(start_time);

    CREATE TABLE IF NOT EXISTS ${s}.${RUN_TABLE_LOG_TABLE} (
      run_id BIGINT NOT NULL REFERENCES ${s}.${RUN_LOG_TABLE}(run_id),
      table_name VARCHAR(100) NOT NULL,
      status VARCHAR(20) NOT NULL CHECK (status IN ('success', 'error', 'skipped')),
      stage VARCHAR(20),
      rows_loaded INTEGER,
      inserted INTEGER,
      updated INTEGER,
      skipped_rows INTEGER,
      duration_ms INTEGER NOT NULL,
      message TEXT,
      recorded_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp()
    );

    CREATE INDEX IF NOT EXISTS idx_${RUN_TABLE_LOG_TABLE}_run ON ${s}.${RUN_TABLE_LOG_TABLE}(run_id);
  `;
}

/**
 * Landing table: text columns, no constraint, identity column keeping file order.
 * Constrained table: same text columns, unique business key, audit timestamps.
 */
export function bronzeTableDdl(schema: string, table: TableSpec): string {
  const s = quoteIdent(schema);
  const columns = table.columns.map(column => `${quoteIdent(column)} TEXT`).join(',\n      ');
  const keys = table.businessKeyColumns.map(quoteIdent).join(', ');
  const landing = quoteIdent(`${LANDING_PREFIX}${table.name}`);
  const target = quoteIdent(table.name);

  return `
    CREATE TABLE IF NOT EXISTS ${s}.${landing} (
      ${LANDING_SEQUENCE_COLUMN} BIGINT GENERATED ALWAYS AS IDENTITY,
      ${columns}
    );

    CREATE TABLE IF NOT EXISTS ${s}.${target} (
      ${columns},
      created_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
      CONSTRAINT ${quoteIdent(`uq_${table.name}_business_key`)} UNIQUE (${keys})
    );
  `;
}

export function silverSchemaDdl(schema: string): string {
  const s = quoteIdent(schema);
  const meta = `
      meta_created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      meta_updated_at TIMESTAMPTZ NOT NULL DEFAULT now()`;

  return `
    CREATE TABLE IF NOT EXISTS ${s}.crm_cust_info (
      cst_id INTEGER PRIMARY KEY,
      cst_key VARCHAR(50),
      cst_firstname VARCHAR(100),
      cst_lastname VARCHAR(100),
      cst_marital_status VARCHAR(10),
      cst_gndr VARCHAR(10),
      cst_create_date DATE,${meta}
    );

    CREATE TABLE IF NOT EXISTS ${s}.crm_prd_info (
      prd_id INTEGER PRIMARY KEY,
      prd_category VARCHAR(50),
      prd_key VARCHAR(50),
      prd_nm VARCHAR(255),
      prd_cost NUMERIC(19, 4),
      prd_line VARCHAR(15),
      prd_start_dt DATE,
      prd_end_dt DATE,${meta}
    );

    CREATE INDEX IF NOT EXISTS idx_crm_prd_info_key ON ${s}.crm_prd_info(prd_key);

    CREATE TABLE IF NOT EXISTS ${s}.crm_sales_details (
      sls_ord_num VARCHAR(20) NOT NULL,
      sls_prd_key VARCHAR(50) NOT NULL,
      sls_cust_id INTEGER,
      sls_order_dt DATE,
      sls_ship_dt DATE,
      sls_due_dt DATE,
      sls_sales NUMERIC(19, 4),
      sls_quantity INTEGER,
      sls_price NUMERIC(19, 4),${meta},
      PRIMARY KEY (sls_ord_num, sls_prd_key)
    );

    CREATE TABLE IF NOT EXISTS ${s}.erp_cust_az12 (
      cid VARCHAR(20) PRIMARY KEY,
      bdate DATE,
      gen VARCHAR(10),${meta}
    );

    CREATE TABLE IF NOT EXISTS ${s}.erp_loc_a101 (
      cid VARCHAR(20) PRIMARY KEY,
      cntry VARCHAR(50),${meta}
    );

    CREATE TABLE IF NOT EXISTS ${s}.erp_px_cat_g1v2 (
      id VARCHAR(20) PRIMARY KEY,
      cat VARCHAR(50),
      subcat VARCHAR(50),
      maintenance BOOLEAN,${meta}
    );
  `;
}

export function goldSchemaDdl(schema: string): string {
  const s = quoteIdent(schema);
  return `
    CREATE TABLE IF NOT EXISTS ${s}.dim_customers (
      customer_key INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
      customer_id INTEGER,
      customer_number VARCHAR(50),
      first_name VARCHAR(100),
      last_name VARCHAR(100),
      full_name VARCHAR(201),
      country VARCHAR(50),
      marital_status VARCHAR(20),
      gender VARCHAR(20),
      birthdate DATE,
      create_date DATE,
      age INTEGER,
      age_group VARCHAR(20),
      meta_created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE INDEX IF NOT EXISTS idx_dim_customers_id ON ${s}.dim_customers(customer_id);
    CREATE INDEX IF NOT EXISTS idx_dim_customers_country ON ${s}.dim_customers(country);

    CREATE TABLE IF NOT EXISTS ${s}.dim_products (
      product_key INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
      product_id INTEGER,
      product_number VARCHAR(50),
      product_name VARCHAR(255),
      category_id VARCHAR(20),
      category_name VARCHAR(50),
      subcategory_name VARCHAR(50),
      maintenance_flag VARCHAR(10),
      product_cost NUMERIC(19, 4),
      product_line VARCHAR(50),
      start_date DATE,
      end_date DATE,
      is_current BOOLEAN NOT NULL,
      meta_created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE INDEX IF NOT EXISTS idx_dim_products_number ON ${s}.dim_products(product_number);
    CREATE INDEX IF NOT EXISTS idx_dim_products_current ON ${s}.dim_products(is_current);

    CREATE TABLE IF NOT EXISTS ${s}.fact_sales (
      sales_key INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
      customer_key INTEGER REFERENCES ${s}.dim_customers(customer_key),
      product_key INTEGER REFERENCES ${s}.dim_products(product_key),
      order_number VARCHAR(20),
      order_date DATE,
      shipping_date DATE,
      due_date DATE,
      sales_amount NUMERIC(19, 4),
      quantity INTEGER,
      price NUMERIC(19, 4),
      meta_created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE INDEX IF NOT EXISTS idx_fact_sales_order_date ON ${s}.fact_sales(order_date);
    CREATE INDEX IF NOT EXISTS idx_fact_sales_product ON ${s}.fact_sales(product_key);
    CREATE INDEX IF NOT EXISTS idx_fact_sales_customer ON ${s}.fact_sales(customer_key);
  `;
}
