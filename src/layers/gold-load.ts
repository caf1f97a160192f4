import { Pool, PoolClient } from 'pg';
import Cursor from 'pg-cursor';
import { describeError } from '../core/errors';
import { PipelineLogger } from '../core/logger';
import { DimensionVersion, PointInTimeIndex, UnknownReason, correctIntervals } from '../core/temporal';
import { TerminalRunStatus, WarehouseSchemas } from '../core/types';
import { bracketRun } from '../ledger/run-bracket';
import { RunLedger } from '../ledger/run-ledger';
import { columnList, quoteIdent, valuesPlaceholders } from '../warehouse/sql';

export const GOLD_PROCESS_NAME = 'gold_load';

// numeric columns arrive as strings and go back unchanged
export type ProductSourceRow = {
  product_id: number;
  product_number: string;
  product_name: string | null;
  category_id: string | null;
  category_name: string | null;
  subcategory_name: string | null;
  maintenance_flag: string;
  product_cost: string | null;
  product_line: string | null;
  start_date: string | null;
  end_date: string | null;
};

export type ProductDimensionRow = ProductSourceRow & { is_current: boolean };

export type SalesSourceRow = {
  sls_ord_num: string;
  sls_prd_key: string;
  sls_cust_id: number | null;
  sls_order_dt: string | null;
  sls_ship_dt: string | null;
  sls_due_dt: string | null;
  sls_sales: string | null;
  sls_quantity: number | null;
  sls_price: string | null;
};

export interface FactRow {
  customer_key: number | null;
  product_key: number | null;
  order_number: string;
  order_date: string | null;
  shipping_date: string | null;
  due_date: string | null;
  sales_amount: string | null;
  quantity: number | null;
  price: string | null;
}

export interface ResolvedFact {
  row: FactRow;
  unknownProduct: UnknownReason | null;
  unknownCustomer: boolean;
}

export interface GoldLoadResult {
  runId: number | null;
  status: TerminalRunStatus;
  message: string;
  customers: number;
  products: number;
  facts: number;
  unknownProducts: Record<UnknownReason, number>;
  unknownCustomers: number;
}

const PRODUCT_COLUMNS = [
  'product_id', 'product_number', 'product_name', 'category_id', 'category_name', 'subcategory_name',
  'maintenance_flag', 'product_cost', 'product_line', 'start_date', 'end_date', 'is_current'
] as const;

const FACT_COLUMNS = [
  'customer_key', 'product_key', 'order_number', 'order_date', 'shipping_date',
  'due_date', 'sales_amount', 'quantity', 'price'
] as const;

interface ProductVersion extends DimensionVersion {
  row: ProductSourceRow;
}

/**
 * Product versions with corrected end dates. Versions without a start date
 * cannot be placed on the timeline: they are kept as recorded and never match a sale.
 */
export function buildProductDimension(rows: readonly ProductSourceRow[]): ProductDimensionRow[] {
  const dated: ProductVersion[] = [];
  const undated: ProductSourceRow[] = [];

  for (const row of rows) {
    if (row.start_date === null) {
      undated.push(row);
    } else {
      dated.push({ key: row.product_number, startDate: row.start_date, endDate: row.end_date, row });
    }
  }

  const corrected = correctIntervals(dated).map(version => ({
    ...version.row,
    end_date: version.endDate,
    is_current: version.endDate === null
  }));
  return [...corrected, ...undated.map(row => ({ ...row, is_current: row.end_date === null }))];
}

export function resolveFact(
  sale: SalesSourceRow,
  products: PointInTimeIndex,
  customers: ReadonlyMap<number, number>
): ResolvedFact {
  const product = products.resolve(sale.sls_prd_key, sale.sls_order_dt);
  const customerKey = sale.sls_cust_id === null ? undefined : customers.get(sale.sls_cust_id);

  return {
    row: {
      customer_key: customerKey ?? null,
      product_key: product.kind === 'resolved' ? product.surrogateKey : null,
      order_number: sale.sls_ord_num,
      order_date: sale.sls_order_dt,
      shipping_date: sale.sls_ship_dt,
      due_date: sale.sls_due_dt,
      sales_amount: sale.sls_sales,
      quantity: sale.sls_quantity,
      price: sale.sls_price
    },
    unknownProduct: product.kind === 'unknown' ? product.reason : null,
    unknownCustomer: customerKey === undefined
  };
}

export function customersSql(silver: string, gold: string): string {
  const s = quoteIdent(silver);
  return `
    INSERT INTO ${quoteIdent(gold)}.dim_customers (
      customer_id, customer_number, first_name, last_name, full_name, country,
      marital_status, gender, birthdate, create_date, age, age_group
    )
    SELECT
      ci.cst_id,
      ci.cst_key,
      ci.cst_firstname,
      ci.cst_lastname,
      NULLIF(CONCAT_WS(' ', ci.cst_firstname, ci.cst_lastname), ''),
      COALESCE(la.cntry, 'n/a'),
      COALESCE(ci.cst_marital_status, 'n/a'),
      CASE WHEN UPPER(TRIM(ci.cst_gndr)) <> 'UNKNOWN' THEN ci.cst_gndr ELSE COALESCE(ca.gen, 'n/a') END,
      ca.bdate,
      ci.cst_create_date,
      a.years,
      CASE
        WHEN a.years IS NULL THEN 'Unknown'
        WHEN a.years < 20 THEN 'Under 20'
        WHEN a.years < 30 THEN '20-29'
        WHEN a.years < 40 THEN '30-39'
        WHEN a.years < 50 THEN '40-49'
        ELSE '50+'
      END
    FROM ${s}.crm_cust_info ci
    LEFT JOIN ${s}.erp_cust_az12 ca ON ca.cid = ci.cst_key
    LEFT JOIN ${s}.erp_loc_a101 la ON la.cid = ci.cst_key
    CROSS JOIN LATERAL (SELECT EXTRACT(YEAR FROM AGE(CURRENT_DATE, ca.bdate))::int AS years) a
    ORDER BY ci.cst_id
    RETURNING customer_key, customer_id`;
}

export function productsSourceSql(silver: string): string {
  const s = quoteIdent(silver);
  return `
    SELECT
      pn.prd_id AS product_id,
      pn.prd_key AS product_number,
      pn.prd_nm AS product_name,
      pc.id AS category_id,
      pc.cat AS category_name,
      pc.subcat AS subcategory_name,
      CASE WHEN pc.maintenance THEN 'Yes' ELSE 'No' END AS maintenance_flag,
      pn.prd_cost::text AS product_cost,
      pn.prd_line AS product_line,
      pn.prd_start_dt::text AS start_date,
      pn.prd_end_dt::text AS end_date
    FROM ${s}.crm_prd_info pn
    LEFT JOIN ${s}.erp_px_cat_g1v2 pc ON pc.id = pn.prd_category
    ORDER BY pn.prd_key, pn.prd_start_dt`;
}

export function salesSourceSql(silver: string): string {
  return `
    SELECT sls_ord_num, sls_prd_key, sls_cust_id,
           sls_order_dt::text AS sls_order_dt,
           sls_ship_dt::text AS sls_ship_dt,
           sls_due_dt::text AS sls_due_dt,
           sls_sales::text AS sls_sales,
           sls_quantity,
           sls_price::text AS sls_price
      FROM ${quoteIdent(silver)}.crm_sales_details
     ORDER BY sls_ord_num, sls_prd_key`;
}

type CustomerKeyRow = { customer_key: number; customer_id: number | null };
type ProductKeyRow = { product_key: number; product_number: string; start_date: string | null; end_date: string | null };

export interface GoldLoadOptions {
  pool: Pool;
  schemas: WarehouseSchemas;
  ledger: RunLedger;
  logger: PipelineLogger;
  batchSize?: number;
}

/**
 * Silver to gold in one transaction: customers, products with corrected
 * history, then facts resolved against the product version valid on the
 * order date. Unresolvable references are stored as NULL and counted.
 */
export class GoldLoad {
  private readonly batchSize: number;

  constructor(private options: GoldLoadOptions) {
    this.batchSize = options.batchSize ?? 1000;
  }

  async run(): Promise<GoldLoadResult> {
    const { ledger, logger } = this.options;

    return bracketRun(ledger, logger, GOLD_PROCESS_NAME, async runId => {
      const result = await this.load(runId);
      return { status: result.status, message: result.message, value: result };
    });
  }

  private async load(runId: number | null): Promise<GoldLoadResult> {
    const { pool, schemas, logger } = this.options;
    const started = Date.now();
    const result: GoldLoadResult = {
      runId,
      status: 'error',
      message: '',
      customers: 0,
      products: 0,
      facts: 0,
      unknownProducts: { 'no-event-date': 0, 'unknown-key': 0, 'no-covering-version': 0 },
      unknownCustomers: 0
    };

    const writer = await pool.connect();
    let reader: PoolClient | null = null;
    try {
      reader = await pool.connect();
      await writer.query('BEGIN');
      const g = quoteIdent(schemas.gold);
      await writer.query(
        `TRUNCATE TABLE ${g}.fact_sales, ${g}.dim_products, ${g}.dim_customers RESTART IDENTITY`
      );

      logger.logPhaseStart('dim_customers');
      const customers = await writer.query<CustomerKeyRow>(customersSql(schemas.silver, schemas.gold));
      const customerKeys = new Map<number, number>();
      for (const row of customers.rows) {
        if (row.customer_id !== null) customerKeys.set(row.customer_id, row.customer_key);
      }
      result.customers = customers.rows.length;
      logger.logPhaseEnd('dim_customers', result.customers);

      logger.logPhaseStart('dim_products');
      const source = await writer.query<ProductSourceRow>(productsSourceSql(schemas.silver));
      const { index: products, inserted } = await this.insertProducts(writer, buildProductDimension(source.rows));
      result.products = inserted;
      logger.logPhaseEnd('dim_products', result.products);

      logger.logPhaseStart('fact_sales');
      const cursor = reader.query(new Cursor(salesSourceSql(schemas.silver)));
      try {
        let sales: SalesSourceRow[] = await cursor.read(this.batchSize);
        while (sales.length > 0) {
          const facts = sales.map(sale => resolveFact(sale, products, customerKeys));
          for (const fact of facts) {
            if (fact.unknownProduct !== null) result.unknownProducts[fact.unknownProduct]++;
            if (fact.unknownCustomer) result.unknownCustomers++;
          }
          await this.insertFacts(writer, facts.map(fact => fact.row));
          result.facts += facts.length;
          sales = await cursor.read(this.batchSize);
        }
      } finally {
        await cursor.close();
      }
      logger.logPhaseEnd('fact_sales', result.facts);

      await writer.query('COMMIT');
    } catch (error) {
      await writer.query('ROLLBACK');
      logger.logError(error, { process: GOLD_PROCESS_NAME });
      result.message = describeError(error);
      return result;
    } finally {
      reader?.release();
      writer.release();
    }

    const unknownProducts = Object.values(result.unknownProducts).reduce((a, b) => a + b, 0);
    if (unknownProducts > 0 || result.unknownCustomers > 0) {
      logger.warn('Facts with unresolved references', {
        unknown_products: result.unknownProducts,
        unknown_customers: result.unknownCustomers
      });
    }

    result.status = 'success';
    result.message =
      `Gold layer loaded in ${((Date.now() - started) / 1000).toFixed(2)}s: ` +
      `${result.customers} customers, ${result.products} products, ${result.facts} sales.`;
    logger.info(result.message);
    return result;
  }

  /** Inserts every dimension row; only dated versions enter the index. */
  private async insertProducts(
    client: PoolClient,
    rows: ProductDimensionRow[]
  ): Promise<{ index: PointInTimeIndex; inserted: number }> {
    const index = new PointInTimeIndex();
    let count = 0;

    for (let i = 0; i < rows.length; i += this.batchSize) {
      const chunk = rows.slice(i, i + this.batchSize);
      const values: unknown[] = [];
      for (const row of chunk) {
        for (const column of PRODUCT_COLUMNS) values.push(row[column]);
      }

      const inserted = await client.query<ProductKeyRow>(
        `INSERT INTO ${quoteIdent(this.options.schemas.gold)}.dim_products (${columnList(PRODUCT_COLUMNS)})
         VALUES ${valuesPlaceholders(chunk.length, PRODUCT_COLUMNS.length)}
         RETURNING product_key, product_number, start_date::text AS start_date, end_date::text AS end_date`,
        values
      );

      count += inserted.rows.length;
      for (const row of inserted.rows) {
        if (row.start_date === null) continue;
        index.add({
          key: row.product_number,
          startDate: row.start_date,
          endDate: row.end_date,
          surrogateKey: row.product_key
        });
      }
    }
    return { index, inserted: count };
  }

  private async insertFacts(client: PoolClient, rows: FactRow[]): Promise<void> {
    if (rows.length === 0) return;
    const values: unknown[] = [];
    for (const row of rows) {
      for (const column of FACT_COLUMNS) values.push(row[column]);
    }
    await client.query(
      `INSERT INTO ${quoteIdent(this.options.schemas.gold)}.fact_sales (${columnList(FACT_COLUMNS)})
       VALUES ${valuesPlaceholders(rows.length, FACT_COLUMNS.length)}`,
      values
    );
  }
}
