import { LandingRow } from './types';

export type SilverValue = string | number | boolean | null;
export type SilverRow = Record<string, SilverValue>;

export interface CustomerInfo extends SilverRow {
  cst_id: number;
  cst_key: string;
  cst_firstname: string | null;
  cst_lastname: string | null;
  cst_marital_status: string;
  cst_gndr: string;
  cst_create_date: string | null;
}

export interface ProductInfo extends SilverRow {
  prd_id: number;
  prd_category: string;
  prd_key: string;
  prd_nm: string | null;
  prd_cost: number | null;
  prd_line: string;
  prd_start_dt: string | null;
  prd_end_dt: string | null;
}

export interface SalesDetail extends SilverRow {
  sls_ord_num: string;
  sls_prd_key: string;
  sls_cust_id: number;
  sls_order_dt: string | null;
  sls_ship_dt: string | null;
  sls_due_dt: string | null;
  sls_sales: number | null;
  sls_quantity: number | null;
  sls_price: number | null;
}

export interface CustomerDemographics extends SilverRow {
  cid: string;
  bdate: string | null;
  gen: string | null;
}

export interface CustomerLocation extends SilverRow {
  cid: string;
  cntry: string | null;
}

export interface ProductCategory extends SilverRow {
  id: string;
  cat: string | null;
  subcat: string | null;
  maintenance: boolean | null;
}

/**
 * Typed, trimmed and normalized rows from raw bronze strings. Every method
 * returns `null` for a row that has no usable business key.
 */
export class SilverTransformer {
  private maritalStatuses: Record<string, string> = { S: 'Single', M: 'Married' };
  private genders: Record<string, string> = { M: 'Male', F: 'Female' };
  private productLines: Record<string, string> = {
    M: 'Mountain',
    S: 'Other Sales',
    R: 'Road',
    T: 'Touring'
  };
  private countryAliases: Record<string, string> = {
    US: 'United States',
    USA: 'United States'
  };

  public customerInfo(row: LandingRow): CustomerInfo | null {
    const id = this.toInteger(row.cst_id);
    const key = this.clean(row.cst_key);
    if (id === null || key === null) return null;

    return {
      cst_id: id,
      cst_key: key,
      cst_firstname: this.clean(row.cst_firstname),
      cst_lastname: this.clean(row.cst_lastname),
      cst_marital_status: this.expandCode(row.cst_marital_status, this.maritalStatuses, 'Unknown'),
      cst_gndr: this.expandCode(row.cst_gndr, this.genders, 'Unknown'),
      cst_create_date: this.parseIsoDate(row.cst_create_date)
    };
  }

  public productInfo(row: LandingRow): ProductInfo | null {
    const id = this.toInteger(row.prd_id);
    const rawKey = this.clean(row.prd_key);
    if (id === null || rawKey === null) return null;

    return {
      prd_id: id,
      // "CO-RF-FR-R92B-58": category "CO_RF", product key "FR-R92B-58"
      prd_category: rawKey.substring(0, 5).replace(/-/g, '_'),
      prd_key: rawKey.substring(6),
      prd_nm: this.clean(row.prd_nm),
      prd_cost: this.toDecimal(row.prd_cost, 0),
      prd_line: this.expandCode(row.prd_line, this.productLines, 'N/A'),
      prd_start_dt: this.parseIsoDate(row.prd_start_dt),
      prd_end_dt: this.parseIsoDate(row.prd_end_dt)
    };
  }

  public salesDetail(row: LandingRow): SalesDetail | null {
    const orderNumber = this.clean(row.sls_ord_num);
    const productKey = this.clean(row.sls_prd_key);
    const customerId = this.toInteger(row.sls_cust_id);
    if (orderNumber === null || productKey === null || customerId === null) return null;

    return {
      sls_ord_num: orderNumber,
      sls_prd_key: productKey,
      sls_cust_id: customerId,
      sls_order_dt: this.parseCompactDate(row.sls_order_dt),
      sls_ship_dt: this.parseCompactDate(row.sls_ship_dt),
      sls_due_dt: this.parseCompactDate(row.sls_due_dt),
      sls_sales: this.toDecimal(row.sls_sales, 0),
      sls_quantity: this.toInteger(row.sls_quantity, 0),
      sls_price: this.toDecimal(row.sls_price, 0)
    };
  }

  public customerDemographics(row: LandingRow): CustomerDemographics | null {
    const raw = this.clean(row.cid);
    if (raw === null) return null;
    const cid = raw.startsWith('NAS') ? raw.substring(3) : raw;
    if (cid === '') return null;

    return {
      cid,
      bdate: this.parseIsoDate(row.bdate),
      gen: this.clean(row.gen)
    };
  }

  public customerLocation(row: LandingRow): CustomerLocation | null {
    const raw = this.clean(row.cid);
    if (raw === null) return null;
    const cid = raw.replace(/-/g, '');
    if (cid === '') return null;

    const country = this.clean(row.cntry);
    return {
      cid,
      cntry: country === null ? null : this.countryAliases[country] ?? country
    };
  }

  public productCategory(row: LandingRow): ProductCategory | null {
    const id = this.clean(row.id);
    if (id === null) return null;

    const maintenance = this.clean(row.maintenance);
    return {
      id,
      cat: this.clean(row.cat),
      subcat: this.clean(row.subcat),
      maintenance: maintenance === 'Yes' ? true : maintenance === 'No' ? false : null
    };
  }

  // Helper methods for transformation
  private clean(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }

  private expandCode(value: string | null | undefined, codes: Record<string, string>, fallback: string): string {
    const code = this.clean(value)?.toUpperCase();
    if (code === undefined) return fallback;
    return codes[code] ?? fallback;
  }

  private toInteger(value: string | null | undefined, whenEmpty: number | null = null): number | null {
    const cleaned = this.clean(value);
    if (cleaned === null) return whenEmpty;
    if (!/^[+-]?\d+$/.test(cleaned)) return null;
    const parsed = Number(cleaned);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }

  private toDecimal(value: string | null | undefined, whenEmpty: number | null = null): number | null {
    const cleaned = this.clean(value);
    if (cleaned === null) return whenEmpty;
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(cleaned)) return null;
    return Number(cleaned);
  }

  /** `YYYY-MM-DD`, optionally followed by a time part that is dropped. */
  private parseIsoDate(value: string | null | undefined): string | null {
    const cleaned = this.clean(value);
    if (cleaned === null) return null;
    const match = /^(\d{4})-(\d{2})-(\d{2})(?:[ T].*)?$/.exec(cleaned);
    if (!match) return null;
    return this.validDay(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  /** `YYYYMMDD`; anything that is not exactly eight digits is no date. */
  private parseCompactDate(value: string | null | undefined): string | null {
    const cleaned = this.clean(value);
    if (cleaned === null || !/^\d{8}$/.test(cleaned)) return null;
    return this.validDay(
      Number(cleaned.substring(0, 4)),
      Number(cleaned.substring(4, 6)),
      Number(cleaned.substring(6, 8))
    );
  }

  private validDay(year: number, month: number, day: number): string | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (
      year < 1 ||
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      return null;
    }
    return date.toISOString().slice(0, 10);
  }
}
