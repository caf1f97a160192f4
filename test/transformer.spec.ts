import { describe, it, expect } from 'vitest';
import { SilverTransformer } from '../src/core/transformer';

describe('SilverTransformer', () => {
  const transformer = new SilverTransformer();

  it('trims customers and expands marital status and gender codes', () => {
    expect(
      transformer.customerInfo({
        cst_id: ' 42 ',
        cst_key: 'AB00000042',
        cst_firstname: '  Test ',
        cst_lastname: 'Person',
        cst_marital_status: 'm',
        cst_gndr: ' F',
        cst_create_date: '2023-10-06'
      })
    ).toEqual({
      cst_id: 42,
      cst_key: 'AB00000042',
      cst_firstname: 'Test',
      cst_lastname: 'Person',
      cst_marital_status: 'Married',
      cst_gndr: 'Female',
      cst_create_date: '2023-10-06'
    });
  });

  it('falls back to Unknown for missing codes and rejects rows without a usable id', () => {
    const row = transformer.customerInfo({ cst_id: '7', cst_key: 'AB7', cst_marital_status: null, cst_gndr: 'X' });
    expect(row?.cst_marital_status).toBe('Unknown');
    expect(row?.cst_gndr).toBe('Unknown');

    expect(transformer.customerInfo({ cst_id: null, cst_key: 'AB7' })).toBeNull();
    expect(transformer.customerInfo({ cst_id: '7a', cst_key: 'AB7' })).toBeNull();
    expect(transformer.customerInfo({ cst_id: '7', cst_key: '  ' })).toBeNull();
  });

  it('splits the product key into category and product number', () => {
    expect(
      transformer.productInfo({
        prd_id: '7',
        prd_key: 'AB-CD-XY-1234-56',
        prd_nm: 'Widget',
        prd_cost: '',
        prd_line: 'r ',
        prd_start_dt: '2021-07-01 00:00:00',
        prd_end_dt: null
      })
    ).toEqual({
      prd_id: 7,
      prd_category: 'AB_CD',
      prd_key: 'XY-1234-56',
      prd_nm: 'Widget',
      prd_cost: 0,
      prd_line: 'Road',
      prd_start_dt: '2021-07-01',
      prd_end_dt: null
    });
  });

  it('keeps end dates before start dates for the dimension to correct', () => {
    const row = transformer.productInfo({
      prd_id: '8',
      prd_key: 'AB-CD-XY-1',
      prd_cost: 'n/a',
      prd_line: 'Q',
      prd_start_dt: '2021-07-01',
      prd_end_dt: '2020-06-30'
    });

    expect(row?.prd_end_dt).toBe('2020-06-30');
    expect(row?.prd_cost).toBeNull();
    expect(row?.prd_line).toBe('N/A');
  });

  it('parses compact sales dates and defaults empty amounts to zero', () => {
    expect(
      transformer.salesDetail({
        sls_ord_num: 'SO1',
        sls_prd_key: 'XY-1',
        sls_cust_id: '42',
        sls_order_dt: '20240131',
        sls_ship_dt: '20240231',
        sls_due_dt: '0',
        sls_sales: '',
        sls_quantity: '3',
        sls_price: '12.50'
      })
    ).toEqual({
      sls_ord_num: 'SO1',
      sls_prd_key: 'XY-1',
      sls_cust_id: 42,
      sls_order_dt: '2024-01-31',
      sls_ship_dt: null,
      sls_due_dt: null,
      sls_sales: 0,
      sls_quantity: 3,
      sls_price: 12.5
    });
  });

  it('rejects sales without order number, product or customer', () => {
    expect(transformer.salesDetail({ sls_ord_num: 'SO1', sls_prd_key: 'XY-1', sls_cust_id: '' })).toBeNull();
  });

  it('strips the NAS prefix from demographic customer ids', () => {
    expect(transformer.customerDemographics({ cid: 'NASAB00000042', bdate: '1980-02-30', gen: ' Female ' })).toEqual({
      cid: 'AB00000042',
      bdate: null,
      gen: 'Female'
    });
    expect(transformer.customerDemographics({ cid: 'NAS' })).toBeNull();
  });

  it('removes dashes from location ids and names the United States', () => {
    expect(transformer.customerLocation({ cid: 'AB-00000042', cntry: 'USA' })).toEqual({
      cid: 'AB00000042',
      cntry: 'United States'
    });
    expect(transformer.customerLocation({ cid: 'AB1', cntry: 'DE' })?.cntry).toBe('DE');
    expect(transformer.customerLocation({ cid: 'AB1', cntry: ' ' })?.cntry).toBeNull();
  });

  it('turns the maintenance flag into a boolean', () => {
    expect(transformer.productCategory({ id: 'AB_CD', cat: 'Bikes', subcat: 'Road', maintenance: 'Yes' })).toEqual({
      id: 'AB_CD',
      cat: 'Bikes',
      subcat: 'Road',
      maintenance: true
    });
    expect(transformer.productCategory({ id: 'AB_CD', maintenance: 'No' })?.maintenance).toBe(false);
    expect(transformer.productCategory({ id: 'AB_CD', maintenance: 'maybe' })?.maintenance).toBeNull();
  });
});
