import { ContainerRef, TableSpec, WarehouseSchemas } from '../core/types';

export const LANDING_PREFIX = 'stg_';
export const LANDING_SEQUENCE_COLUMN = '_landing_seq';

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function qualified(container: ContainerRef): string {
  return `${quoteIdent(container.schema)}.${quoteIdent(container.table)}`;
}

export function landingContainer(table: TableSpec, schemas: WarehouseSchemas): ContainerRef {
  return { schema: schemas.bronze, table: `${LANDING_PREFIX}${table.name}` };
}

export function targetContainer(table: TableSpec, schemas: WarehouseSchemas): ContainerRef {
  return { schema: schemas.bronze, table: table.name };
}

export function columnList(columns: readonly string[], alias?: string): string {
  const prefix = alias ? `${alias}.` : '';
  return columns.map(column => `${prefix}${quoteIdent(column)}`).join(', ');
}

/** `($1, $2), ($3, $4)` for a multi-row VALUES clause. */
export function valuesPlaceholders(rowCount: number, columnCount: number): string {
  const rows: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const params: string[] = [];
    for (let column = 0; column < columnCount; column++) {
      params.push(`$${row * columnCount + column + 1}`);
    }
    rows.push(`(${params.join(', ')})`);
  }
  return rows.join(', ');
}
