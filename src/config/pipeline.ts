import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, describeError } from '../core/errors';
import { FaultPolicy, TableSpec, WarehouseSchemas } from '../core/types';

const identifier = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lower-case SQL identifier');

const formatSchema = z.object({
  delimiter: z.string().length(1).default(','),
  quoteChar: z.string().length(1).default('"'),
  lineTerminator: z.enum(['\n', '\r\n']).default('\r\n'),
  headerRowsToSkip: z.number().int().min(0).default(1)
});

const tableSchema = z
  .object({
    name: identifier,
    columns: z.array(identifier).min(1),
    businessKeyColumns: z.array(identifier).min(1),
    sourcePath: z.string().min(1),
    format: formatSchema.default({})
  })
  .superRefine((table, ctx) => {
    for (const key of table.businessKeyColumns) {
      if (!table.columns.includes(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['businessKeyColumns'],
          message: `key column "${key}" is not one of the table's columns`
        });
      }
    }
    if (new Set(table.columns).size !== table.columns.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['columns'], message: 'duplicate column' });
    }
  });

export const tablesFileSchema = z
  .object({
    processName: z.string().min(1).default('bronze_load'),
    tables: z.array(tableSchema).min(1)
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.tables.forEach((table, index) => {
      if (seen.has(table.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tables', index, 'name'],
          message: `table "${table.name}" is configured twice`
        });
      }
      seen.add(table.name);
    });
  });

const envSchema = z.object({
  ETL_TABLES_FILE: z.string().default('config/tables.json'),
  ETL_SOURCE_DIR: z.string().default('datasets'),
  ETL_FAULT_POLICY: z.enum(['continue', 'abort']).default('continue'),
  ETL_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  ETL_LOG_DIR: z.string().default('logs'),
  ETL_BRONZE_SCHEMA: identifier.default('bronze'),
  ETL_SILVER_SCHEMA: identifier.default('silver'),
  ETL_GOLD_SCHEMA: identifier.default('gold')
});

export interface PipelineConfig {
  readonly processName: string;
  readonly tables: readonly TableSpec[];
  readonly faultPolicy: FaultPolicy;
  readonly schemas: Readonly<WarehouseSchemas>;
  readonly logLevel: string;
  readonly logDir: string;
}

export interface PipelineOverrides {
  faultPolicy?: FaultPolicy;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Builds the table specifications from an already-parsed tables document.
 * Relative source paths are resolved against `sourceDir`.
 */
export function parseTablesDocument(document: unknown, sourceDir: string): { processName: string; tables: TableSpec[] } {
  const parsed = tablesFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`Invalid table configuration: ${formatIssues(parsed.error)}`);
  }

  const tables = parsed.data.tables.map(table => ({
    ...table,
    sourcePath: path.isAbsolute(table.sourcePath)
      ? table.sourcePath
      : path.resolve(sourceDir, table.sourcePath)
  }));
  return { processName: parsed.data.processName, tables };
}

function freezeTable(table: TableSpec): TableSpec {
  return Object.freeze({
    ...table,
    columns: Object.freeze([...table.columns]),
    businessKeyColumns: Object.freeze([...table.businessKeyColumns]),
    format: Object.freeze({ ...table.format })
  });
}

/**
 * Reads the environment once and returns the immutable run configuration.
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv,
  overrides: PipelineOverrides = {}
): PipelineConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
  }
  const settings = parsedEnv.data;

  let raw: string;
  try {
    raw = fs.readFileSync(settings.ETL_TABLES_FILE, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read table configuration ${settings.ETL_TABLES_FILE}: ${describeError(error)}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Table configuration ${settings.ETL_TABLES_FILE} is not valid JSON: ${describeError(error)}`);
  }

  const { processName, tables } = parseTablesDocument(document, settings.ETL_SOURCE_DIR);

  return Object.freeze({
    processName,
    tables: Object.freeze(tables.map(freezeTable)),
    faultPolicy: overrides.faultPolicy ?? settings.ETL_FAULT_POLICY,
    schemas: Object.freeze({
      bronze: settings.ETL_BRONZE_SCHEMA,
      silver: settings.ETL_SILVER_SCHEMA,
      gold: settings.ETL_GOLD_SCHEMA
    }),
    logLevel: settings.ETL_LOG_LEVEL,
    logDir: settings.ETL_LOG_DIR
  });
}
