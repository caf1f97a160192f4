#!/usr/bin/env node
import { createPool, initializeWarehouseSchema, loadDatabaseConfig } from './config/database';
import { PipelineConfig, loadPipelineConfig } from './config/pipeline';
import { CliArguments, parseArguments } from './cli-args';
import { ConfigError, describeError } from './core/errors';
import { PipelineLogger } from './core/logger';
import { GoldLoad } from './layers/gold-load';
import { SilverLoad } from './layers/silver-load';
import { PgRunLedger } from './ledger/pg-run-ledger';
import { PipelineOrchestrator, exitCodeFor } from './pipeline/orchestrator';
import { printRunSummary, writeRunReport } from './pipeline/run-report';
import { PgWarehouse } from './warehouse/pg-warehouse';

function readStartup(): { cli: CliArguments; config: PipelineConfig } | null {
  try {
    const cli = parseArguments(process.argv.slice(2));
    return { cli, config: loadPipelineConfig(process.env, { faultPolicy: cli.policy }) };
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const startup = readStartup();
  if (startup === null) return 1;
  const { cli, config } = startup;

  const logger = new PipelineLogger({
    processName: 'warehouse_load',
    level: config.logLevel,
    logDir: config.logDir
  });
  const pool = createPool(loadDatabaseConfig(process.env));
  const ledger = new PgRunLedger(pool, config.schemas.bronze);
  let exitCode = 0;

  try {
    if (cli.initSchema) {
      logger.logPhaseStart('init_schema');
      await initializeWarehouseSchema(pool, config);
      logger.logPhaseEnd('init_schema');
    }

    if (cli.layer === 'bronze' || cli.layer === 'all') {
      const summary = await new PipelineOrchestrator({
        config,
        warehouse: new PgWarehouse(pool, config.schemas),
        ledger,
        logger: logger.child(config.processName)
      }).run();

      printRunSummary(summary);
      if (cli.report) {
        await writeRunReport(cli.report, summary);
        console.log(`\nRun report saved to: ${cli.report}`);
      }
      exitCode = exitCodeFor(summary, config.faultPolicy);
      if (exitCode !== 0) return exitCode;
    }

    if (cli.layer === 'silver' || cli.layer === 'all') {
      const summary = await new SilverLoad({
        pool,
        schemas: config.schemas,
        bronzeTables: config.tables,
        faultPolicy: config.faultPolicy,
        ledger,
        logger: logger.child('silver_load')
      }).run();

      printRunSummary(summary);
      if (summary.status === 'error') return 1;
    }

    if (cli.layer === 'gold' || cli.layer === 'all') {
      const result = await new GoldLoad({
        pool,
        schemas: config.schemas,
        ledger,
        logger: logger.child('gold_load')
      }).run();

      console.log(`\n${result.status.toUpperCase()}: ${result.message}`);
      if (result.status === 'error') return 1;
    }

    return exitCode;
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Error in main execution:', describeError(error));
      process.exitCode = 1;
    });
}
