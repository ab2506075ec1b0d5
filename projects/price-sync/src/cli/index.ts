// CLI interface for the Caddis price sync job
import { Command } from 'commander';
import { AppConfig, createConfig, describeConfig, ensureConfigDirectories } from '../config';
import { PriceSyncJob } from '../core/job';
import { priceListColumnName } from '../core/services/sheet-table';
import { VendorApiClient } from '../infrastructure/http';
import { JobLock } from '../infrastructure/lock';
import { LogLevel, Logger, cleanupLogger, initializeLogger } from '../infrastructure/logging';
import { GoogleSheetsGateway, SheetWriter } from '../infrastructure/sheets';
import { ConfigurationError, errorMessage, setupGlobalErrorHandlers } from '../utils/error';

const LOG_LEVELS: Record<AppConfig['logging']['level'], LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

interface RunCommandOptions {
  config?: string;
  dryRun?: boolean;
}

interface CheckConfigOptions {
  config?: string;
}

async function initializeCLI(configPath?: string): Promise<{ config: AppConfig; logger: Logger }> {
  setupGlobalErrorHandlers();

  const config = createConfig({ configPath });
  await ensureConfigDirectories(config);

  const logger = initializeLogger({
    logDir: config.logging.logDir,
    level: LOG_LEVELS[config.logging.level],
    consoleOutput: config.logging.consoleOutput,
    fileOutput: config.logging.fileOutput,
    applicationName: 'caddis-price-sync'
  });

  logger.info('Configuration loaded', describeConfig(config));
  return { config, logger };
}

async function runCommand(options: RunCommandOptions): Promise<void> {
  const { config, logger } = await initializeCLI(options.config);
  const dryRun = options.dryRun ?? false;

  try {
    if (!dryRun && !config.sheets.spreadsheetId) {
      throw new ConfigurationError('Missing required configuration: sheets.spreadsheetId (set GOOGLE_SHEETS_ID)');
    }

    const writer = dryRun
      ? undefined
      : new SheetWriter(new GoogleSheetsGateway(config.sheets.spreadsheetId), {
        sheetName: config.sheets.sheetName,
        mode: config.sheets.writeMode,
        applyFormats: config.sheets.applyFormats,
        logger
      });

    const job = new PriceSyncJob({
      config,
      logger,
      api: VendorApiClient.fromConfig(config.api, logger),
      lock: new JobLock({
        lockFile: config.job.lockFile,
        staleAfterMs: config.job.lockStaleAfterSeconds * 1000,
        logger
      }),
      writer
    });

    await job.run({ dryRun });
  } catch (error) {
    logger.critical(`Process failed: ${errorMessage(error)}`, error);
    throw error;
  } finally {
    cleanupLogger();
  }
}

async function checkConfigCommand(options: CheckConfigOptions): Promise<void> {
  const config = createConfig({ configPath: options.config });

  console.log('\nConfiguration:');
  for (const [key, value] of Object.entries(describeConfig(config))) {
    console.log(`  ${key}: ${Array.isArray(value) ? value.join(', ') : String(value)}`);
  }

  console.log('\nPrice list columns (output order):');
  for (const priceListId of config.extraction.priceLists) {
    console.log(`  ${priceListId}: ${priceListColumnName(priceListId, config.priceListNames)}`);
  }
}

const program = new Command();

program
  .name('caddis-price-sync')
  .description('Sync the Caddis catalog and price lists into a Google Sheets tab')
  .version(process.env.npm_package_version || '1.0.0');

program
  .command('run')
  .description('Extract articles and prices, merge them and overwrite the spreadsheet tab')
  .option('-c, --config <path>', 'JSON file overriding the default configuration')
  .option('--dry-run', 'Extract and merge without writing to Google Sheets')
  .action(async (options: RunCommandOptions) => {
    try {
      await runCommand(options);
    } catch (error) {
      console.error('Run failed:', errorMessage(error));
      process.exitCode = 1;
    }
  });

program
  .command('check-config')
  .description('Validate the configuration and print the price list columns')
  .option('-c, --config <path>', 'JSON file overriding the default configuration')
  .action(async (options: CheckConfigOptions) => {
    try {
      await checkConfigCommand(options);
    } catch (error) {
      console.error('Configuration check failed:', errorMessage(error));
      process.exitCode = 1;
    }
  });

export { program };
