// src/core/job/price-sync-job.ts
import { AppConfig } from '../../config';
import { ArticleExtractor, PriceExtractor } from '../../extractors';
import { VendorApi } from '../../infrastructure/http';
import { JobLock } from '../../infrastructure/lock';
import { Logger } from '../../infrastructure/logging';
import { SheetWriteResult, TableWriter } from '../../infrastructure/sheets';
import { ConfigurationError, JobLockedError, MergeInconsistency, serializeError } from '../../utils/error';
import { MergeStats, mergeCatalog } from '../services/merge';
import { buildSheetTable } from '../services/sheet-table';

/** Inconsistencies logged one by one; the rest only show up in the counters */
const MAX_LOGGED_INCONSISTENCIES = 50;

export interface PriceSyncJobDependencies {
  config: AppConfig;
  logger: Logger;
  api: VendorApi;
  lock: JobLock;
  /** Not needed for dry runs */
  writer?: TableWriter;
}

export interface RunOptions {
  /** Extract and merge, but leave the spreadsheet untouched */
  dryRun?: boolean;
}

export interface JobSummary {
  status: 'completed' | 'skipped';
  dryRun: boolean;
  articles: number;
  priceEntries: number;
  pagesFetched: number;
  skippedRecords: number;
  rows: number;
  merge: MergeStats | null;
  write: SheetWriteResult | null;
  startedAt: string;
  durationMs: number;
}

/**
 * One full sync: articles, then every price list, merge, single bulk write.
 * Any fatal error aborts before the spreadsheet is touched.
 */
export class PriceSyncJob {
  constructor(private readonly deps: PriceSyncJobDependencies) {}

  async run(options: RunOptions = {}): Promise<JobSummary> {
    const { config, logger, lock } = this.deps;
    const dryRun = options.dryRun ?? false;
    const startTime = Date.now();
    const startedAt = new Date(startTime).toISOString();

    if (!dryRun && !this.deps.writer) {
      throw new ConfigurationError('A sheet writer is required unless running with dryRun');
    }

    try {
      await lock.acquire();
    } catch (error) {
      if (error instanceof JobLockedError) {
        logger.warn('Previous run still active, skipping this one', { error: serializeError(error) });
        return skippedSummary(dryRun, startedAt, Date.now() - startTime);
      }
      throw error;
    }

    try {
      logger.info('Starting Caddis API data extraction and Google Sheets upload process', {
        priceLists: [...config.extraction.priceLists],
        dryRun
      });

      await this.deps.api.login(config.credentials);

      logger.info('Phase 1: Extracting articles...');
      const articles = await new ArticleExtractor(this.deps.api, {
        endpoint: config.api.articlesPath,
        maxPages: config.api.maxPages,
        skipInactive: config.extraction.skipInactiveArticles,
        logger
      }).extract();

      logger.info('Phase 2: Extracting prices...');
      const prices = await new PriceExtractor(this.deps.api, {
        endpoint: config.api.pricesPath,
        maxPages: config.api.maxPages,
        includeTaxInPrice: config.extraction.includeTaxInPrice,
        logger
      }).extract(config.extraction.priceLists);

      logger.info('Phase 3: Processing and combining data...');
      const merged = mergeCatalog(articles.records, prices.records, config.extraction.priceLists);
      this.logInconsistencies(merged.inconsistencies);
      logger.info(`Combined data for ${merged.rows.length} products`, { ...merged.stats });

      const table = buildSheetTable(merged.rows, config.extraction.priceLists, config.priceListNames);

      let write: SheetWriteResult | null = null;
      if (dryRun) {
        logger.info('Dry run: skipping Google Sheets upload', { rows: table.rows.length, columns: table.header.length });
      } else if (this.deps.writer) {
        logger.info('Phase 4: Uploading to Google Sheets...');
        write = await this.deps.writer.write(table);
      }

      const summary: JobSummary = {
        status: 'completed',
        dryRun,
        articles: articles.records.length,
        priceEntries: prices.records.length,
        pagesFetched: articles.pagesFetched + prices.pagesFetched,
        skippedRecords: articles.skipped + prices.skipped,
        rows: merged.rows.length,
        merge: merged.stats,
        write,
        startedAt,
        durationMs: Date.now() - startTime
      };

      logger.info('Process completed successfully!', { ...summary });
      await this.writeReport(summary);
      return summary;
    } finally {
      await lock.release();
    }
  }

  /** Runs after the write; a failure here only warns */
  private async writeReport(summary: JobSummary): Promise<void> {
    const { logger } = this.deps;
    try {
      await logger.writeReport('price-sync-summary', summary);
    } catch (error) {
      logger.warn('Run summary report could not be written', { error: serializeError(error) });
    }
  }

  private logInconsistencies(inconsistencies: readonly MergeInconsistency[]): void {
    const { logger } = this.deps;
    for (const inconsistency of inconsistencies.slice(0, MAX_LOGGED_INCONSISTENCIES)) {
      logger.warn(inconsistency.message, { ...inconsistency.details });
    }
    if (inconsistencies.length > MAX_LOGGED_INCONSISTENCIES) {
      logger.warn(`${inconsistencies.length - MAX_LOGGED_INCONSISTENCIES} more merge inconsistencies not logged individually`);
    }
  }
}

function skippedSummary(dryRun: boolean, startedAt: string, durationMs: number): JobSummary {
  return {
    status: 'skipped',
    dryRun,
    articles: 0,
    priceEntries: 0,
    pagesFetched: 0,
    skippedRecords: 0,
    rows: 0,
    merge: null,
    write: null,
    startedAt,
    durationMs
  };
}
