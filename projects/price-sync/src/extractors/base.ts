// src/extractors/base.ts
import { PageFetcher, PageRequest } from '../infrastructure/http';
import { Logger } from '../infrastructure/logging';
import { ExtractionResult } from '../types/catalog';
import { PaginationLimitExceeded } from '../utils/error';

export interface ExtractorOptions {
  maxPages: number;
  logger: Logger;
}

/** Outcome of mapping one raw record */
export type RecordOutcome<T> =
  | { kept: true; value: T }
  | { kept: false; reason: string };

/**
 * Walks an endpoint page by page until the first empty page.
 * Subclasses map raw records to domain values.
 */
export abstract class BasePaginatedExtractor<T> {
  protected abstract readonly source: string;

  constructor(
    protected readonly fetcher: PageFetcher,
    protected readonly options: ExtractorOptions
  ) {}

  protected get logger(): Logger {
    return this.options.logger;
  }

  protected abstract mapRecord(raw: unknown, request: Omit<PageRequest, 'page'>): RecordOutcome<T>;

  protected async paginate(request: Omit<PageRequest, 'page'>): Promise<ExtractionResult<T>> {
    const result: ExtractionResult<T> = { records: [], pagesFetched: 0, skipped: 0 };

    for (let page = 1; ; page++) {
      const { records, isLastPage } = await this.fetcher.fetchPage({ ...request, page });
      result.pagesFetched++;

      if (isLastPage) {
        this.logger.info(`No more ${this.source} found at page ${page}`, { priceListId: request.priceListId });
        break;
      }

      // maxPages counts pages with data; the page after them must be empty
      if (page > this.options.maxPages) {
        throw new PaginationLimitExceeded(request.endpoint, this.options.maxPages, request.priceListId);
      }

      let kept = 0;
      for (const raw of records) {
        const outcome = this.mapRecord(raw, request);
        if (outcome.kept) {
          result.records.push(outcome.value);
          kept++;
        } else {
          result.skipped++;
          this.logger.debug(`Skipped ${this.source} record: ${outcome.reason}`, { page, priceListId: request.priceListId });
        }
      }

      this.logger.logPageFetched(this.source, page, {
        priceListId: request.priceListId,
        received: records.length,
        kept
      });
    }

    return result;
  }
}
