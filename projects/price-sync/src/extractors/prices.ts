// src/extractors/prices.ts
import { PageFetcher, PageRequest } from '../infrastructure/http';
import { ExtractionResult, PriceEntry } from '../types/catalog';
import { roundTo } from '../utils/object';
import { PriceRecordSchema, toNumber } from './schemas';
import { BasePaginatedExtractor, ExtractorOptions, RecordOutcome } from './base';

export interface PriceExtractorOptions extends ExtractorOptions {
  endpoint: string;
  /** Store unit prices with tax applied, rounded to cents */
  includeTaxInPrice: boolean;
}

/**
 * Reads every configured price list, one full pagination per list,
 * in the configured order. Any failing list fails the extraction.
 */
export class PriceExtractor extends BasePaginatedExtractor<PriceEntry> {
  protected readonly source = 'prices';

  constructor(fetcher: PageFetcher, private readonly priceOptions: PriceExtractorOptions) {
    super(fetcher, priceOptions);
  }

  async extract(priceLists: readonly number[]): Promise<ExtractionResult<PriceEntry>> {
    this.logger.info('Starting prices extraction...', { priceLists: [...priceLists] });

    const total: ExtractionResult<PriceEntry> = { records: [], pagesFetched: 0, skipped: 0 };

    for (const priceListId of priceLists) {
      this.logger.info(`Processing price list ${priceListId}`);

      const result = await this.paginate({
        endpoint: this.priceOptions.endpoint,
        priceListId,
        query: { mostrar_sin_precio: true }
      });

      total.records.push(...result.records);
      total.pagesFetched += result.pagesFetched;
      total.skipped += result.skipped;

      this.logger.info(`Extracted ${result.records.length} prices from list ${priceListId}`, {
        pagesFetched: result.pagesFetched,
        skipped: result.skipped
      });
    }

    this.logger.info(`Total price entries extracted: ${total.records.length}`);
    return total;
  }

  protected mapRecord(raw: unknown, request: Omit<PageRequest, 'page'>): RecordOutcome<PriceEntry> {
    const { priceListId } = request;
    if (priceListId === undefined) {
      return { kept: false, reason: 'price request without a price list' };
    }

    const parsed = PriceRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return { kept: false, reason: 'not a price object' };
    }

    const record = parsed.data;
    if (!record.sku) {
      return { kept: false, reason: 'price without SKU' };
    }

    // A missing price field reads as 0; an explicit null is skipped below
    const unitPrice = record.precio_unitario === undefined ? 0 : toNumber(record.precio_unitario);
    const taxRate = record.iva_tasa == null ? 0 : toNumber(record.iva_tasa);
    if (unitPrice === null || taxRate === null) {
      this.logger.warn(`Non-numeric price or tax for SKU ${record.sku}`, {
        priceListId,
        precio_unitario: record.precio_unitario,
        iva_tasa: record.iva_tasa
      });
      return { kept: false, reason: `non-numeric price for SKU ${record.sku}` };
    }

    return {
      kept: true,
      value: {
        sku: record.sku,
        priceListId,
        taxRate,
        unitPrice: this.priceOptions.includeTaxInPrice ? roundTo(unitPrice * (1 + taxRate), 2) : unitPrice
      }
    };
  }
}
