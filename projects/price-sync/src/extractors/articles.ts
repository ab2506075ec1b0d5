// src/extractors/articles.ts
import { PageFetcher } from '../infrastructure/http';
import { ExtractionResult, Product } from '../types/catalog';
import { ArticleRecordSchema } from './schemas';
import { BasePaginatedExtractor, ExtractorOptions, RecordOutcome } from './base';

export interface ArticleExtractorOptions extends ExtractorOptions {
  endpoint: string;
  skipInactive: boolean;
}

const INACTIVE_STATE = 'INACTIVO';

/**
 * Reads the whole article catalog in page order
 */
export class ArticleExtractor extends BasePaginatedExtractor<Product> {
  protected readonly source = 'articles';

  constructor(fetcher: PageFetcher, private readonly articleOptions: ArticleExtractorOptions) {
    super(fetcher, articleOptions);
  }

  async extract(): Promise<ExtractionResult<Product>> {
    this.logger.info('Starting articles extraction...');

    const result = await this.paginate({ endpoint: this.articleOptions.endpoint });

    this.logger.info(`Total articles extracted: ${result.records.length}`, {
      pagesFetched: result.pagesFetched,
      skipped: result.skipped
    });
    return result;
  }

  protected mapRecord(raw: unknown): RecordOutcome<Product> {
    const parsed = ArticleRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return { kept: false, reason: 'not an article object' };
    }

    const article = parsed.data;
    if (!article.sku) {
      return { kept: false, reason: 'article without SKU' };
    }
    if (this.articleOptions.skipInactive && article.estado.toUpperCase() === INACTIVE_STATE) {
      return { kept: false, reason: `inactive SKU ${article.sku}` };
    }

    return {
      kept: true,
      value: {
        sku: article.sku,
        name: article.nombre,
        type: article.tipo,
        brand: article.marca,
        group: article.grupo
      }
    };
  }
}
