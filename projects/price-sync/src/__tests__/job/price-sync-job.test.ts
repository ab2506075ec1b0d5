// End-to-end tests for one sync run against in-process API and spreadsheet stand-ins
import fs from 'fs-extra';
import { AppConfig } from '../../config';
import { PriceSyncJob } from '../../core/job';
import { VendorApiClient } from '../../infrastructure/http';
import { JobLock } from '../../infrastructure/lock';
import { Logger } from '../../infrastructure/logging';
import { SheetWriter } from '../../infrastructure/sheets';
import { AuthFailure, ConfigurationError, FetchFailure } from '../../utils/error';
import { createTempDir, createTestLogger, loadTestConfig } from '../../testing/config-helper';
import { InMemorySpreadsheetGateway } from '../../testing/in-memory-gateway';
import { CaddisFixture, STUB_BASE_URL, StubHandler, StubHttp, caddisHandler } from '../../testing/stub-http';

const HEADER = [
  'Código', 'Tipo', 'Artículo', 'Grupo', 'Marca',
  'Minorista Ars', 'Minorista Ars IVA', 'Dealer Ars', 'Dealer Ars IVA'
];

describe('PriceSyncJob', () => {
  let tempDir: string;
  let config: AppConfig;
  let logger: Logger;
  let gateway: InMemorySpreadsheetGateway;

  beforeEach(async () => {
    tempDir = await createTempDir();
    config = loadTestConfig(tempDir, { PRICE_LISTS: '1,2', MAX_RETRIES: '2' });
    logger = createTestLogger();
    gateway = new InMemorySpreadsheetGateway();
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  function createLock(): JobLock {
    return new JobLock({ lockFile: config.job.lockFile, staleAfterMs: 60_000, logger });
  }

  function createJob(handler: StubHandler, options: { withWriter?: boolean } = {}) {
    const stub = new StubHttp(handler);
    const api = new VendorApiClient({
      baseUrl: STUB_BASE_URL,
      loginPath: config.api.loginPath,
      timeoutMs: 1000,
      maxRetries: config.api.maxRetries,
      rateLimitDelayMs: 0,
      logger,
      http: stub.client,
      sleep: async () => undefined
    });
    const writer = options.withWriter === false
      ? undefined
      : new SheetWriter(gateway, { sheetName: config.sheets.sheetName, mode: 'direct', applyFormats: true, logger });

    const job = new PriceSyncJob({ config, logger, api, lock: createLock(), writer });
    return { job, stub };
  }

  function fixture(overrides: Partial<CaddisFixture> = {}): StubHandler {
    return caddisHandler({
      articles: [[{ sku: 'A1', nombre: 'Foo' }]],
      prices: { 1: [[{ sku: 'A1', iva_tasa: 0.21, precio_unitario: 100 }]] },
      ...overrides
    });
  }

  it('should write one row per article with its prices', async () => {
    const { job, stub } = createJob(fixture());

    const summary = await job.run();

    expect(gateway.sheet('Caddis Data')?.values).toEqual([
      HEADER,
      ['A1', '', 'Foo', '', '', 100, 0.21, '', '']
    ]);
    expect(summary).toMatchObject({
      status: 'completed',
      dryRun: false,
      articles: 1,
      priceEntries: 1,
      pagesFetched: 5,
      rows: 1,
      write: { sheetName: 'Caddis Data', mode: 'direct', rowsWritten: 1, columns: 9 }
    });
    expect(stub.requestsTo('/v1/articulos').map((request) => request.params.pagina)).toEqual([1, 2]);
    expect(stub.requestsTo('/v1/articulos/precios').map((request) => [request.params.lista, request.params.pagina]))
      .toEqual([[1, 1], [1, 2], [2, 1]]);
    expect(stub.requests.slice(1).every((request) => request.authorization === 'Bearer test-token')).toBe(true);
  });

  it('should complete when the run report cannot be saved', async () => {
    jest.spyOn(logger, 'writeReport').mockRejectedValue(new Error('ENOSPC: no space left on device'));
    const warn = jest.spyOn(logger, 'warn');
    const { job } = createJob(fixture());

    const summary = await job.run();

    expect(summary.status).toBe('completed');
    expect(gateway.sheet('Caddis Data')?.values).toHaveLength(2);
    expect(warn).toHaveBeenCalledWith('Run summary report could not be written', {
      error: expect.objectContaining({ message: 'ENOSPC: no space left on device' })
    });
  });

  it('should write only the header for an empty catalog', async () => {
    const { job } = createJob(fixture({ articles: [] }));

    const summary = await job.run();

    expect(gateway.sheet('Caddis Data')?.values).toEqual([HEADER]);
    expect(summary.rows).toBe(0);
    expect(summary.write?.rowsWritten).toBe(0);
  });

  it('should drop price-only SKUs and keep the last duplicate price', async () => {
    const { job } = createJob(fixture({
      prices: {
        1: [[{ sku: 'A1', iva_tasa: 0.21, precio_unitario: 100 }, { sku: 'ZZ', iva_tasa: 0.21, precio_unitario: 1 }]],
        2: [[{ sku: 'A1', iva_tasa: 0.21, precio_unitario: 90 }], [{ sku: 'A1', iva_tasa: 0.21, precio_unitario: 95 }]]
      }
    }));

    const summary = await job.run();

    expect(gateway.sheet('Caddis Data')?.values).toEqual([
      HEADER,
      ['A1', '', 'Foo', '', '', 100, 0.21, 95, 0.21]
    ]);
    expect(summary.merge).toMatchObject({ orphanPriceSkus: 1, duplicatePriceEntries: 1 });
  });

  it('should not touch the spreadsheet when a price list fails', async () => {
    const healthy = fixture();
    const { job, stub } = createJob((request) =>
      request.url === '/v1/articulos/precios' && request.params.lista === 2 ? { status: 500 } : healthy(request)
    );

    await expect(job.run()).rejects.toBeInstanceOf(FetchFailure);
    expect(gateway.operations).toEqual([]);
    expect(stub.requestsTo('/v1/articulos/precios').filter((request) => request.params.lista === 2)).toHaveLength(2);
    expect(await fs.pathExists(config.job.lockFile)).toBe(false);
  });

  it('should stop before extracting when login fails', async () => {
    const { job, stub } = createJob(() => ({ status: 401 }));

    await expect(job.run()).rejects.toBeInstanceOf(AuthFailure);
    expect(stub.requests).toHaveLength(1);
    expect(gateway.operations).toEqual([]);
  });

  it('should skip the run while another one holds the lock', async () => {
    const other = createLock();
    await other.acquire();
    const { job, stub } = createJob(fixture());

    const summary = await job.run();

    expect(summary.status).toBe('skipped');
    expect(stub.requests).toEqual([]);
    expect(gateway.operations).toEqual([]);
    expect(await fs.pathExists(config.job.lockFile)).toBe(true);
    await other.release();
  });

  it('should leave the spreadsheet alone on a dry run', async () => {
    const { job } = createJob(fixture(), { withWriter: false });

    const summary = await job.run({ dryRun: true });

    expect(summary).toMatchObject({ status: 'completed', dryRun: true, rows: 1, write: null });
    expect(gateway.operations).toEqual([]);
  });

  it('should require a writer outside dry runs', async () => {
    const { job, stub } = createJob(fixture(), { withWriter: false });

    await expect(job.run()).rejects.toBeInstanceOf(ConfigurationError);
    expect(stub.requests).toEqual([]);
  });
});
