// src/core/services/merge.ts
import { PriceCell, PriceEntry, Product, UnifiedRow } from '../../types/catalog';
import { MergeInconsistency } from '../../utils/error';

export interface MergeStats {
  products: number;
  priceEntries: number;
  rows: number;
  duplicateSkus: number;
  duplicatePriceEntries: number;
  orphanPriceSkus: number;
  /** Entries of price lists outside the configured order */
  ignoredPriceEntries: number;
  /** Configured (row, list) pairs without a price */
  missingPrices: number;
}

export interface MergeResult {
  rows: UnifiedRow[];
  inconsistencies: MergeInconsistency[];
  stats: MergeStats;
}

/**
 * Join catalog articles and price entries by SKU.
 *
 * - one row per distinct catalog SKU, in article order; the first occurrence of a SKU wins
 * - price cells follow `priceListOrder`; for a repeated (SKU, list) pair the last entry wins
 * - SKUs that only appear in price data are dropped
 */
export function mergeCatalog(
  products: readonly Product[],
  priceEntries: readonly PriceEntry[],
  priceListOrder: readonly number[]
): MergeResult {
  const inconsistencies: MergeInconsistency[] = [];
  const configuredLists = new Set(priceListOrder);

  const productsBySku = new Map<string, Product>();
  for (const product of products) {
    if (productsBySku.has(product.sku)) {
      inconsistencies.push(new MergeInconsistency('duplicate-sku', product.sku));
      continue;
    }
    productsBySku.set(product.sku, product);
  }

  const pricesBySku = new Map<string, Map<number, PriceEntry>>();
  const orphanSkus = new Set<string>();
  let duplicatePriceEntries = 0;
  let ignoredPriceEntries = 0;

  for (const entry of priceEntries) {
    if (!configuredLists.has(entry.priceListId)) {
      ignoredPriceEntries++;
      continue;
    }
    if (!productsBySku.has(entry.sku)) {
      if (!orphanSkus.has(entry.sku)) {
        orphanSkus.add(entry.sku);
        inconsistencies.push(new MergeInconsistency('orphan-price', entry.sku));
      }
      continue;
    }

    let skuPrices = pricesBySku.get(entry.sku);
    if (!skuPrices) {
      skuPrices = new Map<number, PriceEntry>();
      pricesBySku.set(entry.sku, skuPrices);
    }
    if (skuPrices.has(entry.priceListId)) {
      duplicatePriceEntries++;
      inconsistencies.push(new MergeInconsistency('duplicate-price', entry.sku, entry.priceListId));
    }
    skuPrices.set(entry.priceListId, entry);
  }

  let missingPrices = 0;
  const rows: UnifiedRow[] = [];

  for (const product of productsBySku.values()) {
    const skuPrices = pricesBySku.get(product.sku);
    const prices: PriceCell[] = priceListOrder.map((priceListId) => {
      const entry = skuPrices?.get(priceListId);
      if (!entry) {
        missingPrices++;
        return { priceListId, unitPrice: null, taxRate: null };
      }
      return { priceListId, unitPrice: entry.unitPrice, taxRate: entry.taxRate };
    });

    rows.push({ ...product, prices });
  }

  return {
    rows,
    inconsistencies,
    stats: {
      products: products.length,
      priceEntries: priceEntries.length,
      rows: rows.length,
      duplicateSkus: products.length - productsBySku.size,
      duplicatePriceEntries,
      orphanPriceSkus: orphanSkus.size,
      ignoredPriceEntries,
      missingPrices
    }
  };
}
