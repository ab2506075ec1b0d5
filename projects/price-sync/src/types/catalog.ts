// src/types/catalog.ts

/**
 * Catalog article as used by the merge. Keyed by SKU.
 */
export interface Product {
  readonly sku: string;
  readonly name: string;
  readonly type: string;
  readonly brand: string;
  readonly group: string;
}

/**
 * Price of one SKU in one price list
 */
export interface PriceEntry {
  readonly sku: string;
  readonly priceListId: number;
  readonly taxRate: number;
  readonly unitPrice: number;
}

/**
 * Price/tax pair of a unified row for one configured price list.
 * Both values are null when the list has no entry for the SKU.
 */
export interface PriceCell {
  readonly priceListId: number;
  readonly unitPrice: number | null;
  readonly taxRate: number | null;
}

/**
 * One output row per catalog SKU. `prices` follows the configured price list order.
 */
export interface UnifiedRow extends Product {
  readonly prices: readonly PriceCell[];
}

export interface ExtractionResult<T> {
  records: T[];
  pagesFetched: number;
  skipped: number;
}
